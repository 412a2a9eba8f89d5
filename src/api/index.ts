export { MutationGatewayServer, type GatewayServerOptions } from './server.js';
export {
  resolveConfig,
  resolveGraphQLConfig,
  type ServerConfig,
  type ServerConfigInput,
  type GraphQLConfig,
  type DispatchPolicy,
} from './config.js';
export { errorHandler, type ApiError } from './middleware/error-handler.js';
export {
  registerGraphQL,
  registerMutationHooks,
  requestOperationName,
  errorFormatter,
  mapError,
  type GraphQLRegistration,
} from './graphql/index.js';
export type { HealthResponse } from './routes/health.js';
