import type { FastifyInstance } from 'fastify';
import mercurius, { type IResolvers } from 'mercurius';
import type { MutationInterceptor } from '../../interceptor/mutation-interceptor.js';
import type { GraphQLConfig } from '../config.js';
import { errorFormatter } from './error-mapper.js';
import { registerMutationHooks } from './mutation-hooks.js';

export interface GraphQLRegistration {
  /** SDL of the hosted schema */
  schema: string;
  resolvers: IResolvers;
  interceptor: MutationInterceptor;
}

/**
 * Registers Mercurius with the hosted schema and puts the mutation
 * interceptor in front of execution.
 */
export async function registerGraphQL(
  fastify: FastifyInstance,
  registration: GraphQLRegistration,
  config: Required<GraphQLConfig>,
): Promise<void> {
  await fastify.register(mercurius, {
    schema: registration.schema,
    resolvers: registration.resolvers,
    path: config.path,
    graphiql: config.graphiql,
    errorFormatter,
  });

  registerMutationHooks(fastify, registration.interceptor, {
    dispatchPolicy: config.dispatchPolicy,
    loanIdResultFields: config.loanIdResultFields,
  });
}

export { errorFormatter, isGraphQLError, mapError } from './error-mapper.js';
export { registerMutationHooks, requestOperationName } from './mutation-hooks.js';
