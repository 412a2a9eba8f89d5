import type { FastifyServerOptions } from 'fastify';

/**
 * GraphQL endpoint configuration.
 */
export interface GraphQLConfig {
  /** Serve the GraphiQL IDE (default: true) */
  graphiql?: boolean;

  /** Path of the GraphQL endpoint (default: '/graphql') */
  path?: string;

  /**
   * Which extracted calls are dispatched once the operation has resolved.
   *
   * - `'resolved'` - skip calls whose field failed, and everything when `data` is null
   * - `'always'` - dispatch every extracted call
   *
   * Default: 'resolved'
   */
  dispatchPolicy?: DispatchPolicy;

  /**
   * Mutation fields whose string result is the id of the loan they created;
   * it becomes the dispatched call's `loanId`.
   *
   * Default: ['recordLoanRequested']
   */
  loanIdResultFields?: string[];
}

export type DispatchPolicy = 'resolved' | 'always';

export interface ServerConfig {
  /** Listening port (default: 4000) */
  port: number;

  /** Host address (default: '0.0.0.0') */
  host: string;

  /** Enable Fastify's pino logger (default: true) */
  logger: boolean;

  graphql: Required<GraphQLConfig>;

  /** Extra Fastify options */
  fastifyOptions: Omit<FastifyServerOptions, 'logger'> | undefined;
}

export interface ServerConfigInput {
  port?: number;
  host?: string;
  logger?: boolean;
  graphql?: GraphQLConfig;
  fastifyOptions?: Omit<FastifyServerOptions, 'logger'>;
}

const DEFAULT_GRAPHQL_CONFIG: Required<GraphQLConfig> = {
  graphiql: true,
  path: '/graphql',
  dispatchPolicy: 'resolved',
  loanIdResultFields: ['recordLoanRequested'],
};

export function resolveGraphQLConfig(input: GraphQLConfig | undefined): Required<GraphQLConfig> {
  return {
    graphiql: input?.graphiql ?? DEFAULT_GRAPHQL_CONFIG.graphiql,
    path: input?.path ?? DEFAULT_GRAPHQL_CONFIG.path,
    dispatchPolicy: input?.dispatchPolicy ?? DEFAULT_GRAPHQL_CONFIG.dispatchPolicy,
    loanIdResultFields: [...(input?.loanIdResultFields ?? DEFAULT_GRAPHQL_CONFIG.loanIdResultFields)],
  };
}

export function resolveConfig(input: ServerConfigInput = {}): ServerConfig {
  return {
    port: input.port ?? 4000,
    host: input.host ?? '0.0.0.0',
    logger: input.logger ?? true,
    graphql: resolveGraphQLConfig(input.graphql),
    fastifyOptions: input.fastifyOptions,
  };
}
