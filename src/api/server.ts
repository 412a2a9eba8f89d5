import Fastify, {
  type FastifyInstance,
  type InjectOptions,
  type LightMyRequestResponse,
} from 'fastify';
import type { IResolvers } from 'mercurius';
import { MutationInterceptor } from '../interceptor/mutation-interceptor.js';
import { MutationExtractor } from '../mapping/mutation-extractor.js';
import { NamingPolicy, type NamingPolicyConfig, type NamingTableEntry } from '../mapping/naming-policy.js';
import { loadSchemaFromSDL } from '../mapping/schema-loader.js';
import { MetricsCollector } from '../observability/metrics-collector.js';
import type { MetricsConfig } from '../observability/types.js';
import { EventStoreSink, type EventStoreConfig } from '../sinks/event-store-sink.js';
import type { MutationSink } from '../types/sink.js';
import { resolveConfig, type ServerConfig, type ServerConfigInput } from './config.js';
import { registerGraphQL } from './graphql/index.js';
import { errorHandler } from './middleware/error-handler.js';
import { registerRoutes } from './routes/index.js';

export interface GatewayServerOptions {
  /** HTTP server configuration */
  server?: ServerConfigInput;

  /** SDL of the hosted schema */
  schema: string;

  resolvers: IResolvers;

  /**
   * Sink receiving the extracted calls. When omitted, an EventStoreSink is
   * built from `eventStore` and owned (closed on stop) by the server.
   */
  sink?: MutationSink;

  /** Event store connection, used only when no `sink` is given */
  eventStore?: EventStoreConfig;

  naming?: NamingPolicyConfig;

  /** Prometheus metrics; `enabled: false` removes the /metrics endpoint */
  metrics?: MetricsConfig;
}

interface LifecycleState {
  stopping: boolean;
}

/**
 * Fastify + Mercurius server hosting one schema, with every executed mutation
 * field forwarded to a sink.
 */
export class MutationGatewayServer {
  private readonly fastify: FastifyInstance;
  private readonly config: ServerConfig;
  private readonly interceptor: MutationInterceptor;
  private readonly ownedSink: EventStoreSink | null;
  private readonly metrics: MetricsCollector | null;
  private readonly lifecycle: LifecycleState;
  readonly namingTable: readonly NamingTableEntry[];

  private constructor(
    fastify: FastifyInstance,
    config: ServerConfig,
    interceptor: MutationInterceptor,
    ownedSink: EventStoreSink | null,
    metrics: MetricsCollector | null,
    lifecycle: LifecycleState,
    namingTable: NamingTableEntry[],
  ) {
    this.fastify = fastify;
    this.config = config;
    this.interceptor = interceptor;
    this.ownedSink = ownedSink;
    this.metrics = metrics;
    this.lifecycle = lifecycle;
    this.namingTable = namingTable;
  }

  /**
   * Builds a ready server without listening.
   *
   * @throws NamingPolicyViolationError when two mutation fields of the schema
   *         map to the same event type
   */
  static async build(options: GatewayServerOptions): Promise<MutationGatewayServer> {
    const config = resolveConfig(options.server);

    const namingPolicy = new NamingPolicy(options.naming);
    const namingTable = namingPolicy.validateSchema(loadSchemaFromSDL(options.schema));

    const fastify = Fastify({
      logger: config.logger,
      ...config.fastifyOptions,
    });

    fastify.setErrorHandler(errorHandler);

    const metrics = options.metrics?.enabled === false ? null : new MetricsCollector(options.metrics);

    let sink: MutationSink;
    let ownedSink: EventStoreSink | null = null;
    if (options.sink) {
      sink = options.sink;
    } else {
      ownedSink = EventStoreSink.fromConfig(
        options.eventStore,
        fastify.log.child({ component: 'event-store-sink' }),
      );
      sink = ownedSink;
    }

    const interceptor = new MutationInterceptor({
      sink,
      extractor: new MutationExtractor(namingPolicy),
      logger: fastify.log.child({ component: 'mutation-interceptor' }),
      ...(metrics && { metrics }),
    });

    const lifecycle: LifecycleState = { stopping: false };

    await registerRoutes(fastify, {
      interceptor,
      metrics,
      isStopping: () => lifecycle.stopping,
    });

    await registerGraphQL(
      fastify,
      { schema: options.schema, resolvers: options.resolvers, interceptor },
      config.graphql,
    );

    await fastify.ready();

    fastify.log.info(
      {
        mutations: namingTable.length,
        streamPrefix: namingPolicy.streamPrefix,
        eventTypeNamespace: namingPolicy.eventTypeNamespace,
      },
      'Mutation naming policy validated',
    );

    return new MutationGatewayServer(
      fastify, config, interceptor, ownedSink, metrics, lifecycle, namingTable,
    );
  }

  /** Builds the server and starts listening on the configured host and port */
  static async start(options: GatewayServerOptions): Promise<MutationGatewayServer> {
    const server = await MutationGatewayServer.build(options);
    await server.fastify.listen({ port: server.config.port, host: server.config.host });
    return server;
  }

  getInterceptor(): MutationInterceptor {
    return this.interceptor;
  }

  getSink(): MutationSink {
    return this.interceptor.sink;
  }

  getMetricsCollector(): MetricsCollector | null {
    return this.metrics;
  }

  inject(request: InjectOptions | string): Promise<LightMyRequestResponse> {
    return this.fastify.inject(request);
  }

  get address(): string {
    const addr = this.fastify.server.address();
    if (typeof addr === 'string') {
      return addr;
    }
    if (addr) {
      return `http://${addr.address === '::' ? 'localhost' : addr.address}:${addr.port}`;
    }
    return '';
  }

  get port(): number {
    return this.config.port;
  }

  /** Closes the HTTP server, waits for in-flight dispatches, closes an owned sink */
  async stop(): Promise<void> {
    this.lifecycle.stopping = true;
    await this.fastify.close();
    await this.interceptor.drain();

    if (this.ownedSink) {
      await this.ownedSink.close();
    }
  }
}
