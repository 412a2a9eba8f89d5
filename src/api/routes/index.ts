import type { FastifyInstance } from 'fastify';
import type { MutationInterceptor } from '../../interceptor/mutation-interceptor.js';
import type { MetricsCollector } from '../../observability/metrics-collector.js';
import { registerHealthRoutes } from './health.js';
import { registerMetricsRoutes } from './metrics.js';

export interface RouteContext {
  interceptor: MutationInterceptor;
  metrics: MetricsCollector | null;
  isStopping: () => boolean;
}

export async function registerRoutes(
  fastify: FastifyInstance,
  context: RouteContext,
): Promise<void> {
  await registerHealthRoutes(fastify, context.interceptor, context.isStopping);

  if (context.metrics) {
    await registerMetricsRoutes(fastify, context.metrics);
  }
}
