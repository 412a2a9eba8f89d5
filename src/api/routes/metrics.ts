import type { FastifyInstance } from 'fastify';
import type { MetricsCollector } from '../../observability/metrics-collector.js';
import { PROMETHEUS_CONTENT_TYPE, formatMetrics } from '../../observability/prometheus-formatter.js';

export async function registerMetricsRoutes(
  fastify: FastifyInstance,
  metrics: MetricsCollector,
): Promise<void> {
  fastify.get('/metrics', async (_request, reply) => {
    const body = formatMetrics(
      metrics.getCounters(),
      metrics.getGauges(),
      metrics.getHistograms(),
      metrics.prefix,
    );
    return reply.type(PROMETHEUS_CONTENT_TYPE).send(body);
  });
}
