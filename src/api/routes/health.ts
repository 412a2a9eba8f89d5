import type { FastifyInstance } from 'fastify';
import type { MutationInterceptor } from '../../interceptor/mutation-interceptor.js';

export interface HealthResponse {
  status: 'ok' | 'stopping';
  timestamp: number;
  uptime: number;
  pendingDispatches: number;
}

export async function registerHealthRoutes(
  fastify: FastifyInstance,
  interceptor: MutationInterceptor,
  isStopping: () => boolean,
): Promise<void> {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    async (): Promise<HealthResponse> => ({
      status: isStopping() ? 'stopping' : 'ok',
      timestamp: Date.now(),
      uptime: process.uptime(),
      pendingDispatches: interceptor.pendingDispatches,
    }),
  );
}
