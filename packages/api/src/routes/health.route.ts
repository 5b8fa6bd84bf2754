import type { FastifyInstance } from 'fastify';
import type { SnapshotStore } from '@eligibility-ledger/core';

export function registerHealthRoutes(
  app: FastifyInstance,
  store: SnapshotStore,
): void {
  app.get('/health', async (request, reply) => {
    let storeStatus: 'ok' | 'error' = 'error';

    let timer: NodeJS.Timeout | undefined;
    try {
      const timeoutPromise = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => reject(new Error('timeout')), 3000);
      });
      await Promise.race([store.ping(), timeoutPromise]);
      storeStatus = 'ok';
    } catch (error) {
      request.log.warn({ err: error }, 'snapshot store health check failed');
    } finally {
      clearTimeout(timer);
    }

    const status = storeStatus === 'ok' ? 'ok' : 'degraded';
    const statusCode = storeStatus === 'ok' ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks: {
        snapshot_store: storeStatus,
      },
    });
  });
}
