import type { FastifyInstance } from 'fastify';
import type { Knex } from 'knex';

export const APP_VERSION = '1.0.0';

interface HealthDeps {
  db: Pick<Knex, 'raw'>;
  salesAvailable: boolean;
  startTime: number;
}

export async function healthRoutes(fastify: FastifyInstance, deps: HealthDeps) {
  fastify.get('/health', async (_request, reply) => {
    let dbStatus = 'disconnected';

    try {
      await deps.db.raw('SELECT 1');
      dbStatus = 'connected';
    } catch {
      dbStatus = 'disconnected';
    }

    const isHealthy = dbStatus === 'connected';

    return reply.status(isHealthy ? 200 : 503).send({
      status: isHealthy ? 'ok' : 'degraded',
      version: APP_VERSION,
      uptime: Math.floor((Date.now() - deps.startTime) / 1000),
      db: dbStatus,
      sales: deps.salesAvailable ? 'available' : 'unavailable',
    });
  });
}
