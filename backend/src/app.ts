import Fastify, { type FastifyInstance } from 'fastify';
import formbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import { randomUUID } from 'crypto';
import type { Knex } from 'knex';
import type { CustomerStore } from './db/customerStore.js';
import type { SalesSource } from './db/salesSource.js';
import type { Locale } from './i18n/messages.js';
import { registerErrorHandler } from './middleware/errorHandler.js';
import { customerRoutes } from './routes/customers/index.js';
import { healthRoutes } from './routes/health.js';
import { createCustomerExportService } from './services/customerExportService.js';
import { createCustomerService } from './services/customerService.js';
import { createCustomerStatsService } from './services/customerStatsService.js';
import { logger } from './utils/logger.js';
import { ASSETS_ROOT } from './views/assets.js';

export interface BuildAppDeps {
  db: Pick<Knex, 'raw'>;
  store: CustomerStore;
  salesSource: SalesSource | null;
  mountPath: string;
  defaultLocale: Locale;
  startTime?: number;
  now?: () => Date;
}

export async function buildApp(deps: BuildAppDeps): Promise<FastifyInstance> {
  const { db, store, salesSource, mountPath, defaultLocale } = deps;

  const fastify = Fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
  });

  await fastify.register(formbody);

  // htmx is served from its npm package
  await fastify.register(fastifyStatic, {
    root: ASSETS_ROOT,
    prefix: `${mountPath}/static/`,
    decorateReply: false,
  });

  // Request logging
  fastify.addHook('onRequest', async (request) => {
    logger.info({ requestId: request.id, method: request.method, url: request.url }, 'Request received');
  });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.info(
      { requestId: request.id, method: request.method, url: request.url, statusCode: reply.statusCode },
      'Request completed',
    );
  });

  registerErrorHandler(fastify);

  // Services
  const customerService = createCustomerService({ store });
  const statsService = createCustomerStatsService({ store, salesSource });
  const exportService = createCustomerExportService({ store });

  // Routes
  await fastify.register(
    async (instance) => healthRoutes(instance, {
      db,
      salesAvailable: statsService.hasSalesSource,
      startTime: deps.startTime ?? Date.now(),
    }),
  );

  await fastify.register(
    async (instance) =>
      customerRoutes(instance, {
        customerService,
        statsService,
        exportService,
        defaultLocale,
        basePath: mountPath,
        now: deps.now,
      }),
    { prefix: mountPath },
  );

  return fastify;
}
