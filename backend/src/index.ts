import { config } from './config.js';
import { logger } from './utils/logger.js';
import { buildApp } from './app.js';
import { createDb, runMigrations } from './db/connection.js';
import { createKnexCustomerStore } from './db/customerStore.js';
import { detectSalesSource } from './db/salesSource.js';

const startTime = Date.now();

// Database
const db = createDb(config.database.url);

if (config.database.migrateOnStart) {
  await runMigrations(db);
}

// Stores
const store = createKnexCustomerStore({ db });
const salesSource = await detectSalesSource(db, config.sales);

const fastify = await buildApp({
  db,
  store,
  salesSource,
  mountPath: config.mountPath,
  defaultLocale: config.defaultLocale,
  startTime,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down gracefully...');
  await fastify.close();
  await db.destroy();
  logger.info('Server shut down');
  process.exit(0);
}

function onSignal(signal: string) {
  shutdown(signal).catch((err: unknown) => {
    logger.error({ err, signal }, 'Shutdown failed');
    process.exit(1);
  });
}

process.on('SIGTERM', () => onSignal('SIGTERM'));
process.on('SIGINT', () => onSignal('SIGINT'));

// Start
try {
  await fastify.listen({ port: config.port, host: config.host });
  logger.info({ port: config.port, host: config.host, mountPath: config.mountPath }, 'Server started');
} catch (err) {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
}

export { fastify, db };
