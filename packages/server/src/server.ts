import 'dotenv/config';
import { SqliteContactStore } from '@rolodex/store-sqlite';
import { buildApp } from './app.js';
import { loadConfig, type AppConfig } from './config.js';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  }
}

const start = async () => {
  const config = readConfig();

  const store = new SqliteContactStore(config.databasePath);
  const fastify = buildApp({
    store,
    logLevel: config.logLevel,
    corsOrigins: config.corsOrigins,
    storeTracing: config.storeTracing,
  });
  fastify.addHook('onClose', async () => {
    store.close();
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    fastify.log.info({ signal }, 'Shutting down');
    try {
      await fastify.close();
      process.exit(0);
    } catch (err) {
      fastify.log.error(err);
      process.exit(1);
    }
  };
  process.once('SIGINT', (signal) => void shutdown(signal));
  process.once('SIGTERM', (signal) => void shutdown(signal));

  try {
    await fastify.listen({ port: config.port, host: config.host });
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

void start();
