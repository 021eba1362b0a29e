import 'dotenv/config';
import http from 'http';
import { createApp } from './app';
import { loadAppConfig } from './config/appConfig';
import { Database, createDatabase, ensurePlotSchema } from './config/database';
import { PostgresPlotStore } from './services/plotStore';
import logger from './utils/logger';

async function bootstrapApplication() {
  const config = loadAppConfig(process.env);
  logger.level = config.logLevel;
  const database: Database = createDatabase(config.database, logger.child({ module: 'database' }));

  try {
    await ensurePlotSchema(database);
  } catch (error) {
    await database.close();
    throw error;
  }
  logger.info('[server] plots table ready');

  const app = createApp({
    plotStore: new PostgresPlotStore(database),
    cors: config.cors,
  });

  const server = http.createServer(app);
  server.listen(config.server.port, () => {
    logger.info({ port: config.server.port, environment: config.environment }, '[server] listening');
  });

  const shutdown = () => {
    logger.info('[server] shutting down');
    server.close((serverError) => {
      database
        .close()
        .then(() => {
          if (serverError) {
            logger.error({ err: serverError }, '[server] error while closing server');
            process.exit(1);
            return;
          }
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ err: error }, '[server] error while closing database pool');
          process.exit(1);
        });
    });
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);
}

async function start(): Promise<void> {
  try {
    await bootstrapApplication();
  } catch (error) {
    logger.error({ err: error }, '[server] failed to start');
    process.exit(1);
  }
}

void start();
