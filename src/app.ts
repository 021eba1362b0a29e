import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import pinoHttp from 'pino-http';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import routes from './routes';
import PlotService from './services/plotService';
import type { PlotStore } from './services/plotStore';
import type { AppConfig } from './config/appConfig';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import baseLogger from './utils/logger';
import ApiError from './utils/ApiError';

export interface AppDependencies {
  plotStore: PlotStore;
  cors: AppConfig['cors'];
  logger?: Logger;
}

export function createApp({ plotStore, cors: corsConfig, logger = baseLogger }: AppDependencies): Express {
  const appLogger = logger.child({ module: 'app' });

  const app = express();
  app.disable('x-powered-by');

  const requestLogger = pinoHttp({
    logger: appLogger,
    genReqId(req, res) {
      const header = req.headers['x-request-id'];
      const headerId = typeof header === 'string' ? header.trim() : undefined;
      const requestId = headerId && headerId.length <= 128 ? headerId : nanoid(16);
      res.setHeader('X-Request-Id', requestId);
      return requestId;
    },
    customLogLevel(_req, res, err) {
      if (err || res.statusCode >= 500) {
        return 'error';
      }
      if (res.statusCode >= 400) {
        return 'warn';
      }
      return 'info';
    },
    customSuccessMessage(req, res) {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },
    customErrorMessage(req, res, err) {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },
  });

  app.use(requestLogger);

  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(
    cors({
      origin(origin, callback) {
        if (!origin || corsConfig.allowAllOrigins || corsConfig.allowedOrigins.includes(origin)) {
          callback(null, true);
          return;
        }
        callback(new ApiError(403, 'Origin not allowed', { origin }, 'CORS_NOT_ALLOWED'));
      },
      exposedHeaders: ['X-Request-Id'],
    })
  );

  app.use(express.json({ limit: '1mb' }));

  const plotService = new PlotService({
    store: plotStore,
    logger: logger.child({ module: 'plot-service' }),
  });

  app.set('plotService', plotService);

  app.use(routes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
