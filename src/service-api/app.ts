import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { API_PREFIX } from '@shared/constants';
import type { ApiContext } from './context';
import { errorHandler, requestLogger } from './middleware/index';
import { apiRouter } from './routes/index';

export interface AppOptions {
  clientUrl?: string;
  logRequests?: boolean;
}

export function createApp(ctx: ApiContext, options: AppOptions = {}): Express {
  const app = express();

  app.use(helmet({ contentSecurityPolicy: false }));
  app.use(cors({ origin: options.clientUrl ?? true, credentials: true }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  if (options.logRequests ?? true) {
    app.use(requestLogger);
  }

  app.use(API_PREFIX, apiRouter(ctx));

  app.use(errorHandler);

  return app;
}
