import compression from 'compression';
import cookieParser from 'cookie-parser';
import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import type { Express, Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { negotiateFormat } from '../api/middleware/negotiate-format.js';
import { requestContext } from '../api/middleware/request-context.js';
import { errorHandler } from '../api/middleware/error-handler.js';
import type { EnvConfig } from '../config/env.js';

/**
 * Creates the Express app with the shared middleware stack. Modules mount
 * their routers afterwards; `finalizeExpressApp` closes the stack.
 */
export function createExpressApp(config: Pick<EnvConfig, 'NODE_ENV' | 'SESSION_SECRET'>): Express {
  const app = express();

  app.set('trust proxy', true);
  app.use(requestContext);
  app.use(helmet());
  app.use(compression());
  // Signs the session cookie that carries the mobile override
  app.use(cookieParser(config.SESSION_SECRET));
  app.use(express.json({ limit: '100kb' }));
  app.use(morgan(config.NODE_ENV === 'production' ? 'combined' : 'dev', {
    skip: () => config.NODE_ENV === 'test'
  }));
  app.use(negotiateFormat());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return app;
}

/**
 * Adds the not-found handler and the error handler after every module router.
 */
export function finalizeExpressApp(app: Express): Express {
  app.use((req: Request, res: Response) => {
    res.status(StatusCodes.NOT_FOUND).json({ success: false, error: `Cannot ${req.method} ${req.path}`, code: 'NOT_FOUND' });
  });
  app.use(errorHandler);
  return app;
}
