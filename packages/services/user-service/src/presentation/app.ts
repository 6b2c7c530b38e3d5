import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import compression from 'compression';
import { generateCorrelationId, getCorrelationId, runWithContext } from '@lastcup/platform-core';
import { createRoutes, type RouteDeps } from './routes';
import { ServiceErrors } from './utils/response-helpers';

function isClientError(error: unknown): boolean {
  const status = error instanceof Error ? Reflect.get(error, 'status') : undefined;
  return typeof status === 'number' && status >= 400 && status < 500;
}

export function createApp(deps: RouteDeps): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));

  app.use((req, res, next) => {
    const correlationId = getCorrelationId(req) ?? generateCorrelationId('req');
    res.setHeader('x-correlation-id', correlationId);
    runWithContext({ correlationId, module: 'http' }, () => next());
  });

  app.use('/api', createRoutes(deps));

  app.use((req, res) => {
    ServiceErrors.notFound(res, `Route ${req.method} ${req.path}`, req);
  });

  // Body parser failures arrive here with an http status attached
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isClientError(error)) {
      ServiceErrors.badRequest(res, 'Malformed request body', req);
      return;
    }
    ServiceErrors.fromException(res, error, 'Request failed', req);
  });

  return app;
}
