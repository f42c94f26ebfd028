import { randomUUID } from 'node:crypto';

import express from 'express';
import type { Express, Request, Response } from 'express';

import type { HttpResult, StatsDependencies } from './stats-query.handler';
import { checkHealth, getAllStats, getStatsByType, resetStats } from './stats-query.handler';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { logger } from '../logging/logger';

function requestIdOf(req: Request): string {
  const header = req.headers['x-request-id'];

  return typeof header === 'string' && header.length > 0 ? header : randomUUID();
}

function send<T>(res: Response, result: HttpResult<T>): void {
  if (result.body === undefined) {
    res.status(result.statusCode).end();

    return;
  }

  res.status(result.statusCode).json(result.body);
}

function route<T>(
  handler: (req: Request, requestId: string) => Promise<HttpResult<T>>,
): (req: Request, res: Response) => void {
  return (req, res) => {
    const requestId = requestIdOf(req);

    res.setHeader('x-request-id', requestId);
    handler(req, requestId)
      .then((result) => send(res, result))
      .catch((error: unknown) => {
        logger.child({ requestId }).error({ error: formatErrorMessage(error) }, 'unhandled');
        res.status(500).json({
          error: { code: 'INTERNAL_ERROR', message: 'unexpected error', requestId },
        });
      });
  };
}

export function createStatsApp(deps: StatsDependencies): Express {
  const app = express();

  app.disable('x-powered-by');

  app.get(
    '/stats',
    route((_req, requestId) => getAllStats(deps, requestId)),
  );
  app.get(
    '/stats/:type',
    route((req, requestId) => getStatsByType(deps, req.params['type'], requestId)),
  );
  app.delete(
    '/stats',
    route((_req, requestId) => resetStats(deps, requestId)),
  );
  app.get(
    '/health',
    route(() => checkHealth(deps)),
  );

  return app;
}
