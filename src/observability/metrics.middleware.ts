import { Request, Response, NextFunction } from 'express';

import { httpRequestsTotal, httpRequestDuration } from './metrics';

/**
 * Collapse ids in unmatched paths to keep label cardinality bounded
 */
const normalizePath = (path: string): string =>
  path
    .replace(/\/(gen|tup|txn)_[A-Za-z0-9_-]+/g, '/:id')
    .replace(/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}/gi, ':id')
    .replace(/\/\d+/g, '/:id');

/**
 * Prefer the matched route pattern; fall back to the normalized path
 */
const getRoutePath = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return (req.baseUrl || '') + routePath;
  }
  return normalizePath(req.path);
};

/**
 * HTTP metrics middleware
 */
export const metricsMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  if (req.path === '/metrics') {
    next();
    return;
  }

  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = {
      method: req.method,
      path: getRoutePath(req),
      status: res.statusCode.toString(),
    };

    httpRequestsTotal.inc(labels);
    endTimer(labels);
  });

  next();
};
