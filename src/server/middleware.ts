import { NextFunction, Request, RequestHandler, Response } from 'express';
import { AppError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../metrics/Metrics';

/** Express 4 does not forward rejected promises; this does. */
export const asyncRoute =
  (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
  (req, res, next) => {
    handler(req, res).catch(next);
  };

/** Reads the first named parameter present as a string in the JSON body or the query string. */
export function readParam(req: Request, ...names: string[]): string | undefined {
  const body: unknown = req.body;
  for (const name of names) {
    if (typeof body === 'object' && body !== null && name in body) {
      const value: unknown = Reflect.get(body, name);
      if (typeof value === 'string' && value.trim()) return value.trim();
    }
    const fromQuery = req.query[name];
    if (typeof fromQuery === 'string' && fromQuery.trim()) return fromQuery.trim();
  }
  return undefined;
}

/** True for a JSON `true` in the body or the string "true" in either place. */
export function readFlag(req: Request, name: string): boolean {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && Reflect.get(body, name) === true) return true;
  return readParam(req, name)?.toLowerCase() === 'true';
}

const UNMATCHED_ROUTE = 'unmatched';

function routeLabel(req: Request): string {
  const route: unknown = req.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${req.method} ${req.baseUrl}${route.path}`;
  }
  return UNMATCHED_ROUTE;
}

/**
 * Counts each response under the route pattern that served it, so the label
 * set stays bounded by the routing table. Static files and unknown paths
 * share one label.
 */
export const countRequests: RequestHandler = (req, res, next) => {
  res.on('finish', () => metrics.incRequest(routeLabel(req)));
  next();
};

export const notFound: RequestHandler = (_req, res) => {
  res.status(404).json({ error: 'Not found' });
};

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof AppError) {
    metrics.incError(err.code);
    const line = `[HTTP] ${req.method} ${req.path} → ${err.statusCode} ${err.code}: ${err.message}`;
    if (err.statusCode >= 500) logger.error(line);
    else logger.warn(line);
    res.status(err.statusCode).json({ error: err.message });
    return;
  }

  if (isBodyParseError(err)) {
    metrics.incError('MALFORMED_BODY');
    logger.warn(`[HTTP] ${req.method} ${req.path} → 400 malformed JSON body`);
    res.status(400).json({ error: 'Malformed JSON body' });
    return;
  }

  metrics.incError('INTERNAL');
  logger.error(`[HTTP] ${req.method} ${req.path} → 500: ${errorMessage(err)}`, {
    stack: err instanceof Error ? err.stack : undefined,
  });
  res.status(500).json({
    error: process.env.NODE_ENV === 'development' ? errorMessage(err) : 'Internal server error',
  });
};
