import type { NextFunction, Request, Response } from 'express';
import { ConfigurationError, SimulationError } from '../../simulation/engine/errors.js';
import { HttpError } from '../types.js';

export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new HttpError(404, `Route not found: ${req.method} ${req.path}`));
}

function statusFor(err: unknown): number {
  if (err instanceof HttpError) return err.status;
  if (err instanceof ConfigurationError) return 400;
  if (isBodyParserError(err)) return 400;
  return 500;
}

function isBodyParserError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = statusFor(err);
  const message = err instanceof Error ? err.message : 'Unexpected server error';
  if (status >= 500) {
    console.error(`[server] ${req.method} ${req.path} failed:`, err);
  }
  res.status(status).json({
    error: message,
    ...(err instanceof SimulationError ? { code: err.code } : {})
  });
}
