import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { SimLogger } from '../../simulation/types/simulation.js';

export function createRequestLogger(logger: SimLogger = console): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const start = performance.now();
    res.on('finish', () => {
      const ms = Math.round(performance.now() - start);
      const line = `[http] ${req.method} ${req.originalUrl} ${res.statusCode} ${ms}ms`;
      if (res.statusCode >= 500) {
        logger.error(line);
      } else {
        logger.info(line);
      }
    });
    next();
  };
}
