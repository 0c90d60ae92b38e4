import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
      /** Identity resolved from the bearer token. */
      caller?: string;
    }
  }
}

/**
 * Attaches a request id and start time used by the request logger and error handler.
 */
export const requestContext = (req: Request, res: Response, next: NextFunction) => {
  req.requestId = randomUUID();
  req.startTime = Date.now();
  res.setHeader('X-Request-ID', req.requestId);
  next();
};
