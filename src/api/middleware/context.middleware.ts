import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { withContext } from '../../utils/logger.js';

/**
 * Middleware to add logging context to all requests
 * correlationId will be attached to notification jobs
 */
export const contextMiddleware = (req: Request, res: Response, next: NextFunction) => {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header !== '' ? header : randomUUID();

  req.correlationId = correlationId;
  res.setHeader('x-correlation-id', correlationId);

  // Run the rest of the request with context
  withContext({ correlationId }, () => next());
};
