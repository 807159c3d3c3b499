import type { Actor } from './index.js';

declare global {
  namespace Express {
    interface Request {
      // set by the context and actor middleware
      correlationId?: string;
      actor?: Actor;
    }
  }
}

export {};
