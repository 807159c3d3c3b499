import { Request, Response, NextFunction, RequestHandler } from 'express';
import basicAuth from 'express-basic-auth';
import { ANONYMOUS, Actor } from '../../types/index.js';
import { AccountsService } from '../../services/auth/accounts.service.js';
import { withContext } from '../../utils/logger.js';

/**
 * Attach the requesting actor. Requests without credentials are anonymous;
 * credentials that fail to verify get a 401 challenge.
 */
export function createActorMiddleware(accounts: AccountsService): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!req.headers.authorization) {
      req.actor = ANONYMOUS;
      next();
      return;
    }

    let actor: Actor | null = null;
    const gate = basicAuth({
      authorizeAsync: true,
      challenge: true,
      realm: 'registration',
      authorizer: (username: string, password: string, callback: basicAuth.AsyncAuthorizerCallback) => {
        accounts.authenticate(username, password).then(
          (resolved) => {
            actor = resolved;
            callback(null, resolved !== null);
          },
          (error: unknown) => callback(error, false)
        );
      },
      unauthorizedResponse: () => ({
        error: { kind: 'PermissionDenied', message: 'Invalid username or password' },
      }),
    });

    gate(req, res, (error?: unknown) => {
      if (error) {
        next(error);
        return;
      }
      const resolved = actor ?? ANONYMOUS;
      req.actor = resolved;
      withContext({ actor: resolved.kind === 'anonymous' ? 'anonymous' : resolved.username }, () =>
        next()
      );
    });
  };
}

export function requestActor(req: Request): Actor {
  return req.actor ?? ANONYMOUS;
}
