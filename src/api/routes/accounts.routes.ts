import { Router } from 'express';
import { AccountsHandler } from '../../handlers/accounts.handler.js';

export function createAccountsRoutes(handler: AccountsHandler): Router {
  const router = Router();

  router.post('/accounts', handler.createAccount.bind(handler));

  return router;
}
