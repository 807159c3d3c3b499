import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import { accountBodySchema, parseRequest } from '../api/middleware/validation.middleware.js';
import { AccountsService } from '../services/auth/accounts.service.js';

export class AccountsHandler {
  constructor(private readonly accounts: AccountsService) {}

  async createAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const body = parseRequest(accountBodySchema, req.body);
      const account = await this.accounts.create(requestActor(req), body);
      res.status(201).json(account);
    } catch (error) {
      next(error);
    }
  }
}
