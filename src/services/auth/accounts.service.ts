import basicAuth from 'express-basic-auth';
import { RegistrationStore } from '../../db/registrationStore.js';
import { Actor, isAdmin } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { PasswordHasher } from './passwordHasher.js';

export const ADMIN_USERNAME = 'admin';
export const SCORING_USERNAME = 'scoring';

const USERNAME_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;
const MIN_PASSWORD_LENGTH = 8;

export interface BuiltInPasswords {
  admin: string;
  scoring: string;
}

export interface NewAccount {
  username: string;
  password: string;
  countryId: string;
  // set for a self-registration account
  personId: string | null;
}

export type AccountSummary = Omit<NewAccount, 'password'>;

/**
 * Resolves HTTP Basic credentials to an actor. The two built-in accounts
 * are configured by environment; everything else is a stored account
 * scoped to one country, or to one person for self-registration.
 */
export class AccountsService {
  constructor(
    private readonly store: RegistrationStore,
    private readonly hasher: PasswordHasher,
    private readonly builtIn: BuiltInPasswords
  ) {}

  async authenticate(username: string, password: string): Promise<Actor | null> {
    if (username === ADMIN_USERNAME) {
      return basicAuth.safeCompare(password, this.builtIn.admin) ? { kind: 'admin', username } : null;
    }
    if (username === SCORING_USERNAME) {
      return basicAuth.safeCompare(password, this.builtIn.scoring)
        ? { kind: 'scoring', username }
        : null;
    }

    const account = await this.store.findAccount(username);
    if (!account || account.retired) {
      logger.debug({ username }, 'Unknown or retired account');
      return null;
    }
    if (!(await this.hasher.verify(account.passwordHash, password))) {
      return null;
    }
    return account.personId === null
      ? { kind: 'delegate', username, countryId: account.countryId }
      : { kind: 'self', username, countryId: account.countryId, personId: account.personId };
  }

  /**
   * Create a delegate account for a country, or a self-registration
   * account for one of its people.
   */
  async create(actor: Actor, input: NewAccount): Promise<AccountSummary> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to create accounts');
    }
    const { username, password, countryId, personId } = input;
    if (!USERNAME_PATTERN.test(username)) {
      throw Errors.formatInvalid('Invalid username', 'username');
    }
    if (username === ADMIN_USERNAME || username === SCORING_USERNAME) {
      throw Errors.conflict('An account with this username already exists', 'username');
    }
    if (password.length < MIN_PASSWORD_LENGTH) {
      throw Errors.formatInvalid(
        `Passwords must be at least ${MIN_PASSWORD_LENGTH} characters`,
        'password'
      );
    }
    const passwordHash = await this.hasher.hash(password);

    await this.store.transaction(async (tx) => {
      if (await tx.findAccount(username)) {
        throw Errors.conflict('An account with this username already exists', 'username');
      }
      const country = await tx.getCountry(countryId);
      if (!country || country.retired) {
        throw Errors.referenceInvalid('Invalid country', 'countryId');
      }
      if (personId !== null) {
        const person = await tx.getPerson(personId);
        if (!person || person.retired || person.countryId !== countryId) {
          throw Errors.referenceInvalid('Person must be from the account country', 'personId');
        }
      }
      await tx.insertAccount({ username, passwordHash, countryId, personId, retired: false });
    });

    logger.info({ username, countryId, personId }, 'Account created');
    return { username, countryId, personId };
  }
}
