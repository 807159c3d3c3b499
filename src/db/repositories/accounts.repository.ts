import { Knex } from 'knex';
import { PostgresAdapter, isUniqueViolation } from '../adapters/PostgresAdapter.js';
import { AccountRow } from '../types/registration.types.js';
import type { Account } from '../registrationStore.js';
import { Errors } from '../../utils/errors.js';

export class AccountsRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async findByUsername(username: string, trx?: Knex.Transaction): Promise<Account | null> {
    const row = await this.db
      .query(trx)<AccountRow>('accounts')
      .where('username', username)
      .first();
    if (!row) {
      return null;
    }
    return {
      username: row.username,
      passwordHash: row.password_hash,
      countryId: row.country_id,
      personId: row.person_id,
      retired: row.retired,
    };
  }

  async create(account: Account, trx?: Knex.Transaction): Promise<void> {
    try {
      await this.db.query(trx)('accounts').insert({
        username: account.username,
        password_hash: account.passwordHash,
        country_id: account.countryId,
        person_id: account.personId,
        retired: account.retired,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw Errors.conflict('An account with this username already exists', 'username');
      }
      throw error;
    }
  }

  async retireForCountry(countryId: string, trx?: Knex.Transaction): Promise<number> {
    return this.db.query(trx)('accounts').where('country_id', countryId).update({ retired: true });
  }
}
