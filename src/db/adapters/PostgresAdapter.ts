import knex, { Knex } from 'knex';
import { logger } from '../../utils/logger.js';

const PG_UNIQUE_VIOLATION = '23505';

/**
 * True for a Postgres unique-constraint violation raised by pg.
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code === PG_UNIQUE_VIOLATION
  );
}

/**
 * Name of the violated constraint or index, when pg reports one.
 */
export function violatedConstraint(error: unknown): string | null {
  if (!isUniqueViolation(error) || !(error instanceof Error)) {
    return null;
  }
  return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : null;
}

export class PostgresAdapter {
  private knex: Knex;
  private connectionString: string;

  constructor(connectionString: string) {
    this.connectionString = connectionString;

    this.knex = knex({
      client: 'pg',
      connection: {
        connectionString: this.connectionString,
        ssl: process.env.NODE_ENV === 'production' ? { rejectUnauthorized: false } : false,
      },
      pool: {
        min: 2,
        max: 10,
      },
    });
  }

  getKnex(): Knex {
    return this.knex;
  }

  /**
   * Query builder bound to the open transaction, if any.
   */
  query(trx?: Knex.Transaction): Knex {
    return trx ?? this.knex;
  }

  async initialize(): Promise<void> {
    // Test the connection
    try {
      await this.knex.raw('SELECT 1');
      logger.debug('PostgreSQL connection established');
      // Schema is managed by migrations
    } catch (error) {
      logger.error({ err: error }, 'Failed to connect to PostgreSQL');
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.knex.destroy();
  }

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return await this.knex.transaction(callback);
  }
}
