import { Knex } from 'knex';
import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { EventStateRow } from '../types/registration.types.js';
import { EventState } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';

const EVENT_ROW_ID = 1;

function toEventState(row: EventStateRow): EventState {
  const { gold, silver, bronze } = row;
  return {
    version: row.version,
    registrationEnabled: row.registration_enabled,
    preregistrationEnabled: row.preregistration_enabled,
    selfScoringEnabled: row.self_scoring_enabled,
    medalBoundaries:
      gold !== null && silver !== null && bronze !== null ? { gold, silver, bronze } : null,
  };
}

export class EventStateRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async get(trx?: Knex.Transaction): Promise<EventState> {
    const row = await this.db
      .query(trx)<EventStateRow>('event_state')
      .where('id', EVENT_ROW_ID)
      .first();
    if (!row) {
      throw Errors.internal('Event state row missing, run migrations');
    }
    return toEventState(row);
  }

  async save(next: EventState, trx?: Knex.Transaction): Promise<EventState> {
    const boundaries = next.medalBoundaries;
    const rows: EventStateRow[] = await this.db
      .query(trx)('event_state')
      .where({ id: EVENT_ROW_ID, version: next.version })
      .update({
        version: next.version + 1,
        registration_enabled: next.registrationEnabled,
        preregistration_enabled: next.preregistrationEnabled,
        self_scoring_enabled: next.selfScoringEnabled,
        gold: boundaries?.gold ?? null,
        silver: boundaries?.silver ?? null,
        bronze: boundaries?.bronze ?? null,
        updated_at: this.db.getKnex().fn.now(),
      })
      .returning('*');
    if (rows.length === 0) {
      throw Errors.stateConflict('Event settings were changed by someone else, please try again');
    }
    return toEventState(rows[0]);
  }
}
