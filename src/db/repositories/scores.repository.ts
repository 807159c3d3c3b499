import { Knex } from 'knex';
import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { ScoreRow } from '../types/registration.types.js';
import { ScoreCell } from '../../types/index.js';

export class ScoresRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async findAll(trx?: Knex.Transaction): Promise<ScoreCell[]> {
    const rows = await this.db
      .query(trx)<ScoreRow>('scores')
      .orderBy([
        { column: 'person_id', order: 'asc' },
        { column: 'problem', order: 'asc' },
      ]);
    return rows.map((row) => ({ personId: row.person_id, problem: row.problem, score: row.score }));
  }

  /**
   * Upsert one cell, or delete it when score is null.
   */
  async set(
    personId: string,
    problem: number,
    score: number | null,
    trx?: Knex.Transaction
  ): Promise<void> {
    const query = this.db.query(trx);
    if (score === null) {
      await query('scores').where({ person_id: personId, problem }).delete();
      return;
    }
    await query('scores')
      .insert({ person_id: personId, problem, score })
      .onConflict(['person_id', 'problem'])
      .merge({ score });
  }
}
