import { Knex } from 'knex';
import {
  PostgresAdapter,
  isUniqueViolation,
  violatedConstraint,
} from '../adapters/PostgresAdapter.js';
import { CountryRow } from '../types/registration.types.js';
import type { CountryDraft } from '../../services/audit/country.auditor.js';
import { Country } from '../../types/index.js';
import { ApiError, Errors } from '../../utils/errors.js';

// partial unique indexes on code and name among current countries
const NAME_INDEX = 'countries_name_current_unique';

/**
 * Conflict error for a unique violation on countries, naming the clashing
 * field; null for any other error.
 */
export function countryConflict(
  error: unknown,
  country: Pick<Country, 'code' | 'name'>
): ApiError | null {
  if (!isUniqueViolation(error)) {
    return null;
  }
  return violatedConstraint(error) === NAME_INDEX
    ? Errors.conflict(`A country with name ${country.name} already exists`, 'name')
    : Errors.conflict(`A country with code ${country.code} already exists`, 'code');
}

export function toCountry(row: CountryRow): Country {
  return {
    id: row.id,
    code: row.code,
    name: row.name,
    isStaff: row.is_staff,
    participantsOk: row.participants_ok,
    contactEmail: row.contact_email,
    contactExtra: row.contact_extra,
    expected: {
      leaders: row.expected_leaders,
      deputies: row.expected_deputies,
      contestants: row.expected_contestants,
      observersA: row.expected_observers_a,
      observersB: row.expected_observers_b,
      observersC: row.expected_observers_c,
      singleRooms: row.expected_single_rooms,
    },
    numbersConfirmed: row.numbers_confirmed,
    genericUrl: row.generic_url,
    flagId: row.flag_id,
    leaderEmail: row.leader_email,
    physicalAddress: row.physical_address,
    retired: row.retired,
  };
}

function toColumns(country: CountryDraft) {
  return {
    code: country.code,
    name: country.name,
    is_staff: country.isStaff,
    participants_ok: country.participantsOk,
    contact_email: country.contactEmail,
    contact_extra: JSON.stringify(country.contactExtra),
    expected_leaders: country.expected.leaders,
    expected_deputies: country.expected.deputies,
    expected_contestants: country.expected.contestants,
    expected_observers_a: country.expected.observersA,
    expected_observers_b: country.expected.observersB,
    expected_observers_c: country.expected.observersC,
    expected_single_rooms: country.expected.singleRooms,
    numbers_confirmed: country.numbersConfirmed,
    generic_url: country.genericUrl,
    leader_email: country.leaderEmail,
    physical_address: country.physicalAddress,
  };
}

export class CountriesRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async findAll(trx?: Knex.Transaction): Promise<Country[]> {
    const rows = await this.db.query(trx)<CountryRow>('countries').orderBy('code', 'asc');
    return rows.map(toCountry);
  }

  async findById(id: string, trx?: Knex.Transaction): Promise<Country | null> {
    const row = await this.db.query(trx)<CountryRow>('countries').where('id', id).first();
    return row ? toCountry(row) : null;
  }

  async create(draft: CountryDraft, trx?: Knex.Transaction): Promise<Country> {
    try {
      const [row]: CountryRow[] = await this.db
        .query(trx)('countries')
        .insert({ ...toColumns(draft), retired: false })
        .returning('*');
      return toCountry(row);
    } catch (error) {
      throw countryConflict(error, draft) ?? error;
    }
  }

  async update(country: Country, trx?: Knex.Transaction): Promise<void> {
    try {
      await this.db
        .query(trx)('countries')
        .where('id', country.id)
        .update({
          ...toColumns(country),
          flag_id: country.flagId,
          retired: country.retired,
          updated_at: this.db.getKnex().fn.now(),
        });
    } catch (error) {
      throw countryConflict(error, country) ?? error;
    }
  }
}
