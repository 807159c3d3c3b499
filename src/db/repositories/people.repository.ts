import { Knex } from 'knex';
import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { PersonRow } from '../types/registration.types.js';
import type { PersonDraft } from '../../services/audit/person.auditor.js';
import { Person } from '../../types/index.js';

export function toPerson(row: PersonRow): Person {
  return {
    id: row.id,
    countryId: row.country_id,
    primaryRole: row.primary_role,
    otherRoles: row.other_roles,
    guideFor: row.guide_for,
    givenName: row.given_name,
    familyName: row.family_name,
    passportGivenName: row.passport_given_name,
    passportFamilyName: row.passport_family_name,
    gender: row.gender,
    dateOfBirth: row.date_of_birth,
    languages: row.languages,
    diet: row.diet,
    tshirt: row.tshirt,
    arrival: {
      place: row.arrival_place,
      date: row.arrival_date,
      hour: row.arrival_hour,
      minute: row.arrival_minute,
      flight: row.arrival_flight,
    },
    departure: {
      place: row.departure_place,
      date: row.departure_date,
      hour: row.departure_hour,
      minute: row.departure_minute,
      flight: row.departure_flight,
    },
    roomType: row.room_type,
    roomShareWith: row.room_share_with,
    roomNumber: row.room_number,
    phoneNumber: row.phone_number,
    passportNumber: row.passport_number,
    nationality: row.nationality,
    incomplete: row.incomplete,
    photoId: row.photo_id,
    consentFormId: row.consent_form_id,
    eventPhotosConsent: row.event_photos_consent,
    photoConsent: row.photo_consent,
    dietConsent: row.diet_consent,
    genericUrl: row.generic_url,
    retired: row.retired,
  };
}

function toColumns(person: PersonDraft) {
  return {
    country_id: person.countryId,
    primary_role: person.primaryRole,
    other_roles: JSON.stringify(person.otherRoles),
    guide_for: JSON.stringify(person.guideFor),
    given_name: person.givenName,
    family_name: person.familyName,
    passport_given_name: person.passportGivenName,
    passport_family_name: person.passportFamilyName,
    gender: person.gender,
    date_of_birth: person.dateOfBirth,
    languages: JSON.stringify(person.languages),
    diet: person.diet,
    tshirt: person.tshirt,
    arrival_place: person.arrival.place,
    arrival_date: person.arrival.date,
    arrival_hour: person.arrival.hour,
    arrival_minute: person.arrival.minute,
    arrival_flight: person.arrival.flight,
    departure_place: person.departure.place,
    departure_date: person.departure.date,
    departure_hour: person.departure.hour,
    departure_minute: person.departure.minute,
    departure_flight: person.departure.flight,
    room_type: person.roomType,
    room_share_with: person.roomShareWith,
    room_number: person.roomNumber,
    phone_number: person.phoneNumber,
    passport_number: person.passportNumber,
    nationality: person.nationality,
    incomplete: person.incomplete,
    event_photos_consent: person.eventPhotosConsent,
    photo_consent: person.photoConsent,
    diet_consent: person.dietConsent,
    generic_url: person.genericUrl,
  };
}

export class PeopleRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async findAll(trx?: Knex.Transaction): Promise<Person[]> {
    const rows = await this.db
      .query(trx)<PersonRow>('people')
      .orderBy([
        { column: 'country_id', order: 'asc' },
        { column: 'created_at', order: 'asc' },
      ]);
    return rows.map(toPerson);
  }

  async findById(id: string, trx?: Knex.Transaction): Promise<Person | null> {
    const row = await this.db.query(trx)<PersonRow>('people').where('id', id).first();
    return row ? toPerson(row) : null;
  }

  async create(draft: PersonDraft, trx?: Knex.Transaction): Promise<Person> {
    const [row]: PersonRow[] = await this.db
      .query(trx)('people')
      .insert({ ...toColumns(draft), retired: false })
      .returning('*');
    return toPerson(row);
  }

  async update(person: Person, trx?: Knex.Transaction): Promise<void> {
    await this.db
      .query(trx)('people')
      .where('id', person.id)
      .update({
        ...toColumns(person),
        photo_id: person.photoId,
        consent_form_id: person.consentFormId,
        retired: person.retired,
        updated_at: this.db.getKnex().fn.now(),
      });
  }
}
