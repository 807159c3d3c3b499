import { stringify } from 'csv-stringify/sync';
import { EventSettings } from '../../config/event.js';
import { contestantCode } from '../../domain/roles.js';
import {
  Actor,
  Country,
  EXPECTED_FIELDS,
  Person,
  StoredFile,
  TravelLeg,
  isAdmin,
} from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { RegistrySnapshot } from '../audit/registryView.js';
import { CsvDelimiter } from '../bulk/csvReader.js';
import { COUNTRY_EXPECTED_COLUMNS } from '../bulk/csvSchemas.js';
import { NO, YES } from '../bulk/rowInputs.js';
import { FileOwner, resolveFileState } from '../files/visibility.service.js';
import { EngineDeps } from '../registration/engine.js';
import { ScoringService } from '../scoring/scoring.service.js';
import { matchGenericUrl } from '../validation/fieldValidators.js';

type CsvRecord = Record<string, string>;

export function fileUrl(fileId: string): string {
  return `/api/files/${fileId}`;
}

/**
 * UTF-8 with a byte-order mark and CRLF line ends, for spreadsheet programs.
 */
export function toCsv(columns: readonly string[], records: CsvRecord[], delimiter: CsvDelimiter): Buffer {
  const text = stringify(records, {
    header: true,
    columns: [...columns],
    delimiter,
    record_delimiter: 'windows',
    bom: true,
  });
  return Buffer.from(text, 'utf8');
}

function yesNo(value: boolean | null): string {
  if (value === null) {
    return '';
  }
  return value ? YES : NO;
}

function timeOfDay(leg: TravelLeg): string {
  return leg.hour !== null ? `${leg.hour}:${leg.minute ?? '00'}` : '';
}

function numbered(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, index) => `${prefix}${index + 1}`);
}

/**
 * CSV exports, derived from current state on every call. Column names match
 * the bulk import layout so an exported file imports unchanged.
 */
export class ExportService {
  constructor(private readonly deps: EngineDeps) {}

  private get settings(): EventSettings {
    return this.deps.settings;
  }

  private genericNumber(url: string | null, kind: 'countries/country' | 'people/person'): string {
    if (url === null) {
      return '';
    }
    const number = matchGenericUrl(url, this.settings.genericUrlBase, kind);
    return number === null ? '' : String(number);
  }

  async countriesCsv(actor: Actor, delimiter: CsvDelimiter = ','): Promise<Buffer> {
    const snapshot = await this.deps.store.loadSnapshot();
    const countries = snapshot.countries().filter((country) => !country.retired);
    const admin = isAdmin(actor);

    const emailCount = Math.max(1, ...countries.map((country) => 1 + country.contactExtra.length));
    const columns = ['Country Number', 'Code', 'Name'];
    if (admin) {
      columns.push(...numbered('Contact Email ', emailCount));
      columns.push(...Object.values(COUNTRY_EXPECTED_COLUMNS));
    }
    columns.push('Flag URL');

    const records = countries.map((country) => {
      const record: CsvRecord = {
        'Country Number': this.genericNumber(country.genericUrl, 'countries/country'),
        Code: country.code,
        Name: country.name,
        'Flag URL': country.flagId ? fileUrl(country.flagId) : '',
      };
      if (admin) {
        const emails = [country.contactEmail ?? '', ...country.contactExtra];
        emails.forEach((email, index) => {
          record[`Contact Email ${index + 1}`] = email;
        });
        for (const field of EXPECTED_FIELDS) {
          record[COUNTRY_EXPECTED_COLUMNS[field]] = String(country.expected[field]);
        }
      }
      return record;
    });

    logger.debug({ rows: records.length, admin }, 'Exported countries');
    return toCsv(columns, records, delimiter);
  }

  async peopleCsv(actor: Actor, delimiter: CsvDelimiter = ','): Promise<Buffer> {
    const [snapshot, files] = await Promise.all([
      this.deps.store.loadSnapshot(),
      this.deps.store.listFiles(),
    ]);
    const fileById = new Map(files.map((file) => [file.id, file]));
    const admin = isAdmin(actor);
    const people = snapshot.people().filter((person) => {
      const country = snapshot.getCountry(person.countryId);
      return !person.retired && country !== null && !country.retired;
    });

    const columns = admin ? this.adminPeopleColumns() : PUBLIC_PEOPLE_COLUMNS;
    const records = people.map((person) => {
      const country = snapshot.getCountry(person.countryId);
      const countryCode = country?.code ?? '';
      const photo = person.photoId ? (fileById.get(person.photoId) ?? null) : null;
      const record: CsvRecord = {
        'Person Number': this.genericNumber(person.genericUrl, 'people/person'),
        'Country Code': countryCode,
        'Given Name': person.givenName,
        'Family Name': person.familyName,
        'Primary Role': person.primaryRole,
        'Other Roles': person.otherRoles.join(','),
        'Guide For Codes': guideCodes(person, snapshot).join(','),
        'Contestant Code': contestantCode(countryCode, person.primaryRole) ?? '',
        'Photo URL': this.photoUrl(photo, person, country, admin),
      };
      if (admin) {
        Object.assign(record, this.adminPersonFields(person));
      }
      return record;
    });

    logger.debug({ rows: records.length, admin }, 'Exported people');
    return toCsv(columns, records, delimiter);
  }

  /**
   * Scores are visible to administrators and the scoring account at any
   * time, and to everyone once medal boundaries are set.
   */
  async scoresCsv(actor: Actor, delimiter: CsvDelimiter = ','): Promise<Buffer> {
    const event = await this.deps.store.getEventState();
    if (!isAdmin(actor) && actor.kind !== 'scoring' && event.medalBoundaries === null) {
      throw Errors.forbidden('Scores are not yet public');
    }
    const snapshot = await this.deps.store.loadSnapshot();
    const results = await new ScoringService(this.deps).computeResults();
    const problems = numbered('P', this.settings.numProblems);
    const columns = [
      'Country Code',
      'Contestant Code',
      'Given Name',
      'Family Name',
      ...problems,
      'Total',
      'Rank',
      'Award',
    ];
    const records = results.map((result) => {
      const person = snapshot.getPerson(result.personId);
      const record: CsvRecord = {
        'Country Code': snapshot.getCountry(result.countryId)?.code ?? '',
        'Contestant Code': result.contestantCode,
        'Given Name': person?.givenName ?? '',
        'Family Name': person?.familyName ?? '',
        Total: String(result.total),
        Rank: String(result.rank),
        Award: result.award ?? '',
      };
      problems.forEach((header, index) => {
        const score = result.scores[index];
        record[header] = score === null ? '' : String(score);
      });
      return record;
    });
    return toCsv(columns, records, delimiter);
  }

  private photoUrl(
    photo: StoredFile | null,
    person: Person,
    country: Country | null,
    admin: boolean
  ): string {
    if (!photo) {
      return '';
    }
    if (admin) {
      return fileUrl(photo.id);
    }
    const owner: FileOwner = { kind: 'person', person, country };
    return resolveFileState(photo, owner, this.settings) === 'public' ? fileUrl(photo.id) : '';
  }

  private adminPeopleColumns(): string[] {
    return [
      'Person Number',
      'Country Code',
      'Given Name',
      'Family Name',
      'Passport Given Name',
      'Passport Family Name',
      'Gender',
      'Primary Role',
      'Other Roles',
      'Guide For Codes',
      'Contestant Code',
      'Date of Birth',
      ...numbered('Language ', this.settings.numLanguages),
      'Allergies and Dietary Requirements',
      'T-Shirt Size',
      'Arrival Place',
      'Arrival Date',
      'Arrival Time',
      'Arrival Flight',
      'Departure Place',
      'Departure Date',
      'Departure Time',
      'Departure Flight',
      'Room Type',
      'Share Room With',
      'Room Number',
      'Phone Number',
      'Passport or Identity Card Number',
      'Nationality',
      'Event Photos Consent',
      'Photo Consent',
      'Diet Consent',
      'Photo URL',
      'Consent Form URL',
    ];
  }

  private adminPersonFields(person: Person): CsvRecord {
    const record: CsvRecord = {
      'Passport Given Name': person.passportGivenName ?? '',
      'Passport Family Name': person.passportFamilyName ?? '',
      Gender: person.gender ?? '',
      'Date of Birth': person.dateOfBirth ?? '',
      'Allergies and Dietary Requirements': person.diet ?? '',
      'T-Shirt Size': person.tshirt ?? '',
      'Room Type': person.roomType ?? '',
      'Share Room With': person.roomShareWith ?? '',
      'Room Number': person.roomNumber ?? '',
      'Phone Number': person.phoneNumber ?? '',
      'Passport or Identity Card Number': person.passportNumber ?? '',
      Nationality: person.nationality ?? '',
      'Event Photos Consent': yesNo(person.eventPhotosConsent),
      'Photo Consent': person.photoConsent ?? '',
      'Diet Consent': yesNo(person.dietConsent),
      'Consent Form URL': person.consentFormId ? fileUrl(person.consentFormId) : '',
    };
    person.languages.forEach((language, index) => {
      record[`Language ${index + 1}`] = language;
    });
    const legs: Array<['Arrival' | 'Departure', TravelLeg]> = [
      ['Arrival', person.arrival],
      ['Departure', person.departure],
    ];
    for (const [label, leg] of legs) {
      record[`${label} Place`] = leg.place ?? '';
      record[`${label} Date`] = leg.date ?? '';
      record[`${label} Time`] = timeOfDay(leg);
      record[`${label} Flight`] = leg.flight ?? '';
    }
    return record;
  }
}

const PUBLIC_PEOPLE_COLUMNS = [
  'Person Number',
  'Country Code',
  'Given Name',
  'Family Name',
  'Primary Role',
  'Other Roles',
  'Guide For Codes',
  'Contestant Code',
  'Photo URL',
];

function guideCodes(person: Person, snapshot: RegistrySnapshot): string[] {
  return person.guideFor
    .map((id) => snapshot.getCountry(id))
    .filter((country): country is Country => country !== null && !country.retired)
    .map((country) => country.code);
}
