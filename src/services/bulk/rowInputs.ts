import AdmZip from 'adm-zip';
import { EventSettings } from '../../config/event.js';
import {
  EXPECTED_FIELDS,
  ExpectedField,
  PhotoConsent,
  UploadedFile,
} from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { CountryInput } from '../audit/country.auditor.js';
import { PersonInput, TravelLegInput } from '../audit/person.auditor.js';
import { RegistrySnapshot } from '../audit/registryView.js';
import { sniffUpload } from '../files/fileFormat.service.js';
import { parseTimeOfDay } from '../validation/fieldValidators.js';
import { COUNTRY_EXPECTED_COLUMNS } from './csvSchemas.js';
import { CsvRow } from './csvReader.js';

export interface RowSources {
  settings: EventSettings;
  view: RegistrySnapshot;
  zip: AdmZip | null;
}

export const YES = 'Yes';
export const NO = 'No';

function numberedValues(row: CsvRow, prefix: string): string[] {
  const result: string[] = [];
  for (let n = 1; row.values.has(`${prefix}${n}`); n++) {
    result.push(row.values.get(`${prefix}${n}`) ?? '');
  }
  return result;
}

async function zipFile(row: CsvRow, header: string, zip: AdmZip | null): Promise<UploadedFile | undefined> {
  const name = row.values.get(header);
  if (name === undefined) {
    return undefined;
  }
  const entry = zip?.getEntry(name);
  if (!entry || entry.isDirectory) {
    throw Errors.referenceInvalid(`${name} not found in ZIP file`, header);
  }
  return sniffUpload(name, entry.getData());
}

/**
 * Number column turned into a previous-participation URL; the auditor
 * checks the number.
 */
function genericUrlFor(
  row: CsvRow,
  header: string,
  kind: 'countries/country' | 'people/person',
  settings: EventSettings
): string | undefined {
  const number = row.values.get(header);
  if (number === undefined) {
    return undefined;
  }
  return `${settings.genericUrlBase}${kind}${number}/`;
}

export async function countryInputFromRow(row: CsvRow, sources: RowSources): Promise<CountryInput> {
  const emails = numberedValues(row, 'Contact Email ');
  const expected: Partial<Record<ExpectedField, string | null>> = {};
  for (const field of EXPECTED_FIELDS) {
    const value = row.values.get(COUNTRY_EXPECTED_COLUMNS[field]);
    if (value !== undefined) {
      expected[field] = value;
    }
  }
  return {
    code: row.values.get('Code'),
    name: row.values.get('Name'),
    contactEmail: emails[0] ?? null,
    contactExtra: emails.slice(1),
    expected,
    genericUrl: genericUrlFor(row, 'Country Number', 'countries/country', sources.settings),
    flag: await zipFile(row, 'Flag', sources.zip),
  };
}

function countryIdForCode(code: string, view: RegistrySnapshot): string {
  const country = view.findCountryByCode(code);
  if (!country) {
    throw Errors.referenceInvalid('Invalid country', 'countryId');
  }
  return country.id;
}

function travelLeg(row: CsvRow, label: 'Arrival' | 'Departure'): TravelLegInput {
  const time = row.values.get(`${label} Time`);
  const parsed = time === undefined ? null : parseTimeOfDay(`${label} time`, time);
  return {
    place: row.values.get(`${label} Place`) ?? null,
    date: row.values.get(`${label} Date`) ?? null,
    hour: parsed?.hour ?? null,
    minute: parsed?.minute ?? null,
    flight: row.values.get(`${label} Flight`) ?? null,
  };
}

function yesNo(row: CsvRow, header: string): boolean | null {
  const value = row.values.get(header);
  if (value === undefined) {
    return null;
  }
  if (value === YES || value === NO) {
    return value === YES;
  }
  throw Errors.formatInvalid(`Invalid value for ${header}`, header);
}

function photoConsent(row: CsvRow): PhotoConsent | null {
  const value = row.values.get('Photo Consent');
  if (value === undefined) {
    return null;
  }
  if (value === 'none' || value === 'badge_only' || value === 'yes') {
    return value;
  }
  throw Errors.formatInvalid('Invalid value for Photo Consent', 'photoConsent');
}

function dateOfBirthParts(row: CsvRow): Pick<PersonInput, 'dobYear' | 'dobMonth' | 'dobDay'> {
  const value = row.values.get('Date of Birth');
  if (value === undefined) {
    return { dobYear: null, dobMonth: null, dobDay: null };
  }
  const match = /^([0-9]+)-([0-9]{2})-([0-9]{2})$/.exec(value);
  if (!match) {
    throw Errors.formatInvalid('Date of birth: bad date', 'dateOfBirth');
  }
  return { dobYear: match[1], dobMonth: match[2], dobDay: match[3] };
}

export async function personInputFromRow(row: CsvRow, sources: RowSources): Promise<PersonInput> {
  const { view, settings, zip } = sources;
  const code = row.values.get('Country Code') ?? '';
  const photo = await zipFile(row, 'Photo', zip);
  return {
    countryId: countryIdForCode(code, view),
    givenName: row.values.get('Given Name') ?? null,
    familyName: row.values.get('Family Name') ?? null,
    passportGivenName: row.values.get('Passport Given Name') ?? null,
    passportFamilyName: row.values.get('Passport Family Name') ?? null,
    gender: row.values.get('Gender') ?? null,
    primaryRole: row.values.get('Primary Role') ?? null,
    otherRoles: row.lists.get('Other Roles') ?? [],
    guideFor: (row.lists.get('Guide For Codes') ?? []).map((guided) => countryIdForCode(guided, view)),
    ...dateOfBirthParts(row),
    languages: numberedValues(row, 'Language '),
    diet: row.values.get('Allergies and Dietary Requirements') ?? null,
    tshirt: row.values.get('T-Shirt Size') ?? null,
    arrival: travelLeg(row, 'Arrival'),
    departure: travelLeg(row, 'Departure'),
    roomType: row.values.get('Room Type') ?? null,
    roomShareWith: row.values.get('Share Room With') ?? null,
    roomNumber: row.values.get('Room Number') ?? null,
    phoneNumber: row.values.get('Phone Number') ?? null,
    passportNumber: row.values.get('Passport or Identity Card Number') ?? null,
    nationality: row.values.get('Nationality') ?? null,
    genericUrl: genericUrlFor(row, 'Person Number', 'people/person', settings),
    reusePhoto: photo === undefined,
    eventPhotosConsent: yesNo(row, 'Event Photos Consent'),
    photoConsent: photoConsent(row),
    dietConsent: yesNo(row, 'Diet Consent'),
    photo,
    consentForm: await zipFile(row, 'Consent Form', zip),
  };
}
