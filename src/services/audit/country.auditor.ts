import { isVirtualEvent, EventSettings } from '../../config/event.js';
import {
  Country,
  EXPECTED_FIELDS,
  ExpectedField,
  ExpectedNumbers,
  UploadedFile,
  isAdmin,
} from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { checkUploadFormat } from '../files/fileFormat.service.js';
import {
  isValidEmail,
  matchGenericUrl,
  parseSmallInt,
  splitEmailList,
} from '../validation/fieldValidators.js';
import { newValue, requireValue } from './auditUtil.js';
import { AuditContext, PendingUpload } from './registryView.js';

/**
 * Proposed country values as submitted. A property left undefined keeps its
 * stored value; null or an empty string clears it.
 */
export interface CountryInput {
  code?: string | null;
  name?: string | null;
  isStaff?: boolean;
  participantsOk?: boolean;
  contactEmail?: string | null;
  contactExtra?: string | string[] | null;
  expected?: Partial<Record<ExpectedField, string | null>>;
  genericUrl?: string | null;
  flag?: UploadedFile;
  leaderEmail?: string | null;
  physicalAddress?: string | null;
}

export type CountryDraft = Omit<Country, 'id' | 'flagId' | 'retired'>;

export interface AuditedCountry {
  draft: CountryDraft;
  flag: PendingUpload | null;
}

export interface PreregistrationResult {
  changed: boolean;
  draft: CountryDraft;
}

const EXPECTED_LABELS: Record<ExpectedField, string> = {
  leaders: 'expected number of Leaders',
  deputies: 'expected number of Deputy Leaders',
  contestants: 'expected number of Contestants',
  observersA: 'expected number of Observers with Contestants',
  observersB: 'expected number of Observers with Leader',
  observersC: 'expected number of Observers with Deputy',
  singleRooms: 'expected number of single rooms',
};

const PREREGISTRATION_FIELDS = new Set<keyof CountryInput>([
  'expected',
  'leaderEmail',
  'physicalAddress',
]);

export function defaultExpectedNumbers(settings: EventSettings, isStaff: boolean): ExpectedNumbers {
  if (isStaff) {
    return {
      leaders: 0,
      deputies: 0,
      contestants: 0,
      observersA: 0,
      observersB: 0,
      observersC: 0,
      singleRooms: 0,
    };
  }
  return {
    leaders: 1,
    deputies: 1,
    contestants: settings.numContestantsPerTeam,
    observersA: 0,
    observersB: 0,
    observersC: 0,
    singleRooms: 0,
  };
}

function auditExpectedNumbers(
  input: CountryInput,
  previous: Country | null,
  isStaff: boolean,
  settings: EventSettings
): ExpectedNumbers {
  const defaults = defaultExpectedNumbers(settings, isStaff);
  const result: ExpectedNumbers = previous ? { ...previous.expected } : { ...defaults };
  for (const field of EXPECTED_FIELDS) {
    const raw = input.expected?.[field];
    if (raw === undefined) {
      continue;
    }
    const text = raw === null ? '' : raw.trim();
    if (text === '') {
      result[field] = defaults[field];
      continue;
    }
    const max = field === 'contestants' ? settings.numContestantsPerTeam : settings.maxExpectedNumber;
    result[field] = parseSmallInt(text, EXPECTED_LABELS[field], max);
  }
  if (isStaff && EXPECTED_FIELDS.some((field) => result[field] !== defaults[field])) {
    throw Errors.formatInvalid('Staff countries cannot have expected numbers of participants');
  }
  return result;
}

function auditContactEmails(
  input: CountryInput,
  previous: Country | null
): { contactEmail: string | null; contactExtra: string[] } {
  const contactEmail = newValue(input.contactEmail, previous?.contactEmail);
  if (contactEmail !== null && !isValidEmail(contactEmail)) {
    throw Errors.formatInvalid('Email address syntax invalid', 'contactEmail');
  }
  let contactExtra = previous?.contactExtra ?? [];
  if (input.contactExtra !== undefined) {
    const raw = input.contactExtra ?? [];
    contactExtra = (typeof raw === 'string' ? splitEmailList(raw) : raw)
      .map((address) => address.trim())
      .filter((address) => address !== '');
  }
  for (const address of contactExtra) {
    if (!isValidEmail(address)) {
      throw Errors.formatInvalid('Email address syntax invalid', 'contactExtra');
    }
  }
  if (contactEmail === null && contactExtra.length > 0) {
    throw Errors.requiredField(
      'Additional contact email addresses need a main contact email address',
      'contactEmail'
    );
  }
  return { contactEmail, contactExtra };
}

function auditVirtualFields(
  input: CountryInput,
  previous: Country | null,
  settings: EventSettings
): { leaderEmail: string | null; physicalAddress: string | null } {
  const leaderEmail = newValue(input.leaderEmail, previous?.leaderEmail);
  const physicalAddress = newValue(input.physicalAddress, previous?.physicalAddress);
  if (!isVirtualEvent(settings)) {
    if (leaderEmail !== null || physicalAddress !== null) {
      throw Errors.formatInvalid(
        'Leader email and physical address are only collected for virtual events'
      );
    }
    return { leaderEmail: null, physicalAddress: null };
  }
  if (leaderEmail !== null && !isValidEmail(leaderEmail)) {
    throw Errors.formatInvalid('Email address syntax invalid', 'leaderEmail');
  }
  return { leaderEmail, physicalAddress };
}

/**
 * Check a previous-participation URL for a country or person against the
 * configured base and, when one is loaded, the roster.
 */
export function auditGenericUrl(
  url: string | null,
  kind: 'countries/country' | 'people/person',
  ctx: AuditContext
): number | null {
  if (url === null) {
    return null;
  }
  const { settings, roster } = ctx;
  const number = matchGenericUrl(url, settings.genericUrlBase, kind);
  if (number === null) {
    throw Errors.formatInvalid(
      `${settings.genericUrlDescPlural} for previous participation must be in the form ${settings.genericUrlBase}${kind}N/`,
      'genericUrl'
    );
  }
  const known =
    kind === 'countries/country' ? roster?.hasCountry(number) : roster?.hasPerson(number);
  if (known === false) {
    throw Errors.referenceInvalid(
      `${settings.genericUrlDesc} for previous participation not valid`,
      'genericUrl'
    );
  }
  return number;
}

/**
 * Validate and normalize a country create (previous null) or edit by an
 * administrator.
 */
export function auditCountry(
  input: CountryInput,
  previous: Country | null,
  ctx: AuditContext
): AuditedCountry {
  const { settings, view } = ctx;
  if (!isAdmin(ctx.actor)) {
    throw Errors.forbidden('You do not have permission to edit countries');
  }

  const code = requireValue(input.code, previous?.code, {
    entity: 'country',
    prop: 'code',
    desc: 'country code',
  });
  const name = requireValue(input.name, previous?.name, {
    entity: 'country',
    prop: 'name',
    desc: 'country name',
  });
  if (!/^[A-Z]+$/.test(code)) {
    throw Errors.formatInvalid('Country codes must be all capital letters', 'code');
  }

  const others = view.countries().filter((other) => !other.retired && other.id !== previous?.id);
  if (others.some((other) => other.code === code)) {
    throw Errors.conflict(`A country with code ${code} already exists`, 'code');
  }
  if (others.some((other) => other.name === name)) {
    throw Errors.conflict(`A country with name ${name} already exists`, 'name');
  }

  let isStaff = input.isStaff ?? false;
  let participantsOk = input.participantsOk ?? true;
  if (previous) {
    if (input.isStaff !== undefined && input.isStaff !== previous.isStaff) {
      throw Errors.stateConflict('Cannot change whether a country is normal', 'isStaff');
    }
    if (input.participantsOk !== undefined && input.participantsOk !== previous.participantsOk) {
      throw Errors.stateConflict(
        'Cannot change whether a country can have participants',
        'participantsOk'
      );
    }
    isStaff = previous.isStaff;
    participantsOk = previous.participantsOk;
  }

  const expected = auditExpectedNumbers(input, previous, isStaff, settings);
  const { contactEmail, contactExtra } = auditContactEmails(input, previous);

  const genericUrl = newValue(input.genericUrl, previous?.genericUrl);
  auditGenericUrl(genericUrl, 'countries/country', ctx);

  let flag: PendingUpload | null = null;
  if (input.flag) {
    const format = checkUploadFormat(input.flag, 'flag', ['png'], 'Flags must be in PNG format');
    flag = { kind: 'flag', format, filename: input.flag.filename, content: input.flag.content };
  }

  const { leaderEmail, physicalAddress } = auditVirtualFields(input, previous, settings);

  logger.debug({ code, create: previous === null }, 'Country audit passed');
  return {
    draft: {
      code,
      name,
      isStaff,
      participantsOk,
      contactEmail,
      contactExtra,
      expected,
      numbersConfirmed: previous?.numbersConfirmed ?? false,
      genericUrl,
      leaderEmail,
      physicalAddress,
    },
    flag,
  };
}

function sameDraft(a: CountryDraft, b: Country): boolean {
  return (
    EXPECTED_FIELDS.every((field) => a.expected[field] === b.expected[field]) &&
    a.leaderEmail === b.leaderEmail &&
    a.physicalAddress === b.physicalAddress
  );
}

/**
 * Preregistration edit: expected numbers and, for virtual events, leader
 * contact details. Resubmitting the stored values is always accepted.
 */
export function auditPreregistration(
  input: CountryInput,
  previous: Country,
  ctx: AuditContext
): PreregistrationResult {
  const { actor, settings, event } = ctx;
  const admin = isAdmin(actor);
  if (!admin && !(actor.kind === 'delegate' && actor.countryId === previous.id)) {
    throw Errors.forbidden('You do not have permission to edit countries');
  }
  for (const key of Object.keys(input)) {
    if (!isCountryInputKey(key) || PREREGISTRATION_FIELDS.has(key)) {
      continue;
    }
    if (input[key] !== undefined) {
      throw Errors.forbidden(`You do not have permission to change ${key}`, key);
    }
  }

  const prereg: CountryInput = {
    expected: input.expected,
    leaderEmail: input.leaderEmail,
    physicalAddress: input.physicalAddress,
  };
  const expected = auditExpectedNumbers(prereg, previous, previous.isStaff, settings);
  const { leaderEmail, physicalAddress } = auditVirtualFields(prereg, previous, settings);
  const draft: CountryDraft = {
    ...previous,
    expected,
    leaderEmail,
    physicalAddress,
  };

  if (sameDraft(draft, previous)) {
    return { changed: false, draft: { ...previous } };
  }
  if (!admin && !event.preregistrationEnabled) {
    throw Errors.stateConflict(
      'Preregistration is now disabled, please contact the event organisers to change expected numbers of participants'
    );
  }
  return { changed: true, draft: { ...draft, numbersConfirmed: !admin || previous.numbersConfirmed } };
}

const COUNTRY_INPUT_KEYS: ReadonlyArray<keyof CountryInput> = [
  'code',
  'name',
  'isStaff',
  'participantsOk',
  'contactEmail',
  'contactExtra',
  'expected',
  'genericUrl',
  'flag',
  'leaderEmail',
  'physicalAddress',
];

function isCountryInputKey(key: string): key is keyof CountryInput {
  return COUNTRY_INPUT_KEYS.some((known) => known === key);
}
