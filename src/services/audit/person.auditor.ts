import { EventSettings } from '../../config/event.js';
import { RosterPerson } from '../../config/roster.js';
import { RoleCapabilities } from '../../domain/roles.js';
import {
  Actor,
  Country,
  Person,
  PhotoConsent,
  TravelLeg,
  UploadedFile,
  isAdmin,
} from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { checkUploadFormat } from '../files/fileFormat.service.js';
import {
  dateFromParts,
  formatList,
  parseHour,
  parseIsoDate,
  parseMinute,
} from '../validation/fieldValidators.js';
import { newValue, requireValue, sameList } from './auditUtil.js';
import { auditGenericUrl } from './country.auditor.js';
import { AuditContext, PendingUpload } from './registryView.js';

export interface TravelLegInput {
  place?: string | null;
  date?: string | null;
  hour?: string | null;
  minute?: string | null;
  flight?: string | null;
}

/**
 * Proposed person values as submitted. Undefined keeps the stored value,
 * null or an empty string clears it.
 */
export interface PersonInput {
  countryId?: string | null;
  givenName?: string | null;
  familyName?: string | null;
  passportGivenName?: string | null;
  passportFamilyName?: string | null;
  gender?: string | null;
  primaryRole?: string | null;
  otherRoles?: string[];
  guideFor?: string[];
  dobYear?: string | null;
  dobMonth?: string | null;
  dobDay?: string | null;
  languages?: string[];
  diet?: string | null;
  tshirt?: string | null;
  arrival?: TravelLegInput;
  departure?: TravelLegInput;
  roomType?: string | null;
  roomShareWith?: string | null;
  roomNumber?: string | null;
  phoneNumber?: string | null;
  passportNumber?: string | null;
  nationality?: string | null;
  incomplete?: boolean;
  genericUrl?: string | null;
  reusePhoto?: boolean;
  eventPhotosConsent?: boolean | null;
  photoConsent?: PhotoConsent | null;
  dietConsent?: boolean | null;
  photo?: UploadedFile;
  consentForm?: UploadedFile;
}

export type PersonDraft = Omit<Person, 'id' | 'photoId' | 'consentFormId' | 'retired'>;

export interface AuditedPerson {
  draft: PersonDraft;
  photo: PendingUpload | null;
  consentForm: PendingUpload | null;
  // roster entry whose photo is copied when no photo is uploaded
  rosterPhoto: RosterPerson | null;
}

export const DIET_UNKNOWN = 'Unknown';

const ADMIN_ONLY_LISTS = ['otherRoles', 'guideFor'] as const;

function checkAccess(
  actor: Actor,
  previous: Person | null,
  countryId: string | null,
  registrationEnabled: boolean
): void {
  switch (actor.kind) {
    case 'admin':
      return;
    case 'anonymous':
    case 'scoring':
      throw Errors.forbidden('You do not have permission to register people');
    case 'delegate':
      if (
        (countryId !== null && countryId !== actor.countryId) ||
        (previous !== null && previous.countryId !== actor.countryId)
      ) {
        throw Errors.forbidden('Person must be from your country', 'countryId');
      }
      break;
    case 'self':
      if (previous === null || previous.id !== actor.personId) {
        throw Errors.forbidden('You may only edit your own registration');
      }
      if (countryId !== null && countryId !== previous.countryId) {
        throw Errors.forbidden('You may not change your country', 'countryId');
      }
      break;
  }
  if (!registrationEnabled) {
    throw Errors.stateConflict(
      'Registration is now disabled, please contact the event organisers to change details of registered participants'
    );
  }
}

function checkAdminOnlyFields(input: PersonInput, previous: Person | null): void {
  for (const field of ADMIN_ONLY_LISTS) {
    const proposed = input[field];
    if (proposed !== undefined && !sameList(proposed, previous?.[field] ?? [])) {
      throw Errors.forbidden(`Only administrators may change ${field}`, field);
    }
  }
  if (
    input.roomNumber !== undefined &&
    newValue(input.roomNumber, null) !== (previous?.roomNumber ?? null)
  ) {
    throw Errors.forbidden('Only administrators may change roomNumber', 'roomNumber');
  }
  if (input.incomplete !== undefined && input.incomplete !== (previous?.incomplete ?? false)) {
    throw Errors.forbidden('Only administrators may change incomplete', 'incomplete');
  }
}

/**
 * Country lookup: must exist, be current and accept participants.
 */
function resolveCountry(countryId: string, ctx: AuditContext): Country {
  const country = ctx.view.getCountry(countryId);
  if (!country || country.retired || !country.participantsOk) {
    throw Errors.referenceInvalid('Invalid country', 'countryId');
  }
  return country;
}

function auditRoles(
  country: Country,
  role: RoleCapabilities,
  otherRoles: readonly string[],
  guideFor: readonly string[],
  previous: Person | null,
  ctx: AuditContext
): void {
  const { roles, view } = ctx;
  if (country.isStaff) {
    if (!role.staffOnly) {
      throw Errors.formatInvalid('Staff must have administrative roles', 'primaryRole');
    }
    for (const name of otherRoles) {
      const other = roles.get(name);
      if (!other || !other.staffOnly) {
        throw Errors.formatInvalid('Staff must have administrative roles', 'otherRoles');
      }
    }
  } else {
    if (role.staffOnly) {
      throw Errors.formatInvalid('Invalid role for participant', 'primaryRole');
    }
    for (const name of otherRoles) {
      if (!roles.get(name)?.secondaryOk) {
        throw Errors.formatInvalid('Non-staff may not have secondary roles', 'otherRoles');
      }
    }
    if (!role.isObserver) {
      const clash = view
        .people()
        .some(
          (other) =>
            !other.retired &&
            other.id !== previous?.id &&
            other.countryId === country.id &&
            other.primaryRole === role.name
        );
      if (clash) {
        throw Errors.conflict('A person with this role already exists', 'primaryRole');
      }
    }
  }

  if (guideFor.length > 0 && !role.canGuide) {
    throw Errors.formatInvalid('People with this role may not guide a country', 'guideFor');
  }
  for (const id of guideFor) {
    const guided = view.getCountry(id);
    if (!guided || guided.retired || guided.isStaff || !guided.participantsOk) {
      throw Errors.formatInvalid('May only guide normal countries', 'guideFor');
    }
  }
}

function splitDate(iso: string | null): [string | null, string | null, string | null] {
  if (iso === null) {
    return [null, null, null];
  }
  const [year, month, day] = iso.split('-');
  return [year, month, day];
}

function auditDateOfBirth(
  input: PersonInput,
  previous: Person | null,
  role: RoleCapabilities,
  settings: EventSettings,
  requireDate: boolean
): string | null {
  const [prevYear, prevMonth, prevDay] = splitDate(previous?.dateOfBirth ?? null);
  const year = newValue(input.dobYear, prevYear);
  const month = newValue(input.dobMonth, prevMonth);
  const day = newValue(input.dobDay, prevDay);
  if (year === null && month === null && day === null) {
    if (requireDate) {
      const supplied =
        input.dobYear !== undefined || input.dobMonth !== undefined || input.dobDay !== undefined;
      throw supplied
        ? Errors.requiredField('No date of birth specified', 'dateOfBirth')
        : Errors.requiredField('Required person property date_of_birth not supplied', 'dateOfBirth');
    }
    return null;
  }
  if (year === null) {
    throw Errors.requiredField('No year of birth specified', 'dateOfBirth');
  }
  if (month === null) {
    throw Errors.requiredField('No month of birth specified', 'dateOfBirth');
  }
  if (day === null) {
    throw Errors.requiredField('No day of birth specified', 'dateOfBirth');
  }
  const dob = dateFromParts('Date of birth', year, month, day);

  if (role.isContestant && dob < settings.earliestDateOfBirthContestant) {
    throw Errors.formatInvalid('Contestant too old', 'dateOfBirth');
  }
  if (dob < settings.earliestDateOfBirth) {
    throw Errors.formatInvalid('Participant implausibly old', 'dateOfBirth');
  }
  if (dob >= settings.sanityDateOfBirth) {
    throw Errors.formatInvalid('Participant implausibly young', 'dateOfBirth');
  }
  return dob;
}

interface LegRules {
  label: 'Arrival' | 'Departure';
  earliest: string;
  latest: string;
}

function auditTravelLeg(
  input: TravelLegInput | undefined,
  previous: TravelLeg | undefined,
  rules: LegRules,
  settings: EventSettings
): TravelLeg {
  const { label } = rules;
  const lower = label.toLowerCase();
  const place = newValue(input?.place, previous?.place);
  const rawDate = newValue(input?.date, previous?.date);
  const rawHour = newValue(input?.hour, previous?.hour);
  let rawMinute = newValue(input?.minute, previous?.minute);
  const flight = newValue(input?.flight, previous?.flight);

  if (place !== null && settings.locations.length > 0 && !settings.locations.includes(place)) {
    throw Errors.referenceInvalid(`Invalid ${lower} place`, `${lower}.place`);
  }
  const date = rawDate === null ? null : parseIsoDate(`${label} date`, rawDate);
  if (date === null && (rawHour !== null || rawMinute !== null)) {
    throw Errors.formatInvalid(
      `${label} time specified without ${lower} date`,
      `${lower}.hour`
    );
  }
  if (rawHour === null && rawMinute !== null) {
    throw Errors.formatInvalid(`${label} minute specified without hour`, `${lower}.minute`);
  }
  if (rawHour !== null && rawMinute === null) {
    rawMinute = '00';
  }
  const hour = rawHour === null ? null : parseHour(`${label} time`, rawHour);
  const minute = rawMinute === null ? null : parseMinute(`${label} time`, rawMinute);

  if (date !== null) {
    if (date < rules.earliest) {
      throw Errors.formatInvalid(`${label} date too early`, `${lower}.date`);
    }
    if (date > rules.latest) {
      throw Errors.formatInvalid(`${label} date too late`, `${lower}.date`);
    }
  }
  return { place, date, hour, minute, flight };
}

function auditTravel(
  input: PersonInput,
  previous: Person | null,
  settings: EventSettings
): { arrival: TravelLeg; departure: TravelLeg } {
  const arrival = auditTravelLeg(
    input.arrival,
    previous?.arrival,
    {
      label: 'Arrival',
      earliest: settings.earliestArrivalDate,
      latest: settings.latestArrivalDate,
    },
    settings
  );
  const departure = auditTravelLeg(
    input.departure,
    previous?.departure,
    {
      label: 'Departure',
      earliest: settings.earliestDepartureDate,
      latest: settings.latestDepartureDate,
    },
    settings
  );
  if (arrival.date !== null && departure.date !== null) {
    if (arrival.date > departure.date) {
      throw Errors.formatInvalid('Arrival date after departure date', 'arrival.date');
    }
    if (
      arrival.date === departure.date &&
      arrival.hour !== null &&
      departure.hour !== null &&
      `${arrival.hour}:${arrival.minute}` > `${departure.hour}:${departure.minute}`
    ) {
      throw Errors.formatInvalid('Arrival time after departure time', 'arrival.hour');
    }
  }
  return { arrival, departure };
}

function auditRoomType(
  input: PersonInput,
  previous: Person | null,
  role: RoleCapabilities,
  roleChanged: boolean,
  ctx: AuditContext
): string | null {
  let roomType = newValue(input.roomType, previous?.roomType);
  if (roomType === null && previous === null) {
    roomType = role.defaultRoomType;
  }
  if (roomType === null) {
    return null;
  }
  if (!ctx.settings.roomTypes.includes(roomType)) {
    throw Errors.referenceInvalid('Invalid room type', 'roomType');
  }
  const checked = previous === null || input.roomType !== undefined || roleChanged;
  if (checked && !isAdmin(ctx.actor) && !role.roomTypes.includes(roomType)) {
    throw Errors.formatInvalid(
      `Room type for this role must be ${formatList(role.roomTypes)}`,
      'roomType'
    );
  }
  return roomType;
}

function auditUploads(input: PersonInput): {
  photo: PendingUpload | null;
  consentForm: PendingUpload | null;
} {
  let photo: PendingUpload | null = null;
  let consentForm: PendingUpload | null = null;
  if (input.photo) {
    const format = checkUploadFormat(
      input.photo,
      'photo',
      ['jpeg', 'png'],
      'Photos must be in JPEG or PNG format'
    );
    photo = { kind: 'photo', format, filename: input.photo.filename, content: input.photo.content };
  }
  if (input.consentForm) {
    const format = checkUploadFormat(
      input.consentForm,
      'consent_form',
      ['pdf'],
      'Consent forms must be in PDF format'
    );
    consentForm = {
      kind: 'consent_form',
      format,
      filename: input.consentForm.filename,
      content: input.consentForm.content,
    };
  }
  return { photo, consentForm };
}

function nullableChoice<T>(proposed: T | null | undefined, previous: T | null | undefined): T | null {
  if (proposed !== undefined) {
    return proposed;
  }
  return previous ?? null;
}

/**
 * Validate and normalize a person create (previous null) or edit.
 * Checks run against ctx.view, so bulk import sees rows accepted earlier
 * in the same batch.
 */
export function auditPerson(
  input: PersonInput,
  previous: Person | null,
  ctx: AuditContext
): AuditedPerson {
  const { actor, settings, roles } = ctx;
  const admin = isAdmin(actor);

  checkAccess(actor, previous, newValue(input.countryId, null), ctx.event.registrationEnabled);
  if (!admin) {
    checkAdminOnlyFields(input, previous);
  }

  // Only administrators keep a record incomplete; any other edit must
  // supply everything that is missing.
  const incomplete = admin ? (input.incomplete ?? previous?.incomplete ?? false) : false;
  const required = (
    proposed: string | null | undefined,
    stored: string | null | undefined,
    prop: string,
    desc: string
  ): string | null =>
    incomplete
      ? newValue(proposed, stored)
      : requireValue(proposed, stored, { entity: 'person', prop, desc });

  const countryId = requireValue(input.countryId, previous?.countryId, {
    entity: 'person',
    prop: 'country',
    desc: 'country',
  });
  const givenName = required(input.givenName, previous?.givenName, 'given_name', 'given name');
  const familyName = required(input.familyName, previous?.familyName, 'family_name', 'family name');
  const gender = required(input.gender, previous?.gender, 'gender', 'gender');
  const primaryRole = requireValue(input.primaryRole, previous?.primaryRole, {
    entity: 'person',
    prop: 'primary_role',
    desc: 'primary role',
  });

  const languages = (input.languages ?? previous?.languages ?? [])
    .map((language) => language.trim())
    .filter((language) => language !== '');
  if (!incomplete && languages.length === 0) {
    throw input.languages === undefined && previous === null
      ? Errors.requiredField('Required person property language_1 not supplied', 'languages')
      : Errors.requiredField('No first language specified', 'languages');
  }
  const tshirt = required(input.tshirt, previous?.tshirt, 'tshirt', 'T-shirt size');

  const country = resolveCountry(countryId, ctx);
  const role = roles.get(primaryRole);
  if (!role) {
    throw Errors.referenceInvalid('Invalid role', 'primaryRole');
  }
  const otherRoles = input.otherRoles ?? previous?.otherRoles ?? [];
  const guideFor = input.guideFor ?? previous?.guideFor ?? [];
  auditRoles(country, role, otherRoles, guideFor, previous, ctx);

  if (gender !== null) {
    if (!settings.genders.includes(gender)) {
      throw Errors.referenceInvalid('Invalid gender', 'gender');
    }
    if (role.allowedGenders !== null && !role.allowedGenders.includes(gender)) {
      throw Errors.formatInvalid(
        `Contestant gender must be ${formatList(role.allowedGenders)}`,
        'gender'
      );
    }
  }

  const dateOfBirth = auditDateOfBirth(
    input,
    previous,
    role,
    settings,
    settings.requireDateOfBirth && !incomplete
  );

  if (languages.length > settings.numLanguages) {
    throw Errors.formatInvalid(
      `At most ${settings.numLanguages} languages may be specified`,
      'languages'
    );
  }
  if (new Set(languages).size !== languages.length) {
    throw Errors.formatInvalid('Duplicate languages specified', 'languages');
  }
  for (const language of languages) {
    if (!settings.languages.includes(language)) {
      throw Errors.referenceInvalid('Invalid language', 'languages');
    }
  }
  if (tshirt !== null && !settings.tshirtSizes.includes(tshirt)) {
    throw Errors.referenceInvalid('Invalid T-shirt size', 'tshirt');
  }

  const { arrival, departure } = auditTravel(input, previous, settings);
  const roomType = auditRoomType(
    input,
    previous,
    role,
    previous !== null && previous.primaryRole !== primaryRole,
    ctx
  );

  const phoneNumber = newValue(input.phoneNumber, previous?.phoneNumber);
  if (phoneNumber !== null && !role.staffOnly) {
    throw Errors.formatInvalid('Phone numbers may only be entered for staff', 'phoneNumber');
  }

  const passportNumber = settings.requirePassportNumber
    ? required(
        input.passportNumber,
        previous?.passportNumber,
        'passport_number',
        'passport or identity card number'
      )
    : newValue(input.passportNumber, previous?.passportNumber);
  const nationality = settings.requireNationality
    ? required(input.nationality, previous?.nationality, 'nationality', 'nationality')
    : newValue(input.nationality, previous?.nationality);

  const { photo, consentForm } = auditUploads(input);

  const genericUrl = newValue(input.genericUrl, previous?.genericUrl);
  const genericNumber = auditGenericUrl(genericUrl, 'people/person', ctx);
  let rosterPhoto: RosterPerson | null = null;
  if (input.reusePhoto && photo === null && genericNumber !== null && ctx.roster) {
    const entry = ctx.roster.getPerson(genericNumber);
    rosterPhoto = entry?.photoPath ? entry : null;
  }

  let eventPhotosConsent: boolean | null = null;
  let photoConsent: PhotoConsent | null = null;
  let dietConsent: boolean | null = null;
  let diet = newValue(input.diet, previous?.diet);
  if (settings.consentUi) {
    eventPhotosConsent = nullableChoice(input.eventPhotosConsent, previous?.eventPhotosConsent);
    dietConsent = nullableChoice(input.dietConsent, previous?.dietConsent);
    photoConsent = nullableChoice(input.photoConsent, previous?.photoConsent);
    const hasPhoto = photo !== null || rosterPhoto !== null || (previous?.photoId ?? null) !== null;
    if (!incomplete) {
      if (eventPhotosConsent === null) {
        throw Errors.requiredField(
          'No choice of consent for photos at the event specified',
          'eventPhotosConsent'
        );
      }
      if (dietConsent === null) {
        throw Errors.requiredField(
          'No choice of consent for allergies and dietary requirements information specified',
          'dietConsent'
        );
      }
      if (hasPhoto && photoConsent === null) {
        throw Errors.requiredField(
          'No choice of consent for registration photo specified',
          'photoConsent'
        );
      }
    }
    if (dietConsent === false) {
      diet = DIET_UNKNOWN;
    }
  }
  if (settings.requireDiet && !incomplete && diet === null) {
    diet = requireValue(input.diet, previous?.diet, {
      entity: 'person',
      prop: 'diet',
      desc: 'allergies and dietary requirements',
    });
  }

  logger.debug({ countryId, primaryRole, create: previous === null }, 'Person audit passed');
  return {
    draft: {
      countryId,
      primaryRole,
      otherRoles: [...otherRoles],
      guideFor: [...guideFor],
      givenName: givenName ?? '',
      familyName: familyName ?? '',
      passportGivenName: newValue(input.passportGivenName, previous?.passportGivenName),
      passportFamilyName: newValue(input.passportFamilyName, previous?.passportFamilyName),
      gender,
      dateOfBirth,
      languages,
      diet,
      tshirt,
      arrival,
      departure,
      roomType,
      roomShareWith: newValue(input.roomShareWith, previous?.roomShareWith),
      roomNumber: newValue(input.roomNumber, previous?.roomNumber),
      phoneNumber,
      passportNumber,
      nationality,
      incomplete,
      eventPhotosConsent,
      photoConsent,
      dietConsent,
      genericUrl,
    },
    photo,
    consentForm,
    rosterPhoto,
  };
}

