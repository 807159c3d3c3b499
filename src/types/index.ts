/**
 * Registered team. The staff country holds organisers and is exempt from
 * the expected-number fields.
 */
export interface Country {
  id: string;
  code: string;
  name: string;
  isStaff: boolean;
  participantsOk: boolean;
  contactEmail: string | null;
  contactExtra: string[];
  expected: ExpectedNumbers;
  numbersConfirmed: boolean;
  genericUrl: string | null;
  flagId: string | null;
  leaderEmail: string | null;
  physicalAddress: string | null;
  retired: boolean;
}

export interface ExpectedNumbers {
  leaders: number;
  deputies: number;
  contestants: number;
  observersA: number;
  observersB: number;
  observersC: number;
  singleRooms: number;
}

export type ExpectedField = keyof ExpectedNumbers;

export const EXPECTED_FIELDS: readonly ExpectedField[] = [
  'leaders',
  'deputies',
  'contestants',
  'observersA',
  'observersB',
  'observersC',
  'singleRooms',
];

export type PhotoConsent = 'none' | 'badge_only' | 'yes';

export interface TravelLeg {
  place: string | null;
  date: string | null; // yyyy-mm-dd
  hour: string | null; // hh
  minute: string | null; // mm
  flight: string | null;
}

export interface Person {
  id: string;
  countryId: string;
  primaryRole: string;
  otherRoles: string[];
  guideFor: string[];
  givenName: string;
  familyName: string;
  passportGivenName: string | null;
  passportFamilyName: string | null;
  gender: string | null;
  dateOfBirth: string | null; // yyyy-mm-dd
  languages: string[];
  diet: string | null;
  tshirt: string | null;
  arrival: TravelLeg;
  departure: TravelLeg;
  roomType: string | null;
  roomShareWith: string | null;
  roomNumber: string | null;
  phoneNumber: string | null;
  passportNumber: string | null;
  nationality: string | null;
  incomplete: boolean;
  photoId: string | null;
  consentFormId: string | null;
  eventPhotosConsent: boolean | null;
  photoConsent: PhotoConsent | null;
  dietConsent: boolean | null;
  genericUrl: string | null;
  retired: boolean;
}

export type FileKind = 'photo' | 'flag' | 'consent_form';
export type FileFormat = 'png' | 'jpeg' | 'pdf';

/**
 * Immutable file metadata; bytes live in object storage under storageKey.
 */
export interface StoredFile {
  id: string;
  kind: FileKind;
  ownerKind: 'country' | 'person';
  ownerId: string;
  format: FileFormat;
  filename: string;
  storageKey: string;
  createdAt: string;
}

export interface MedalBoundaries {
  gold: number;
  silver: number;
  bronze: number;
}

/**
 * The mutable part of the event. Updated only as a whole, guarded by version.
 */
export interface EventState {
  version: number;
  registrationEnabled: boolean;
  preregistrationEnabled: boolean;
  selfScoringEnabled: boolean;
  medalBoundaries: MedalBoundaries | null;
}

export interface ScoreCell {
  personId: string;
  problem: number; // 1-based
  score: number;
}

export type Actor =
  | { kind: 'admin'; username: string }
  | { kind: 'scoring'; username: string }
  | { kind: 'delegate'; username: string; countryId: string }
  | { kind: 'self'; username: string; countryId: string; personId: string }
  | { kind: 'anonymous' };

export const ANONYMOUS: Actor = { kind: 'anonymous' };

export function isAdmin(actor: Actor): boolean {
  return actor.kind === 'admin';
}

/**
 * Country an account is scoped to, for delegates and self-registration accounts.
 */
export function actorCountryId(actor: Actor): string | null {
  if (actor.kind === 'delegate' || actor.kind === 'self') {
    return actor.countryId;
  }
  return null;
}

/**
 * An upload after format sniffing. detected is null when the content is not
 * a recognised image or document.
 */
export interface UploadedFile {
  filename: string;
  content: Buffer;
  detected: FileFormat | null;
}
