import { z } from 'zod';
import { Errors } from '../../utils/errors.js';

/**
 * Request body schemas. Bodies arrive as JSON or as multipart form fields,
 * so booleans and lists also accept their text forms.
 */
const text = z.string().nullable().optional();

const flag = z
  .union([z.boolean(), z.enum(['true', 'false']).transform((value) => value === 'true')])
  .optional();

const textList = z
  .union([
    z.array(z.string()),
    z.string().transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry !== '')
    ),
  ])
  .optional();

const photoConsent = z
  .union([z.enum(['none', 'badge_only', 'yes']), z.literal('').transform(() => null), z.null()])
  .optional();

const choice = z
  .union([
    z.boolean(),
    z.enum(['true', 'false']).transform((value) => value === 'true'),
    z.literal('').transform(() => null),
    z.null(),
  ])
  .optional();

export const countryBodySchema = z.object({
  code: text,
  name: text,
  isStaff: flag,
  participantsOk: flag,
  contactEmail: text,
  contactExtra: z.union([z.string(), z.array(z.string())]).nullable().optional(),
  expectedLeaders: text,
  expectedDeputies: text,
  expectedContestants: text,
  expectedObserversA: text,
  expectedObserversB: text,
  expectedObserversC: text,
  expectedSingleRooms: text,
  genericUrl: text,
  leaderEmail: text,
  physicalAddress: text,
});

export type CountryBody = z.infer<typeof countryBodySchema>;

export const personBodySchema = z.object({
  countryId: text,
  givenName: text,
  familyName: text,
  passportGivenName: text,
  passportFamilyName: text,
  gender: text,
  primaryRole: text,
  otherRoles: textList,
  guideFor: textList,
  dobYear: text,
  dobMonth: text,
  dobDay: text,
  languages: textList,
  diet: text,
  tshirt: text,
  arrivalPlace: text,
  arrivalDate: text,
  arrivalHour: text,
  arrivalMinute: text,
  arrivalFlight: text,
  departurePlace: text,
  departureDate: text,
  departureHour: text,
  departureMinute: text,
  departureFlight: text,
  roomType: text,
  roomShareWith: text,
  roomNumber: text,
  phoneNumber: text,
  passportNumber: text,
  nationality: text,
  incomplete: flag,
  genericUrl: text,
  reusePhoto: flag,
  eventPhotosConsent: choice,
  photoConsent,
  dietConsent: choice,
});

export type PersonBody = z.infer<typeof personBodySchema>;

export const eventFlagsSchema = z.object({
  registrationEnabled: flag,
  preregistrationEnabled: flag,
  selfScoringEnabled: flag,
});

const boundary = z
  .union([z.string(), z.number().int().transform((value) => String(value))])
  .nullable()
  .optional();

export const medalBoundariesSchema = z.object({
  gold: boundary,
  silver: boundary,
  bronze: boundary,
});

const scoreValue = z
  .union([z.string(), z.number().int().transform((value) => String(value))])
  .nullable();

export const scoreCellSchema = z.object({
  personId: z.string().min(1),
  problem: z.coerce.number().int(),
  score: scoreValue,
});

export const countryScoresSchema = z.object({
  scores: z.record(scoreValue),
});

export const accountBodySchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().min(1),
  countryId: z.string().min(1),
  personId: z
    .string()
    .nullable()
    .optional()
    .transform((value) => (value ? value : null)),
});

export const bulkImportSchema = z.object({
  delimiter: z.enum([',', ';']).default(','),
  dryRun: flag,
});

export const exportQuerySchema = z.object({
  delimiter: z.enum([',', ';']).default(','),
});

/**
 * Parse a request body or query; the first issue becomes a FormatInvalid
 * error naming the field.
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.');
    throw Errors.formatInvalid(
      field !== '' ? `Invalid ${field}: ${issue.message}` : issue.message,
      field !== '' ? field : undefined
    );
  }
  return result.data;
}
