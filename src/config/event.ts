import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { isHexColor } from '../services/validation/fieldValidators.js';

const isoDate = z.string().regex(/^[0-9]{4}-[0-9]{2}-[0-9]{2}$/, 'must be a yyyy-mm-dd date');
const nameList = z.array(z.string().trim().min(1));
const badgePalette = z.object({ background: z.string(), outline: z.string(), text: z.string() });

/**
 * Static rulebook for one occurrence of the event.
 * Mutable event state (registration flags, medal boundaries) lives in the database.
 */
export const eventSettingsSchema = z
  .object({
    shortName: z.string().min(1),
    year: z.string().regex(/^[0-9]{4}$/),
    eventType: z.enum(['in-person', 'virtual', 'hybrid']).default('in-person'),

    numProblems: z.number().int().min(1),
    marksPerProblem: z.array(z.number().int().min(1)),
    numContestantsPerTeam: z.number().int().min(1),
    honourableMentionsAvailable: z.boolean().default(true),

    genders: nameList.default(['Female', 'Male', 'Non-binary']),
    contestantGenders: nameList.default([]),
    tshirtSizes: nameList.default(['S', 'M', 'L', 'XL', 'XXL', 'XXXL']),
    languages: nameList,
    numLanguages: z.number().int().min(1).default(2),
    locations: nameList.default([]),

    roomTypes: nameList.default(['Shared room', 'Single room']),
    roomTypesContestant: nameList.default([]),
    roomTypesNonContestant: nameList.default([]),
    defaultRoomTypeContestant: z.string().nullable().default(null),
    defaultRoomTypeNonContestant: z.string().nullable().default(null),

    requirePassportNumber: z.boolean().default(false),
    requireNationality: z.boolean().default(false),
    requireDiet: z.boolean().default(false),
    requireDateOfBirth: z.boolean().default(false),

    earliestDateOfBirth: isoDate.default('1902-01-01'),
    sanityDateOfBirth: isoDate,
    earliestDateOfBirthContestant: isoDate,
    earliestArrivalDate: isoDate,
    latestArrivalDate: isoDate,
    earliestDepartureDate: isoDate,
    latestDepartureDate: isoDate,

    consentUi: z.boolean().default(false),
    consentFormsDate: isoDate.nullable().default(null),

    genericUrlBase: z.string().url().endsWith('/'),
    genericUrlDesc: z.string().min(1),
    genericUrlDescPlural: z.string().min(1),
    rosterPath: z.string().nullable().default(null),

    staffCountryCode: z.string().regex(/^[A-Z]+$/).default('ZZA'),
    extraAdminRolesSecondaryOk: nameList.default([]),
    maxExpectedNumber: z.number().int().min(1).default(999),
    // per-role badge colours replacing the built-in palette
    badgeColors: z.record(badgePalette).default({}),
  })
  .superRefine((settings, ctx) => {
    if (settings.marksPerProblem.length !== settings.numProblems) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['marksPerProblem'],
        message: `expected ${settings.numProblems} entries`,
      });
    }
    const roomChecks: Array<[string, string | null]> = [
      ['defaultRoomTypeContestant', settings.defaultRoomTypeContestant],
      ['defaultRoomTypeNonContestant', settings.defaultRoomTypeNonContestant],
    ];
    for (const [key, value] of roomChecks) {
      if (value !== null && !settings.roomTypes.includes(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `unknown room type ${value}`,
        });
      }
    }
    for (const [role, palette] of Object.entries(settings.badgeColors)) {
      for (const [part, colour] of Object.entries(palette)) {
        if (!isHexColor(colour)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['badgeColors', role, part],
            message: 'must be 6 hex digits',
          });
        }
      }
    }
  });

export type EventSettings = z.infer<typeof eventSettingsSchema>;

export function isVirtualEvent(settings: EventSettings): boolean {
  return settings.eventType !== 'in-person';
}

export function totalMarks(settings: EventSettings): number {
  return settings.marksPerProblem.reduce((sum, marks) => sum + marks, 0);
}

export function parseEventSettings(raw: unknown): EventSettings {
  const result = eventSettingsSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new Error(`Event configuration invalid:\n${details}`);
  }
  return result.data;
}

export function loadEventSettings(filePath: string): EventSettings {
  const absolute = path.resolve(filePath);
  const raw: unknown = JSON.parse(fs.readFileSync(absolute, 'utf8'));
  return parseEventSettings(raw);
}
