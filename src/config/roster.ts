import fs from 'fs';
import path from 'path';
import { z } from 'zod';

const rosterSchema = z.object({
  countries: z
    .array(
      z.object({
        number: z.number().int().min(1),
        code: z.string(),
        name: z.string(),
      })
    )
    .default([]),
  people: z
    .array(
      z.object({
        number: z.number().int().min(1),
        givenName: z.string(),
        familyName: z.string(),
        // relative to the roster file
        photo: z.string().nullable().default(null),
      })
    )
    .default([]),
});

export interface RosterPerson {
  number: number;
  givenName: string;
  familyName: string;
  photoPath: string | null;
}

/**
 * Country and person numbers from previous occurrences of the event.
 */
export class RosterIndex {
  private readonly countryNumbers: Set<number>;
  private readonly people: Map<number, RosterPerson>;

  constructor(countryNumbers: Iterable<number>, people: Iterable<RosterPerson>) {
    this.countryNumbers = new Set(countryNumbers);
    this.people = new Map();
    for (const person of people) {
      this.people.set(person.number, person);
    }
  }

  hasCountry(number: number): boolean {
    return this.countryNumbers.has(number);
  }

  hasPerson(number: number): boolean {
    return this.people.has(number);
  }

  getPerson(number: number): RosterPerson | null {
    return this.people.get(number) ?? null;
  }
}

export function loadRoster(filePath: string): RosterIndex {
  const absolute = path.resolve(filePath);
  const parsed = rosterSchema.parse(JSON.parse(fs.readFileSync(absolute, 'utf8')));
  const dir = path.dirname(absolute);
  return new RosterIndex(
    parsed.countries.map((c) => c.number),
    parsed.people.map((p) => ({
      number: p.number,
      givenName: p.givenName,
      familyName: p.familyName,
      photoPath: p.photo ? path.join(dir, p.photo) : null,
    }))
  );
}
