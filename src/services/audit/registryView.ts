import { EventSettings } from '../../config/event.js';
import { RosterIndex } from '../../config/roster.js';
import { RoleTable } from '../../domain/roles.js';
import { Actor, Country, EventState, FileFormat, FileKind, Person } from '../../types/index.js';

/**
 * Read-only registry the auditors check against.
 */
export interface RegistryView {
  countries(): readonly Country[];
  getCountry(id: string): Country | null;
  people(): readonly Person[];
  getPerson(id: string): Person | null;
}

/**
 * Point-in-time copy of all countries and people.
 * Bulk import overlays accepted rows on it with put().
 */
export class RegistrySnapshot implements RegistryView {
  private readonly countryMap: Map<string, Country>;
  private readonly personMap: Map<string, Person>;

  constructor(countries: Iterable<Country>, people: Iterable<Person>) {
    this.countryMap = new Map();
    this.personMap = new Map();
    for (const country of countries) {
      this.countryMap.set(country.id, country);
    }
    for (const person of people) {
      this.personMap.set(person.id, person);
    }
  }

  countries(): readonly Country[] {
    return [...this.countryMap.values()];
  }

  getCountry(id: string): Country | null {
    return this.countryMap.get(id) ?? null;
  }

  people(): readonly Person[] {
    return [...this.personMap.values()];
  }

  getPerson(id: string): Person | null {
    return this.personMap.get(id) ?? null;
  }

  findCountryByCode(code: string): Country | null {
    for (const country of this.countryMap.values()) {
      if (!country.retired && country.code === code) {
        return country;
      }
    }
    return null;
  }

  putCountry(country: Country): void {
    this.countryMap.set(country.id, country);
  }

  putPerson(person: Person): void {
    this.personMap.set(person.id, person);
  }
}

/**
 * Everything an auditor needs besides the proposed values.
 */
export interface AuditContext {
  settings: EventSettings;
  roles: RoleTable;
  roster: RosterIndex | null;
  event: EventState;
  actor: Actor;
  view: RegistryView;
}

/**
 * A validated upload waiting to be written to storage.
 */
export interface PendingUpload {
  kind: FileKind;
  format: FileFormat;
  filename: string;
  content: Buffer;
}
