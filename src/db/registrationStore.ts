import { RegistrySnapshot } from '../services/audit/registryView.js';
import type { CountryDraft } from '../services/audit/country.auditor.js';
import type { PersonDraft } from '../services/audit/person.auditor.js';
import { Country, EventState, Person, ScoreCell, StoredFile } from '../types/index.js';

export interface Account {
  username: string;
  passwordHash: string;
  countryId: string;
  personId: string | null;
  retired: boolean;
}

export type NewFile = Omit<StoredFile, 'id' | 'createdAt'>;

export interface RegistrationReader {
  loadSnapshot(): Promise<RegistrySnapshot>;
  getEventState(): Promise<EventState>;
  getCountry(id: string): Promise<Country | null>;
  getPerson(id: string): Promise<Person | null>;
  getFile(id: string): Promise<StoredFile | null>;
  listFiles(): Promise<StoredFile[]>;
  listScores(): Promise<ScoreCell[]>;
  findAccount(username: string): Promise<Account | null>;
}

export interface RegistrationWriter extends RegistrationReader {
  insertCountry(draft: CountryDraft): Promise<Country>;
  updateCountry(country: Country): Promise<void>;
  insertPerson(draft: PersonDraft): Promise<Person>;
  updatePerson(person: Person): Promise<void>;
  insertFile(file: NewFile): Promise<StoredFile>;
  // null clears the cell
  setScore(personId: string, problem: number, score: number | null): Promise<void>;
  /**
   * Compare-and-swap on version: fails with StateConflict when the stored
   * version differs from next.version. Returns the stored state.
   */
  saveEventState(next: EventState): Promise<EventState>;
  insertAccount(account: Account): Promise<void>;
  retireAccounts(countryId: string): Promise<void>;
}

/**
 * Persistence seam for the engine. Every mutation runs inside transaction().
 */
export interface RegistrationStore extends RegistrationReader {
  transaction<T>(fn: (tx: RegistrationWriter) => Promise<T>): Promise<T>;
}
