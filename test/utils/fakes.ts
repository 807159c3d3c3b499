import fs from 'fs';
import path from 'path';
import { EventSettings, parseEventSettings } from '../../src/config/event.js';
import { RosterIndex } from '../../src/config/roster.js';
import {
  Account,
  NewFile,
  RegistrationStore,
  RegistrationWriter,
} from '../../src/db/registrationStore.js';
import { buildRoleTable } from '../../src/domain/roles.js';
import type { CountryDraft } from '../../src/services/audit/country.auditor.js';
import type { PersonDraft } from '../../src/services/audit/person.auditor.js';
import { AuditContext, RegistrySnapshot } from '../../src/services/audit/registryView.js';
import { PasswordHasher } from '../../src/services/auth/passwordHasher.js';
import {
  NotificationQueue,
  RegistrationNotificationJobData,
} from '../../src/services/queue/jobQueue.service.js';
import { EngineDeps } from '../../src/services/registration/engine.js';
import { FileStorage } from '../../src/services/storage/minio.service.js';
import {
  Actor,
  Country,
  EventState,
  Person,
  ScoreCell,
  StoredFile,
} from '../../src/types/index.js';
import { Errors } from '../../src/utils/errors.js';

export const ADMIN: Actor = { kind: 'admin', username: 'admin' };
export const SCORING: Actor = { kind: 'scoring', username: 'scoring' };
export const ANONYMOUS: Actor = { kind: 'anonymous' };

export function delegateOf(countryId: string): Actor {
  return { kind: 'delegate', username: `delegate-${countryId}`, countryId };
}

const baseSettings: unknown = JSON.parse(
  fs.readFileSync(path.resolve('test/fixtures/event.json'), 'utf8')
);

export function testSettings(overrides: Record<string, unknown> = {}): EventSettings {
  if (typeof baseSettings !== 'object' || baseSettings === null) {
    throw new Error('event fixture is not an object');
  }
  return parseEventSettings({ ...baseSettings, ...overrides });
}

export function testRoster(): RosterIndex {
  return new RosterIndex(
    [1, 2],
    [
      { number: 10, givenName: 'Ada', familyName: 'Example', photoPath: null },
      { number: 11, givenName: 'Ben', familyName: 'Sample', photoPath: null },
    ]
  );
}

export const OPEN_EVENT: EventState = {
  version: 1,
  registrationEnabled: true,
  preregistrationEnabled: true,
  selfScoringEnabled: false,
  medalBoundaries: null,
};

export function makeCountry(overrides: Partial<Country> & Pick<Country, 'id' | 'code'>): Country {
  return {
    name: `Country ${overrides.code}`,
    isStaff: false,
    participantsOk: true,
    contactEmail: null,
    contactExtra: [],
    expected: {
      leaders: 1,
      deputies: 1,
      contestants: 4,
      observersA: 0,
      observersB: 0,
      observersC: 0,
      singleRooms: 0,
    },
    numbersConfirmed: false,
    genericUrl: null,
    flagId: null,
    leaderEmail: null,
    physicalAddress: null,
    retired: false,
    ...overrides,
  };
}

const EMPTY_LEG = { place: null, date: null, hour: null, minute: null, flight: null };

export function makePerson(
  overrides: Partial<Person> & Pick<Person, 'id' | 'countryId' | 'primaryRole'>
): Person {
  return {
    otherRoles: [],
    guideFor: [],
    givenName: 'Given',
    familyName: 'Family',
    passportGivenName: null,
    passportFamilyName: null,
    gender: 'Female',
    dateOfBirth: null,
    languages: ['English'],
    diet: null,
    tshirt: 'M',
    arrival: { ...EMPTY_LEG },
    departure: { ...EMPTY_LEG },
    roomType: null,
    roomShareWith: null,
    roomNumber: null,
    phoneNumber: null,
    passportNumber: null,
    nationality: null,
    incomplete: false,
    photoId: null,
    consentFormId: null,
    eventPhotosConsent: null,
    photoConsent: null,
    dietConsent: null,
    genericUrl: null,
    retired: false,
    ...overrides,
  };
}

export function makeFile(overrides: Partial<StoredFile> & Pick<StoredFile, 'id' | 'kind' | 'ownerId'>): StoredFile {
  return {
    ownerKind: overrides.kind === 'flag' ? 'country' : 'person',
    format: overrides.kind === 'consent_form' ? 'pdf' : 'png',
    filename: 'upload.png',
    storageKey: `files/${overrides.kind}/${overrides.id}`,
    createdAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

interface StoreState {
  countries: Map<string, Country>;
  people: Map<string, Person>;
  files: Map<string, StoredFile>;
  scores: Map<string, ScoreCell>;
  accounts: Map<string, Account>;
  event: EventState;
  nextId: number;
}

function cloneState(state: StoreState): StoreState {
  return {
    countries: new Map(state.countries),
    people: new Map(state.people),
    files: new Map(state.files),
    scores: new Map(state.scores),
    accounts: new Map(state.accounts),
    event: { ...state.event },
    nextId: state.nextId,
  };
}

class InMemoryWriter implements RegistrationWriter {
  constructor(protected state: StoreState) {}

  private newId(prefix: string): string {
    this.state.nextId += 1;
    return `${prefix}-${this.state.nextId}`;
  }

  async loadSnapshot(): Promise<RegistrySnapshot> {
    return new RegistrySnapshot(this.state.countries.values(), this.state.people.values());
  }

  async getEventState(): Promise<EventState> {
    return { ...this.state.event };
  }

  async getCountry(id: string): Promise<Country | null> {
    return this.state.countries.get(id) ?? null;
  }

  async getPerson(id: string): Promise<Person | null> {
    return this.state.people.get(id) ?? null;
  }

  async getFile(id: string): Promise<StoredFile | null> {
    return this.state.files.get(id) ?? null;
  }

  async listFiles(): Promise<StoredFile[]> {
    return [...this.state.files.values()];
  }

  async listScores(): Promise<ScoreCell[]> {
    return [...this.state.scores.values()];
  }

  async findAccount(username: string): Promise<Account | null> {
    return this.state.accounts.get(username) ?? null;
  }

  async insertCountry(draft: CountryDraft): Promise<Country> {
    const country: Country = { ...draft, id: this.newId('country'), flagId: null, retired: false };
    this.state.countries.set(country.id, country);
    return country;
  }

  async updateCountry(country: Country): Promise<void> {
    this.state.countries.set(country.id, country);
  }

  async insertPerson(draft: PersonDraft): Promise<Person> {
    const person: Person = {
      ...draft,
      id: this.newId('person'),
      photoId: null,
      consentFormId: null,
      retired: false,
    };
    this.state.people.set(person.id, person);
    return person;
  }

  async updatePerson(person: Person): Promise<void> {
    this.state.people.set(person.id, person);
  }

  async insertFile(file: NewFile): Promise<StoredFile> {
    const stored: StoredFile = {
      ...file,
      id: this.newId('file'),
      createdAt: '2026-01-01T00:00:00.000Z',
    };
    this.state.files.set(stored.id, stored);
    return stored;
  }

  async setScore(personId: string, problem: number, score: number | null): Promise<void> {
    const key = `${personId}:${problem}`;
    if (score === null) {
      this.state.scores.delete(key);
    } else {
      this.state.scores.set(key, { personId, problem, score });
    }
  }

  async saveEventState(next: EventState): Promise<EventState> {
    if (next.version !== this.state.event.version) {
      throw Errors.stateConflict('Event settings were changed by someone else, please try again');
    }
    this.state.event = { ...next, version: next.version + 1 };
    return { ...this.state.event };
  }

  async insertAccount(account: Account): Promise<void> {
    if (this.state.accounts.has(account.username)) {
      throw Errors.conflict('An account with this username already exists', 'username');
    }
    this.state.accounts.set(account.username, account);
  }

  async retireAccounts(countryId: string): Promise<void> {
    for (const [username, account] of this.state.accounts) {
      if (account.countryId === countryId) {
        this.state.accounts.set(username, { ...account, retired: true });
      }
    }
  }
}

/**
 * Store kept in maps. A transaction works on a copy that replaces the
 * committed state only when its callback resolves.
 */
export class InMemoryRegistrationStore extends InMemoryWriter implements RegistrationStore {
  transactions = 0;
  // runs before each transaction body, with the 1-based transaction number
  beforeTransaction: ((count: number, store: InMemoryRegistrationStore) => Promise<void>) | null =
    null;

  constructor(event: EventState = OPEN_EVENT) {
    super({
      countries: new Map(),
      people: new Map(),
      files: new Map(),
      scores: new Map(),
      accounts: new Map(),
      event: { ...event },
      nextId: 0,
    });
  }

  async transaction<T>(fn: (tx: RegistrationWriter) => Promise<T>): Promise<T> {
    this.transactions += 1;
    if (this.beforeTransaction) {
      await this.beforeTransaction(this.transactions, this);
    }
    const working = cloneState(this.state);
    const result = await fn(new InMemoryWriter(working));
    this.state = working;
    return result;
  }

  seedCountry(country: Country): Country {
    this.state.countries.set(country.id, country);
    return country;
  }

  seedPerson(person: Person): Person {
    this.state.people.set(person.id, person);
    return person;
  }

  seedFile(file: StoredFile): StoredFile {
    this.state.files.set(file.id, file);
    return file;
  }

  seedScore(personId: string, problem: number, score: number): void {
    this.state.scores.set(`${personId}:${problem}`, { personId, problem, score });
  }

  seedAccount(account: Account): void {
    this.state.accounts.set(account.username, account);
  }

  setEvent(event: Partial<EventState>): void {
    this.state.event = { ...this.state.event, ...event };
  }

  countries(): Country[] {
    return [...this.state.countries.values()];
  }

  people(): Person[] {
    return [...this.state.people.values()];
  }

  files(): StoredFile[] {
    return [...this.state.files.values()];
  }
}

export class InMemoryFileStorage implements FileStorage {
  readonly objects = new Map<string, Buffer>();

  async put(key: string, content: Buffer): Promise<void> {
    this.objects.set(key, content);
  }

  async get(key: string): Promise<Buffer> {
    const content = this.objects.get(key);
    if (!content) {
      throw Errors.notFound('File content');
    }
    return content;
  }
}

export class RecordingNotificationQueue implements NotificationQueue {
  readonly jobs: RegistrationNotificationJobData[] = [];

  async enqueueRegistrationNotification(data: RegistrationNotificationJobData): Promise<string> {
    this.jobs.push(data);
    return `job-${this.jobs.length}`;
  }
}

/**
 * Stored hash is "hashed:" followed by the password.
 */
export class PlainPasswordHasher implements PasswordHasher {
  async hash(plainText: string): Promise<string> {
    return `hashed:${plainText}`;
  }

  async verify(hash: string, plainText: string): Promise<boolean> {
    return hash === `hashed:${plainText}`;
  }
}

export interface TestEngine {
  deps: EngineDeps;
  store: InMemoryRegistrationStore;
  storage: InMemoryFileStorage;
  notifications: RecordingNotificationQueue;
}

export function createTestEngine(
  options: { settings?: EventSettings; event?: EventState; roster?: RosterIndex | null } = {}
): TestEngine {
  const settings = options.settings ?? testSettings();
  const store = new InMemoryRegistrationStore(options.event);
  const storage = new InMemoryFileStorage();
  const notifications = new RecordingNotificationQueue();
  return {
    deps: {
      store,
      storage,
      notifications,
      settings,
      roles: buildRoleTable(settings),
      roster: options.roster ?? null,
    },
    store,
    storage,
    notifications,
  };
}

export function auditContextFor(
  actor: Actor,
  view: RegistrySnapshot,
  options: { settings?: EventSettings; event?: EventState; roster?: RosterIndex | null } = {}
): AuditContext {
  const settings = options.settings ?? testSettings();
  return {
    settings,
    roles: buildRoleTable(settings),
    roster: options.roster ?? null,
    event: options.event ?? OPEN_EVENT,
    actor,
    view,
  };
}
