import { Knex } from 'knex';
import { PostgresAdapter } from './adapters/PostgresAdapter.js';
import { AccountsRepository } from './repositories/accounts.repository.js';
import { CountriesRepository } from './repositories/countries.repository.js';
import { EventStateRepository } from './repositories/eventState.repository.js';
import { FilesRepository } from './repositories/files.repository.js';
import { PeopleRepository } from './repositories/people.repository.js';
import { ScoresRepository } from './repositories/scores.repository.js';
import {
  Account,
  NewFile,
  RegistrationStore,
  RegistrationWriter,
} from './registrationStore.js';
import { RegistrySnapshot } from '../services/audit/registryView.js';
import type { CountryDraft } from '../services/audit/country.auditor.js';
import type { PersonDraft } from '../services/audit/person.auditor.js';
import { Country, EventState, Person, ScoreCell, StoredFile } from '../types/index.js';

interface Repositories {
  countries: CountriesRepository;
  people: PeopleRepository;
  files: FilesRepository;
  scores: ScoresRepository;
  eventState: EventStateRepository;
  accounts: AccountsRepository;
}

/**
 * Store operations bound to one knex transaction, or to the pool when trx
 * is undefined.
 */
class KnexRegistrationWriter implements RegistrationWriter {
  constructor(
    protected readonly repos: Repositories,
    private readonly trx?: Knex.Transaction
  ) {}

  async loadSnapshot(): Promise<RegistrySnapshot> {
    const [countries, people] = await Promise.all([
      this.repos.countries.findAll(this.trx),
      this.repos.people.findAll(this.trx),
    ]);
    return new RegistrySnapshot(countries, people);
  }

  getEventState(): Promise<EventState> {
    return this.repos.eventState.get(this.trx);
  }

  getCountry(id: string): Promise<Country | null> {
    return this.repos.countries.findById(id, this.trx);
  }

  getPerson(id: string): Promise<Person | null> {
    return this.repos.people.findById(id, this.trx);
  }

  getFile(id: string): Promise<StoredFile | null> {
    return this.repos.files.findById(id, this.trx);
  }

  listFiles(): Promise<StoredFile[]> {
    return this.repos.files.findAll(this.trx);
  }

  listScores(): Promise<ScoreCell[]> {
    return this.repos.scores.findAll(this.trx);
  }

  findAccount(username: string): Promise<Account | null> {
    return this.repos.accounts.findByUsername(username, this.trx);
  }

  insertCountry(draft: CountryDraft): Promise<Country> {
    return this.repos.countries.create(draft, this.trx);
  }

  updateCountry(country: Country): Promise<void> {
    return this.repos.countries.update(country, this.trx);
  }

  insertPerson(draft: PersonDraft): Promise<Person> {
    return this.repos.people.create(draft, this.trx);
  }

  updatePerson(person: Person): Promise<void> {
    return this.repos.people.update(person, this.trx);
  }

  insertFile(file: NewFile): Promise<StoredFile> {
    return this.repos.files.create(file, this.trx);
  }

  setScore(personId: string, problem: number, score: number | null): Promise<void> {
    return this.repos.scores.set(personId, problem, score, this.trx);
  }

  saveEventState(next: EventState): Promise<EventState> {
    return this.repos.eventState.save(next, this.trx);
  }

  insertAccount(account: Account): Promise<void> {
    return this.repos.accounts.create(account, this.trx);
  }

  async retireAccounts(countryId: string): Promise<void> {
    await this.repos.accounts.retireForCountry(countryId, this.trx);
  }
}

export class KnexRegistrationStore extends KnexRegistrationWriter implements RegistrationStore {
  constructor(private readonly db: PostgresAdapter) {
    super({
      countries: new CountriesRepository(db),
      people: new PeopleRepository(db),
      files: new FilesRepository(db),
      scores: new ScoresRepository(db),
      eventState: new EventStateRepository(db),
      accounts: new AccountsRepository(db),
    });
  }

  transaction<T>(fn: (tx: RegistrationWriter) => Promise<T>): Promise<T> {
    return this.db.transaction((trx) => fn(new KnexRegistrationWriter(this.repos, trx)));
  }
}
