import { totalMarks } from '../../config/event.js';
import { RegistrationWriter } from '../../db/registrationStore.js';
import { contestantCode } from '../../domain/roles.js';
import {
  Actor,
  Country,
  EventState,
  MedalBoundaries,
  Person,
  ScoreCell,
  isAdmin,
} from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { RegistryView } from '../audit/registryView.js';
import { EngineDeps, notify } from '../registration/engine.js';
import { isValidSmallInt } from '../validation/fieldValidators.js';

export type MedalName = keyof MedalBoundaries;

const MEDALS: readonly MedalName[] = ['gold', 'silver', 'bronze'];

/**
 * Submitted boundaries. Undefined leaves a boundary alone, null or an empty
 * string unsets it.
 */
export type MedalBoundaryInput = Partial<Record<MedalName, string | null>>;

export interface EventFlagsInput {
  registrationEnabled?: boolean;
  preregistrationEnabled?: boolean;
  selfScoringEnabled?: boolean;
}

export type Award = 'Gold Medal' | 'Silver Medal' | 'Bronze Medal' | 'Honourable Mention';

export interface ContestantResult {
  personId: string;
  countryId: string;
  contestantCode: string;
  // indexed by problem - 1; null where not entered
  scores: Array<number | null>;
  total: number;
  rank: number;
  award: Award | null;
}

export interface ScoreChange {
  personId: string;
  problem: number;
  score: number | null;
  changed: boolean;
}

interface Contestant {
  person: Person;
  country: Country;
  code: string;
}

function contestantsOf(view: RegistryView): Contestant[] {
  const result: Contestant[] = [];
  for (const person of view.people()) {
    const country = view.getCountry(person.countryId);
    if (person.retired || !country || country.retired || country.isStaff) {
      continue;
    }
    const code = contestantCode(country.code, person.primaryRole);
    if (code !== null) {
      result.push({ person, country, code });
    }
  }
  return result;
}

function scoreKey(personId: string, problem: number): string {
  return `${personId}:${problem}`;
}

function scoreMap(cells: readonly ScoreCell[]): Map<string, number> {
  return new Map(cells.map((cell) => [scoreKey(cell.personId, cell.problem), cell.score]));
}

function blank(value: string | null | undefined): boolean {
  return value === null || (value !== undefined && value.trim() === '');
}

/**
 * Score entry and medal boundaries. Scores can be entered only once
 * registration is closed, and are frozen while boundaries are set.
 */
export class ScoringService {
  constructor(private readonly deps: EngineDeps) {}

  eventState(): Promise<EventState> {
    return this.deps.store.getEventState();
  }

  private checkScoringAccess(actor: Actor, event: EventState, countryId: string): void {
    if (isAdmin(actor) || actor.kind === 'scoring') {
      return;
    }
    if (actor.kind === 'delegate' && event.selfScoringEnabled && actor.countryId === countryId) {
      return;
    }
    throw Errors.forbidden('You do not have permission to enter scores');
  }

  private checkScoresOpen(event: EventState): void {
    if (event.registrationEnabled) {
      throw Errors.stateConflict('Registration must be disabled before scores are entered');
    }
    if (event.medalBoundaries !== null) {
      throw Errors.stateConflict('Scores cannot be entered after medal boundaries are set');
    }
  }

  private checkProblem(problem: number): void {
    if (!Number.isInteger(problem) || problem < 1 || problem > this.deps.settings.numProblems) {
      throw Errors.referenceInvalid('Country or problem invalid or not specified', 'problem');
    }
  }

  /**
   * Blank clears the cell; otherwise an integer up to the problem's marks.
   */
  private parseScore(value: string | null, problem: number, code: string): number | null {
    if (value === null || value.trim() === '') {
      return null;
    }
    const max = this.deps.settings.marksPerProblem[problem - 1];
    const text = value.trim();
    if (!isValidSmallInt(text, max)) {
      throw Errors.formatInvalid(`Invalid score specified for ${code}`, 'score');
    }
    return Number(text);
  }

  private async writeScore(
    tx: RegistrationWriter,
    scores: Map<string, number>,
    personId: string,
    problem: number,
    score: number | null
  ): Promise<ScoreChange> {
    const current = scores.get(scoreKey(personId, problem)) ?? null;
    if (current === score) {
      return { personId, problem, score, changed: false };
    }
    await tx.setScore(personId, problem, score);
    return { personId, problem, score, changed: true };
  }

  async setScore(
    actor: Actor,
    personId: string,
    problem: number,
    value: string | null
  ): Promise<ScoreChange> {
    const change = await this.deps.store.transaction(async (tx) => {
      const [view, event, cells] = await Promise.all([
        tx.loadSnapshot(),
        tx.getEventState(),
        tx.listScores(),
      ]);
      const person = view.getPerson(personId);
      if (!person || person.retired) {
        throw Errors.notFound('Person');
      }
      this.checkScoringAccess(actor, event, person.countryId);
      this.checkScoresOpen(event);
      this.checkProblem(problem);
      const contestant = contestantsOf(view).find((entry) => entry.person.id === personId);
      if (!contestant) {
        throw Errors.formatInvalid('Scores may only be entered for contestants', 'personId');
      }
      const score = this.parseScore(value, problem, contestant.code);
      return this.writeScore(tx, scoreMap(cells), personId, problem, score);
    });

    if (change.changed) {
      logger.info({ personId, problem, score: change.score }, 'Score updated');
      await notify(this.deps, actor, { entity: 'scores', id: personId, action: 'updated' });
    }
    return change;
  }

  /**
   * Scores for one problem for a country's contestants, keyed by
   * contestant code. Contestants without an entry are left unchanged.
   */
  async enterCountryScores(
    actor: Actor,
    countryId: string,
    problem: number,
    values: Record<string, string | null>
  ): Promise<ScoreChange[]> {
    const changes = await this.deps.store.transaction(async (tx) => {
      const [view, event, cells] = await Promise.all([
        tx.loadSnapshot(),
        tx.getEventState(),
        tx.listScores(),
      ]);
      const country = view.getCountry(countryId);
      if (!country || country.retired || country.isStaff) {
        throw Errors.referenceInvalid('Country or problem invalid or not specified', 'countryId');
      }
      this.checkScoringAccess(actor, event, countryId);
      this.checkScoresOpen(event);
      this.checkProblem(problem);

      const contestants = contestantsOf(view).filter((entry) => entry.country.id === countryId);
      const known = new Set(contestants.map((entry) => entry.code));
      for (const code of Object.keys(values)) {
        if (!known.has(code)) {
          throw Errors.formatInvalid('Scores may only be entered for contestants', code);
        }
      }

      const parsed: Array<{ personId: string; score: number | null }> = [];
      for (const { person, code } of contestants) {
        if (code in values) {
          parsed.push({ personId: person.id, score: this.parseScore(values[code], problem, code) });
        }
      }
      const scores = scoreMap(cells);
      const result: ScoreChange[] = [];
      for (const { personId, score } of parsed) {
        result.push(await this.writeScore(tx, scores, personId, problem, score));
      }
      return result;
    });

    if (changes.some((change) => change.changed)) {
      logger.info({ countryId, problem }, 'Country scores updated');
      await notify(this.deps, actor, { entity: 'scores', id: countryId, action: 'updated' });
    }
    return changes;
  }

  private parseBoundary(medal: MedalName, value: string): number {
    const text = value.trim();
    if (!isValidSmallInt(text, totalMarks(this.deps.settings) + 1)) {
      throw Errors.formatInvalid(`Invalid ${medal} medal boundary`, medal);
    }
    return Number(text);
  }

  private allScoresEntered(view: RegistryView, cells: readonly ScoreCell[]): boolean {
    const scores = scoreMap(cells);
    return contestantsOf(view).every(({ person }) => {
      for (let problem = 1; problem <= this.deps.settings.numProblems; problem++) {
        if (!scores.has(scoreKey(person.id, problem))) {
          return false;
        }
      }
      return true;
    });
  }

  /**
   * All three boundaries are set together and unset together; once set,
   * each may be changed on its own.
   */
  async setMedalBoundaries(actor: Actor, input: MedalBoundaryInput): Promise<EventState> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to set medal boundaries');
    }
    const result = await this.deps.store.transaction(async (tx) => {
      const event = await tx.getEventState();
      const current = event.medalBoundaries;
      const supplied = MEDALS.filter((medal) => input[medal] !== undefined);
      const cleared = supplied.filter((medal) => blank(input[medal]));

      if (current !== null && cleared.length > 0) {
        if (cleared.length !== MEDALS.length) {
          throw Errors.formatInvalid('Must unset all medal boundaries at once');
        }
        return { state: await tx.saveEventState({ ...event, medalBoundaries: null }), changed: true };
      }

      const values = new Map<MedalName, number>();
      for (const medal of supplied) {
        const value = input[medal];
        if (typeof value === 'string' && value.trim() !== '') {
          values.set(medal, this.parseBoundary(medal, value));
        }
      }
      if (current === null) {
        if (values.size === 0) {
          return { state: event, changed: false };
        }
        if (values.size !== MEDALS.length) {
          throw Errors.requiredField('Must set all medal boundaries at once');
        }
        if (event.registrationEnabled) {
          throw Errors.stateConflict(
            'Registration must be disabled before medal boundaries are set'
          );
        }
        const [view, cells] = await Promise.all([tx.loadSnapshot(), tx.listScores()]);
        if (!this.allScoresEntered(view, cells)) {
          throw Errors.stateConflict('Scores not all entered');
        }
      }

      const next: MedalBoundaries = {
        gold: values.get('gold') ?? current?.gold ?? 0,
        silver: values.get('silver') ?? current?.silver ?? 0,
        bronze: values.get('bronze') ?? current?.bronze ?? 0,
      };
      if (next.gold < next.silver || next.silver < next.bronze) {
        throw Errors.formatInvalid('Medal boundaries in wrong order');
      }
      if (
        current !== null &&
        current.gold === next.gold &&
        current.silver === next.silver &&
        current.bronze === next.bronze
      ) {
        return { state: event, changed: false };
      }
      return { state: await tx.saveEventState({ ...event, medalBoundaries: next }), changed: true };
    });

    if (result.changed) {
      logger.info({ medalBoundaries: result.state.medalBoundaries }, 'Medal boundaries updated');
      await notify(this.deps, actor, { entity: 'event', id: 'event', action: 'updated' });
    }
    return result.state;
  }

  async updateEventFlags(actor: Actor, input: EventFlagsInput): Promise<EventState> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to change event settings');
    }
    const state = await this.deps.store.transaction(async (tx) => {
      const event = await tx.getEventState();
      return tx.saveEventState({
        ...event,
        registrationEnabled: input.registrationEnabled ?? event.registrationEnabled,
        preregistrationEnabled: input.preregistrationEnabled ?? event.preregistrationEnabled,
        selfScoringEnabled: input.selfScoringEnabled ?? event.selfScoringEnabled,
      });
    });

    logger.info(
      {
        registrationEnabled: state.registrationEnabled,
        preregistrationEnabled: state.preregistrationEnabled,
        selfScoringEnabled: state.selfScoringEnabled,
      },
      'Event flags updated'
    );
    await notify(this.deps, actor, { entity: 'event', id: 'event', action: 'updated' });
    return state;
  }

  /**
   * Totals, ranks and awards for every current contestant, best first.
   * Medals are awarded only once boundaries are set; a full score on some
   * problem earns an honourable mention when no medal applies.
   */
  async computeResults(): Promise<ContestantResult[]> {
    const { store, settings } = this.deps;
    const [view, event, cells] = await Promise.all([
      store.loadSnapshot(),
      store.getEventState(),
      store.listScores(),
    ]);
    const scores = scoreMap(cells);

    const results = contestantsOf(view).map(({ person, country, code }) => {
      const row: Array<number | null> = [];
      for (let problem = 1; problem <= settings.numProblems; problem++) {
        row.push(scores.get(scoreKey(person.id, problem)) ?? null);
      }
      const total = row.reduce<number>((sum, score) => sum + (score ?? 0), 0);
      return {
        personId: person.id,
        countryId: country.id,
        contestantCode: code,
        scores: row,
        total,
        award: this.awardFor(event.medalBoundaries, total, row),
      };
    });

    return results
      .map((result) => ({
        ...result,
        rank: 1 + results.filter((other) => other.total > result.total).length,
      }))
      .sort((a, b) => b.total - a.total || a.contestantCode.localeCompare(b.contestantCode));
  }

  private awardFor(
    boundaries: MedalBoundaries | null,
    total: number,
    row: ReadonlyArray<number | null>
  ): Award | null {
    if (boundaries === null) {
      return null;
    }
    if (total >= boundaries.gold) {
      return 'Gold Medal';
    }
    if (total >= boundaries.silver) {
      return 'Silver Medal';
    }
    if (total >= boundaries.bronze) {
      return 'Bronze Medal';
    }
    const { marksPerProblem, honourableMentionsAvailable } = this.deps.settings;
    const fullScore = row.some((score, index) => score !== null && score === marksPerProblem[index]);
    return honourableMentionsAvailable && fullScore ? 'Honourable Mention' : null;
  }
}
