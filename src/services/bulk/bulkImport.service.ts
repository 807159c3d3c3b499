import AdmZip from 'adm-zip';
import { RegistrationWriter } from '../../db/registrationStore.js';
import { Actor, Country, EventState, Person, isAdmin } from '../../types/index.js';
import { ApiError, Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { CountryDraft, CountryInput, auditCountry } from '../audit/country.auditor.js';
import { PersonDraft, PersonInput, auditPerson } from '../audit/person.auditor.js';
import { insertAuditedCountry } from '../registration/countries.service.js';
import { EngineDeps, auditContext, notify } from '../registration/engine.js';
import { PeopleService } from '../registration/people.service.js';
import { CsvDelimiter, CsvRow, readBulkCsv } from './csvReader.js';
import { BulkEntityKind, SCHEMAS } from './csvSchemas.js';
import { RowSources, countryInputFromRow, personInputFromRow } from './rowInputs.js';

export interface BulkImportRequest {
  kind: BulkEntityKind;
  csv: Buffer | null;
  zip: Buffer | null;
  delimiter: CsvDelimiter;
  dryRun: boolean;
}

export type BulkRecord =
  | { row: number; kind: 'country'; draft: CountryDraft }
  | { row: number; kind: 'person'; draft: PersonDraft };

export interface BulkImportResult {
  kind: BulkEntityKind;
  dryRun: boolean;
  records: BulkRecord[];
  // ids of created records in file order; empty for a dry run
  createdIds: string[];
}

type AcceptedRow =
  | { row: number; kind: 'country'; input: CountryInput; draft: CountryDraft }
  | { row: number; kind: 'person'; input: PersonInput; draft: PersonDraft };

function rowPrefix(row: number): string {
  return `row ${row}: `;
}

function pendingId(row: number): string {
  return `pending-row-${row}`;
}

/**
 * Validate-all-then-commit import of countries or people from a CSV file
 * and an optional ZIP of attachments.
 *
 * Validation audits every row against a snapshot that already holds the
 * rows accepted before it, and any failure aborts the batch with nothing
 * written. Rows are then committed one transaction at a time. A row that
 * no longer passes at commit time (another session got in first) stops the
 * import with a RaceConditionError; rows committed before it stay.
 */
export class BulkImportService {
  private readonly people: PeopleService;

  constructor(private readonly deps: EngineDeps) {
    this.people = new PeopleService(deps);
  }

  async import(actor: Actor, request: BulkImportRequest): Promise<BulkImportResult> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to upload bulk registration data');
    }
    if (!request.csv) {
      throw Errors.requiredField('no CSV file uploaded', 'csv');
    }
    const zip = request.zip ? openZip(request.zip) : null;
    const rows = readBulkCsv(request.csv, request.delimiter, SCHEMAS[request.kind]);

    const accepted = await this.validate(actor, request.kind, rows, zip);
    const records = accepted.map((entry): BulkRecord =>
      entry.kind === 'country'
        ? { row: entry.row, kind: 'country', draft: entry.draft }
        : { row: entry.row, kind: 'person', draft: entry.draft }
    );
    if (request.dryRun) {
      logger.info({ kind: request.kind, rows: records.length }, 'Bulk import validated (dry run)');
      return { kind: request.kind, dryRun: true, records, createdIds: [] };
    }

    const createdIds = await this.commit(actor, accepted);
    logger.info({ kind: request.kind, rows: createdIds.length }, 'Bulk import committed');
    return { kind: request.kind, dryRun: false, records, createdIds };
  }

  private async validate(
    actor: Actor,
    kind: BulkEntityKind,
    rows: CsvRow[],
    zip: AdmZip | null
  ): Promise<AcceptedRow[]> {
    const [view, event] = await Promise.all([
      this.deps.store.loadSnapshot(),
      this.deps.store.getEventState(),
    ]);
    const sources: RowSources = { settings: this.deps.settings, view, zip };
    const accepted: AcceptedRow[] = [];

    for (const row of rows) {
      try {
        accepted.push(await this.acceptRow(actor, kind, row, sources, event));
      } catch (error) {
        if (error instanceof ApiError) {
          logger.warn({ kind, row: row.row, reason: error.message }, 'Bulk import rejected');
          throw error.withPrefix(rowPrefix(row.row));
        }
        throw error;
      }
    }
    return accepted;
  }

  private async acceptRow(
    actor: Actor,
    kind: BulkEntityKind,
    row: CsvRow,
    sources: RowSources,
    event: EventState
  ): Promise<AcceptedRow> {
    const { view } = sources;
    const ctx = auditContext(this.deps, actor, view, event);
    const id = pendingId(row.row);

    if (kind === 'country') {
      const input = await countryInputFromRow(row, sources);
      const { draft } = auditCountry(input, null, ctx);
      view.putCountry({ ...draft, id, flagId: null, retired: false });
      return { row: row.row, kind, input, draft };
    }
    const input = await personInputFromRow(row, sources);
    const { draft } = auditPerson(input, null, ctx);
    view.putPerson({ ...draft, id, photoId: null, consentFormId: null, retired: false });
    return { row: row.row, kind, input, draft };
  }

  private async commit(actor: Actor, accepted: AcceptedRow[]): Promise<string[]> {
    const createdIds: string[] = [];
    for (const entry of accepted) {
      let created: Country | Person;
      try {
        created = await this.deps.store.transaction((tx) => this.commitRow(actor, tx, entry));
      } catch (error) {
        if (error instanceof ApiError) {
          logger.error(
            { row: entry.row, committed: createdIds.length, reason: error.message },
            'Bulk import stopped by a conflicting change'
          );
          throw Errors.raceCondition(`${rowPrefix(entry.row)}${error.message}`, createdIds);
        }
        throw error;
      }
      createdIds.push(created.id);
      await notify(this.deps, actor, {
        entity: entry.kind,
        id: created.id,
        action: 'bulk-created',
      });
    }
    return createdIds;
  }

  /**
   * Audit the row again against the current store and write it.
   */
  private async commitRow(
    actor: Actor,
    tx: RegistrationWriter,
    entry: AcceptedRow
  ): Promise<Country | Person> {
    const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
    const ctx = auditContext(this.deps, actor, view, event);
    if (entry.kind === 'country') {
      return insertAuditedCountry(this.deps, tx, auditCountry(entry.input, null, ctx));
    }
    const audited = auditPerson(entry.input, null, ctx);
    const created = await tx.insertPerson(audited.draft);
    return this.people.attachFiles(tx, created, audited);
  }
}

function openZip(content: Buffer): AdmZip {
  try {
    return new AdmZip(content);
  } catch (error) {
    throw Errors.formatInvalid(error instanceof Error ? error.message : String(error), 'zip');
  }
}
