import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { Errors } from '../../utils/errors.js';
import { EntitySchema, isRecognizedHeader } from './csvSchemas.js';

export type CsvDelimiter = ',' | ';';

/**
 * One data row with blank cells dropped. Row 0 is the header, so the first
 * data row is row 1.
 */
export interface CsvRow {
  row: number;
  values: Map<string, string>;
  lists: Map<string, string[]>;
}

const recordsSchema = z.array(z.array(z.string()));

export function isCsvDelimiter(value: unknown): value is CsvDelimiter {
  return value === ',' || value === ';';
}

/**
 * Strict UTF-8 decode; a leading byte-order mark is dropped.
 */
export function decodeUtf8(bytes: Buffer): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    throw Errors.formatInvalid('CSV file is not valid UTF-8');
  }
}

function parseRecords(text: string, delimiter: string): string[][] {
  let raw: unknown;
  try {
    raw = parse(text, { delimiter, relax_column_count: true, skip_empty_lines: true });
  } catch (error) {
    throw Errors.formatInvalid(error instanceof Error ? error.message : String(error));
  }
  return recordsSchema.parse(raw);
}

/**
 * Split a comma-separated cell, honouring CSV quoting.
 */
export function splitList(cell: string): string[] {
  const [first] = parseRecords(cell, ',');
  return (first ?? []).map((entry) => entry.trim()).filter((entry) => entry !== '');
}

/**
 * Decode and parse an upload, then apply the schema's structural rules:
 * required columns, distinct list entries and batch-unique columns.
 * Rows may have fewer cells than the header; unrecognized columns are ignored.
 */
export function readBulkCsv(bytes: Buffer, delimiter: CsvDelimiter, schema: EntitySchema): CsvRow[] {
  const records = parseRecords(decodeUtf8(bytes), delimiter);
  if (records.length === 0) {
    throw Errors.formatInvalid('CSV file has no header row');
  }
  const header = records[0].map((name) => name.trim());
  for (const column of schema.columns) {
    if (column.required && !header.includes(column.header)) {
      throw Errors.requiredField(`required column ${column.header} missing`);
    }
  }

  const seen = new Map<string, Set<string>>();
  const rows: CsvRow[] = [];
  records.slice(1).forEach((cells, index) => {
    const rowNumber = index + 1;
    const prefix = `row ${rowNumber}: `;
    const values = new Map<string, string>();
    const lists = new Map<string, string[]>();

    header.forEach((name, column) => {
      if (!isRecognizedHeader(schema, name)) {
        return;
      }
      const value = (cells[column] ?? '').trim();
      if (value === '') {
        return;
      }
      values.set(name, value);
      if (schema.columns.some((spec) => spec.header === name && spec.list)) {
        const entries = splitList(value);
        if (new Set(entries).size !== entries.length) {
          throw Errors.formatInvalid(`${prefix}duplicate entries in ${name}`);
        }
        lists.set(name, entries);
      }
    });

    for (const spec of schema.columns) {
      const value = values.get(spec.header);
      if (spec.required && value === undefined) {
        throw Errors.requiredField(`${prefix}required column ${spec.header} missing`);
      }
      if (spec.uniqueInBatch && value !== undefined) {
        const used = seen.get(spec.header) ?? new Set<string>();
        if (used.has(value)) {
          throw Errors.conflict(`${prefix}duplicate value for ${spec.header}`);
        }
        used.add(value);
        seen.set(spec.header, used);
      }
    }
    rows.push({ row: rowNumber, values, lists });
  });
  return rows;
}
