/**
 * Column layout of bulk registration files, shared with the CSV exports so
 * an exported file imports unchanged.
 */
export interface ColumnSpec {
  header: string;
  required?: boolean;
  // value must not repeat within one upload
  uniqueInBatch?: boolean;
  // comma-separated list; entries must be distinct
  list?: boolean;
  // names an entry of the accompanying ZIP file
  file?: boolean;
}

export type BulkEntityKind = 'country' | 'person';

export interface EntitySchema {
  kind: BulkEntityKind;
  columns: readonly ColumnSpec[];
  // numbered column families such as "Contact Email 1", "Contact Email 2"
  numbered: readonly string[];
}

export const COUNTRY_EXPECTED_COLUMNS = {
  leaders: 'Expected Leaders',
  deputies: 'Expected Deputies',
  contestants: 'Expected Contestants',
  observersA: 'Expected Observers with Contestants',
  observersB: 'Expected Observers with Leader',
  observersC: 'Expected Observers with Deputy',
  singleRooms: 'Expected Single Rooms',
} as const;

export const COUNTRY_SCHEMA: EntitySchema = {
  kind: 'country',
  columns: [
    { header: 'Country Number', uniqueInBatch: true },
    { header: 'Code', required: true, uniqueInBatch: true },
    { header: 'Name', required: true, uniqueInBatch: true },
    ...Object.values(COUNTRY_EXPECTED_COLUMNS).map((header) => ({ header })),
    { header: 'Flag', file: true },
  ],
  numbered: ['Contact Email '],
};

export const PERSON_SCHEMA: EntitySchema = {
  kind: 'person',
  columns: [
    { header: 'Person Number', uniqueInBatch: true },
    { header: 'Country Code', required: true },
    { header: 'Given Name', required: true },
    { header: 'Family Name', required: true },
    { header: 'Passport Given Name' },
    { header: 'Passport Family Name' },
    { header: 'Gender' },
    { header: 'Primary Role', required: true },
    { header: 'Other Roles', list: true },
    { header: 'Guide For Codes', list: true },
    { header: 'Date of Birth' },
    { header: 'Allergies and Dietary Requirements' },
    { header: 'T-Shirt Size' },
    { header: 'Arrival Place' },
    { header: 'Arrival Date' },
    { header: 'Arrival Time' },
    { header: 'Arrival Flight' },
    { header: 'Departure Place' },
    { header: 'Departure Date' },
    { header: 'Departure Time' },
    { header: 'Departure Flight' },
    { header: 'Room Type' },
    { header: 'Share Room With' },
    { header: 'Room Number' },
    { header: 'Phone Number' },
    { header: 'Passport or Identity Card Number' },
    { header: 'Nationality' },
    { header: 'Event Photos Consent' },
    { header: 'Photo Consent' },
    { header: 'Diet Consent' },
    { header: 'Photo', file: true },
    { header: 'Consent Form', file: true },
  ],
  numbered: ['Language '],
};

export const SCHEMAS: Record<BulkEntityKind, EntitySchema> = {
  country: COUNTRY_SCHEMA,
  person: PERSON_SCHEMA,
};

export function isRecognizedHeader(schema: EntitySchema, header: string): boolean {
  if (schema.columns.some((column) => column.header === header)) {
    return true;
  }
  return schema.numbered.some(
    (prefix) => header.startsWith(prefix) && /^[1-9][0-9]*$/.test(header.slice(prefix.length))
  );
}
