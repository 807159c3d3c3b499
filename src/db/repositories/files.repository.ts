import { Knex } from 'knex';
import { PostgresAdapter } from '../adapters/PostgresAdapter.js';
import { FileRow } from '../types/registration.types.js';
import type { NewFile } from '../registrationStore.js';
import { StoredFile } from '../../types/index.js';

function toStoredFile(row: FileRow): StoredFile {
  return {
    id: row.id,
    kind: row.kind,
    ownerKind: row.owner_kind,
    ownerId: row.owner_id,
    format: row.format,
    filename: row.filename,
    storageKey: row.storage_key,
    createdAt: new Date(row.created_at).toISOString(),
  };
}

/**
 * File metadata. Rows are only ever inserted; replacing a photo or flag
 * inserts a new row and moves the owner's pointer.
 */
export class FilesRepository {
  constructor(private readonly db: PostgresAdapter) {}

  async findById(id: string, trx?: Knex.Transaction): Promise<StoredFile | null> {
    const row = await this.db.query(trx)<FileRow>('files').where('id', id).first();
    return row ? toStoredFile(row) : null;
  }

  async findAll(trx?: Knex.Transaction): Promise<StoredFile[]> {
    const rows = await this.db.query(trx)<FileRow>('files').orderBy('created_at', 'asc');
    return rows.map(toStoredFile);
  }

  async create(file: NewFile, trx?: Knex.Transaction): Promise<StoredFile> {
    const [row]: FileRow[] = await this.db
      .query(trx)('files')
      .insert({
        kind: file.kind,
        owner_kind: file.ownerKind,
        owner_id: file.ownerId,
        format: file.format,
        filename: file.filename,
        storage_key: file.storageKey,
      })
      .returning('*');
    return toStoredFile(row);
  }
}
