import AdmZip from 'adm-zip';
import { Actor, StoredFile } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { EngineDeps } from '../registration/engine.js';
import { CANONICAL_EXTENSION, CONTENT_TYPES } from './fileFormat.service.js';
import {
  FileOwner,
  canServe,
  publicFlags,
  publicPhotos,
  resolveFileState,
} from './visibility.service.js';

export interface FileDownload {
  content: Buffer;
  contentType: string;
  filename: string;
}

const PHOTOS_README =
  'The photos in this file are arranged by internal database identifier;\n' +
  'see the Photo URL column in the CSV file of people to match them to\n' +
  'individual participants.\n';

const FLAGS_README =
  'The flags in this file are arranged by internal database identifier;\n' +
  'see the Flag URL column in the CSV file of countries to match them to\n' +
  'individual countries.\n';

export function downloadFilename(file: StoredFile): string {
  return `${file.kind}${file.id}.${CANONICAL_EXTENSION[file.format]}`;
}

export class FileService {
  constructor(private readonly deps: EngineDeps) {}

  private async ownerOf(file: StoredFile): Promise<FileOwner | null> {
    const { store } = this.deps;
    if (file.ownerKind === 'country') {
      const country = await store.getCountry(file.ownerId);
      return country ? { kind: 'country', country } : null;
    }
    const person = await store.getPerson(file.ownerId);
    if (!person) {
      return null;
    }
    return { kind: 'person', person, country: await store.getCountry(person.countryId) };
  }

  /**
   * Visibility is resolved against the owner's current record on each call.
   */
  async download(actor: Actor, fileId: string): Promise<FileDownload> {
    const file = await this.deps.store.getFile(fileId);
    if (!file) {
      throw Errors.notFound('File');
    }
    const owner = await this.ownerOf(file);
    if (!owner) {
      throw Errors.notFound('File');
    }
    const state = resolveFileState(file, owner, this.deps.settings);
    if (!canServe(state, owner, actor)) {
      logger.debug({ fileId, state, actor: actor.kind }, 'File download refused');
      throw Errors.forbidden('You are not allowed to view this file');
    }
    return {
      content: await this.deps.storage.get(file.storageKey),
      contentType: CONTENT_TYPES[file.format],
      filename: downloadFilename(file),
    };
  }

  /**
   * ZIP of every publicly visible current photo.
   */
  async photosArchive(): Promise<Buffer> {
    const { store, storage, settings } = this.deps;
    const [snapshot, files] = await Promise.all([store.loadSnapshot(), store.listFiles()]);
    const zip = new AdmZip();
    zip.addFile('photos/README.txt', Buffer.from(PHOTOS_README, 'utf8'));
    const photos = publicPhotos(snapshot.people(), snapshot.countries(), files, settings);
    for (const { file } of photos) {
      const content = await storage.get(file.storageKey);
      zip.addFile(`photos/photo${file.id}/photo.${CANONICAL_EXTENSION[file.format]}`, content);
    }
    logger.debug({ count: photos.length }, 'Built public photo archive');
    return zip.toBuffer();
  }

  /**
   * ZIP of the current flag of every registered country.
   */
  async flagsArchive(): Promise<Buffer> {
    const { store, storage } = this.deps;
    const [snapshot, files] = await Promise.all([store.loadSnapshot(), store.listFiles()]);
    const zip = new AdmZip();
    zip.addFile('flags/README.txt', Buffer.from(FLAGS_README, 'utf8'));
    const flags = publicFlags(snapshot.countries(), files);
    for (const file of flags) {
      const content = await storage.get(file.storageKey);
      zip.addFile(`flags/flag${file.id}/flag.${CANONICAL_EXTENSION[file.format]}`, content);
    }
    logger.debug({ count: flags.length }, 'Built flag archive');
    return zip.toBuffer();
  }
}
