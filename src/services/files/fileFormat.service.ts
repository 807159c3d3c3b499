import { fileTypeFromBuffer } from 'file-type';
import { FileFormat, FileKind, UploadedFile } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';

const FORMATS_BY_EXT: Record<string, FileFormat> = {
  png: 'png',
  jpg: 'jpeg',
  jpeg: 'jpeg',
  pdf: 'pdf',
};

export const CANONICAL_EXTENSION: Record<FileFormat, string> = {
  png: 'png',
  jpeg: 'jpg',
  pdf: 'pdf',
};

export const CONTENT_TYPES: Record<FileFormat, string> = {
  png: 'image/png',
  jpeg: 'image/jpeg',
  pdf: 'application/pdf',
};

const KIND_LABELS: Record<FileKind, string> = {
  photo: 'photo',
  flag: 'flag',
  consent_form: 'consent form',
};

/**
 * Sniff the format from content. Extensions are never trusted.
 */
export async function detectFormat(content: Buffer): Promise<FileFormat | null> {
  const result = await fileTypeFromBuffer(content);
  if (!result) {
    return null;
  }
  return FORMATS_BY_EXT[result.ext] ?? null;
}

export async function sniffUpload(filename: string, content: Buffer): Promise<UploadedFile> {
  return { filename, content, detected: await detectFormat(content) };
}

function extensionOf(filename: string): string {
  const dot = filename.lastIndexOf('.');
  return dot < 0 ? '' : filename.slice(dot + 1).toLowerCase();
}

/**
 * Check a sniffed upload against the formats allowed for its slot.
 * The filename extension must name the same format, ignoring case.
 */
export function checkUploadFormat(
  upload: UploadedFile,
  kind: FileKind,
  allowed: readonly FileFormat[],
  formatMessage: string
): FileFormat {
  const detected = upload.detected;
  if (detected === null || !allowed.includes(detected)) {
    throw Errors.formatInvalid(formatMessage, kind);
  }
  if (FORMATS_BY_EXT[extensionOf(upload.filename)] !== detected) {
    throw Errors.formatInvalid(
      `Filename extension for ${KIND_LABELS[kind]} must match contents (${CANONICAL_EXTENSION[detected]})`,
      kind
    );
  }
  return detected;
}
