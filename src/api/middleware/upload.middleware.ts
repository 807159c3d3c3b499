import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { config } from '../../config/index.js';
import { ApiError, Errors } from '../../utils/errors.js';

export type UploadField = 'flag' | 'photo' | 'consentForm' | 'csv' | 'zip';

/**
 * Uploads are kept in memory; content is sniffed and stored by the engine.
 */
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: config.uploadMaxSize,
    files: 2,
  },
});

export function acceptUploads(...fields: UploadField[]) {
  return upload.fields(fields.map((name) => ({ name, maxCount: 1 })));
}

/**
 * Convert Multer errors to ApiError
 */
export function handleMulterError(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (error instanceof multer.MulterError) {
    if (error.code === 'LIMIT_FILE_SIZE') {
      next(
        new ApiError(
          413,
          'FormatInvalid',
          `File size exceeds limit of ${config.uploadMaxSize} bytes`,
          error.field
        )
      );
    } else if (error.code === 'LIMIT_FILE_COUNT') {
      next(Errors.formatInvalid('Too many files uploaded', error.field));
    } else if (error.code === 'LIMIT_UNEXPECTED_FILE') {
      next(Errors.formatInvalid(`Unexpected field: ${error.field}`, error.field));
    } else {
      next(Errors.formatInvalid(error.message, error.field));
    }
  } else {
    next(error);
  }
}

/**
 * The single file uploaded under field, if any.
 */
export function uploadedFile(req: Request, field: UploadField): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) {
    return undefined;
  }
  return files[field]?.[0];
}
