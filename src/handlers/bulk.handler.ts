import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import { uploadedFile } from '../api/middleware/upload.middleware.js';
import { bulkImportSchema, parseRequest } from '../api/middleware/validation.middleware.js';
import { BulkImportResult, BulkImportService } from '../services/bulk/bulkImport.service.js';
import { BulkEntityKind } from '../services/bulk/csvSchemas.js';

export class BulkHandler {
  constructor(private readonly bulk: BulkImportService) {}

  private async run(kind: BulkEntityKind, req: Request): Promise<BulkImportResult> {
    const { delimiter, dryRun } = parseRequest(bulkImportSchema, req.body);
    return this.bulk.import(requestActor(req), {
      kind,
      csv: uploadedFile(req, 'csv')?.buffer ?? null,
      zip: uploadedFile(req, 'zip')?.buffer ?? null,
      delimiter,
      dryRun: dryRun ?? false,
    });
  }

  async importCountries(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.run('country', req);
      res.status(result.dryRun ? 200 : 201).json(result);
    } catch (error) {
      next(error);
    }
  }

  async importPeople(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const result = await this.run('person', req);
      res.status(result.dryRun ? 200 : 201).json(result);
    } catch (error) {
      next(error);
    }
  }
}
