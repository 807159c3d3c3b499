import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import { FileService } from '../services/files/file.service.js';

export class FilesHandler {
  constructor(private readonly files: FileService) {}

  async downloadFile(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const file = await this.files.download(requestActor(req), req.params.id);
      res.setHeader('Content-Type', file.contentType);
      res.setHeader('Content-Disposition', `inline; filename="${file.filename}"`);
      res.send(file.content);
    } catch (error) {
      next(error);
    }
  }

  async downloadPhotoArchive(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const archive = await this.files.photosArchive();
      res.setHeader('Content-Type', 'application/zip');
      res.setHeader('Content-Disposition', 'attachment; filename="photos.zip"');
      res.send(archive);
    } catch (error) {
      next(error);
    }
  }

  async downloadFlagArchive(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const archive = await this.files.flagsArchive();
      res.setHeader('Content-Type', 'application/zip');
      res.setHeader('Content-Disposition', 'attachment; filename="flags.zip"');
      res.send(archive);
    } catch (error) {
      next(error);
    }
  }
}
