import { Router } from 'express';
import { FilesHandler } from '../../handlers/files.handler.js';

export function createFilesRoutes(handler: FilesHandler): Router {
  const router = Router();

  router.get('/files/:id', handler.downloadFile.bind(handler));
  router.get('/photos.zip', handler.downloadPhotoArchive.bind(handler));
  router.get('/flags.zip', handler.downloadFlagArchive.bind(handler));

  return router;
}
