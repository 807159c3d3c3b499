import { Router } from 'express';
import { BulkHandler } from '../../handlers/bulk.handler.js';
import { PeopleHandler } from '../../handlers/people.handler.js';
import { acceptUploads, handleMulterError } from '../middleware/upload.middleware.js';

export function createPeopleRoutes(handler: PeopleHandler, bulk: BulkHandler): Router {
  const router = Router();

  router.get('/people.csv', handler.exportPeople.bind(handler));
  router.get('/people/:id', handler.getPerson.bind(handler));

  router.post(
    '/people/bulk',
    acceptUploads('csv', 'zip'),
    handleMulterError,
    bulk.importPeople.bind(bulk)
  );
  router.post(
    '/people',
    acceptUploads('photo', 'consentForm'),
    handleMulterError,
    handler.createPerson.bind(handler)
  );
  router.patch(
    '/people/:id',
    acceptUploads('photo', 'consentForm'),
    handleMulterError,
    handler.editPerson.bind(handler)
  );
  router.post('/people/:id/retire', handler.retirePerson.bind(handler));

  return router;
}
