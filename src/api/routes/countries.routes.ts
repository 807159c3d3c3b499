import { Router } from 'express';
import { BulkHandler } from '../../handlers/bulk.handler.js';
import { CountriesHandler } from '../../handlers/countries.handler.js';
import { acceptUploads, handleMulterError } from '../middleware/upload.middleware.js';

export function createCountriesRoutes(handler: CountriesHandler, bulk: BulkHandler): Router {
  const router = Router();

  router.get('/countries.csv', handler.exportCountries.bind(handler));
  router.get('/countries', handler.listCountries.bind(handler));
  router.get('/countries/:id', handler.getCountry.bind(handler));

  router.post(
    '/countries/bulk',
    acceptUploads('csv', 'zip'),
    handleMulterError,
    bulk.importCountries.bind(bulk)
  );
  router.post(
    '/countries',
    acceptUploads('flag'),
    handleMulterError,
    handler.createCountry.bind(handler)
  );
  router.patch(
    '/countries/:id',
    acceptUploads('flag'),
    handleMulterError,
    handler.editCountry.bind(handler)
  );
  router.patch('/countries/:id/preregistration', handler.preregister.bind(handler));
  router.post('/countries/:id/retire', handler.retireCountry.bind(handler));

  return router;
}
