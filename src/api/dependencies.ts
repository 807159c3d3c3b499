import { ServerDependencies } from './server.js';
import { createActorMiddleware } from './middleware/actor.middleware.js';
import { AccountsHandler } from '../handlers/accounts.handler.js';
import { BulkHandler } from '../handlers/bulk.handler.js';
import { CountriesHandler } from '../handlers/countries.handler.js';
import { EventHandler } from '../handlers/event.handler.js';
import { FilesHandler } from '../handlers/files.handler.js';
import { PeopleHandler } from '../handlers/people.handler.js';
import { AccountsService } from '../services/auth/accounts.service.js';
import { BulkImportService } from '../services/bulk/bulkImport.service.js';
import { ExportService } from '../services/export/export.service.js';
import { FileService } from '../services/files/file.service.js';
import { CountriesService } from '../services/registration/countries.service.js';
import { EngineDeps } from '../services/registration/engine.js';
import { PeopleService } from '../services/registration/people.service.js';
import { ScoringService } from '../services/scoring/scoring.service.js';

/**
 * Build every service and handler over one set of engine collaborators.
 */
export function createServerDependencies(
  deps: EngineDeps,
  accounts: AccountsService
): ServerDependencies {
  const exports = new ExportService(deps);
  return {
    actorMiddleware: createActorMiddleware(accounts),
    countriesHandler: new CountriesHandler(new CountriesService(deps), exports),
    peopleHandler: new PeopleHandler(new PeopleService(deps), exports),
    filesHandler: new FilesHandler(new FileService(deps)),
    eventHandler: new EventHandler(new ScoringService(deps), exports, deps.settings),
    bulkHandler: new BulkHandler(new BulkImportService(deps)),
    accountsHandler: new AccountsHandler(accounts),
  };
}
