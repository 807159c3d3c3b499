import { Router } from 'express';
import { EventHandler } from '../../handlers/event.handler.js';

export function createEventRoutes(handler: EventHandler): Router {
  const router = Router();

  router.get('/event', handler.getEvent.bind(handler));
  router.patch('/event', handler.updateEvent.bind(handler));
  router.put('/event/medal-boundaries', handler.setMedalBoundaries.bind(handler));

  router.put('/scores/cell', handler.setScore.bind(handler));
  router.put('/scores/:countryId/:problem', handler.enterCountryScores.bind(handler));
  router.get('/scores.csv', handler.exportScores.bind(handler));

  return router;
}
