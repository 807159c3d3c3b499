import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import {
  countryScoresSchema,
  eventFlagsSchema,
  exportQuerySchema,
  medalBoundariesSchema,
  parseRequest,
  scoreCellSchema,
} from '../api/middleware/validation.middleware.js';
import { EventSettings } from '../config/event.js';
import { ExportService } from '../services/export/export.service.js';
import { ScoringService } from '../services/scoring/scoring.service.js';
import { EventState, MedalBoundaries } from '../types/index.js';
import { Errors } from '../utils/errors.js';
import { sendCsv } from './csvResponse.js';

export interface EventResponse {
  shortName: string;
  year: string;
  eventType: EventSettings['eventType'];
  numProblems: number;
  marksPerProblem: number[];
  registrationEnabled: boolean;
  preregistrationEnabled: boolean;
  selfScoringEnabled: boolean;
  medalBoundaries: MedalBoundaries | null;
}

export class EventHandler {
  constructor(
    private readonly scoring: ScoringService,
    private readonly exports: ExportService,
    private readonly settings: EventSettings
  ) {}

  private toResponse(state: EventState): EventResponse {
    return {
      shortName: this.settings.shortName,
      year: this.settings.year,
      eventType: this.settings.eventType,
      numProblems: this.settings.numProblems,
      marksPerProblem: this.settings.marksPerProblem,
      registrationEnabled: state.registrationEnabled,
      preregistrationEnabled: state.preregistrationEnabled,
      selfScoringEnabled: state.selfScoringEnabled,
      medalBoundaries: state.medalBoundaries,
    };
  }

  async getEvent(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      res.json(this.toResponse(await this.scoring.eventState()));
    } catch (error) {
      next(error);
    }
  }

  async updateEvent(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = parseRequest(eventFlagsSchema, req.body);
      const state = await this.scoring.updateEventFlags(requestActor(req), input);
      res.json(this.toResponse(state));
    } catch (error) {
      next(error);
    }
  }

  async setMedalBoundaries(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const input = parseRequest(medalBoundariesSchema, req.body);
      const state = await this.scoring.setMedalBoundaries(requestActor(req), input);
      res.json(this.toResponse(state));
    } catch (error) {
      next(error);
    }
  }

  async setScore(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { personId, problem, score } = parseRequest(scoreCellSchema, req.body);
      const change = await this.scoring.setScore(requestActor(req), personId, problem, score);
      res.json(change);
    } catch (error) {
      next(error);
    }
  }

  async enterCountryScores(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const problem = Number(req.params.problem);
      if (!Number.isInteger(problem)) {
        throw Errors.referenceInvalid('Country or problem invalid or not specified', 'problem');
      }
      const { scores } = parseRequest(countryScoresSchema, req.body);
      const changes = await this.scoring.enterCountryScores(
        requestActor(req),
        req.params.countryId,
        problem,
        scores
      );
      res.json(changes);
    } catch (error) {
      next(error);
    }
  }

  async exportScores(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { delimiter } = parseRequest(exportQuerySchema, req.query);
      sendCsv(res, 'scores.csv', await this.exports.scoresCsv(requestActor(req), delimiter));
    } catch (error) {
      next(error);
    }
  }
}
