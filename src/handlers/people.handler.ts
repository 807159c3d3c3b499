import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import {
  exportQuerySchema,
  parseRequest,
  personBodySchema,
} from '../api/middleware/validation.middleware.js';
import { ExportService, fileUrl } from '../services/export/export.service.js';
import { PeopleService } from '../services/registration/people.service.js';
import { Actor, Person, isAdmin } from '../types/index.js';
import { sendCsv } from './csvResponse.js';
import { personInputFromBody, sniffedUpload } from './requestInputs.js';

export interface PublicPersonResponse {
  id: string;
  countryId: string;
  givenName: string;
  familyName: string;
  primaryRole: string;
  otherRoles: string[];
  guideFor: string[];
}

export type PersonResponse = Omit<Person, 'photoId' | 'consentFormId'> & {
  photoUrl: string | null;
  consentFormUrl: string | null;
};

export class PeopleHandler {
  constructor(
    private readonly people: PeopleService,
    private readonly exports: ExportService
  ) {}

  /**
   * Full details go to administrators and the person's own country.
   */
  private toResponse(person: Person, actor: Actor): PersonResponse | PublicPersonResponse {
    const own = (actor.kind === 'delegate' || actor.kind === 'self') && actor.countryId === person.countryId;
    if (!isAdmin(actor) && !own) {
      return {
        id: person.id,
        countryId: person.countryId,
        givenName: person.givenName,
        familyName: person.familyName,
        primaryRole: person.primaryRole,
        otherRoles: person.otherRoles,
        guideFor: person.guideFor,
      };
    }
    const { photoId, consentFormId, ...details } = person;
    return {
      ...details,
      photoUrl: photoId ? fileUrl(photoId) : null,
      consentFormUrl: consentFormId ? fileUrl(consentFormId) : null,
    };
  }

  async getPerson(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const person = await this.people.get(actor, req.params.id);
      res.json(this.toResponse(person, actor));
    } catch (error) {
      next(error);
    }
  }

  async createPerson(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const body = parseRequest(personBodySchema, req.body);
      const input = personInputFromBody(
        body,
        await sniffedUpload(req, 'photo'),
        await sniffedUpload(req, 'consentForm')
      );
      const person = await this.people.create(actor, input);
      res.status(201).json(this.toResponse(person, actor));
    } catch (error) {
      next(error);
    }
  }

  async editPerson(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const body = parseRequest(personBodySchema, req.body);
      const input = personInputFromBody(
        body,
        await sniffedUpload(req, 'photo'),
        await sniffedUpload(req, 'consentForm')
      );
      const person = await this.people.edit(actor, req.params.id, input);
      res.json(this.toResponse(person, actor));
    } catch (error) {
      next(error);
    }
  }

  async retirePerson(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const person = await this.people.retire(actor, req.params.id);
      res.json(this.toResponse(person, actor));
    } catch (error) {
      next(error);
    }
  }

  async exportPeople(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { delimiter } = parseRequest(exportQuerySchema, req.query);
      sendCsv(res, 'people.csv', await this.exports.peopleCsv(requestActor(req), delimiter));
    } catch (error) {
      next(error);
    }
  }
}
