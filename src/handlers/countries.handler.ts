import { Request, Response, NextFunction } from 'express';
import { requestActor } from '../api/middleware/actor.middleware.js';
import {
  countryBodySchema,
  exportQuerySchema,
  parseRequest,
} from '../api/middleware/validation.middleware.js';
import { ExportService, fileUrl } from '../services/export/export.service.js';
import { CountriesService } from '../services/registration/countries.service.js';
import { Actor, Country, ExpectedNumbers, isAdmin } from '../types/index.js';
import { countryInputFromBody, sniffedUpload } from './requestInputs.js';
import { sendCsv } from './csvResponse.js';

export interface PublicCountryResponse {
  id: string;
  code: string;
  name: string;
  isStaff: boolean;
  genericUrl: string | null;
  flagUrl: string | null;
}

export interface CountryResponse extends PublicCountryResponse {
  participantsOk: boolean;
  contactEmail: string | null;
  contactExtra: string[];
  expected: ExpectedNumbers;
  numbersConfirmed: boolean;
  leaderEmail: string | null;
  physicalAddress: string | null;
  retired: boolean;
}

export class CountriesHandler {
  constructor(
    private readonly countries: CountriesService,
    private readonly exports: ExportService
  ) {}

  /**
   * Contact details and expected numbers go to administrators and the
   * country's own accounts only.
   */
  private toResponse(country: Country, actor: Actor): CountryResponse | PublicCountryResponse {
    const summary: PublicCountryResponse = {
      id: country.id,
      code: country.code,
      name: country.name,
      isStaff: country.isStaff,
      genericUrl: country.genericUrl,
      flagUrl: country.flagId ? fileUrl(country.flagId) : null,
    };
    const own = (actor.kind === 'delegate' || actor.kind === 'self') && actor.countryId === country.id;
    if (!isAdmin(actor) && !own) {
      return summary;
    }
    return {
      ...summary,
      participantsOk: country.participantsOk,
      contactEmail: country.contactEmail,
      contactExtra: country.contactExtra,
      expected: country.expected,
      numbersConfirmed: country.numbersConfirmed,
      leaderEmail: country.leaderEmail,
      physicalAddress: country.physicalAddress,
      retired: country.retired,
    };
  }

  async listCountries(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const countries = await this.countries.list(actor);
      res.json(countries.map((country) => this.toResponse(country, actor)));
    } catch (error) {
      next(error);
    }
  }

  async getCountry(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const country = await this.countries.get(actor, req.params.id);
      res.json(this.toResponse(country, actor));
    } catch (error) {
      next(error);
    }
  }

  async createCountry(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const body = parseRequest(countryBodySchema, req.body);
      const input = countryInputFromBody(body, await sniffedUpload(req, 'flag'));
      const country = await this.countries.create(actor, input);
      res.status(201).json(this.toResponse(country, actor));
    } catch (error) {
      next(error);
    }
  }

  async editCountry(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const body = parseRequest(countryBodySchema, req.body);
      const input = countryInputFromBody(body, await sniffedUpload(req, 'flag'));
      const country = await this.countries.edit(actor, req.params.id, input);
      res.json(this.toResponse(country, actor));
    } catch (error) {
      next(error);
    }
  }

  async preregister(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const body = parseRequest(countryBodySchema, req.body);
      const country = await this.countries.preregister(
        actor,
        req.params.id,
        countryInputFromBody(body)
      );
      res.json(this.toResponse(country, actor));
    } catch (error) {
      next(error);
    }
  }

  async retireCountry(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const actor = requestActor(req);
      const country = await this.countries.retire(actor, req.params.id);
      res.json(this.toResponse(country, actor));
    } catch (error) {
      next(error);
    }
  }

  async exportCountries(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { delimiter } = parseRequest(exportQuerySchema, req.query);
      sendCsv(res, 'countries.csv', await this.exports.countriesCsv(requestActor(req), delimiter));
    } catch (error) {
      next(error);
    }
  }
}
