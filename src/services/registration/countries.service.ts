import { RegistrationWriter } from '../../db/registrationStore.js';
import { Actor, Country, isAdmin } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import {
  AuditedCountry,
  CountryInput,
  auditCountry,
  auditPreregistration,
} from '../audit/country.auditor.js';
import { EngineDeps, auditContext, notify, storeUpload } from './engine.js';

/**
 * Insert an audited new country and store its flag.
 */
export async function insertAuditedCountry(
  deps: EngineDeps,
  tx: RegistrationWriter,
  audited: AuditedCountry
): Promise<Country> {
  const created = await tx.insertCountry(audited.draft);
  if (!audited.flag) {
    return created;
  }
  const flag = await storeUpload(deps, tx, audited.flag, {
    ownerKind: 'country',
    ownerId: created.id,
  });
  const withFlag = { ...created, flagId: flag.id };
  await tx.updateCountry(withFlag);
  return withFlag;
}

export class CountriesService {
  constructor(private readonly deps: EngineDeps) {}

  async list(actor: Actor): Promise<Country[]> {
    const snapshot = await this.deps.store.loadSnapshot();
    const countries = snapshot.countries();
    return isAdmin(actor) ? [...countries] : countries.filter((country) => !country.retired);
  }

  async get(actor: Actor, id: string): Promise<Country> {
    const country = await this.deps.store.getCountry(id);
    if (!country || (country.retired && !isAdmin(actor) && !this.isOwnCountry(actor, id))) {
      throw Errors.notFound('Country');
    }
    return country;
  }

  async create(actor: Actor, input: CountryInput): Promise<Country> {
    const country = await this.deps.store.transaction(async (tx) => {
      const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
      const audited = auditCountry(input, null, auditContext(this.deps, actor, view, event));
      return insertAuditedCountry(this.deps, tx, audited);
    });

    logger.info({ countryId: country.id, code: country.code }, 'Country created');
    await notify(this.deps, actor, { entity: 'country', id: country.id, action: 'created' });
    return country;
  }

  async edit(actor: Actor, id: string, input: CountryInput): Promise<Country> {
    const country = await this.deps.store.transaction(async (tx) => {
      const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
      const previous = view.getCountry(id);
      if (!previous || previous.retired) {
        throw Errors.notFound('Country');
      }
      const audited = auditCountry(input, previous, auditContext(this.deps, actor, view, event));
      let flagId = previous.flagId;
      if (audited.flag) {
        const flag = await storeUpload(this.deps, tx, audited.flag, {
          ownerKind: 'country',
          ownerId: id,
        });
        flagId = flag.id;
      }
      const updated: Country = { ...audited.draft, id, flagId, retired: false };
      await tx.updateCountry(updated);
      return updated;
    });

    logger.info({ countryId: id }, 'Country updated');
    await notify(this.deps, actor, { entity: 'country', id, action: 'updated' });
    return country;
  }

  /**
   * Expected numbers and virtual-event contact details. A resubmission of
   * the stored values returns the record without writing.
   */
  async preregister(actor: Actor, id: string, input: CountryInput): Promise<Country> {
    const result = await this.deps.store.transaction(async (tx) => {
      const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
      const previous = view.getCountry(id);
      if (!previous || previous.retired) {
        throw Errors.notFound('Country');
      }
      const audited = auditPreregistration(
        input,
        previous,
        auditContext(this.deps, actor, view, event)
      );
      if (!audited.changed) {
        return { country: previous, changed: false };
      }
      const updated: Country = { ...previous, ...audited.draft };
      await tx.updateCountry(updated);
      return { country: updated, changed: true };
    });

    if (result.changed) {
      logger.info({ countryId: id }, 'Preregistration updated');
      await notify(this.deps, actor, { entity: 'country', id, action: 'updated' });
    }
    return result.country;
  }

  /**
   * Retire a country with its people and accounts, and drop it from every
   * guide's list.
   */
  async retire(actor: Actor, id: string): Promise<Country> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to retire');
    }
    const country = await this.deps.store.transaction(async (tx) => {
      const view = await tx.loadSnapshot();
      const country = view.getCountry(id);
      if (!country || country.retired) {
        throw Errors.notFound('Country');
      }
      if (country.isStaff || country.code === this.deps.settings.staffCountryCode) {
        throw Errors.stateConflict('Special countries cannot be retired');
      }
      const retired = { ...country, retired: true };
      await tx.updateCountry(retired);
      for (const person of view.people()) {
        if (person.countryId === id && !person.retired) {
          await tx.updatePerson({ ...person, retired: true });
        } else if (person.guideFor.includes(id)) {
          await tx.updatePerson({
            ...person,
            guideFor: person.guideFor.filter((guided) => guided !== id),
          });
        }
      }
      await tx.retireAccounts(id);
      return retired;
    });

    logger.info({ countryId: id }, 'Country retired');
    await notify(this.deps, actor, { entity: 'country', id, action: 'retired' });
    return country;
  }

  private isOwnCountry(actor: Actor, id: string): boolean {
    return (actor.kind === 'delegate' || actor.kind === 'self') && actor.countryId === id;
  }
}
