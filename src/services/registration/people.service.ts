import fs from 'fs/promises';
import path from 'path';
import { RegistrationWriter } from '../../db/registrationStore.js';
import { Actor, Person, isAdmin } from '../../types/index.js';
import { Errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { AuditedPerson, PersonInput, auditPerson } from '../audit/person.auditor.js';
import { PendingUpload } from '../audit/registryView.js';
import { detectFormat } from '../files/fileFormat.service.js';
import { EngineDeps, auditContext, notify, storeUpload } from './engine.js';

export class PeopleService {
  constructor(private readonly deps: EngineDeps) {}

  async get(actor: Actor, id: string): Promise<Person> {
    const person = await this.deps.store.getPerson(id);
    if (!person) {
      throw Errors.notFound('Person');
    }
    if (person.retired && !isAdmin(actor)) {
      const sameCountry =
        (actor.kind === 'delegate' || actor.kind === 'self') && actor.countryId === person.countryId;
      if (!sameCountry) {
        throw Errors.notFound('Person');
      }
    }
    return person;
  }

  async create(actor: Actor, input: PersonInput): Promise<Person> {
    const person = await this.deps.store.transaction(async (tx) => {
      const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
      const audited = auditPerson(input, null, auditContext(this.deps, actor, view, event));
      const created = await tx.insertPerson(audited.draft);
      return this.attachFiles(tx, created, audited);
    });

    logger.info({ personId: person.id, countryId: person.countryId }, 'Person created');
    await notify(this.deps, actor, { entity: 'person', id: person.id, action: 'created' });
    return person;
  }

  async edit(actor: Actor, id: string, input: PersonInput): Promise<Person> {
    const person = await this.deps.store.transaction(async (tx) => {
      const [view, event] = await Promise.all([tx.loadSnapshot(), tx.getEventState()]);
      const previous = view.getPerson(id);
      if (!previous || previous.retired) {
        throw Errors.notFound('Person');
      }
      const audited = auditPerson(input, previous, auditContext(this.deps, actor, view, event));
      return this.attachFiles(
        tx,
        {
          ...audited.draft,
          id,
          photoId: previous.photoId,
          consentFormId: previous.consentFormId,
          retired: false,
        },
        audited
      );
    });

    logger.info({ personId: id }, 'Person updated');
    await notify(this.deps, actor, { entity: 'person', id, action: 'updated' });
    return person;
  }

  async retire(actor: Actor, id: string): Promise<Person> {
    if (!isAdmin(actor)) {
      throw Errors.forbidden('You do not have permission to retire');
    }
    const person = await this.deps.store.transaction(async (tx) => {
      const person = await tx.getPerson(id);
      if (!person || person.retired) {
        throw Errors.notFound('Person');
      }
      const retired = { ...person, retired: true };
      await tx.updatePerson(retired);
      return retired;
    });

    logger.info({ personId: id }, 'Person retired');
    await notify(this.deps, actor, { entity: 'person', id, action: 'retired' });
    return person;
  }

  /**
   * Store new uploads and point the record at them. The previous file in
   * each slot stays in storage, superseded.
   */
  async attachFiles(tx: RegistrationWriter, person: Person, audited: AuditedPerson): Promise<Person> {
    let photo = audited.photo;
    if (!photo && audited.rosterPhoto?.photoPath) {
      photo = await this.loadRosterPhoto(audited.rosterPhoto.photoPath);
    }
    const owner = { ownerKind: 'person' as const, ownerId: person.id };
    let updated = person;
    if (photo) {
      const file = await storeUpload(this.deps, tx, photo, owner);
      updated = { ...updated, photoId: file.id };
    }
    if (audited.consentForm) {
      const file = await storeUpload(this.deps, tx, audited.consentForm, owner);
      updated = { ...updated, consentFormId: file.id };
    }
    await tx.updatePerson(updated);
    return updated;
  }

  private async loadRosterPhoto(photoPath: string): Promise<PendingUpload | null> {
    const content = await fs.readFile(photoPath);
    const format = await detectFormat(content);
    if (format !== 'jpeg' && format !== 'png') {
      logger.warn({ photoPath }, 'Roster photo is not JPEG or PNG, not copied');
      return null;
    }
    return { kind: 'photo', format, filename: path.basename(photoPath), content };
  }
}
