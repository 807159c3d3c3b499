import { randomUUID } from 'crypto';
import { EventSettings } from '../../config/event.js';
import { RosterIndex } from '../../config/roster.js';
import { RegistrationStore, RegistrationWriter } from '../../db/registrationStore.js';
import { RoleTable } from '../../domain/roles.js';
import { Actor, EventState, StoredFile } from '../../types/index.js';
import { getContext } from '../../utils/logger.js';
import { AuditContext, PendingUpload, RegistryView } from '../audit/registryView.js';
import { CANONICAL_EXTENSION, CONTENT_TYPES } from '../files/fileFormat.service.js';
import { FileStorage } from '../storage/minio.service.js';
import {
  NotificationQueue,
  RegistrationNotificationJobData,
} from '../queue/jobQueue.service.js';

/**
 * Collaborators shared by every engine service.
 */
export interface EngineDeps {
  store: RegistrationStore;
  storage: FileStorage;
  notifications: NotificationQueue;
  settings: EventSettings;
  roles: RoleTable;
  roster: RosterIndex | null;
}

export function auditContext(
  deps: EngineDeps,
  actor: Actor,
  view: RegistryView,
  event: EventState
): AuditContext {
  return {
    settings: deps.settings,
    roles: deps.roles,
    roster: deps.roster,
    event,
    actor,
    view,
  };
}

export function actorName(actor: Actor): string {
  return actor.kind === 'anonymous' ? 'anonymous' : actor.username;
}

/**
 * Write upload content under a fresh key and record its metadata.
 * Content is never overwritten, so a failed transaction only leaves an
 * unreferenced object behind.
 */
export async function storeUpload(
  deps: EngineDeps,
  tx: RegistrationWriter,
  upload: PendingUpload,
  owner: Pick<StoredFile, 'ownerKind' | 'ownerId'>
): Promise<StoredFile> {
  const storageKey = `files/${upload.kind}/${randomUUID()}.${CANONICAL_EXTENSION[upload.format]}`;
  await deps.storage.put(storageKey, upload.content, CONTENT_TYPES[upload.format]);
  return tx.insertFile({
    kind: upload.kind,
    ownerKind: owner.ownerKind,
    ownerId: owner.ownerId,
    format: upload.format,
    filename: upload.filename,
    storageKey,
  });
}

export async function notify(
  deps: EngineDeps,
  actor: Actor,
  data: Omit<RegistrationNotificationJobData, 'actor' | 'correlationId'>
): Promise<void> {
  const correlationId = getContext().correlationId;
  await deps.notifications.enqueueRegistrationNotification({
    ...data,
    actor: actorName(actor),
    correlationId: typeof correlationId === 'string' ? correlationId : undefined,
  });
}
