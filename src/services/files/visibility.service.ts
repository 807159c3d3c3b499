import { EventSettings } from '../../config/event.js';
import { Actor, Country, Person, StoredFile } from '../../types/index.js';

export type FileState = 'public' | 'badge-only' | 'private' | 'superseded';

export type FileOwner =
  | { kind: 'country'; country: Country }
  | { kind: 'person'; person: Person; country: Country | null };

function currentFileId(file: StoredFile, owner: FileOwner): string | null {
  if (owner.kind === 'country') {
    return file.kind === 'flag' ? owner.country.flagId : null;
  }
  switch (file.kind) {
    case 'photo':
      return owner.person.photoId;
    case 'consent_form':
      return owner.person.consentFormId;
    default:
      return null;
  }
}

/**
 * Visibility of a file, computed from the owner's current record on every
 * read. A file no longer occupying its slot stays superseded whatever the
 * consent fields later say.
 */
export function resolveFileState(
  file: StoredFile,
  owner: FileOwner,
  settings: EventSettings
): FileState {
  if (currentFileId(file, owner) !== file.id) {
    return 'superseded';
  }
  if (file.kind === 'flag') {
    return 'public';
  }
  if (file.kind === 'consent_form' || owner.kind !== 'person') {
    return 'private';
  }
  if (!settings.consentUi) {
    return 'public';
  }
  switch (owner.person.photoConsent) {
    case 'yes':
      return 'public';
    case 'badge_only':
      return 'badge-only';
    default:
      return 'private';
  }
}

function ownerRetired(owner: FileOwner): boolean {
  if (owner.kind === 'country') {
    return owner.country.retired;
  }
  return owner.person.retired || (owner.country?.retired ?? false);
}

/**
 * Whether the actor belongs to the owner's country, or is the owner.
 */
function isOwnerSide(owner: FileOwner, actor: Actor): boolean {
  const countryId = owner.kind === 'country' ? owner.country.id : owner.person.countryId;
  switch (actor.kind) {
    case 'delegate':
      return actor.countryId === countryId;
    case 'self':
      return owner.kind === 'country'
        ? actor.countryId === countryId
        : actor.personId === owner.person.id;
    default:
      return false;
  }
}

export function canServe(state: FileState, owner: FileOwner, actor: Actor): boolean {
  if (actor.kind === 'admin') {
    return true;
  }
  switch (state) {
    case 'superseded':
      return false;
    case 'public':
      return !ownerRetired(owner) || isOwnerSide(owner, actor);
    case 'badge-only':
    case 'private':
      return isOwnerSide(owner, actor);
  }
}

/**
 * Photos that may appear in the public archive: current, publicly
 * consented, of people and countries still registered.
 */
export function publicPhotos(
  people: readonly Person[],
  countries: readonly Country[],
  files: readonly StoredFile[],
  settings: EventSettings
): Array<{ file: StoredFile; person: Person }> {
  const countryById = new Map(countries.map((country) => [country.id, country]));
  const personById = new Map(people.map((person) => [person.id, person]));
  const result: Array<{ file: StoredFile; person: Person }> = [];
  for (const file of files) {
    if (file.kind !== 'photo' || file.ownerKind !== 'person') {
      continue;
    }
    const person = personById.get(file.ownerId);
    if (!person) {
      continue;
    }
    const owner: FileOwner = {
      kind: 'person',
      person,
      country: countryById.get(person.countryId) ?? null,
    };
    if (resolveFileState(file, owner, settings) === 'public' && !ownerRetired(owner)) {
      result.push({ file, person });
    }
  }
  return result;
}

/**
 * Current flags of countries still registered. Flags are always public.
 */
export function publicFlags(
  countries: readonly Country[],
  files: readonly StoredFile[]
): StoredFile[] {
  const current = new Set(
    countries.flatMap((country) =>
      !country.retired && country.flagId !== null ? [country.flagId] : []
    )
  );
  return files.filter((file) => file.kind === 'flag' && current.has(file.id));
}
