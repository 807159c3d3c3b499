import { Errors } from '../../utils/errors.js';

export interface RequiredProperty {
  entity: 'country' | 'person';
  prop: string;
  desc: string;
}

/**
 * Value after an edit: the proposed value if one was supplied, else the
 * stored one. Strings are trimmed and empty strings become null.
 */
export function newValue(
  proposed: string | null | undefined,
  previous: string | null | undefined
): string | null {
  const value = proposed === undefined ? previous : proposed;
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Require a non-empty value. Emptying a stored value on edit restores it.
 *
 * A property left out of the input entirely was not supplied; a property
 * present but empty was submitted blank, which gets the friendlier message.
 */
export function requireValue(
  proposed: string | null | undefined,
  previous: string | null | undefined,
  required: RequiredProperty
): string {
  const value = newValue(proposed, previous);
  if (value !== null) {
    return value;
  }
  const stored = newValue(undefined, previous);
  if (stored !== null) {
    return stored;
  }
  if (proposed === undefined) {
    throw Errors.requiredField(
      `Required ${required.entity} property ${required.prop} not supplied`,
      required.prop
    );
  }
  throw Errors.requiredField(`No ${required.desc} specified`, required.prop);
}

export function sameList(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
