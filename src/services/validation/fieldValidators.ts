import { z } from 'zod';
import { Errors } from '../../utils/errors.js';

const SMALL_INT = /^(0|[1-9][0-9]*)$/;
const HEX_COLOR = /^[0-9a-fA-F]{6}$/;
const emailSchema = z.string().email();

/**
 * Digits only, no sign, no leading zero unless the value is 0.
 */
export function isValidSmallInt(text: string, max: number | null = null): boolean {
  if (!SMALL_INT.test(text)) {
    return false;
  }
  return max === null || Number(text) <= max;
}

export function parseSmallInt(text: string, desc: string, max: number | null = null): number {
  if (!isValidSmallInt(text, max)) {
    throw Errors.formatInvalid(`Invalid ${desc}`, desc);
  }
  return Number(text);
}

export function isValidEmail(address: string): boolean {
  return emailSchema.safeParse(address).success;
}

/**
 * Split a multi-address field on commas and newlines, dropping empty entries.
 */
export function splitEmailList(text: string): string[] {
  return text
    .split(/[,\r\n]+/)
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

export function isHexColor(text: string): boolean {
  return HEX_COLOR.test(text);
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

/**
 * Build an ISO date from year, month and day strings.
 * Month and day must be exactly two digits.
 */
export function dateFromParts(desc: string, year: string, month: string, day: string): string {
  if (!/^[0-9]+$/.test(year)) {
    throw Errors.formatInvalid(`${desc}: invalid year`);
  }
  if (!/^[0-9]{2}$/.test(month)) {
    throw Errors.formatInvalid(`${desc}: invalid month`);
  }
  if (!/^[0-9]{2}$/.test(day)) {
    throw Errors.formatInvalid(`${desc}: invalid day`);
  }
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  if (y < 1 || y > 9999) {
    throw Errors.formatInvalid(`${desc}: year ${y} is out of range`);
  }
  if (m < 1 || m > 12) {
    throw Errors.formatInvalid(`${desc}: month must be in 1..12`);
  }
  if (d < 1 || d > daysInMonth(y, m)) {
    throw Errors.formatInvalid(`${desc}: day is out of range for month`);
  }
  return `${pad(y, 4)}-${pad(m, 2)}-${pad(d, 2)}`;
}

export function parseIsoDate(desc: string, text: string): string {
  const match = /^([0-9]+)-([0-9]{2})-([0-9]{2})$/.exec(text);
  if (!match) {
    throw Errors.formatInvalid(`${desc}: bad date`);
  }
  return dateFromParts(desc, match[1], match[2], match[3]);
}

export function parseHour(desc: string, text: string): string {
  if (!/^[0-9]{2}$/.test(text)) {
    throw Errors.formatInvalid(`${desc}: invalid hour`);
  }
  if (Number(text) > 23) {
    throw Errors.formatInvalid(`${desc}: hour must be in 0..23`);
  }
  return text;
}

export function parseMinute(desc: string, text: string): string {
  if (!/^[0-9]{2}$/.test(text)) {
    throw Errors.formatInvalid(`${desc}: invalid minute`);
  }
  if (Number(text) > 59) {
    throw Errors.formatInvalid(`${desc}: minute must be in 0..59`);
  }
  return text;
}

/**
 * Split an hh:mm time of day into hour and minute.
 */
export function parseTimeOfDay(desc: string, text: string): { hour: string; minute: string } {
  const match = /^([0-9]{2}):([0-9]{2})$/.exec(text);
  if (!match) {
    throw Errors.formatInvalid(`${desc}: bad time`);
  }
  return { hour: parseHour(desc, match[1]), minute: parseMinute(desc, match[2]) };
}

/**
 * Number N from a generic URL of the form <base><kind>N/, or null.
 */
export function matchGenericUrl(
  url: string,
  base: string,
  kind: 'countries/country' | 'people/person'
): number | null {
  const prefix = `${base}${kind}`;
  if (!url.startsWith(prefix)) {
    return null;
  }
  const match = /^([1-9][0-9]*)\/$/.exec(url.slice(prefix.length));
  return match ? Number(match[1]) : null;
}

/**
 * English list: A, A or B, A, B or C.
 */
export function formatList(items: readonly string[], conjunction = 'or'): string {
  if (items.length <= 1) {
    return items.join('');
  }
  return `${items.slice(0, -1).join(', ')} ${conjunction} ${items[items.length - 1]}`;
}
