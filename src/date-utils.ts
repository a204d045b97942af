/**
 * iCalendar date and date-time values (RFC 5545 Sections 3.3.4 and 3.3.5)
 *
 * Three encodings are modeled:
 * - UTC:      YYYYMMDDTHHMMSSZ -> { kind: 'utc', instant }
 * - Floating: YYYYMMDDTHHMMSS  -> { kind: 'floating', ...wall clock fields }
 * - Date:     YYYYMMDD         -> { kind: 'dateOnly', year, month, day }
 *
 * All arithmetic uses the UTC calendar, so results never depend on the host
 * locale or time zone.
 */

import type { ContentLine } from './content-line.js';

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface WallClockTime extends CalendarDate {
  hour: number;
  minute: number;
  second: number;
}

export type TemporalValue =
  | { kind: 'utc'; instant: Date }
  | ({ kind: 'floating' } & WallClockTime)
  | ({ kind: 'dateOnly' } & CalendarDate);

export interface DateProperty {
  value: TemporalValue;
  /**
   * TZID parameter of the source property. The value keeps floating
   * semantics: it is not resolved against a VTIMEZONE.
   */
  tzid?: string;
}

const UTC_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z$/;
const FLOATING_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})$/;
const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}

function utcDate(fields: WallClockTime): Date {
  // setUTCFullYear avoids Date.UTC mapping years 0-99 onto 1900-1999
  const date = new Date(0);
  date.setUTCFullYear(fields.year, fields.month - 1, fields.day);
  date.setUTCHours(fields.hour, fields.minute, fields.second, 0);
  return date;
}

function isValidWallClock(fields: WallClockTime): boolean {
  if (fields.hour > 23 || fields.minute > 59 || fields.second > 59) return false;
  const date = utcDate(fields);
  return (
    date.getUTCFullYear() === fields.year &&
    date.getUTCMonth() === fields.month - 1 &&
    date.getUTCDate() === fields.day
  );
}

function wallClockFrom(match: RegExpExecArray): WallClockTime {
  return {
    year: Number(match[1]),
    month: Number(match[2]),
    day: Number(match[3]),
    hour: Number(match[4]),
    minute: Number(match[5]),
    second: Number(match[6]),
  };
}

/**
 * Parse an iCalendar date or date-time value.
 *
 * Tries UTC, then floating, then date-only. Returns undefined when the text
 * matches none of them or names an impossible date.
 */
export function parseTemporal(text: string): TemporalValue | undefined {
  const value = text.trim();

  const utc = UTC_PATTERN.exec(value);
  if (utc) {
    const fields = wallClockFrom(utc);
    return isValidWallClock(fields) ? { kind: 'utc', instant: utcDate(fields) } : undefined;
  }

  const floating = FLOATING_PATTERN.exec(value);
  if (floating) {
    const fields = wallClockFrom(floating);
    return isValidWallClock(fields) ? { kind: 'floating', ...fields } : undefined;
  }

  const date = DATE_PATTERN.exec(value);
  if (date) {
    const fields = { year: Number(date[1]), month: Number(date[2]), day: Number(date[3]) };
    return isValidWallClock({ ...fields, hour: 0, minute: 0, second: 0 })
      ? { kind: 'dateOnly', ...fields }
      : undefined;
  }

  return undefined;
}

function formatDate(fields: CalendarDate): string {
  return `${pad(fields.year, 4)}${pad(fields.month, 2)}${pad(fields.day, 2)}`;
}

function formatTime(fields: WallClockTime): string {
  return `${pad(fields.hour, 2)}${pad(fields.minute, 2)}${pad(fields.second, 2)}`;
}

/**
 * Format a temporal value; the exact inverse of parseTemporal.
 * Sub-second precision of UTC instants is dropped.
 */
export function formatTemporal(value: TemporalValue): string {
  switch (value.kind) {
    case 'utc': {
      const instant = value.instant;
      const fields: WallClockTime = {
        year: instant.getUTCFullYear(),
        month: instant.getUTCMonth() + 1,
        day: instant.getUTCDate(),
        hour: instant.getUTCHours(),
        minute: instant.getUTCMinutes(),
        second: instant.getUTCSeconds(),
      };
      return `${formatDate(fields)}T${formatTime(fields)}Z`;
    }
    case 'floating':
      return `${formatDate(value)}T${formatTime(value)}`;
    case 'dateOnly':
      return formatDate(value);
  }
}

/**
 * Format a Date to iCalendar DATE-TIME format (YYYYMMDDTHHMMSSZ)
 */
export function formatICalDate(date: Date): string {
  return formatTemporal({ kind: 'utc', instant: date });
}

/**
 * Read a DTSTART/DTEND/DUE-style property.
 *
 * `VALUE=DATE` forces a date-only value. A TZID parameter is recorded but the
 * value stays floating.
 */
export function parseDateProperty(line: ContentLine): DateProperty | undefined {
  const value = parseTemporal(line.value);
  if (!value) return undefined;
  if (line.params['VALUE'] === 'DATE' && value.kind !== 'dateOnly') return undefined;

  const tzid = line.params['TZID'];
  return tzid ? { value, tzid } : { value };
}

export function dateProperty(name: string, property: DateProperty): ContentLine {
  const params: Record<string, string> = {};
  if (property.value.kind === 'dateOnly') params['VALUE'] = 'DATE';
  if (property.tzid && property.value.kind === 'floating') params['TZID'] = property.tzid;
  return { name, params, value: formatTemporal(property.value) };
}

/**
 * Convert to a JS Date where that is well defined: UTC instants, and dates
 * (as UTC midnight). Floating values return undefined.
 */
export function temporalToDate(value: TemporalValue): Date | undefined {
  switch (value.kind) {
    case 'utc':
      return new Date(value.instant.getTime());
    case 'dateOnly':
      return utcDate({ ...value, hour: 0, minute: 0, second: 0 });
    case 'floating':
      return undefined;
  }
}
