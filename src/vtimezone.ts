/**
 * VTIMEZONE parsing (RFC 5545 Section 3.6.5)
 *
 * Only the UTC offsets written in the component are extracted; there is no
 * time zone database lookup and no evaluation of RRULE transitions.
 */

import { tryParseContentLine, unfoldLines } from './content-line.js';
import { DAVError } from './errors.js';

export interface VTimeZone {
  readonly tzid: string;
  /** Seconds east of UTC in standard time. */
  readonly standardOffset: number;
  /** Seconds east of UTC in daylight time; absent without a DST rule. */
  readonly daylightOffset?: number;
}

const OFFSET_PATTERN = /^([+-])?(\d{2})(\d{2})(\d{2})?$/;

/**
 * Parse a UTC-OFFSET value (`+HHMM`, `-HHMM`, `+HHMMSS`) to seconds.
 * Returns undefined for anything else.
 */
export function parseUtcOffset(text: string): number | undefined {
  const match = OFFSET_PATTERN.exec(text.trim());
  if (!match) return undefined;

  const [, sign, hours, minutes, seconds] = match;
  const total = Number(hours) * 3600 + Number(minutes) * 60 + Number(seconds ?? '0');
  return sign === '-' ? -total : total;
}

export function formatUtcOffset(seconds: number): string {
  const sign = seconds < 0 ? '-' : '+';
  const abs = Math.abs(seconds);
  const hours = String(Math.floor(abs / 3600)).padStart(2, '0');
  const minutes = String(Math.floor((abs % 3600) / 60)).padStart(2, '0');
  const rest = abs % 60;
  return `${sign}${hours}${minutes}${rest ? String(rest).padStart(2, '0') : ''}`;
}

function isMarker(line: string, marker: string): boolean {
  return line.trim().toUpperCase() === marker;
}

/**
 * Build a VTimeZone from already unfolded lines spanning one
 * BEGIN:VTIMEZONE ... END:VTIMEZONE block.
 */
export function vTimeZoneFromLines(lines: string[]): VTimeZone {
  const begin = lines.findIndex((line) => isMarker(line, 'BEGIN:VTIMEZONE'));
  if (begin === -1) {
    throw DAVError.parsingError('Missing BEGIN:VTIMEZONE');
  }
  const end = lines.findIndex((line, index) => index > begin && isMarker(line, 'END:VTIMEZONE'));
  if (end === -1) {
    throw DAVError.parsingError('Missing END:VTIMEZONE');
  }

  let tzid: string | undefined;
  let standardOffset: number | undefined;
  let daylightOffset: number | undefined;
  let block: 'STANDARD' | 'DAYLIGHT' | undefined;

  for (const line of lines.slice(begin + 1, end)) {
    const property = tryParseContentLine(line);
    if (!property) continue;

    const marker = property.value.trim().toUpperCase();
    if (property.name === 'BEGIN' && (marker === 'STANDARD' || marker === 'DAYLIGHT')) {
      block = marker;
    } else if (property.name === 'END' && marker === block) {
      block = undefined;
    } else if (property.name === 'TZID' && tzid === undefined) {
      tzid = property.value.trim();
    } else if (property.name === 'TZOFFSETFROM' || property.name === 'TZOFFSETTO') {
      const offset = parseUtcOffset(property.value);
      if (offset === undefined) continue;
      // Offsets outside STANDARD/DAYLIGHT come from minimal producers; count them as standard
      if (block === 'DAYLIGHT') {
        daylightOffset = offset;
      } else {
        standardOffset = offset;
      }
    }
  }

  if (!tzid) {
    throw DAVError.parsingError('Missing TZID in VTIMEZONE');
  }
  if (standardOffset === undefined) {
    if (daylightOffset === undefined) {
      throw DAVError.parsingError('Missing TZOFFSETFROM/TZOFFSETTO in VTIMEZONE');
    }
    // A zone with only a DAYLIGHT rule still has one known offset
    standardOffset = daylightOffset;
    daylightOffset = undefined;
  }

  return Object.freeze(
    daylightOffset === undefined ? { tzid, standardOffset } : { tzid, standardOffset, daylightOffset }
  );
}

/**
 * Parse the first VTIMEZONE component in `text`.
 */
export function parseVTimeZone(text: string): VTimeZone {
  return vTimeZoneFromLines(unfoldLines(text));
}

/**
 * Return the first TZID value without validating the rest of the component.
 */
export function extractTzid(text: string): string | undefined {
  for (const line of text.split(/\r\n|\n|\r/)) {
    const trimmed = line.trim();
    if (trimmed.toUpperCase().startsWith('TZID:')) {
      return trimmed.slice('TZID:'.length);
    }
  }
  return undefined;
}
