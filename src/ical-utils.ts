/**
 * iCalendar Utilities
 *
 * Parsing and generation of iCalendar (RFC 5545) objects: the VCALENDAR
 * envelope, VEVENT/VTODO entities and their VTIMEZONE definitions.
 */

import { getConfig, DEFAULT_PROD_ID } from './config.js';
import {
  escapeText,
  parseContentLine,
  serializeContentLine,
  unescapeText,
  unfoldLines,
} from './content-line.js';
import type { ContentLine } from './content-line.js';
import { dateProperty, formatICalDate, parseDateProperty } from './date-utils.js';
import type { DateProperty } from './date-utils.js';
import { DAVError } from './errors.js';
import { formatUtcOffset, vTimeZoneFromLines } from './vtimezone.js';
import type { VTimeZone } from './vtimezone.js';

export type EntityType = 'VEVENT' | 'VTODO';

export interface Subcomponent {
  name: string;
  properties: ContentLine[];
}

export interface CalendarEntity {
  type: EntityType;
  uid: string;
  /** SEQUENCE; 0 when absent. Higher wins when two copies share a UID. */
  sequence: number;
  summary?: string;
  description?: string;
  location?: string;
  status?: string;
  start?: DateProperty;
  end?: DateProperty;
  due?: DateProperty;
  /** Every property not modeled above, in source order. */
  properties: ContentLine[];
  /** Nested components such as VALARM. */
  subcomponents: Subcomponent[];
}

export interface ICalendarObject {
  version?: string;
  prodId?: string;
  method?: string;
  entities: CalendarEntity[];
  timezones: VTimeZone[];
}

const ENTITY_TYPES: ReadonlySet<string> = new Set<EntityType>(['VEVENT', 'VTODO']);

function isEntityType(name: string): name is EntityType {
  return ENTITY_TYPES.has(name);
}

function entityFromProperties(
  type: EntityType,
  properties: ContentLine[],
  subcomponents: Subcomponent[]
): CalendarEntity {
  let uid: string | undefined;
  const entity: Omit<CalendarEntity, 'uid'> = {
    type,
    sequence: 0,
    properties: [],
    subcomponents,
  };

  for (const property of properties) {
    switch (property.name) {
      case 'UID':
        uid = property.value.trim();
        break;
      case 'SEQUENCE': {
        const sequence = Number.parseInt(property.value, 10);
        if (Number.isNaN(sequence)) entity.properties.push(property);
        else entity.sequence = sequence;
        break;
      }
      case 'SUMMARY':
        entity.summary = unescapeText(property.value);
        break;
      case 'DESCRIPTION':
        entity.description = unescapeText(property.value);
        break;
      case 'LOCATION':
        entity.location = unescapeText(property.value);
        break;
      case 'STATUS':
        entity.status = property.value.trim().toUpperCase();
        break;
      case 'DTSTART':
      case 'DTEND':
      case 'DUE': {
        const parsed = parseDateProperty(property);
        if (!parsed) {
          entity.properties.push(property);
        } else if (property.name === 'DTSTART') {
          entity.start = parsed;
        } else if (property.name === 'DTEND') {
          entity.end = parsed;
        } else {
          entity.due = parsed;
        }
        break;
      }
      default:
        entity.properties.push(property);
    }
  }

  if (!uid) {
    throw DAVError.parsingError(`Missing UID in ${type}`);
  }

  return { ...entity, uid };
}

/**
 * Parse an iCalendar object (one VCALENDAR).
 */
export function parseICalendar(text: string): ICalendarObject {
  const lines = unfoldLines(text);
  if (lines.length === 0) {
    throw DAVError.parsingError('Empty iCalendar data');
  }

  const calendar: ICalendarObject = { entities: [], timezones: [] };
  const stack: string[] = [];
  let entity: { type: EntityType; properties: ContentLine[]; subcomponents: Subcomponent[] } | undefined;
  let nested: Subcomponent | undefined;
  let timezoneLines: string[] | undefined;

  for (const line of lines) {
    const property = parseContentLine(line);

    if (timezoneLines) {
      timezoneLines.push(line);
    }

    if (property.name === 'BEGIN') {
      const name = property.value.trim().toUpperCase();
      if (stack.length === 0 && name !== 'VCALENDAR') {
        throw DAVError.parsingError(`Expected BEGIN:VCALENDAR, got BEGIN:${name}`);
      }
      stack.push(name);

      if (stack.length === 2 && isEntityType(name)) {
        entity = { type: name, properties: [], subcomponents: [] };
      } else if (stack.length === 2 && name === 'VTIMEZONE') {
        timezoneLines = [line];
      } else if (stack.length === 3 && entity) {
        nested = { name, properties: [] };
      }
      continue;
    }

    if (property.name === 'END') {
      const name = property.value.trim().toUpperCase();
      const open = stack.pop();
      if (open !== name) {
        throw DAVError.parsingError(`END:${name} does not match BEGIN:${open ?? '(none)'}`);
      }

      if (stack.length === 1 && entity) {
        calendar.entities.push(entityFromProperties(entity.type, entity.properties, entity.subcomponents));
        entity = undefined;
      } else if (stack.length === 1 && timezoneLines) {
        calendar.timezones.push(vTimeZoneFromLines(timezoneLines));
        timezoneLines = undefined;
      } else if (stack.length === 2 && entity && nested) {
        entity.subcomponents.push(nested);
        nested = undefined;
      }
      continue;
    }

    if (stack.length === 1) {
      if (property.name === 'VERSION') calendar.version = property.value;
      else if (property.name === 'PRODID') calendar.prodId = property.value;
      else if (property.name === 'METHOD') calendar.method = property.value;
    } else if (nested) {
      nested.properties.push(property);
    } else if (entity && stack.length === 2) {
      entity.properties.push(property);
    }
  }

  if (stack.length > 0) {
    throw DAVError.parsingError(`Missing END:${stack[stack.length - 1]}`);
  }

  return calendar;
}

function textLine(name: string, value: string): ContentLine {
  return { name, params: {}, value: escapeText(value) };
}

function entityLines(entity: CalendarEntity): ContentLine[] {
  const lines: ContentLine[] = [{ name: 'UID', params: {}, value: entity.uid }];

  if (!entity.properties.some((property) => property.name === 'DTSTAMP')) {
    lines.push({ name: 'DTSTAMP', params: {}, value: formatICalDate(new Date()) });
  }
  lines.push({ name: 'SEQUENCE', params: {}, value: String(entity.sequence) });

  if (entity.summary !== undefined) lines.push(textLine('SUMMARY', entity.summary));
  if (entity.description !== undefined) lines.push(textLine('DESCRIPTION', entity.description));
  if (entity.location !== undefined) lines.push(textLine('LOCATION', entity.location));
  if (entity.status !== undefined) lines.push({ name: 'STATUS', params: {}, value: entity.status });
  if (entity.start) lines.push(dateProperty('DTSTART', entity.start));
  if (entity.end) lines.push(dateProperty('DTEND', entity.end));
  if (entity.due) lines.push(dateProperty('DUE', entity.due));

  return [...lines, ...entity.properties];
}

function vtimezoneBlock(zone: VTimeZone): string[] {
  const block = (name: 'STANDARD' | 'DAYLIGHT', offset: number) => [
    `BEGIN:${name}`,
    'DTSTART:19700101T000000',
    `TZOFFSETFROM:${formatUtcOffset(offset)}`,
    `TZOFFSETTO:${formatUtcOffset(offset)}`,
    `END:${name}`,
  ];

  return [
    'BEGIN:VTIMEZONE',
    serializeContentLine({ name: 'TZID', params: {}, value: zone.tzid }),
    ...block('STANDARD', zone.standardOffset),
    ...(zone.daylightOffset === undefined ? [] : block('DAYLIGHT', zone.daylightOffset)),
    'END:VTIMEZONE',
  ];
}

/**
 * Generate iCalendar (VCALENDAR) data.
 *
 * VTIMEZONE components are written with the offsets only; transition rules
 * are not part of the model.
 */
export function generateICalendar(
  calendar: Omit<ICalendarObject, 'timezones'> & { timezones?: VTimeZone[] }
): string {
  const lines = [
    'BEGIN:VCALENDAR',
    `VERSION:${calendar.version ?? '2.0'}`,
    serializeContentLine({
      name: 'PRODID',
      params: {},
      value: calendar.prodId ?? getConfig().prodId ?? DEFAULT_PROD_ID,
    }),
    'CALSCALE:GREGORIAN',
  ];

  if (calendar.method) {
    lines.push(`METHOD:${calendar.method}`);
  }

  for (const zone of calendar.timezones ?? []) {
    lines.push(...vtimezoneBlock(zone));
  }

  for (const entity of calendar.entities) {
    lines.push(`BEGIN:${entity.type}`);
    lines.push(...entityLines(entity).map(serializeContentLine));
    for (const sub of entity.subcomponents) {
      lines.push(`BEGIN:${sub.name}`, ...sub.properties.map(serializeContentLine), `END:${sub.name}`);
    }
    lines.push(`END:${entity.type}`);
  }

  lines.push('END:VCALENDAR');
  return lines.join('\r\n') + '\r\n';
}

/**
 * Generate a single-entity calendar object, the unit stored in one CalDAV resource.
 */
export function generateICalData(entity: CalendarEntity, timezones: VTimeZone[] = []): string {
  return generateICalendar({ entities: [entity], timezones });
}

/**
 * Build a new entity with the required fields set.
 */
export function createEntity(
  type: EntityType,
  uid: string,
  fields: Partial<Omit<CalendarEntity, 'type' | 'uid'>> = {}
): CalendarEntity {
  return {
    ...fields,
    type,
    uid,
    sequence: fields.sequence ?? 0,
    properties: fields.properties ?? [],
    subcomponents: fields.subcomponents ?? [],
  };
}

/**
 * First entity of a calendar object resource; its UID and SEQUENCE identify
 * the resource when two resources carry the same component.
 */
export function primaryEntity(calendar: ICalendarObject): CalendarEntity | undefined {
  return calendar.entities[0];
}
