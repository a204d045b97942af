/**
 * vCard Utilities
 *
 * Parsing and generation of vCard 3.0 / 4.0 (RFC 2426, RFC 6350) contacts.
 */

import { DEFAULT_PROD_ID, getConfig } from './config.js';
import {
  escapeText,
  parseContentLine,
  serializeContentLine,
  unescapeText,
  unfoldLines,
} from './content-line.js';
import type { ContentLine } from './content-line.js';
import { formatTemporal, parseTemporal } from './date-utils.js';
import type { TemporalValue } from './date-utils.js';
import { DAVError } from './errors.js';

export type VCardVersion = '3.0' | '4.0';

export interface StructuredName {
  familyNames: string[];
  givenNames: string[];
  additionalNames: string[];
  honorificPrefixes: string[];
  honorificSuffixes: string[];
}

export interface TypedValue {
  value: string;
  /** Lower-cased TYPE parameter values, e.g. ['work', 'voice']. */
  types: string[];
  /** PREF parameter (vCard 4.0) or `pref` type (vCard 3.0), 1 = most preferred. */
  preference?: number;
}

export interface VCard {
  version: VCardVersion;
  uid?: string;
  formattedName: string;
  name?: StructuredName;
  emails: TypedValue[];
  telephones: TypedValue[];
  /** ORG components: organization name followed by units. */
  organization?: string[];
  note?: string;
  revision?: TemporalValue;
  /** Every property not modeled above, in source order. */
  properties: ContentLine[];
}

/**
 * Split a structured value on unescaped `sep`.
 */
function splitStructured(value: string, sep: ';' | ','): string[] {
  const parts: string[] = [];
  let current = '';
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    if (char === '\\' && i + 1 < value.length) {
      current += char + value[i + 1];
      i++;
    } else if (char === sep) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}

function listComponent(component: string | undefined): string[] {
  if (!component) return [];
  return splitStructured(component, ',').map(unescapeText).filter((part) => part.length > 0);
}

function parseStructuredName(value: string): StructuredName {
  const [family, given, additional, prefixes, suffixes] = splitStructured(value, ';');
  return {
    familyNames: listComponent(family),
    givenNames: listComponent(given),
    additionalNames: listComponent(additional),
    honorificPrefixes: listComponent(prefixes),
    honorificSuffixes: listComponent(suffixes),
  };
}

function parseTypedValue(property: ContentLine): TypedValue {
  const types = (property.params['TYPE'] ?? '')
    .split(',')
    .map((type) => type.trim().toLowerCase())
    .filter((type) => type.length > 0);

  const pref = property.params['PREF'];
  let preference: number | undefined = pref ? Number.parseInt(pref, 10) : undefined;
  if (preference !== undefined && Number.isNaN(preference)) preference = undefined;
  if (preference === undefined && types.includes('pref')) preference = 1;

  const typed: TypedValue = {
    value: unescapeText(property.value),
    types: types.filter((type) => type !== 'pref'),
  };
  return preference === undefined ? typed : { ...typed, preference };
}

/**
 * REV is a timestamp; vCard 3.0 producers often write the extended ISO form.
 */
function parseRevision(value: string): TemporalValue | undefined {
  return parseTemporal(value.replace(/[-:]/g, '').replace(/\.\d+/, ''));
}

function cardFromProperties(properties: ContentLine[]): VCard {
  const version = properties.find((property) => property.name === 'VERSION')?.value.trim();
  if (!version) {
    throw DAVError.parsingError('Missing VERSION property in VCARD');
  }
  if (version !== '3.0' && version !== '4.0') {
    throw DAVError.parsingError(`Unsupported vCard version: ${version}`);
  }

  const fn = properties.find((property) => property.name === 'FN');
  if (!fn) {
    throw DAVError.parsingError('Missing FN (formatted name) property in VCARD');
  }

  const card: VCard = {
    version,
    formattedName: unescapeText(fn.value),
    emails: [],
    telephones: [],
    properties: [],
  };

  for (const property of properties) {
    switch (property.name) {
      case 'VERSION':
      case 'FN':
        break;
      case 'UID':
        card.uid = property.value.trim();
        break;
      case 'N':
        card.name = parseStructuredName(property.value);
        break;
      case 'EMAIL':
        card.emails.push(parseTypedValue(property));
        break;
      case 'TEL':
        card.telephones.push(parseTypedValue(property));
        break;
      case 'ORG':
        card.organization = splitStructured(property.value, ';').map(unescapeText);
        break;
      case 'NOTE':
        card.note = unescapeText(property.value);
        break;
      case 'REV': {
        const revision = parseRevision(property.value);
        if (revision) card.revision = revision;
        else card.properties.push(property);
        break;
      }
      default:
        card.properties.push(property);
    }
  }

  return card;
}

/**
 * Parse every VCARD block in `text`.
 */
export function parseVCards(text: string): VCard[] {
  const cards: VCard[] = [];
  let current: ContentLine[] | undefined;

  for (const line of unfoldLines(text)) {
    const property = parseContentLine(line);
    const marker = property.value.trim().toUpperCase();

    if (property.name === 'BEGIN' && marker === 'VCARD') {
      if (current) throw DAVError.parsingError('Nested BEGIN:VCARD');
      current = [];
    } else if (property.name === 'END' && marker === 'VCARD') {
      if (!current) throw DAVError.parsingError('END:VCARD without BEGIN:VCARD');
      cards.push(cardFromProperties(current));
      current = undefined;
    } else if (current) {
      current.push(property);
    }
  }

  if (current) {
    throw DAVError.parsingError('Missing END:VCARD');
  }
  return cards;
}

/**
 * Parse a vCard resource; exactly the first card is returned.
 */
export function parseVCard(text: string): VCard {
  const [card] = parseVCards(text);
  if (!card) {
    throw DAVError.parsingError('Missing BEGIN:VCARD');
  }
  return card;
}

function joinList(values: string[]): string {
  return values.map(escapeText).join(',');
}

function typedLine(name: string, typed: TypedValue, version: VCardVersion): ContentLine {
  const params: Record<string, string> = {};
  const types = [...typed.types];
  if (typed.preference !== undefined) {
    if (version === '4.0') params['PREF'] = String(typed.preference);
    else types.push('pref');
  }
  if (types.length > 0) params['TYPE'] = types.join(',');
  return { name, params, value: escapeText(typed.value) };
}

/**
 * Generate vCard text for one contact.
 */
export function generateVCard(card: VCard): string {
  const lines: ContentLine[] = [
    { name: 'VERSION', params: {}, value: card.version },
    { name: 'PRODID', params: {}, value: getConfig().prodId ?? DEFAULT_PROD_ID },
  ];

  if (card.uid) lines.push({ name: 'UID', params: {}, value: card.uid });
  lines.push({ name: 'FN', params: {}, value: escapeText(card.formattedName) });

  if (card.name) {
    const n = card.name;
    lines.push({
      name: 'N',
      params: {},
      value: [n.familyNames, n.givenNames, n.additionalNames, n.honorificPrefixes, n.honorificSuffixes]
        .map(joinList)
        .join(';'),
    });
  } else if (card.version === '3.0') {
    // N is mandatory in vCard 3.0
    lines.push({ name: 'N', params: {}, value: ';;;;' });
  }

  for (const email of card.emails) lines.push(typedLine('EMAIL', email, card.version));
  for (const tel of card.telephones) lines.push(typedLine('TEL', tel, card.version));
  if (card.organization) {
    lines.push({ name: 'ORG', params: {}, value: card.organization.map(escapeText).join(';') });
  }
  if (card.note !== undefined) lines.push({ name: 'NOTE', params: {}, value: escapeText(card.note) });
  if (card.revision) lines.push({ name: 'REV', params: {}, value: formatTemporal(card.revision) });

  const extra = card.properties.filter((property) => property.name !== 'PRODID');
  const body = [...lines, ...extra].map(serializeContentLine);
  return ['BEGIN:VCARD', ...body, 'END:VCARD'].join('\r\n') + '\r\n';
}
