/**
 * Content Lines
 *
 * Shared line-level grammar of iCalendar (RFC 5545 §3.1) and vCard
 * (RFC 6350 §3.3): unfolding, tokenizing `NAME;PARAM=VALUE:VALUE`, TEXT
 * escaping and folding on output.
 */

import { DAVError } from './errors.js';

export interface ContentLine {
  /** vCard property group (`item1` in `item1.EMAIL`). */
  group?: string;
  /** Upper-cased property name. */
  name: string;
  /** Upper-cased parameter names to unquoted values. */
  params: Record<string, string>;
  value: string;
}

const FOLD_LIMIT = 75;

/**
 * Split text into logical lines.
 *
 * Continuation lines (starting with one space or tab) are joined to the
 * previous line before anything else; the result is trimmed and empty lines
 * are dropped.
 */
export function unfoldLines(text: string): string[] {
  const logical: string[] = [];

  for (const physical of text.split(/\r\n|\n|\r/)) {
    if ((physical.startsWith(' ') || physical.startsWith('\t')) && logical.length > 0) {
      logical[logical.length - 1] += physical.slice(1);
    } else {
      logical.push(physical);
    }
  }

  return logical.map((line) => line.trim()).filter((line) => line.length > 0);
}

/**
 * Split `text` on `separator`, ignoring separators inside double quotes.
 */
function splitOutsideQuotes(text: string, separator: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;

  for (const char of text) {
    if (char === '"') {
      quoted = !quoted;
      current += char;
    } else if (char === separator && !quoted) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  parts.push(current);
  return parts;
}

function valueSeparatorIndex(line: string): number {
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') quoted = !quoted;
    else if (char === ':' && !quoted) return i;
  }
  return -1;
}

function unquote(value: string): string {
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"') ? value.slice(1, -1) : value;
}

/**
 * Tokenize one unfolded line.
 */
export function parseContentLine(line: string): ContentLine {
  const colon = valueSeparatorIndex(line);
  if (colon <= 0) {
    throw DAVError.parsingError(`Invalid content line (expected NAME:VALUE): ${line}`);
  }

  const [qualifiedName, ...rawParams] = splitOutsideQuotes(line.slice(0, colon), ';');
  const dot = qualifiedName.indexOf('.');
  const group = dot > 0 ? qualifiedName.slice(0, dot) : undefined;
  const name = (dot > 0 ? qualifiedName.slice(dot + 1) : qualifiedName).trim().toUpperCase();

  if (!name) {
    throw DAVError.parsingError(`Missing property name: ${line}`);
  }

  const params: Record<string, string> = {};
  for (const rawParam of rawParams) {
    const eq = rawParam.indexOf('=');
    if (eq <= 0) continue;
    const key = rawParam.slice(0, eq).trim().toUpperCase();
    const paramValue = unquote(rawParam.slice(eq + 1).trim());
    // A repeated parameter adds to the value list (TYPE=work;TYPE=voice)
    const existing = params[key];
    params[key] = existing === undefined ? paramValue : `${existing},${paramValue}`;
  }

  const value = line.slice(colon + 1);
  return group ? { group, name, params, value } : { name, params, value };
}

/**
 * Tokenize a line, returning undefined instead of throwing.
 */
export function tryParseContentLine(line: string): ContentLine | undefined {
  try {
    return parseContentLine(line);
  } catch {
    return undefined;
  }
}

/**
 * Escape text for iCalendar/vCard TEXT values (RFC 5545 Section 3.3.11)
 */
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

/**
 * Unescape a TEXT value.
 */
export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_match, char: string) =>
    char === 'n' || char === 'N' ? '\n' : char
  );
}

function formatParamValue(value: string): string {
  return /[:;,]/.test(value) ? `"${value}"` : value;
}

function utf8Length(char: string): number {
  const code = char.codePointAt(0) ?? 0;
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code < 0x10000) return 3;
  return 4;
}

/**
 * Fold a line to at most 75 octets per physical line (RFC 5545 Section 3.1),
 * counting UTF-8 octets and breaking only between code points.
 */
export function foldLine(line: string): string {
  const chunks: string[] = [];
  let current = '';
  let octets = 0;

  for (const char of line) {
    const size = utf8Length(char);
    if (octets + size > FOLD_LIMIT) {
      chunks.push(current);
      current = ' ';
      octets = 1;
    }
    current += char;
    octets += size;
  }
  chunks.push(current);
  return chunks.join('\r\n');
}

export function serializeContentLine(line: ContentLine): string {
  const params = Object.entries(line.params)
    .map(([key, value]) => `;${key}=${formatParamValue(value)}`)
    .join('');
  const name = line.group ? `${line.group}.${line.name}` : line.name;
  return foldLine(`${name}${params}:${line.value}`);
}

/**
 * Find the first property with the given name.
 */
export function findProperty(lines: ContentLine[], name: string): ContentLine | undefined {
  return lines.find((line) => line.name === name);
}
