/**
 * Parameter codec for `Authorization`, `Server-Authorization` and
 * `WWW-Authenticate` values.
 *
 * Format: `Hawk key1="value1", key2="value2"`. Values are quoted strings in
 * which `\"` and `\\` are the only escapes.
 */

import { HAWK_SCHEME } from './constants.js';

/**
 * Ordered attribute list. Entries with an `undefined` value are skipped when
 * formatting.
 */
export type HeaderEntries = ReadonlyArray<readonly [string, string | undefined]>;

const ATTRIBUTE_NAME = /^[A-Za-z0-9_-]+$/;

function isWhitespace(ch: string | undefined): boolean {
  return ch === ' ' || ch === '\t';
}

/**
 * Parse the parameter list that follows the scheme name.
 *
 * @returns Attribute map, or `null` if the list is malformed or repeats an
 *   attribute
 */
export function parseHeaderParameters(input: string): Map<string, string> | null {
  const params = new Map<string, string>();
  let i = 0;

  const skipWhitespace = (): void => {
    while (isWhitespace(input[i])) i++;
  };

  skipWhitespace();
  while (i < input.length) {
    const eq = input.indexOf('=', i);
    if (eq === -1) return null;

    const name = input.slice(i, eq).trim();
    if (!ATTRIBUTE_NAME.test(name) || params.has(name)) return null;

    i = eq + 1;
    skipWhitespace();
    if (input[i] !== '"') return null;
    i++;

    let value = '';
    let closed = false;
    while (i < input.length) {
      const ch = input.charAt(i);
      if (ch === '\\') {
        if (i + 1 >= input.length) return null;
        value += input.charAt(i + 1);
        i += 2;
        continue;
      }
      i++;
      if (ch === '"') {
        closed = true;
        break;
      }
      value += ch;
    }
    if (!closed) return null;
    params.set(name, value);

    skipWhitespace();
    if (i >= input.length) break;
    if (input[i] !== ',') return null;
    i++;
    skipWhitespace();
    // Trailing comma
    if (i >= input.length) return null;
  }

  return params;
}

/**
 * Whether a header value uses `scheme`, exactly (case-sensitive) and
 * followed by whitespace or nothing. Says nothing about the parameters.
 */
export function hasAuthorizationScheme(
  value: string | undefined,
  scheme: string = HAWK_SCHEME
): boolean {
  if (value === undefined) return false;

  const trimmed = value.trim();
  if (!trimmed.startsWith(scheme)) return false;
  return trimmed.length === scheme.length || isWhitespace(trimmed.charAt(scheme.length));
}

/**
 * Split a header value into scheme and parameters.
 *
 * Only an exact (case-sensitive) match of `scheme` is accepted; any other
 * scheme, or malformed parameters, yields `null`.
 */
export function parseAuthorizationHeader(
  value: string | undefined,
  scheme: string = HAWK_SCHEME
): Map<string, string> | null {
  if (value === undefined || !hasAuthorizationScheme(value, scheme)) return null;

  return parseHeaderParameters(value.trim().slice(scheme.length));
}

function escapeValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

/**
 * Serialize entries as comma-space separated `key="value"` pairs.
 */
export function formatHeaderParameters(entries: HeaderEntries): string {
  const parts: string[] = [];
  for (const [name, value] of entries) {
    if (value === undefined) continue;
    parts.push(`${name}="${escapeValue(value)}"`);
  }
  return parts.join(', ');
}

/**
 * Serialize a complete header value, e.g. `Hawk mac="...", hash="..."`.
 */
export function formatHeader(entries: HeaderEntries, scheme: string = HAWK_SCHEME): string {
  const params = formatHeaderParameters(entries);
  return params ? `${scheme} ${params}` : scheme;
}
