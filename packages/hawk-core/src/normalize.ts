/**
 * Canonical string construction.
 *
 * The canonical strings are the exact bytes that get MAC'd or hashed, so
 * every newline here is part of the wire contract:
 *
 * ```
 * hawk.1.<type>\n<ts>\n<nonce>\n<method>\n<uri>\n<host>\n<port>\n<hash>\n<ext>\n[<app>\n<dlg>\n]
 * ```
 *
 * @packageDocumentation
 */

import { HAWK_VERSION } from './constants.js';
import type { HawkArtifacts, HawkOptions, MessageType } from './types.js';

/**
 * Build the canonical string for a header, response or bewit MAC.
 *
 * Missing options render as empty lines. `app` and `dlg` are only appended
 * when both are present.
 */
export function normalizeString(type: MessageType, options: HawkOptions): string {
  let normalized =
    `hawk.${HAWK_VERSION}.${type}\n` +
    `${options.ts ?? ''}\n` +
    `${options.nonce ?? ''}\n` +
    `${options.method ?? ''}\n` +
    `${options.uri ?? ''}\n` +
    `${options.host ?? ''}\n` +
    `${options.port ?? ''}\n` +
    `${options.hash ?? ''}\n` +
    `${options.ext ?? ''}\n`;

  if (options.app !== undefined && options.dlg !== undefined) {
    normalized += `${options.app}\n${options.dlg}\n`;
  }

  return normalized;
}

/**
 * Build the canonical string for the time-sync MAC (`tsm`).
 */
export function normalizeTimestamp(ts: number): string {
  return `hawk.${HAWK_VERSION}.ts\n${ts}\n`;
}

/**
 * Build the canonical string hashed for payload validation.
 *
 * @param payload - Body text (already decoded as UTF-8)
 * @param mediaType - Bare, lowercased media type
 */
export function normalizePayload(payload: string, mediaType: string): string {
  return `hawk.${HAWK_VERSION}.payload\n${mediaType}\n${payload}\n`;
}

/**
 * Convert request artifacts to canonicalization options.
 */
export function artifactsToOptions(artifacts: HawkArtifacts): HawkOptions {
  return {
    method: artifacts.method,
    uri: artifacts.uri,
    host: artifacts.host,
    port: String(artifacts.port),
    ts: String(artifacts.ts),
    nonce: artifacts.nonce,
    hash: artifacts.hash,
    ext: artifacts.ext,
    app: artifacts.app,
    dlg: artifacts.dlg,
  };
}
