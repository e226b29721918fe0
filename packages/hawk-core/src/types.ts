/**
 * @hawk-auth/core - Shared types
 *
 * Runtime-neutral shapes shared by the server verifier and the client signer.
 */

/**
 * Algorithm pair identifier. Each value selects both the HMAC digest used for
 * MACs and the hash digest used for payload hashes.
 */
export type HawkAlgorithm = 'sha1' | 'sha256';

/**
 * Minimal capability a user/principal must expose to take part in Hawk
 * verification: the shared key and the algorithm pair bound to it.
 */
export interface HawkPrincipal {
  readonly key: string;
  readonly algorithm: HawkAlgorithm;
}

/**
 * Hawk credentials as held by a client.
 */
export interface HawkCredentials extends HawkPrincipal {
  /** Key identifier sent in the `id` attribute */
  readonly id: string;
}

/**
 * Message types that carry a MAC.
 */
export type MessageType = 'header' | 'response' | 'bewit';

/**
 * Keys of the canonicalization input.
 */
export type HawkOptionKey =
  | 'method'
  | 'uri'
  | 'host'
  | 'port'
  | 'ts'
  | 'nonce'
  | 'hash'
  | 'ext'
  | 'app'
  | 'dlg';

/**
 * Canonicalization input. Absent keys render as empty lines.
 */
export type HawkOptions = Readonly<Partial<Record<HawkOptionKey, string>>>;

/**
 * Request artifacts shared by both sides of an exchange. The server derives
 * them from an authenticated request; the client keeps the ones it signed so
 * it can check the matching `Server-Authorization` header.
 */
export interface HawkArtifacts {
  method: string;
  host: string;
  port: number;
  /** Path and query exactly as sent */
  uri: string;
  /** Unix seconds */
  ts: number;
  nonce: string;
  hash?: string;
  ext?: string;
  app?: string;
  dlg?: string;
}

/**
 * Attributes parsed from an `Authorization: Hawk ...` header.
 */
export interface AuthHeaderAttributes {
  /** `''` when the header carries no id */
  id: string;
  /** Unix seconds; 0 when absent, not an integer, or beyond the safe integer range */
  ts: number;
  /** `ts` digits as sent (`"0"` when not an integer); enters the canonical string */
  rawTs: string;
  nonce?: string;
  ext?: string;
  hash?: string;
  mac?: string;
  app?: string;
  dlg?: string;
}

/**
 * Attributes decoded from a `bewit` query parameter.
 */
export interface BewitAttributes {
  id: string;
  /** Expiry, Unix seconds */
  exp: number;
  mac: string;
  ext: string;
}

/**
 * Returns the current time in Unix seconds.
 */
export type TimestampProvider = () => number;

/**
 * Returns a fresh nonce.
 */
export type NonceProvider = () => string;
