/**
 * @hawk-auth/server - Configuration
 *
 * Server configuration is validated once with zod and then frozen.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * Default configuration values
 */
export const CONFIG_DEFAULTS = {
  nonceCacheMaxEntries: 10000,
  timeSkewSeconds: 60,
  payloadValidation: true,
  timeSkewValidation: true,
  challengeLookupTimeoutMs: 5000,
  serverAuthorizationExt: 'hawk-auth',
} as const;

const HawkServerConfigSchema = z
  .object({
    nonceCache: z
      .object({
        maxEntries: z.number().int().positive().default(CONFIG_DEFAULTS.nonceCacheMaxEntries),
      })
      .strict()
      .default({}),
    timeSkewSeconds: z.number().int().nonnegative().default(CONFIG_DEFAULTS.timeSkewSeconds),
    payloadValidation: z.boolean().default(CONFIG_DEFAULTS.payloadValidation),
    timeSkewValidation: z.boolean().default(CONFIG_DEFAULTS.timeSkewValidation),
    challengeLookupTimeoutMs: z
      .number()
      .int()
      .positive()
      .default(CONFIG_DEFAULTS.challengeLookupTimeoutMs),
    serverAuthorizationExt: z.string().default(CONFIG_DEFAULTS.serverAuthorizationExt),
  })
  .strict();

/**
 * Configuration accepted by `resolveConfig`. Every field is optional.
 */
export type HawkServerConfigInput = z.input<typeof HawkServerConfigSchema>;

/**
 * Resolved server configuration.
 */
export type HawkServerConfig = Readonly<z.output<typeof HawkServerConfigSchema>>;

export interface ConfigValidationError {
  field: string;
  message: string;
}

/**
 * Configuration validation error
 */
export class ConfigError extends Error {
  readonly errors: ConfigValidationError[];

  constructor(errors: ConfigValidationError[]) {
    const message = errors.map((e) => `${e.field}: ${e.message}`).join('; ');
    super(`Invalid hawk configuration: ${message}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Apply defaults and validate.
 *
 * @throws ConfigError listing every invalid field
 */
export function resolveConfig(input: HawkServerConfigInput = {}): HawkServerConfig {
  const result = HawkServerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => ({
        field: issue.path.join('.') || '(root)',
        message: issue.message,
      }))
    );
  }
  const config = result.data;
  Object.freeze(config.nonceCache);
  return Object.freeze(config);
}

/**
 * Parse boolean from string.
 *
 * Only recognizes "true" and "1" (case-insensitive for "true").
 */
export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (!value) {
    return defaultValue;
  }
  const lower = value.toLowerCase();
  return lower === 'true' || lower === '1';
}

/**
 * Parse a number, leaving unparseable text as NaN so validation reports it.
 */
function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Read configuration from environment variables.
 *
 * @param env - Environment variables as a Record
 * @throws ConfigError if a numeric variable is not an integer in range
 */
export function parseConfigFromEnv(env: Record<string, string | undefined>): HawkServerConfig {
  return resolveConfig({
    nonceCache: { maxEntries: parseNumber(env['HAWK_NONCE_CACHE_MAX_ENTRIES']) },
    timeSkewSeconds: parseNumber(env['HAWK_TIME_SKEW_SECONDS']),
    payloadValidation: parseBool(env['HAWK_PAYLOAD_VALIDATION'], CONFIG_DEFAULTS.payloadValidation),
    timeSkewValidation: parseBool(
      env['HAWK_TIME_SKEW_VALIDATION'],
      CONFIG_DEFAULTS.timeSkewValidation
    ),
    challengeLookupTimeoutMs: parseNumber(env['HAWK_CHALLENGE_LOOKUP_TIMEOUT_MS']),
    serverAuthorizationExt: env['HAWK_SERVER_EXT'],
  });
}

/**
 * Nonce lifetime: the full width of the skew window plus one second.
 */
export function nonceCacheTtlMs(config: HawkServerConfig): number {
  return (2 * config.timeSkewSeconds + 1) * 1000;
}
