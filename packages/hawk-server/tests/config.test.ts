/**
 * @hawk-auth/server - Configuration tests
 */

import { describe, it, expect } from 'vitest';
import {
  CONFIG_DEFAULTS,
  ConfigError,
  nonceCacheTtlMs,
  parseBool,
  parseConfigFromEnv,
  resolveConfig,
} from '../src/config.js';

describe('resolveConfig', () => {
  it('applies defaults', () => {
    expect(resolveConfig()).toEqual({
      nonceCache: { maxEntries: 10000 },
      timeSkewSeconds: 60,
      payloadValidation: true,
      timeSkewValidation: true,
      challengeLookupTimeoutMs: 5000,
      serverAuthorizationExt: 'hawk-auth',
    });
  });

  it('keeps supplied values', () => {
    const config = resolveConfig({ timeSkewSeconds: 30, payloadValidation: false });
    expect(config.timeSkewSeconds).toBe(30);
    expect(config.payloadValidation).toBe(false);
    expect(config.timeSkewValidation).toBe(CONFIG_DEFAULTS.timeSkewValidation);
  });

  it('rejects unknown options', () => {
    const input = { timeSkewSeconds: 30, nonceLength: 8 };
    expect(() => resolveConfig(input)).toThrow(ConfigError);
  });

  it('returns a frozen object', () => {
    const config = resolveConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.nonceCache)).toBe(true);
  });

  it('reports every invalid field', () => {
    try {
      resolveConfig({ timeSkewSeconds: -1, nonceCache: { maxEntries: 0 } });
      expect.unreachable('resolveConfig should throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.errors.map((e) => e.field).sort()).toEqual([
          'nonceCache.maxEntries',
          'timeSkewSeconds',
        ]);
        expect(err.message).toMatch(/^Invalid hawk configuration: /);
      }
    }
  });
});

describe('parseBool', () => {
  it('recognizes "true" and "1"', () => {
    expect(parseBool('true', false)).toBe(true);
    expect(parseBool('TRUE', false)).toBe(true);
    expect(parseBool('1', false)).toBe(true);
  });

  it('treats anything else as false', () => {
    expect(parseBool('yes', true)).toBe(false);
    expect(parseBool('0', true)).toBe(false);
  });

  it('uses the default when absent', () => {
    expect(parseBool(undefined, true)).toBe(true);
    expect(parseBool('', false)).toBe(false);
  });
});

describe('parseConfigFromEnv', () => {
  it('uses defaults for an empty environment', () => {
    expect(parseConfigFromEnv({})).toEqual(resolveConfig());
  });

  it('reads every variable', () => {
    const config = parseConfigFromEnv({
      HAWK_NONCE_CACHE_MAX_ENTRIES: '500',
      HAWK_TIME_SKEW_SECONDS: '30',
      HAWK_PAYLOAD_VALIDATION: 'false',
      HAWK_TIME_SKEW_VALIDATION: '0',
      HAWK_CHALLENGE_LOOKUP_TIMEOUT_MS: '250',
      HAWK_SERVER_EXT: 'api-v2',
    });

    expect(config).toEqual({
      nonceCache: { maxEntries: 500 },
      timeSkewSeconds: 30,
      payloadValidation: false,
      timeSkewValidation: false,
      challengeLookupTimeoutMs: 250,
      serverAuthorizationExt: 'api-v2',
    });
  });

  it('ignores unrelated variables', () => {
    expect(parseConfigFromEnv({ HAWK_NONCE_LENGTH: '16', PATH: '/usr/bin' })).toEqual(
      resolveConfig()
    );
  });

  it('rejects non-numeric values', () => {
    expect(() => parseConfigFromEnv({ HAWK_TIME_SKEW_SECONDS: 'soon' })).toThrow(ConfigError);
  });
});

describe('nonceCacheTtlMs', () => {
  it('covers both sides of the skew window plus one second', () => {
    expect(nonceCacheTtlMs(resolveConfig({ timeSkewSeconds: 60 }))).toBe(121_000);
  });
});
