/**
 * @hawk-auth/client - Bewit generation tests
 */

import { describe, it, expect } from 'vitest';
import { decodeBewit, type HawkCredentials } from '@hawk-auth/core';
import { createBewitUrl, getBewit } from '../src/bewit.js';
import { HawkClientError } from '../src/errors.js';

const credentials: HawkCredentials = {
  id: 'dh37fgj492je',
  key: 'werxhqb98rpaxn39848xrunpaw3489ruxnpa98w4rxn',
  algorithm: 'sha256',
};

const TOKEN =
  'ZGgzN2ZnajQ5MmplXDEzNTM4MzYyMzRcVFlIeUE2YnVTL2pKUGMxQkk5MFowTUZMbjJWS1gyNTBaZmNrQkZydzA5TT1cYXBwLWRhdGE=';

const options = { ttlSec: 4000, ext: 'app-data', timestamp: 1353832234 };

describe('getBewit', () => {
  it('produces the expected token', () => {
    expect(getBewit(credentials, 'http://example.com:8000/resource/1?b=1&a=2', options)).toBe(
      TOKEN
    );
  });

  it('sets the expiry to now plus the TTL', () => {
    const result = decodeBewit(getBewit(credentials, 'https://example.com/a', options));
    expect(result.ok && result.attributes.exp).toBe(1353836234);
  });

  it('rejects an empty ext', () => {
    expect(() =>
      getBewit(credentials, 'https://example.com/a', { ...options, ext: ' ' })
    ).toThrow(HawkClientError);
  });

  it('rejects a non-positive TTL', () => {
    expect(() => getBewit(credentials, 'https://example.com/a', { ...options, ttlSec: 0 })).toThrow(
      'Invalid bewit ttlSec: 0'
    );
  });
});

describe('createBewitUrl', () => {
  it('appends the encoded token after existing parameters', () => {
    expect(
      createBewitUrl(credentials, 'http://example.com:8000/resource/1?b=1&a=2', options)
    ).toBe(`http://example.com:8000/resource/1?b=1&a=2&bewit=${encodeURIComponent(TOKEN)}`);
  });

  it('starts a query when there is none', () => {
    const url = createBewitUrl(credentials, 'https://example.com/a', options);
    expect(url.startsWith('https://example.com/a?bewit=')).toBe(true);
  });
});
