/**
 * @hawk-auth/core - Canonical string and MAC tests
 */

import { describe, it, expect } from 'vitest';
import { normalizeString, normalizeTimestamp, artifactsToOptions } from '../src/normalize.js';
import {
  calculateMac,
  calculateTimestampMac,
  computeMac,
  fixedTimeEqual,
} from '../src/mac.js';
import type { HawkOptions, HawkPrincipal } from '../src/types.js';

const principal: HawkPrincipal = {
  key: 'werxhqb98rpaxn39848xrunpaw3489ruxnpa98w4rxn',
  algorithm: 'sha256',
};

const getOptions: HawkOptions = {
  method: 'GET',
  uri: '/resource/1?b=1&a=2',
  host: 'example.com',
  port: '8000',
  ts: '1353832234',
  nonce: 'j4h3g2',
  ext: 'some-app-ext-data',
};

describe('normalizeString', () => {
  it('renders every field on its own line with a trailing newline', () => {
    expect(normalizeString('header', getOptions)).toBe(
      'hawk.1.header\n1353832234\nj4h3g2\nGET\n/resource/1?b=1&a=2\nexample.com\n8000\n\nsome-app-ext-data\n'
    );
  });

  it('renders missing fields as empty lines', () => {
    expect(normalizeString('response', {})).toBe('hawk.1.response\n\n\n\n\n\n\n\n\n');
  });

  it('appends app and dlg only when both are present', () => {
    const withBoth = normalizeString('header', { ...getOptions, app: 'my-app', dlg: 'my-dlg' });
    expect(withBoth.endsWith('some-app-ext-data\nmy-app\nmy-dlg\n')).toBe(true);

    const appOnly = normalizeString('header', { ...getOptions, app: 'my-app' });
    expect(appOnly).toBe(normalizeString('header', getOptions));
  });
});

describe('normalizeTimestamp', () => {
  it('builds the time-sync string', () => {
    expect(normalizeTimestamp(1353832234)).toBe('hawk.1.ts\n1353832234\n');
  });
});

describe('artifactsToOptions', () => {
  it('stringifies port and timestamp', () => {
    const options = artifactsToOptions({
      method: 'GET',
      host: 'example.com',
      port: 8000,
      uri: '/',
      ts: 1353832234,
      nonce: 'abc123',
    });
    expect(options.port).toBe('8000');
    expect(options.ts).toBe('1353832234');
    expect(options.hash).toBeUndefined();
  });
});

describe('calculateMac', () => {
  it('matches the sha256 header vector', () => {
    expect(calculateMac(principal, 'header', getOptions)).toBe(
      '6R4rV5iE+NPoym+WwjeHzjAGXUtLNIxmo1vpMofpLAE='
    );
  });

  it('matches the sha1 header vector', () => {
    expect(calculateMac({ ...principal, algorithm: 'sha1' }, 'header', getOptions)).toBe(
      'KqOejc9yo2NAQlM29iSeYQEzwmE='
    );
  });

  it('matches the sha256 vector with a payload hash', () => {
    const options: HawkOptions = {
      ...getOptions,
      method: 'POST',
      hash: 'Yi9LfIIFRtBEPt74PVmbTF/xVAwPn7ub15ePICfgnuY=',
    };
    expect(calculateMac(principal, 'header', options)).toBe(
      'aSe1DERmZuRl3pI36/9BdZmnErTw3sNzOOAUlfeKjVw='
    );
  });

  it('binds app and dlg into the MAC', () => {
    expect(
      calculateMac(principal, 'header', { ...getOptions, app: 'my-app', dlg: 'my-dlg' })
    ).toBe('imCuweCaxAT1gR3oF3pLPtcNpNgNByz8tbMtaysk5iY=');
  });

  it('matches the bewit vector', () => {
    const options: HawkOptions = {
      method: 'GET',
      uri: '/resource/1?b=1&a=2',
      host: 'example.com',
      port: '8000',
      ts: '1353836234',
      nonce: '',
      ext: 'app-data',
    };
    expect(calculateMac(principal, 'bewit', options)).toBe(
      'TYHyA6buS/jJPc1BI90Z0MFLn2VKX250ZfckBFrw09M='
    );
  });

  it('equals computeMac over the canonical string', () => {
    expect(computeMac(principal, normalizeString('header', getOptions))).toBe(
      calculateMac(principal, 'header', getOptions)
    );
  });
});

describe('calculateTimestampMac', () => {
  it('matches the tsm vector', () => {
    expect(calculateTimestampMac(principal, 1353832234)).toBe(
      '2mw1eh/qXzl0wJZ/E6XvBhRMEJN7L3j8AyMA8eItEb0='
    );
  });
});

describe('fixedTimeEqual', () => {
  it('accepts equal strings', () => {
    expect(fixedTimeEqual('abc=', 'abc=')).toBe(true);
  });

  it('rejects different strings of the same length', () => {
    expect(fixedTimeEqual('abc=', 'abd=')).toBe(false);
  });

  it('rejects strings of different length', () => {
    expect(fixedTimeEqual('abc=', 'abc')).toBe(false);
    expect(fixedTimeEqual('', 'a')).toBe(false);
  });
});
