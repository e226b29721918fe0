/**
 * @hawk-auth/server - Challenge and Server-Authorization tests
 */

import { describe, it, expect } from 'vitest';
import { ErrorCodes, parseAuthorizationHeader, type HawkPrincipal } from '@hawk-auth/core';
import { formatChallenge, toRejection } from '../src/challenge.js';
import { buildServerAuthorizationHeader } from '../src/response.js';

const principal: HawkPrincipal = {
  key: 'werxhqb98rpaxn39848xrunpaw3489ruxnpa98w4rxn',
  algorithm: 'sha256',
};

describe('formatChallenge', () => {
  it('renders the realm alone', () => {
    expect(formatChallenge('api')).toBe('Hawk realm="api"');
  });

  it('renders attributes in a fixed order', () => {
    expect(formatChallenge('api', { error: 'Bad mac', tsm: 'x=', ts: 5 })).toBe(
      'Hawk realm="api", ts="5", tsm="x=", error="Bad mac"'
    );
  });

  it('escapes quotes in the realm', () => {
    expect(formatChallenge('the "api"')).toBe('Hawk realm="the \\"api\\""');
  });
});

describe('toRejection', () => {
  it('maps bewit structure errors to 400', () => {
    expect(toRejection({ code: ErrorCodes.INVALID_BEWIT_STRUCTURE }, 'api', 0)).toEqual({
      httpStatus: 400,
      code: ErrorCodes.INVALID_BEWIT_STRUCTURE,
      message: 'Invalid bewit structure',
      headers: { 'WWW-Authenticate': 'Hawk realm="api", error="Invalid bewit structure"' },
    });
  });

  it('maps an invalid method to 401', () => {
    expect(toRejection({ code: ErrorCodes.INVALID_METHOD }, 'api', 0).httpStatus).toBe(401);
  });

  it('keeps the retrieval cause out of the challenge', () => {
    const rejection = toRejection(
      { code: ErrorCodes.USER_RETRIEVAL, cause: new Error('password=hunter') },
      'api',
      0
    );
    expect(rejection.headers['WWW-Authenticate']).toBe(
      'Hawk realm="api", error="An error occurred while retrieving a hawk user"'
    );
  });

  it('MACs the server time for stale timestamps', () => {
    const rejection = toRejection(
      { code: ErrorCodes.STALE_TIMESTAMP, user: principal },
      'api',
      1353832234
    );
    const params = parseAuthorizationHeader(rejection.headers['WWW-Authenticate']);
    expect(params?.get('ts')).toBe('1353832234');
    expect(params?.get('tsm')).toBe('2mw1eh/qXzl0wJZ/E6XvBhRMEJN7L3j8AyMA8eItEb0=');
  });
});

describe('buildServerAuthorizationHeader', () => {
  const artifacts = {
    method: 'POST',
    host: 'example.com',
    port: 8000,
    uri: '/resource/1?b=1&a=2',
    ts: 1353832234,
    nonce: 'j4h3g2',
    hash: 'Yi9LfIIFRtBEPt74PVmbTF/xVAwPn7ub15ePICfgnuY=',
    ext: 'some-app-ext-data',
  };

  it('replaces the request hash and ext with the response values', () => {
    expect(
      buildServerAuthorizationHeader(principal, artifacts, 'hawk-auth', {
        body: 'Bob',
        contentType: 'text/plain',
      })
    ).toBe(
      'Hawk mac="iJjvQS3HXCy/Yij83mZNjpKS1zHwr3xUIKRSE3pBTRU=", hash="adQztfXWuBrabtDCkK9innCGU4dCILx6ecq+b6JjUbc=", ext="hawk-auth"'
    );
  });

  it('hashes byte bodies', () => {
    expect(
      buildServerAuthorizationHeader(principal, artifacts, 'hawk-auth', {
        body: new TextEncoder().encode('Bob'),
        contentType: 'text/plain; charset=utf-8',
      })
    ).toBe(
      'Hawk mac="iJjvQS3HXCy/Yij83mZNjpKS1zHwr3xUIKRSE3pBTRU=", hash="adQztfXWuBrabtDCkK9innCGU4dCILx6ecq+b6JjUbc=", ext="hawk-auth"'
    );
  });
});
