import { describe, expect, it } from 'vitest';

import {
  getAllowedOrigins,
  isLocalhostOrigin,
  isOriginAllowed,
} from '@/infra/plugins/cors.js';

import { makeTestConfig } from '../../fixtures/builders.js';

describe('getAllowedOrigins', () => {
  it('combines the origin list and the client URL', () => {
    const config = makeTestConfig({
      cors: {
        allowedOrigins: ' https://a.example, ,https://b.example ',
        clientBaseUrl: 'https://app.example',
      },
    });

    expect([...getAllowedOrigins(config)]).toEqual([
      'https://a.example',
      'https://b.example',
      'https://app.example',
    ]);
  });

  it('is empty when nothing is configured', () => {
    expect(getAllowedOrigins(makeTestConfig()).size).toBe(0);
  });
});

describe('isLocalhostOrigin', () => {
  it('accepts loopback hosts on any port', () => {
    expect(isLocalhostOrigin('http://localhost:5173')).toBe(true);
    expect(isLocalhostOrigin('https://127.0.0.1')).toBe(true);
    expect(isLocalhostOrigin('http://[::1]:3000')).toBe(true);
  });

  it('rejects look-alike hosts, other schemes and garbage', () => {
    expect(isLocalhostOrigin('http://localhost.attacker.example')).toBe(false);
    expect(isLocalhostOrigin('ftp://localhost')).toBe(false);
    expect(isLocalhostOrigin('not a url')).toBe(false);
  });
});

describe('isOriginAllowed', () => {
  const allowed = new Set(['https://app.example']);

  it('allows requests without an origin', () => {
    expect(isOriginAllowed(undefined, allowed, false)).toBe(true);
  });

  it('allows listed origins in every environment', () => {
    expect(isOriginAllowed('https://app.example', allowed, false)).toBe(true);
  });

  it('allows localhost only in development', () => {
    expect(isOriginAllowed('http://localhost:5173', allowed, true)).toBe(true);
    expect(isOriginAllowed('http://localhost:5173', allowed, false)).toBe(false);
  });

  it('rejects other origins', () => {
    expect(isOriginAllowed('https://evil.example', allowed, true)).toBe(false);
  });
});
