// ============================================================
// CORS Lockdown Tests
//
// Verifies:
//  1. Dev mode: localhost origins are allowed
//  2. Dev mode: CORS_ORIGIN origins are allowed
//  3. Dev mode: non-localhost, non-listed origins are blocked
//  4. Strict mode: allowlisted origins pass, others are blocked
//  5. Both modes: missing origin (server-to-server) is allowed
//  6. fastifyCorsOrigin callback + getCorsOptions shape
// ============================================================

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// vi.hoisted runs before vi.mock hoisting, so mockEnv is available in the factory.
const mockEnv = vi.hoisted(() => ({
  NODE_ENV: 'development',
  CORS_ORIGIN: 'http://localhost:5173',
}));

vi.mock('../src/config/env.js', () => ({
  env: mockEnv,
}));

import {
  isStrictCors,
  validateOrigin,
  fastifyCorsOrigin,
  getCorsOptions,
  logCorsPolicy,
} from '../src/config/cors.js';

function callbackResult(origin: string | undefined): Promise<boolean> {
  return new Promise((resolve, reject) => {
    fastifyCorsOrigin(origin, (err, allow) => {
      if (err) return reject(err);
      resolve(allow);
    });
  });
}

function setStrictMode(corsOrigin: string) {
  mockEnv.NODE_ENV = 'production';
  mockEnv.CORS_ORIGIN = corsOrigin;
}

describe('CORS lockdown', () => {
  beforeEach(() => {
    mockEnv.NODE_ENV = 'development';
    mockEnv.CORS_ORIGIN = 'http://localhost:5173';
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('isStrictCors()', () => {
    it('is false outside production', () => {
      expect(isStrictCors()).toBe(false);
      mockEnv.NODE_ENV = 'test';
      expect(isStrictCors()).toBe(false);
    });

    it('is true when NODE_ENV=production', () => {
      mockEnv.NODE_ENV = 'production';
      expect(isStrictCors()).toBe(true);
    });
  });

  describe('dev mode (permissive)', () => {
    it.each([
      'http://localhost:5173',
      'http://localhost:3000',
      'https://localhost:8443',
      'http://127.0.0.1:5173',
      'http://[::1]:5173',
    ])('allows %s', (origin) => {
      expect(validateOrigin(origin)).toBe(true);
    });

    it('allows a CORS_ORIGIN value', () => {
      mockEnv.CORS_ORIGIN = 'https://booking.example.com';
      expect(validateOrigin('https://booking.example.com')).toBe(true);
    });

    it('blocks a non-localhost, unlisted origin', () => {
      expect(validateOrigin('https://evil.example.net')).toBe(false);
    });

    it('blocks a malformed origin', () => {
      expect(validateOrigin('not-a-url')).toBe(false);
    });

    it('allows a missing origin', () => {
      expect(validateOrigin(undefined)).toBe(true);
    });
  });

  describe('strict mode (NODE_ENV=production)', () => {
    beforeEach(() => {
      setStrictMode('https://booking.example.com, https://admin.example.com ');
    });

    it('allows listed origins, trimming whitespace', () => {
      expect(validateOrigin('https://booking.example.com')).toBe(true);
      expect(validateOrigin('https://admin.example.com')).toBe(true);
    });

    it('blocks unlisted origins and localhost', () => {
      expect(validateOrigin('https://evil.example.net')).toBe(false);
      expect(validateOrigin('http://localhost:5173')).toBe(false);
    });

    it('allows a missing origin', () => {
      expect(validateOrigin(undefined)).toBe(true);
    });

    it('blocks everything when no origins are configured', () => {
      setStrictMode('');
      expect(validateOrigin('https://booking.example.com')).toBe(false);
    });
  });

  describe('fastifyCorsOrigin()', () => {
    it('calls back with the validation result', async () => {
      expect(await callbackResult('http://localhost:5173')).toBe(true);
      expect(await callbackResult('https://evil.example.net')).toBe(false);
      expect(await callbackResult(undefined)).toBe(true);
    });
  });

  describe('getCorsOptions()', () => {
    it('uses the origin callback and the engine methods', () => {
      const opts = getCorsOptions();
      expect(opts.origin).toBe(fastifyCorsOrigin);
      expect(opts.methods).toEqual(['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS']);
    });
  });

  describe('logCorsPolicy()', () => {
    it('logs the dev policy', () => {
      const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
      logCorsPolicy();
      expect(spy).toHaveBeenCalledWith('[cors] DEV mode: localhost origins + CORS_ORIGIN allowed');
    });

    it('warns when strict mode has no origins', () => {
      setStrictMode('');
      vi.spyOn(console, 'log').mockImplementation(() => {});
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
      logCorsPolicy();
      expect(warn).toHaveBeenCalledWith(
        '[cors] CORS_ORIGIN is empty; all cross-origin browser requests will be rejected.',
      );
    });
  });
});
