// ============================================================
// Environment Validation Tests
//
// config/env.ts parses process.env at import time and exits on
// failure, so each case re-imports it after vi.resetModules().
// ============================================================

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

describe('env', () => {
  const savedTimezone = process.env.DEFAULT_TIMEZONE;

  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    if (savedTimezone === undefined) delete process.env.DEFAULT_TIMEZONE;
    else process.env.DEFAULT_TIMEZONE = savedTimezone;
    vi.restoreAllMocks();
  });

  it('accepts a known DEFAULT_TIMEZONE', async () => {
    process.env.DEFAULT_TIMEZONE = 'Europe/Berlin';
    const { env } = await import('../src/config/env.js');
    expect(env.DEFAULT_TIMEZONE).toBe('Europe/Berlin');
  });

  it('exits on an unknown DEFAULT_TIMEZONE', async () => {
    process.env.DEFAULT_TIMEZONE = 'Mars/Olympus_Mons';
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });

    await expect(import('../src/config/env.js')).rejects.toThrow('process.exit called');
    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(errorSpy).toHaveBeenCalledWith('❌ Invalid environment variables:');
  });
});
