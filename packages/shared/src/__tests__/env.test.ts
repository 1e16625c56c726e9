import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getEnv, loadEnv, resetEnvCacheForTesting } from '../env.js';

const touchedKeys = ['TIMEZONE', 'LOG_LEVEL'] as const;
const saved: Partial<Record<(typeof touchedKeys)[number], string | undefined>> = {};

beforeEach(() => {
  resetEnvCacheForTesting();
  for (const key of touchedKeys) {
    saved[key] = process.env[key];
    delete process.env[key];
  }
});

afterEach(() => {
  resetEnvCacheForTesting();
  for (const key of touchedKeys) {
    const value = saved[key];
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
});

describe('env', () => {
  it('applies defaults when optional variables are absent', () => {
    const env = loadEnv({ path: '/nonexistent/.env' });
    expect(env.TIMEZONE).toBe('UTC');
    expect(env.LOG_LEVEL).toBeUndefined();
  });

  it('caches the first parsed result', () => {
    process.env.TIMEZONE = 'Europe/Berlin';
    const first = loadEnv({ path: '/nonexistent/.env' });
    process.env.TIMEZONE = 'Asia/Tokyo';
    expect(loadEnv({ path: '/nonexistent/.env' })).toBe(first);
    expect(getEnv().TIMEZONE).toBe('Europe/Berlin');
  });

  it('throws when a variable fails validation', () => {
    process.env.LOG_LEVEL = 'verbose';
    expect(() => loadEnv({ path: '/nonexistent/.env' })).toThrow(/Invalid environment configuration: LOG_LEVEL/);
  });

  it('refuses getEnv before loadEnv', () => {
    expect(() => getEnv()).toThrow('Environment not loaded');
  });
});
