import { describe, expect, it } from 'vitest';

import { durationMs, loadEnv } from './env';

describe('loadEnv', () => {
  it('applies defaults around the required secret', () => {
    const env = loadEnv({ JWT_SECRET: 'test-secret' });

    expect(env.PORT).toBe(4000);
    expect(env.JWT_ACCESS_EXPIRES).toBe('15m');
    expect(env.JWT_REFRESH_EXPIRES).toBe('7d');
    expect(env.JWT_EMAIL_EXPIRES).toBe('24h');
    expect(env.BCRYPT_ROUNDS).toBe(10);
    expect(env.AUTH_RATE_LIMIT_MAX).toBe(10);
    expect(env.REFRESH_COOKIE_NAME).toBe('rt');
    expect(env.RESEND_API_KEY).toBeUndefined();
    expect(Object.isFrozen(env)).toBe(true);
  });

  it('coerces numeric values from strings', () => {
    const env = loadEnv({ JWT_SECRET: 'test-secret', PORT: '8080', RATE_LIMIT_MAX: '7' });
    expect(env.PORT).toBe(8080);
    expect(env.RATE_LIMIT_MAX).toBe(7);
  });

  it('refuses to start without a signing secret', () => {
    expect(() => loadEnv({})).toThrow(/^Invalid environment: JWT_SECRET/);
  });

  it('rejects unparseable durations', () => {
    expect(() => loadEnv({ JWT_SECRET: 'test-secret', JWT_ACCESS_EXPIRES: 'soon' })).toThrow(
      'Invalid environment: JWT_ACCESS_EXPIRES: Expected a duration of at least one second, such as "15m" or "7d"'
    );
  });

  it('rejects durations under one second', () => {
    expect(() => loadEnv({ JWT_SECRET: 'test-secret', JWT_REFRESH_EXPIRES: '500' })).toThrow(
      'Invalid environment: JWT_REFRESH_EXPIRES: Expected a duration of at least one second, such as "15m" or "7d"'
    );
    expect(loadEnv({ JWT_SECRET: 'test-secret', JWT_ACCESS_EXPIRES: '1s' }).JWT_ACCESS_EXPIRES).toBe('1s');
  });
});

describe('durationMs', () => {
  it('converts ms-style strings', () => {
    expect(durationMs('15m')).toBe(900_000);
    expect(durationMs('7d')).toBe(604_800_000);
  });

  it('throws on garbage', () => {
    expect(() => durationMs('eventually')).toThrow('Invalid duration "eventually"');
  });
});
