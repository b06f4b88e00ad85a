import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../src/config/index.js';
import { parseDotEnv } from '../src/env/loadEnv.js';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3001,
      host: '0.0.0.0',
      logLevel: 'info',
      kioskToken: null,
      timeZone: 'UTC',
      capacity: { lockMode: 'database', lockTimeoutMs: 5000, warningPercent: 80 },
      securityCodes: { length: 4, maxAttempts: 10 },
      pickupRateLimit: { maxAttempts: 5, windowMinutes: 15, pruneIntervalMs: 60_000 },
    });
  });

  it('reads and coerces overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      KIOSK_TOKEN: 'test-kiosk-token',
      TIME_ZONE: 'America/Chicago',
      CAPACITY_LOCK_MODE: 'process',
      CAPACITY_WARNING_PERCENT: '75',
      SECURITY_CODE_LENGTH: '6',
      PICKUP_RATE_LIMIT_MAX_ATTEMPTS: '3',
    });

    expect(config.port).toBe(8080);
    expect(config.kioskToken).toBe('test-kiosk-token');
    expect(config.timeZone).toBe('America/Chicago');
    expect(config.capacity).toEqual({ lockMode: 'process', lockTimeoutMs: 5000, warningPercent: 75 });
    expect(config.securityCodes.length).toBe(6);
    expect(config.pickupRateLimit.maxAttempts).toBe(3);
  });

  it('names the offending variable', () => {
    expect(() => loadConfig({ TIME_ZONE: 'Mars/Olympus_Mons' })).toThrow(
      'Invalid configuration: TIME_ZONE: Unknown IANA time zone'
    );
    expect(() => loadConfig({ CAPACITY_LOCK_MODE: 'redis' })).toThrow(/CAPACITY_LOCK_MODE/);
    expect(() => loadConfig({ SECURITY_CODE_LENGTH: '2' })).toThrow(ConfigError);
  });
});

describe('parseDotEnv', () => {
  it('parses assignments, quotes, comments and export prefixes', () => {
    const raw = [
      '# local settings',
      'PORT=4000',
      'export KIOSK_TOKEN="test-kiosk-token"',
      "TIME_ZONE='Europe/Lisbon'",
      '',
      'NOT_AN_ASSIGNMENT',
    ].join('\n');

    expect(parseDotEnv(raw)).toEqual({
      PORT: '4000',
      KIOSK_TOKEN: 'test-kiosk-token',
      TIME_ZONE: 'Europe/Lisbon',
    });
  });
});
