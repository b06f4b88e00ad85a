import { z } from 'zod';
import { DEFAULT_CAPACITY_WARNING_PERCENT, SECURITY_CODE_LENGTH } from '@roomsafe/shared';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  PORT: positiveInt(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  KIOSK_TOKEN: z.string().min(1).optional(),
  TIME_ZONE: z
    .string()
    .default('UTC')
    .refine(
      (value) => {
        try {
          new Intl.DateTimeFormat('en-US', { timeZone: value });
          return true;
        } catch {
          return false;
        }
      },
      { message: 'Unknown IANA time zone' }
    ),
  CAPACITY_LOCK_MODE: z.enum(['database', 'process']).default('database'),
  CAPACITY_LOCK_TIMEOUT_MS: positiveInt(5000),
  CAPACITY_WARNING_PERCENT: z.coerce
    .number()
    .int()
    .min(1)
    .max(100)
    .default(DEFAULT_CAPACITY_WARNING_PERCENT),
  SECURITY_CODE_LENGTH: z.coerce.number().int().min(3).max(8).default(SECURITY_CODE_LENGTH),
  SECURITY_CODE_MAX_ATTEMPTS: positiveInt(10),
  PICKUP_RATE_LIMIT_MAX_ATTEMPTS: positiveInt(5),
  PICKUP_RATE_LIMIT_WINDOW_MINUTES: positiveInt(15),
  RATE_LIMIT_PRUNE_INTERVAL_MS: positiveInt(60_000),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  kioskToken: string | null;
  timeZone: string;
  capacity: {
    lockMode: 'database' | 'process';
    lockTimeoutMs: number;
    warningPercent: number;
  };
  securityCodes: {
    length: number;
    maxAttempts: number;
  };
  pickupRateLimit: {
    maxAttempts: number;
    windowMinutes: number;
    pruneIntervalMs: number;
  };
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Validates the process environment. Throws a ConfigError naming every bad variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    logLevel: e.LOG_LEVEL,
    kioskToken: e.KIOSK_TOKEN ?? null,
    timeZone: e.TIME_ZONE,
    capacity: {
      lockMode: e.CAPACITY_LOCK_MODE,
      lockTimeoutMs: e.CAPACITY_LOCK_TIMEOUT_MS,
      warningPercent: e.CAPACITY_WARNING_PERCENT,
    },
    securityCodes: {
      length: e.SECURITY_CODE_LENGTH,
      maxAttempts: e.SECURITY_CODE_MAX_ATTEMPTS,
    },
    pickupRateLimit: {
      maxAttempts: e.PICKUP_RATE_LIMIT_MAX_ATTEMPTS,
      windowMinutes: e.PICKUP_RATE_LIMIT_WINDOW_MINUTES,
      pruneIntervalMs: e.RATE_LIMIT_PRUNE_INTERVAL_MS,
    },
  };
}
