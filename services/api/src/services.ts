import type pg from 'pg';
import type { Logger } from 'pino';
import type { AppConfig } from './config/index.js';
import { InProcessLocationLock, type LocationLock } from './capacity/locationLock.js';
import { PgLocationLock } from './capacity/pgLocationLock.js';
import { CapacityService } from './capacity/service.js';
import { PgAttendanceStore } from './checkin/pgAttendanceStore.js';
import { CheckinService } from './checkin/service.js';
import type { AttendanceStore } from './checkin/types.js';
import { PgDirectory } from './directory/pgDirectory.js';
import type { Directory, LocationSettingsStore } from './directory/types.js';
import { PgPickupStore } from './pickup/pgPickupStore.js';
import { PickupAttemptLimiter } from './pickup/rateLimiter.js';
import { PickupService } from './pickup/service.js';
import type { PickupStore } from './pickup/types.js';
import { PickupVerificationGate } from './pickup/verificationGate.js';
import { PgSecurityCodeStore } from './securityCodes/pgSecurityCodeStore.js';
import { SecurityCodeIssuer, type SecurityCodeStore } from './securityCodes/issuer.js';
import type { Clock } from './time/clock.js';

export interface ServiceBackends {
  directory: Directory;
  locationSettings: LocationSettingsStore;
  attendance: AttendanceStore;
  securityCodes: SecurityCodeStore;
  pickups: PickupStore;
  locationLock: LocationLock;
}

export interface AppServices {
  capacity: CapacityService;
  checkin: CheckinService;
  pickups: PickupService;
  pickupVerification: PickupVerificationGate;
  pickupAttempts: PickupAttemptLimiter;
}

export type ServiceSettings = Pick<AppConfig, 'capacity' | 'securityCodes' | 'pickupRateLimit'>;

export function createPgBackends(
  pool: pg.Pool,
  settings: ServiceSettings,
  logger: Logger
): ServiceBackends {
  const directory = new PgDirectory(pool);
  return {
    directory,
    locationSettings: directory,
    attendance: new PgAttendanceStore(pool),
    securityCodes: new PgSecurityCodeStore(pool),
    pickups: new PgPickupStore(pool),
    locationLock:
      settings.capacity.lockMode === 'process'
        ? new InProcessLocationLock(settings.capacity.lockTimeoutMs)
        : new PgLocationLock(pool, settings.capacity.lockTimeoutMs, logger.child({ component: 'location-lock' })),
  };
}

export function createServices(
  backends: ServiceBackends,
  settings: ServiceSettings,
  clock: Clock,
  logger: Logger,
  opts: { randomIndex?: (max: number) => number } = {}
): AppServices {
  const securityCodes = new SecurityCodeIssuer(
    backends.securityCodes,
    logger.child({ component: 'security-codes' }),
    {
      length: settings.securityCodes.length,
      maxAttempts: settings.securityCodes.maxAttempts,
      randomIndex: opts.randomIndex,
    }
  );

  const capacity = new CapacityService({
    directory: backends.directory,
    attendance: backends.attendance,
    locationSettings: backends.locationSettings,
    clock,
    logger: logger.child({ component: 'capacity' }),
    capacityWarningPercent: settings.capacity.warningPercent,
  });

  const checkin = new CheckinService({
    directory: backends.directory,
    attendance: backends.attendance,
    locationLock: backends.locationLock,
    capacity,
    securityCodes,
    clock,
    logger: logger.child({ component: 'checkin' }),
    capacityWarningPercent: settings.capacity.warningPercent,
  });

  const pickups = new PickupService({
    directory: backends.directory,
    attendance: backends.attendance,
    pickups: backends.pickups,
    clock,
    logger: logger.child({ component: 'pickup' }),
  });

  const pickupAttempts = new PickupAttemptLimiter(
    {
      maxAttempts: settings.pickupRateLimit.maxAttempts,
      windowMinutes: settings.pickupRateLimit.windowMinutes,
    },
    clock,
    logger.child({ component: 'pickup-rate-limit' })
  );

  return {
    capacity,
    checkin,
    pickups,
    pickupVerification: new PickupVerificationGate(pickupAttempts, pickups),
    pickupAttempts,
  };
}
