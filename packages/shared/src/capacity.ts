import { CapacityStatus } from './enums.js';

export interface CapacityLimits {
  softCapacity: number | null;
  hardCapacity: number | null;
}

export interface CapacitySnapshot {
  currentCount: number;
  softCapacity: number | null;
  hardCapacity: number | null;
  /** Count at which the location reports NEAR_CAPACITY, null when unlimited. */
  warningThreshold: number | null;
  capacityStatus: CapacityStatus;
  percentageFull: number;
}

export const DEFAULT_CAPACITY_WARNING_PERCENT = 80;

/**
 * Soft capacity wins when configured; otherwise the warning band starts at a
 * percentage of the hard limit.
 */
export function getWarningThreshold(
  limits: CapacityLimits,
  warningPercent: number = DEFAULT_CAPACITY_WARNING_PERCENT
): number | null {
  if (limits.softCapacity !== null) return limits.softCapacity;
  if (limits.hardCapacity === null) return null;
  return Math.ceil((limits.hardCapacity * warningPercent) / 100);
}

/**
 * Returns true when one more occupant would exceed the hard limit.
 * Unconfigured capacity is unlimited.
 */
export function isAtCapacity(limits: CapacityLimits, currentCount: number): boolean {
  return limits.hardCapacity !== null && currentCount >= limits.hardCapacity;
}

export function computeCapacitySnapshot(
  limits: CapacityLimits,
  currentCount: number,
  warningPercent: number = DEFAULT_CAPACITY_WARNING_PERCENT
): CapacitySnapshot {
  const warningThreshold = getWarningThreshold(limits, warningPercent);

  let capacityStatus = CapacityStatus.AVAILABLE;
  if (isAtCapacity(limits, currentCount)) {
    capacityStatus = CapacityStatus.FULL;
  } else if (warningThreshold !== null && currentCount >= warningThreshold) {
    capacityStatus = CapacityStatus.NEAR_CAPACITY;
  }

  const limit = limits.hardCapacity ?? limits.softCapacity;
  const percentageFull = limit && limit > 0 ? Math.round((currentCount / limit) * 100) : 0;

  return {
    currentCount,
    softCapacity: limits.softCapacity,
    hardCapacity: limits.hardCapacity,
    warningThreshold,
    capacityStatus,
    percentageFull,
  };
}

export interface StaffRatioStatus {
  /** Children per staff member; null when no ratio is configured. */
  staffToChildRatio: number | null;
  currentStaffCount: number;
  /** Null without a ratio or without children present. */
  requiredStaffCount: number | null;
  meetsStaffRatio: boolean;
}

/**
 * Staff on duty are part of the occupancy but are not counted as children.
 */
export function computeStaffRatio(
  staffToChildRatio: number | null,
  occupantCount: number,
  staffCount: number
): StaffRatioStatus {
  const childCount = Math.max(0, occupantCount - staffCount);
  if (staffToChildRatio === null || staffToChildRatio <= 0 || childCount === 0) {
    return {
      staffToChildRatio,
      currentStaffCount: staffCount,
      requiredStaffCount: null,
      meetsStaffRatio: true,
    };
  }

  const requiredStaffCount = Math.ceil(childCount / staffToChildRatio);
  return {
    staffToChildRatio,
    currentStaffCount: staffCount,
    requiredStaffCount,
    meetsStaffRatio: staffCount >= requiredStaffCount,
  };
}
