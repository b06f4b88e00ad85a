/**
 * Standing policy for a (child, pickup person) pairing.
 * ALWAYS releases once the security code checks out, EMERGENCY_ONLY needs a
 * supervisor every time, NEVER cannot be overridden.
 */
export enum AuthorizationLevel {
  ALWAYS = 'ALWAYS',
  EMERGENCY_ONLY = 'EMERGENCY_ONLY',
  NEVER = 'NEVER',
}

/**
 * Relationship label shown on an authorized pickup entry.
 */
export enum PickupRelationship {
  PARENT = 'PARENT',
  GRANDPARENT = 'GRANDPARENT',
  SIBLING = 'SIBLING',
  GUARDIAN = 'GUARDIAN',
  AUNT = 'AUNT',
  UNCLE = 'UNCLE',
  FRIEND = 'FRIEND',
  OTHER = 'OTHER',
}

/**
 * Expected (non-exceptional) reasons a check-in is refused.
 */
export enum CheckinFailureReason {
  INVALID_PERSON_ID = 'INVALID_PERSON_ID',
  INVALID_LOCATION_OR_SCHEDULE_ID = 'INVALID_LOCATION_OR_SCHEDULE_ID',
  PERSON_NOT_FOUND = 'PERSON_NOT_FOUND',
  PERSON_DECEASED = 'PERSON_DECEASED',
  PERSON_INACTIVE = 'PERSON_INACTIVE',
  LOCATION_NOT_FOUND = 'LOCATION_NOT_FOUND',
  LOCATION_INACTIVE = 'LOCATION_INACTIVE',
  SCHEDULE_NOT_FOUND = 'SCHEDULE_NOT_FOUND',
  OUTSIDE_SCHEDULE = 'OUTSIDE_SCHEDULE',
  ALREADY_CHECKED_IN = 'ALREADY_CHECKED_IN',
  AT_CAPACITY = 'AT_CAPACITY',
  // Batch only: the location lock could not be acquired in time.
  LOCATION_BUSY = 'LOCATION_BUSY',
}

/**
 * Occupancy band derived from the live count and the location's limits.
 */
export enum CapacityStatus {
  AVAILABLE = 'AVAILABLE',
  NEAR_CAPACITY = 'NEAR_CAPACITY',
  FULL = 'FULL',
}

/**
 * Outcome of a pickup verification.
 */
export enum PickupVerificationOutcome {
  AUTHORIZED = 'AUTHORIZED',
  EMERGENCY_ONLY = 'EMERGENCY_ONLY',
  NOT_ON_LIST = 'NOT_ON_LIST',
  BLOCKED = 'BLOCKED',
  INVALID_SECURITY_CODE = 'INVALID_SECURITY_CODE',
  INVALID_ATTENDANCE = 'INVALID_ATTENDANCE',
  ATTENDANCE_NOT_FOUND = 'ATTENDANCE_NOT_FOUND',
  INVALID_PICKUP_PERSON = 'INVALID_PICKUP_PERSON',
  ALREADY_RELEASED = 'ALREADY_RELEASED',
}
