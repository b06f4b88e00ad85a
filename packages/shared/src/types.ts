import type {
  AuthorizationLevel,
  CapacityStatus,
  CheckinFailureReason,
  PickupRelationship,
  PickupVerificationOutcome,
} from './enums.js';
import type { CapacitySnapshot, StaffRatioStatus } from './capacity.js';

/**
 * Who is collecting a child: a person on record, or someone known only by name.
 */
export type PickupPerson =
  | { kind: 'KNOWN_PERSON'; personId: string }
  | { kind: 'NAMED_PERSON'; name: string };

export interface PersonSummary {
  id: string;
  fullName: string;
  firstName: string;
  lastName: string;
  nickName: string | null;
  age: number | null;
}

export interface LocationSummary {
  id: string;
  name: string;
}

export interface CheckinRequest {
  personId: string;
  locationId: string;
  scheduleId?: string | null;
  /** YYYY-MM-DD; defaults to today. */
  occurrenceDate?: string;
  generateSecurityCode?: boolean;
  note?: string | null;
}

export interface CheckinSuccess {
  success: true;
  attendanceId: string;
  occurrenceId: string;
  securityCode: string | null;
  checkInTime: Date;
  isFirstTime: boolean;
  person: PersonSummary;
  location: LocationSummary;
  capacity: CapacitySnapshot;
}

/**
 * Where to send an attendee when the requested location is full.
 */
export interface OverflowSuggestion {
  location: LocationSummary;
  capacityStatus: CapacityStatus;
  /** False when the overflow location is full or inactive as well. */
  canAccept: boolean;
}

export interface CheckinFailure {
  success: false;
  reason: CheckinFailureReason;
  message: string;
  /** True when the same request may succeed if retried later. */
  retryable: boolean;
  /** Present on AT_CAPACITY when the location auto-assigns to an overflow location. */
  overflow?: OverflowSuggestion;
}

export type CheckinResult = CheckinSuccess | CheckinFailure;

export interface BatchCheckinResult {
  results: CheckinResult[];
  successCount: number;
  failureCount: number;
  allSucceeded: boolean;
}

export interface CheckinValidation {
  isAllowed: boolean;
  reason?: CheckinFailureReason;
  message?: string;
  overflow?: OverflowSuggestion;
}

export interface AttendanceSummary {
  attendanceId: string;
  occurrenceDate: string;
  person: PersonSummary;
  location: LocationSummary;
  startTime: Date;
  endTime: Date | null;
  securityCode: string | null;
  isFirstTime: boolean;
  note: string | null;
}

export interface LocationCapacity extends CapacitySnapshot, StaffRatioStatus {
  location: LocationSummary;
  isActive: boolean;
  occurrenceDate: string;
  overflowLocation: LocationSummary | null;
  autoAssignOverflow: boolean;
}

export interface CapacitySettings {
  softCapacity: number | null;
  hardCapacity: number | null;
  staffToChildRatio: number | null;
  overflowLocationId: string | null;
  autoAssignOverflow: boolean;
}

export interface PickupVerificationResult {
  outcome: PickupVerificationOutcome;
  isAuthorized: boolean;
  authorizationLevel: AuthorizationLevel | null;
  requiresSupervisorOverride: boolean;
  message: string;
  authorizedPickupId: string | null;
}

export interface AuthorizedPickup {
  id: string;
  childId: string;
  authorizedPersonId: string | null;
  name: string | null;
  phoneNumber: string | null;
  relationship: PickupRelationship;
  authorizationLevel: AuthorizationLevel;
  photoUrl: string | null;
  custodyNotes: string | null;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export interface PickupLogEntry {
  id: string;
  attendanceId: string;
  childId: string;
  pickupPersonId: string | null;
  pickupPersonName: string | null;
  wasAuthorized: boolean;
  authorizedPickupId: string | null;
  supervisorOverride: boolean;
  supervisorPersonId: string | null;
  checkoutTime: Date;
  notes: string | null;
}
