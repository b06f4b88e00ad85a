import { AuthorizationLevel, PickupVerificationOutcome } from './enums.js';

export interface PickupPolicyDecision {
  outcome: PickupVerificationOutcome;
  isAuthorized: boolean;
  requiresSupervisorOverride: boolean;
}

/**
 * Applies the standing-authorization policy once identity and security code
 * have been checked. `null` means no active authorization is on file.
 *
 * - ALWAYS: released without staff involvement
 * - EMERGENCY_ONLY: never automatic; a supervisor must override
 * - NEVER: hard block, an override cannot release
 * - not on the list: soft denial, a supervisor may override
 */
export function evaluatePickupPolicy(level: AuthorizationLevel | null): PickupPolicyDecision {
  switch (level) {
    case AuthorizationLevel.ALWAYS:
      return {
        outcome: PickupVerificationOutcome.AUTHORIZED,
        isAuthorized: true,
        requiresSupervisorOverride: false,
      };
    case AuthorizationLevel.EMERGENCY_ONLY:
      return {
        outcome: PickupVerificationOutcome.EMERGENCY_ONLY,
        isAuthorized: false,
        requiresSupervisorOverride: true,
      };
    case AuthorizationLevel.NEVER:
      return {
        outcome: PickupVerificationOutcome.BLOCKED,
        isAuthorized: false,
        requiresSupervisorOverride: false,
      };
    case null:
      return {
        outcome: PickupVerificationOutcome.NOT_ON_LIST,
        isAuthorized: false,
        requiresSupervisorOverride: true,
      };
  }
}

/**
 * Whether a supervisor override can turn this outcome into a release.
 */
export function canOverride(outcome: PickupVerificationOutcome): boolean {
  return (
    outcome === PickupVerificationOutcome.NOT_ON_LIST ||
    outcome === PickupVerificationOutcome.EMERGENCY_ONLY ||
    outcome === PickupVerificationOutcome.INVALID_PICKUP_PERSON
  );
}

/**
 * Outcomes that count against the verification rate limit. Outcomes that a
 * supervisor can resolve are not failures of the presenter.
 */
export function countsAsFailedAttempt(outcome: PickupVerificationOutcome): boolean {
  return outcome !== PickupVerificationOutcome.AUTHORIZED && !canOverride(outcome);
}

export function describePickupDecision(
  outcome: PickupVerificationOutcome,
  names: { pickupPersonName: string; childName: string }
): string {
  switch (outcome) {
    case PickupVerificationOutcome.AUTHORIZED:
      return `${names.pickupPersonName} is authorized to pick up ${names.childName}.`;
    case PickupVerificationOutcome.EMERGENCY_ONLY:
      return 'Emergency-only authorization. Supervisor approval required.';
    case PickupVerificationOutcome.NOT_ON_LIST:
      return 'Person not on authorized pickup list. Supervisor approval required.';
    case PickupVerificationOutcome.BLOCKED:
      return 'This person is blocked from picking up this child.';
    case PickupVerificationOutcome.INVALID_SECURITY_CODE:
      return 'Invalid security code';
    case PickupVerificationOutcome.INVALID_ATTENDANCE:
      return 'Invalid attendance record';
    case PickupVerificationOutcome.ATTENDANCE_NOT_FOUND:
      return 'Attendance record not found';
    case PickupVerificationOutcome.INVALID_PICKUP_PERSON:
      return 'Invalid pickup person. Supervisor approval required.';
    case PickupVerificationOutcome.ALREADY_RELEASED:
      return 'This child has already been picked up.';
  }
}
