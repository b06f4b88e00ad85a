// Enums
export {
  AuthorizationLevel,
  PickupRelationship,
  CheckinFailureReason,
  CapacityStatus,
  PickupVerificationOutcome,
} from './enums.js';

// Capacity helpers
export {
  DEFAULT_CAPACITY_WARNING_PERCENT,
  computeCapacitySnapshot,
  computeStaffRatio,
  getWarningThreshold,
  isAtCapacity,
  type CapacityLimits,
  type CapacitySnapshot,
  type StaffRatioStatus,
} from './capacity.js';

// Pickup policy
export {
  evaluatePickupPolicy,
  canOverride,
  countsAsFailedAttempt,
  describePickupDecision,
  type PickupPolicyDecision,
} from './pickupPolicy.js';

// Security codes
export {
  SECURITY_CODE_ALPHABET,
  SECURITY_CODE_LENGTH,
  normalizeSecurityCode,
  isWellFormedSecurityCode,
  securityCodeKeyspaceSize,
} from './securityCode.js';

// Types
export type {
  PickupPerson,
  PersonSummary,
  LocationSummary,
  CheckinRequest,
  CheckinSuccess,
  CheckinFailure,
  CheckinResult,
  BatchCheckinResult,
  CheckinValidation,
  AttendanceSummary,
  LocationCapacity,
  CapacitySettings,
  OverflowSuggestion,
  PickupVerificationResult,
  AuthorizedPickup,
  PickupLogEntry,
} from './types.js';

// Zod schemas
export {
  UuidSchema,
  isUuid,
  IsoDateSchema,
  E164_PHONE_PATTERN,
  AuthorizationLevelSchema,
  PickupRelationshipSchema,
  PickupPersonSchema,
  CheckinRequestSchema,
  BatchCheckinRequestSchema,
  ValidateCheckinRequestSchema,
  VerifyPickupRequestSchema,
  RecordPickupRequestSchema,
  CreateAuthorizedPickupSchema,
  UpdateAuthorizedPickupSchema,
  AttendanceHistoryQuerySchema,
  LocationCapacityQuerySchema,
  PickupHistoryQuerySchema,
  UpdateCapacitySettingsSchema,
  MultiLocationCapacityRequestSchema,
  type CheckinRequestInput,
  type BatchCheckinRequestInput,
  type ValidateCheckinRequestInput,
  type VerifyPickupRequestInput,
  type RecordPickupRequestInput,
  type CreateAuthorizedPickupInput,
  type UpdateAuthorizedPickupInput,
  type PickupHistoryQuery,
  type UpdateCapacitySettingsInput,
  type MultiLocationCapacityRequest,
} from './schemas.js';
