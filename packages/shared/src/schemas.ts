import { z } from 'zod';
import { AuthorizationLevel, PickupRelationship } from './enums.js';

export const UuidSchema = z.string().uuid();

export function isUuid(value: string): boolean {
  return UuidSchema.safeParse(value).success;
}

/**
 * Calendar date as YYYY-MM-DD that round-trips through Date (rejects 2024-02-30).
 */
export const IsoDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date formatted as YYYY-MM-DD')
  .refine(
    (value) => {
      const parsed = new Date(`${value}T00:00:00.000Z`);
      return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
    },
    { message: 'Invalid calendar date' }
  );

export const E164_PHONE_PATTERN = /^\+[1-9]\d{1,14}$/;

export const AuthorizationLevelSchema = z.nativeEnum(AuthorizationLevel);
export const PickupRelationshipSchema = z.nativeEnum(PickupRelationship);

/**
 * Ids stay plain strings here: the services report malformed ids as
 * structured outcomes rather than request validation errors.
 */
export const PickupPersonSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('KNOWN_PERSON'), personId: z.string().min(1) }),
  z.object({ kind: z.literal('NAMED_PERSON'), name: z.string().trim().min(1).max(200) }),
]);

export const CheckinRequestSchema = z.object({
  personId: z.string(),
  locationId: z.string(),
  scheduleId: z.string().nullish(),
  occurrenceDate: IsoDateSchema.optional(),
  generateSecurityCode: z.boolean().default(true),
  note: z.string().max(1000).nullish(),
});

export const BatchCheckinRequestSchema = z.object({
  items: z.array(CheckinRequestSchema).min(1).max(50),
});

export const ValidateCheckinRequestSchema = z.object({
  personId: z.string(),
  locationId: z.string(),
});

export const VerifyPickupRequestSchema = z.object({
  attendanceId: z.string(),
  pickupPerson: PickupPersonSchema,
  securityCode: z.string().max(32),
});

export const RecordPickupRequestSchema = z.object({
  attendanceId: z.string(),
  pickupPerson: PickupPersonSchema,
  wasAuthorized: z.boolean(),
  authorizedPickupId: z.string().nullish(),
  supervisorOverride: z.boolean().default(false),
  supervisorPersonId: z.string().nullish(),
  notes: z.string().max(2000).nullish(),
});

const authorizedPickupFields = {
  name: z.string().trim().min(1).max(200, 'Name cannot exceed 200 characters'),
  phoneNumber: z
    .string()
    .regex(E164_PHONE_PATTERN, 'Phone number must be in E.164 format (e.g., +12345678901)'),
  relationship: PickupRelationshipSchema,
  authorizationLevel: AuthorizationLevelSchema,
  photoUrl: z.string().url().max(500, 'Photo URL cannot exceed 500 characters'),
  custodyNotes: z.string().max(2000, 'Custody notes cannot exceed 2000 characters'),
};

export const CreateAuthorizedPickupSchema = z
  .object({
    authorizedPersonId: UuidSchema.nullish(),
    name: authorizedPickupFields.name.nullish(),
    phoneNumber: authorizedPickupFields.phoneNumber.nullish(),
    relationship: authorizedPickupFields.relationship,
    authorizationLevel: authorizedPickupFields.authorizationLevel,
    photoUrl: authorizedPickupFields.photoUrl.nullish(),
    custodyNotes: authorizedPickupFields.custodyNotes.nullish(),
  })
  .refine((value) => Boolean(value.authorizedPersonId) || Boolean(value.name), {
    message: 'Either authorizedPersonId or name must be provided',
    path: ['name'],
  });

export const UpdateAuthorizedPickupSchema = z
  .object({
    name: authorizedPickupFields.name.nullable(),
    phoneNumber: authorizedPickupFields.phoneNumber.nullable(),
    relationship: authorizedPickupFields.relationship,
    authorizationLevel: authorizedPickupFields.authorizationLevel,
    photoUrl: authorizedPickupFields.photoUrl.nullable(),
    custodyNotes: authorizedPickupFields.custodyNotes.nullable(),
  })
  .partial()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one field must be provided',
  });

export const AttendanceHistoryQuerySchema = z.object({
  days: z.coerce.number().int().min(0).max(365).default(30),
});

export const LocationCapacityQuerySchema = z.object({
  date: IsoDateSchema.optional(),
});

export const PickupHistoryQuerySchema = z
  .object({
    from: IsoDateSchema.optional(),
    to: IsoDateSchema.optional(),
  })
  .refine((value) => !value.from || !value.to || value.from <= value.to, {
    message: 'from must not be after to',
    path: ['to'],
  });

const capacityLimit = z.number().int().min(0).max(10_000).nullable();

/**
 * Replaces a location's capacity settings as a whole.
 */
export const UpdateCapacitySettingsSchema = z
  .object({
    softCapacity: capacityLimit,
    hardCapacity: capacityLimit,
    staffToChildRatio: z.number().int().min(1).max(100).nullable().default(null),
    overflowLocationId: UuidSchema.nullable().default(null),
    autoAssignOverflow: z.boolean().default(false),
  })
  .refine(
    (value) =>
      value.softCapacity === null || value.hardCapacity === null || value.softCapacity <= value.hardCapacity,
    {
      message: 'Soft capacity must be less than or equal to hard capacity',
      path: ['softCapacity'],
    }
  );

export const MultiLocationCapacityRequestSchema = z.object({
  locationIds: z.array(z.string()).min(1).max(100),
  date: IsoDateSchema.optional(),
});

export type CheckinRequestInput = z.infer<typeof CheckinRequestSchema>;
export type BatchCheckinRequestInput = z.infer<typeof BatchCheckinRequestSchema>;
export type ValidateCheckinRequestInput = z.infer<typeof ValidateCheckinRequestSchema>;
export type VerifyPickupRequestInput = z.infer<typeof VerifyPickupRequestSchema>;
export type RecordPickupRequestInput = z.infer<typeof RecordPickupRequestSchema>;
export type CreateAuthorizedPickupInput = z.infer<typeof CreateAuthorizedPickupSchema>;
export type UpdateAuthorizedPickupInput = z.infer<typeof UpdateAuthorizedPickupSchema>;
export type PickupHistoryQuery = z.infer<typeof PickupHistoryQuerySchema>;
export type UpdateCapacitySettingsInput = z.infer<typeof UpdateCapacitySettingsSchema>;
export type MultiLocationCapacityRequest = z.infer<typeof MultiLocationCapacityRequestSchema>;
