import type { Logger } from 'pino';
import {
  AuthorizationLevel,
  PickupRelationship,
  PickupVerificationOutcome,
  describePickupDecision,
  evaluatePickupPolicy,
  isUuid,
  normalizeSecurityCode,
  type AuthorizedPickup,
  type CreateAuthorizedPickupInput,
  type PickupLogEntry,
  type PickupPerson,
  type PickupVerificationResult,
} from '@roomsafe/shared';
import { timingSafeEquals } from '../auth/kioskToken.js';
import type { AttendanceRecord, AttendanceStore } from '../checkin/types.js';
import type { OperationOptions } from '../checkin/service.js';
import { fullNameOf, type Directory } from '../directory/types.js';
import {
  ArgumentError,
  InvalidIdError,
  InvalidOperationError,
  NotFoundError,
} from '../errors/domain.js';
import type { Clock } from '../time/clock.js';
import type { AuthorizedPickupPatch, PickupStore } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface PickupServiceDeps {
  directory: Directory;
  attendance: AttendanceStore;
  pickups: PickupStore;
  clock: Clock;
  logger: Logger;
}

export interface VerifyPickupRequest {
  attendanceId: string;
  pickupPerson: PickupPerson;
  securityCode: string;
}

export interface RecordPickupRequest {
  attendanceId: string;
  pickupPerson: PickupPerson;
  wasAuthorized: boolean;
  authorizedPickupId?: string | null;
  supervisorOverride: boolean;
  supervisorPersonId?: string | null;
  notes?: string | null;
}

export const BLOCKED_REFERENCE_MESSAGE =
  "Cannot record pickup for a person with 'Never' authorization level. This person is blocked from pickup and cannot be overridden.";
export const BLOCKED_OVERRIDE_MESSAGE =
  "Cannot record pickup for a blocked person. This person is on the 'Never' list, even a supervisor override cannot release to them.";

/**
 * Decides who may collect a checked-in child and keeps the pickup audit trail.
 */
export class PickupService {
  constructor(private readonly deps: PickupServiceDeps) {}

  /**
   * Speculative check: writes nothing. The security code is checked before any
   * relationship lookup.
   */
  async verify(
    request: VerifyPickupRequest,
    opts: OperationOptions = {}
  ): Promise<PickupVerificationResult> {
    const { attendance, pickups, logger } = this.deps;

    if (!isUuid(request.attendanceId)) {
      return this.deny(PickupVerificationOutcome.INVALID_ATTENDANCE);
    }
    opts.signal?.throwIfAborted();

    const record = await attendance.getAttendance(request.attendanceId);
    if (!record) {
      return this.deny(PickupVerificationOutcome.ATTENDANCE_NOT_FOUND);
    }

    const presented = normalizeSecurityCode(request.securityCode);
    if (!record.securityCode || !presented || !timingSafeEquals(presented, record.securityCode)) {
      logger.info({ attendanceId: record.id }, 'Pickup verification failed: invalid security code');
      return this.deny(PickupVerificationOutcome.INVALID_SECURITY_CODE);
    }

    if (await pickups.getPickupLogForAttendance(record.id)) {
      return this.deny(PickupVerificationOutcome.ALREADY_RELEASED);
    }

    if (request.pickupPerson.kind === 'KNOWN_PERSON' && !isUuid(request.pickupPerson.personId)) {
      return {
        ...this.deny(PickupVerificationOutcome.INVALID_PICKUP_PERSON),
        requiresSupervisorOverride: true,
      };
    }

    const authorization = await pickups.findActiveAuthorization(
      record.personId,
      request.pickupPerson
    );
    const level = authorization?.authorizationLevel ?? null;
    const decision = evaluatePickupPolicy(level);

    const message = describePickupDecision(decision.outcome, {
      pickupPersonName: await this.displayNameOf(request.pickupPerson, authorization),
      childName: await this.childNameOf(record),
    });

    logger.info(
      { attendanceId: record.id, outcome: decision.outcome, authorizationLevel: level },
      'Pickup verified'
    );

    return {
      outcome: decision.outcome,
      isAuthorized: decision.isAuthorized,
      authorizationLevel: level,
      requiresSupervisorOverride: decision.requiresSupervisorOverride,
      message,
      authorizedPickupId: decision.isAuthorized && authorization ? authorization.id : null,
    };
  }

  /**
   * Commits a release: appends the pickup log and closes the attendance.
   * Contract violations throw; a NEVER relationship can never be released.
   */
  async recordPickup(request: RecordPickupRequest, opts: OperationOptions = {}): Promise<PickupLogEntry> {
    const { attendance, clock, logger, pickups } = this.deps;

    if (request.wasAuthorized && request.supervisorOverride) {
      throw new ArgumentError('supervisorOverride must be false when wasAuthorized is true');
    }
    if (!request.wasAuthorized && !request.supervisorOverride) {
      throw new ArgumentError('supervisorOverride is required when wasAuthorized is false');
    }

    if (!isUuid(request.attendanceId)) {
      throw new InvalidIdError('attendance ID');
    }
    if (request.pickupPerson.kind === 'KNOWN_PERSON' && !isUuid(request.pickupPerson.personId)) {
      throw new InvalidIdError('pickup person ID');
    }

    const record = await attendance.getAttendance(request.attendanceId);
    if (!record) {
      throw new NotFoundError('Attendance record not found');
    }

    if (request.authorizedPickupId) {
      const referenced = await this.getAuthorizationOrThrow(request.authorizedPickupId);
      if (referenced.childId !== record.personId) {
        throw new ArgumentError('Authorized pickup does not belong to this child');
      }
      if (referenced.authorizationLevel === AuthorizationLevel.NEVER) {
        throw new InvalidOperationError(BLOCKED_REFERENCE_MESSAGE);
      }
    }

    if (request.supervisorOverride) {
      if (!request.supervisorPersonId) {
        throw new ArgumentError('supervisorPersonId is required when supervisorOverride is true');
      }
      if (!isUuid(request.supervisorPersonId)) {
        throw new InvalidIdError('supervisor person ID');
      }
    }

    const resolved = await pickups.findActiveAuthorization(record.personId, request.pickupPerson);
    if (resolved?.authorizationLevel === AuthorizationLevel.NEVER) {
      logger.warn(
        { attendanceId: record.id, authorizedPickupId: resolved.id },
        'Refused pickup for blocked person'
      );
      throw new InvalidOperationError(BLOCKED_OVERRIDE_MESSAGE);
    }
    if (request.wasAuthorized && resolved?.authorizationLevel !== AuthorizationLevel.ALWAYS) {
      throw new ArgumentError(
        'wasAuthorized requires an active ALWAYS authorization for this pickup person'
      );
    }

    opts.signal?.throwIfAborted();

    const entry = await pickups.recordPickup({
      attendanceId: record.id,
      childId: record.personId,
      pickupPersonId:
        request.pickupPerson.kind === 'KNOWN_PERSON' ? request.pickupPerson.personId : null,
      pickupPersonName:
        request.pickupPerson.kind === 'NAMED_PERSON' ? request.pickupPerson.name.trim() : null,
      wasAuthorized: request.wasAuthorized,
      authorizedPickupId: request.authorizedPickupId ?? resolved?.id ?? null,
      supervisorOverride: request.supervisorOverride,
      supervisorPersonId: request.supervisorOverride ? (request.supervisorPersonId ?? null) : null,
      checkoutTime: clock.now(),
      notes: request.notes ?? null,
    });
    if (!entry) {
      throw new InvalidOperationError('A pickup has already been recorded for this attendance');
    }

    const logFields = {
      pickupLogId: entry.id,
      attendanceId: entry.attendanceId,
      childId: entry.childId,
      supervisorPersonId: entry.supervisorPersonId,
    };
    if (entry.supervisorOverride) {
      logger.warn(logFields, 'Pickup released under supervisor override');
    } else {
      logger.info(logFields, 'Pickup recorded');
    }

    return entry;
  }

  async listAuthorizedPickups(
    childId: string,
    opts: { includeInactive?: boolean } = {}
  ): Promise<AuthorizedPickup[]> {
    if (!isUuid(childId)) {
      throw new InvalidIdError('child ID');
    }
    return this.deps.pickups.listAuthorizedPickups(childId, {
      includeInactive: opts.includeInactive ?? false,
    });
  }

  async addAuthorizedPickup(
    childId: string,
    input: CreateAuthorizedPickupInput
  ): Promise<AuthorizedPickup> {
    const { directory, pickups, clock, logger } = this.deps;
    await this.getChildOrThrow(childId);

    const authorizedPersonId = input.authorizedPersonId ?? null;
    if (authorizedPersonId !== null) {
      if (authorizedPersonId === childId) {
        throw new ArgumentError('A child cannot be their own authorized pickup');
      }
      if (!(await directory.getPerson(authorizedPersonId))) {
        throw new NotFoundError('Authorized person not found');
      }
    }

    const name = input.name?.trim() || null;
    const person: PickupPerson | null = authorizedPersonId
      ? { kind: 'KNOWN_PERSON', personId: authorizedPersonId }
      : name
        ? { kind: 'NAMED_PERSON', name }
        : null;
    if (!person) {
      throw new ArgumentError('Either authorizedPersonId or name must be provided');
    }
    if (await pickups.findActiveAuthorization(childId, person)) {
      throw new InvalidOperationError('An active authorization already exists for this person');
    }

    const created = await pickups.insertAuthorizedPickup(
      {
        childId,
        authorizedPersonId,
        name,
        phoneNumber: input.phoneNumber ?? null,
        relationship: input.relationship,
        authorizationLevel: input.authorizationLevel,
        photoUrl: input.photoUrl ?? null,
        custodyNotes: input.custodyNotes ?? null,
      },
      clock.now()
    );

    logger.info(
      { authorizedPickupId: created.id, childId, level: created.authorizationLevel },
      'Authorized pickup added'
    );
    return created;
  }

  async updateAuthorizedPickup(id: string, patch: AuthorizedPickupPatch): Promise<AuthorizedPickup> {
    const existing = await this.getAuthorizationOrThrow(id);
    if (!existing.isActive) {
      throw new InvalidOperationError('Cannot update an inactive authorization');
    }

    const normalized: AuthorizedPickupPatch = { ...patch };
    if (patch.name !== undefined) {
      normalized.name = patch.name?.trim() || null;
      if (normalized.name === null && existing.authorizedPersonId === null) {
        throw new ArgumentError('Name is required when no authorized person is linked');
      }
    }

    const updated = await this.deps.pickups.updateAuthorizedPickup(
      id,
      normalized,
      this.deps.clock.now()
    );
    if (!updated) {
      throw new NotFoundError('Authorized pickup not found');
    }

    this.deps.logger.info(
      { authorizedPickupId: id, changes: Object.keys(normalized) },
      'Authorized pickup updated'
    );
    return updated;
  }

  /**
   * Soft delete. Deactivating an inactive entry returns it unchanged.
   */
  async deactivateAuthorizedPickup(id: string): Promise<AuthorizedPickup> {
    const existing = await this.getAuthorizationOrThrow(id);
    if (!existing.isActive) return existing;

    const deactivated = await this.deps.pickups.deactivateAuthorizedPickup(id, this.deps.clock.now());
    if (!deactivated) {
      throw new NotFoundError('Authorized pickup not found');
    }

    this.deps.logger.info({ authorizedPickupId: id }, 'Authorized pickup deactivated');
    return deactivated;
  }

  /**
   * Grants ALWAYS/PARENT to every adult family member without an active entry.
   * Safe to repeat: the store upserts on (child, person).
   */
  async autoPopulateStandingAuthorizations(childId: string): Promise<{ created: number }> {
    const { directory, pickups, clock, logger } = this.deps;
    await this.getChildOrThrow(childId);

    const adults = await directory.listAdultFamilyMembers(childId);
    let created = 0;
    for (const adult of adults) {
      if (adult.id === childId) continue;
      const inserted = await pickups.upsertStandingAuthorization(
        {
          childId,
          authorizedPersonId: adult.id,
          name: null,
          phoneNumber: null,
          relationship: PickupRelationship.PARENT,
          authorizationLevel: AuthorizationLevel.ALWAYS,
          photoUrl: null,
          custodyNotes: null,
        },
        clock.now()
      );
      if (inserted) created++;
    }

    logger.info({ childId, candidates: adults.length, created }, 'Standing authorizations populated');
    return { created };
  }

  /**
   * Pickup logs for the child, most recent first. Dates are inclusive UTC days.
   */
  async getPickupHistory(
    childId: string,
    range: { from?: string; to?: string } = {}
  ): Promise<PickupLogEntry[]> {
    if (!isUuid(childId)) {
      throw new InvalidIdError('child ID');
    }
    const from = range.from ? new Date(`${range.from}T00:00:00.000Z`) : null;
    const to = range.to ? new Date(new Date(`${range.to}T00:00:00.000Z`).getTime() + DAY_MS) : null;
    if (from && to && from >= to) {
      throw new ArgumentError('from must not be after to');
    }
    return this.deps.pickups.listPickupLogs(childId, { from, to });
  }

  private deny(outcome: PickupVerificationOutcome): PickupVerificationResult {
    return {
      outcome,
      isAuthorized: false,
      authorizationLevel: null,
      requiresSupervisorOverride: false,
      message: describePickupDecision(outcome, { pickupPersonName: '', childName: '' }),
      authorizedPickupId: null,
    };
  }

  private async getChildOrThrow(childId: string): Promise<void> {
    if (!isUuid(childId)) {
      throw new InvalidIdError('child ID');
    }
    if (!(await this.deps.directory.getPerson(childId))) {
      throw new NotFoundError('Child not found');
    }
  }

  private async getAuthorizationOrThrow(id: string): Promise<AuthorizedPickup> {
    if (!isUuid(id)) {
      throw new InvalidIdError('authorized pickup ID');
    }
    const authorization = await this.deps.pickups.getAuthorizedPickup(id);
    if (!authorization) {
      throw new NotFoundError('Authorized pickup not found');
    }
    return authorization;
  }

  private async displayNameOf(
    person: PickupPerson,
    authorization: AuthorizedPickup | null
  ): Promise<string> {
    if (person.kind === 'NAMED_PERSON') return person.name.trim();
    const record = await this.deps.directory.getPerson(person.personId);
    if (record) return fullNameOf(record);
    return authorization?.name ?? 'This person';
  }

  private async childNameOf(record: AttendanceRecord): Promise<string> {
    const child = await this.deps.directory.getPerson(record.personId);
    return child ? fullNameOf(child) : 'this child';
  }
}
