import type { Logger } from 'pino';
import {
  CheckinFailureReason,
  computeCapacitySnapshot,
  isAtCapacity,
  isUuid,
  type AttendanceSummary,
  type BatchCheckinResult,
  type CheckinFailure,
  type CheckinRequest,
  type CheckinResult,
  type CheckinValidation,
  type LocationSummary,
  type OverflowSuggestion,
  type PersonSummary,
} from '@roomsafe/shared';
import type { LocationLock } from '../capacity/locationLock.js';
import type { CapacityService } from '../capacity/service.js';
import type { Directory, LocationRecord, PersonRecord, ScheduleRecord } from '../directory/types.js';
import { fullNameOf } from '../directory/types.js';
import { ArgumentError, InvalidIdError, LockTimeoutError, NotFoundError } from '../errors/domain.js';
import type { SecurityCodeIssuer } from '../securityCodes/issuer.js';
import { ageOn, type Clock } from '../time/clock.js';
import { isCheckinWindowOpen } from './schedule.js';
import type { AttendanceRecord, AttendanceStore, OccurrenceSlot } from './types.js';

const SLOW_CHECKIN_MS = 200;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface CheckinServiceDeps {
  directory: Directory;
  attendance: AttendanceStore;
  locationLock: LocationLock;
  capacity: CapacityService;
  securityCodes: SecurityCodeIssuer;
  clock: Clock;
  logger: Logger;
  capacityWarningPercent?: number;
}

export interface OperationOptions {
  signal?: AbortSignal;
}

type Eligibility =
  | { ok: false; failure: CheckinFailure }
  | { ok: true; person: PersonRecord; location: LocationRecord; slot: OccurrenceSlot };

type GuardedOutcome =
  | { kind: 'committed'; record: AttendanceRecord; occupancy: number }
  | { kind: 'duplicate' }
  | { kind: 'full'; occupancy: number };

function failure(
  reason: CheckinFailureReason,
  message: string,
  retryable = false
): CheckinFailure {
  return { success: false, reason, message, retryable };
}

function toLocationSummary(location: Pick<LocationRecord, 'id' | 'name'>): LocationSummary {
  return { id: location.id, name: location.name };
}

/**
 * Admits and releases attendees. The only writer of attendance rows.
 */
export class CheckinService {
  constructor(private readonly deps: CheckinServiceDeps) {}

  async checkIn(request: CheckinRequest, opts: OperationOptions = {}): Promise<CheckinResult> {
    const { attendance, clock, logger, locationLock, securityCodes } = this.deps;
    const startedAt = Date.now();

    const eligibility = await this.resolveEligibility(request, opts);
    if (!eligibility.ok) {
      logger.info(
        { personId: request.personId, locationId: request.locationId, reason: eligibility.failure.reason },
        'Check-in refused'
      );
      return eligibility.failure;
    }

    const { person, location, slot } = eligibility;
    const occurrence = await attendance.getOrCreateOccurrence(slot);

    if (await attendance.findOpenAttendance(person.id, occurrence.id)) {
      return this.refuse(person.id, location.id, CheckinFailureReason.ALREADY_CHECKED_IN);
    }

    const isFirstTime = !(await attendance.hasAttendedLocation(person.id, location.id));
    const securityCode =
      request.generateSecurityCode === false ? null : await securityCodes.issue(clock.today());

    opts.signal?.throwIfAborted();

    const outcome = await locationLock.executeWithLocationLock(
      location.id,
      async (): Promise<GuardedOutcome> => {
        if (await attendance.findOpenAttendance(person.id, occurrence.id)) {
          return { kind: 'duplicate' };
        }

        const occupancy = await attendance.countOpenAttendances(location.id, slot.occurrenceDate);
        if (isAtCapacity(location, occupancy)) {
          return { kind: 'full', occupancy };
        }

        const record = await attendance.insertAttendance({
          personId: person.id,
          occurrenceId: occurrence.id,
          startTime: clock.now(),
          isFirstTime,
          note: request.note ?? null,
          securityCodeId: securityCode?.id ?? null,
        });
        if (!record) {
          return { kind: 'duplicate' };
        }
        return { kind: 'committed', record, occupancy: occupancy + 1 };
      },
      { signal: opts.signal }
    );

    // Past this point the slot is committed; cancellation no longer applies.
    switch (outcome.kind) {
      case 'duplicate':
        return this.refuse(person.id, location.id, CheckinFailureReason.ALREADY_CHECKED_IN);
      case 'full': {
        const overflow = await this.deps.capacity.suggestOverflow(location, slot.occurrenceDate);
        return this.refuse(person.id, location.id, CheckinFailureReason.AT_CAPACITY, overflow);
      }
      case 'committed':
        break;
    }

    const elapsedMs = Date.now() - startedAt;
    const logFields = {
      attendanceId: outcome.record.id,
      personId: person.id,
      locationId: location.id,
      occupancy: outcome.occupancy,
      elapsedMs,
    };
    if (elapsedMs > SLOW_CHECKIN_MS) {
      logger.warn(logFields, 'Slow check-in');
    } else {
      logger.info(logFields, 'Checked in');
    }

    return {
      success: true,
      attendanceId: outcome.record.id,
      occurrenceId: occurrence.id,
      securityCode: securityCode?.code ?? null,
      checkInTime: outcome.record.startTime,
      isFirstTime,
      person: this.toPersonSummary(person),
      location: toLocationSummary(location),
      capacity: computeCapacitySnapshot(
        location,
        outcome.occupancy,
        this.deps.capacityWarningPercent
      ),
    };
  }

  /**
   * Runs every item independently. A lock timeout becomes a retryable
   * LOCATION_BUSY failure for that item; any other fault is rethrown once all
   * items have settled.
   */
  async batchCheckIn(
    requests: readonly CheckinRequest[],
    opts: OperationOptions = {}
  ): Promise<BatchCheckinResult> {
    const settled = await Promise.allSettled(requests.map((request) => this.checkIn(request, opts)));

    const results: CheckinResult[] = [];
    const faults: unknown[] = [];
    for (const item of settled) {
      if (item.status === 'fulfilled') {
        results.push(item.value);
      } else if (item.reason instanceof LockTimeoutError) {
        results.push(failure(CheckinFailureReason.LOCATION_BUSY, item.reason.message, true));
      } else {
        faults.push(item.reason);
      }
    }

    if (faults.length > 0) {
      this.deps.logger.error(
        { err: faults[0], faults: faults.length, completed: results.length },
        'Batch check-in aborted by an unexpected fault'
      );
      throw faults[0];
    }

    const successCount = results.filter((result) => result.success).length;
    return {
      results,
      successCount,
      failureCount: results.length - successCount,
      allSucceeded: successCount === results.length,
    };
  }

  /**
   * Read-only pre-check with the same rules as check-in. Takes no lock, so a
   * positive answer is advisory.
   */
  async validateCheckIn(
    request: Pick<CheckinRequest, 'personId' | 'locationId' | 'scheduleId' | 'occurrenceDate'>,
    opts: OperationOptions = {}
  ): Promise<CheckinValidation> {
    const { attendance } = this.deps;
    const eligibility = await this.resolveEligibility(request, opts);
    if (!eligibility.ok) {
      return {
        isAllowed: false,
        reason: eligibility.failure.reason,
        message: eligibility.failure.message,
      };
    }

    const { person, location, slot } = eligibility;
    const occurrence = await attendance.findOccurrence(slot);
    if (occurrence && (await attendance.findOpenAttendance(person.id, occurrence.id))) {
      return {
        isAllowed: false,
        reason: CheckinFailureReason.ALREADY_CHECKED_IN,
        message: this.describe(CheckinFailureReason.ALREADY_CHECKED_IN),
      };
    }

    const occupancy = await attendance.countOpenAttendances(location.id, slot.occurrenceDate);
    if (isAtCapacity(location, occupancy)) {
      const overflow = await this.deps.capacity.suggestOverflow(location, slot.occurrenceDate);
      return {
        isAllowed: false,
        reason: CheckinFailureReason.AT_CAPACITY,
        message: this.describe(CheckinFailureReason.AT_CAPACITY),
        ...(overflow ? { overflow } : {}),
      };
    }

    return { isAllowed: true };
  }

  /**
   * Closes the attendance. Returns false when it does not exist or is already
   * closed, so repeated calls are harmless.
   */
  async checkOut(attendanceId: string, opts: OperationOptions = {}): Promise<boolean> {
    if (!isUuid(attendanceId)) {
      throw new InvalidIdError('attendance ID');
    }
    opts.signal?.throwIfAborted();

    const closed = await this.deps.attendance.closeAttendance(attendanceId, this.deps.clock.now());
    if (!closed) {
      this.deps.logger.info({ attendanceId }, 'Check-out ignored: attendance missing or closed');
      return false;
    }

    this.deps.logger.info(
      { attendanceId, personId: closed.personId, locationId: closed.locationId },
      'Checked out'
    );
    return true;
  }

  /**
   * Today's open attendances at the location, ordered by last then first name.
   */
  async getCurrentOccupants(
    locationId: string,
    opts: OperationOptions = {}
  ): Promise<AttendanceSummary[]> {
    if (!isUuid(locationId)) {
      throw new InvalidIdError('location ID');
    }
    opts.signal?.throwIfAborted();

    const { attendance, clock, directory } = this.deps;
    const location = await directory.getLocation(locationId);
    if (!location) {
      throw new NotFoundError('Location not found');
    }

    const records = await attendance.listOpenAttendances(locationId, clock.today());
    const people = await directory.getPeople([...new Set(records.map((r) => r.personId))]);
    const peopleById = new Map(people.map((p) => [p.id, p]));

    const occupants: Array<{ person: PersonRecord; record: AttendanceRecord }> = [];
    for (const record of records) {
      const person = peopleById.get(record.personId);
      if (person) occupants.push({ person, record });
    }

    occupants.sort(
      (a, b) =>
        a.person.lastName.localeCompare(b.person.lastName) ||
        a.person.firstName.localeCompare(b.person.firstName)
    );

    return occupants.map(({ person, record }) =>
      this.toAttendanceSummary(record, person, toLocationSummary(location))
    );
  }

  /**
   * Attendances in the last `windowDays` days, most recent first. Zero days is
   * an empty window, not "all time".
   */
  async getPersonHistory(
    personId: string,
    windowDays: number,
    opts: OperationOptions = {}
  ): Promise<AttendanceSummary[]> {
    if (!isUuid(personId)) {
      throw new InvalidIdError('person ID');
    }
    if (!Number.isInteger(windowDays) || windowDays < 0) {
      throw new ArgumentError('windowDays must be a non-negative integer');
    }
    opts.signal?.throwIfAborted();
    if (windowDays === 0) return [];

    const { attendance, clock, directory } = this.deps;
    const person = await directory.getPerson(personId);
    if (!person) {
      throw new NotFoundError('Person not found');
    }

    const since = new Date(clock.now().getTime() - windowDays * DAY_MS);
    const records = await attendance.listAttendanceForPerson(personId, since);
    const locations = await directory.getLocations([...new Set(records.map((r) => r.locationId))]);
    const locationsById = new Map(locations.map((l) => [l.id, l]));

    return records.map((record) =>
      this.toAttendanceSummary(record, person, {
        id: record.locationId,
        name: locationsById.get(record.locationId)?.name ?? 'Unknown location',
      })
    );
  }

  private async resolveEligibility(
    request: Pick<CheckinRequest, 'personId' | 'locationId' | 'scheduleId' | 'occurrenceDate'>,
    opts: OperationOptions
  ): Promise<Eligibility> {
    const { clock, directory } = this.deps;
    const deny = (reason: CheckinFailureReason, message = this.describe(reason)): Eligibility => ({
      ok: false,
      failure: failure(reason, message),
    });

    const scheduleId = request.scheduleId ? request.scheduleId : null;
    if (!isUuid(request.personId)) {
      return deny(CheckinFailureReason.INVALID_PERSON_ID);
    }
    if (!isUuid(request.locationId)) {
      return deny(CheckinFailureReason.INVALID_LOCATION_OR_SCHEDULE_ID, 'Invalid location ID');
    }
    if (scheduleId !== null && !isUuid(scheduleId)) {
      return deny(CheckinFailureReason.INVALID_LOCATION_OR_SCHEDULE_ID, 'Invalid schedule ID');
    }

    opts.signal?.throwIfAborted();

    const person = await directory.getPerson(request.personId);
    if (!person) return deny(CheckinFailureReason.PERSON_NOT_FOUND);
    if (person.isDeceased) return deny(CheckinFailureReason.PERSON_DECEASED);
    if (!person.isActive) return deny(CheckinFailureReason.PERSON_INACTIVE);

    const location = await directory.getLocation(request.locationId);
    if (!location) return deny(CheckinFailureReason.LOCATION_NOT_FOUND);
    if (!location.isActive) return deny(CheckinFailureReason.LOCATION_INACTIVE);

    if (scheduleId !== null) {
      const schedule: ScheduleRecord | null = await directory.getSchedule(scheduleId);
      if (!schedule) return deny(CheckinFailureReason.SCHEDULE_NOT_FOUND);
      if (!isCheckinWindowOpen(schedule, clock.toLocal(clock.now()))) {
        return deny(CheckinFailureReason.OUTSIDE_SCHEDULE);
      }
    }

    return {
      ok: true,
      person,
      location,
      slot: {
        locationId: location.id,
        scheduleId,
        occurrenceDate: request.occurrenceDate ?? clock.today(),
      },
    };
  }

  private refuse(
    personId: string,
    locationId: string,
    reason: CheckinFailureReason,
    overflow: OverflowSuggestion | null = null
  ): CheckinFailure {
    this.deps.logger.info(
      { personId, locationId, reason, overflowLocationId: overflow?.location.id },
      'Check-in refused'
    );
    const refused = failure(reason, this.describe(reason));
    return overflow ? { ...refused, overflow } : refused;
  }

  private describe(reason: CheckinFailureReason): string {
    switch (reason) {
      case CheckinFailureReason.INVALID_PERSON_ID:
        return 'Invalid person ID';
      case CheckinFailureReason.INVALID_LOCATION_OR_SCHEDULE_ID:
        return 'Invalid location or schedule ID';
      case CheckinFailureReason.PERSON_NOT_FOUND:
        return 'Person not found';
      case CheckinFailureReason.PERSON_DECEASED:
        return 'Person is marked as deceased';
      case CheckinFailureReason.PERSON_INACTIVE:
        return 'Person is inactive';
      case CheckinFailureReason.LOCATION_NOT_FOUND:
        return 'Location not found';
      case CheckinFailureReason.LOCATION_INACTIVE:
        return 'Location is inactive';
      case CheckinFailureReason.SCHEDULE_NOT_FOUND:
        return 'Schedule not found';
      case CheckinFailureReason.OUTSIDE_SCHEDULE:
        return 'Check-in is outside the schedule window';
      case CheckinFailureReason.ALREADY_CHECKED_IN:
        return 'Person is already checked in to this location';
      case CheckinFailureReason.AT_CAPACITY:
        return 'Location is at capacity';
      case CheckinFailureReason.LOCATION_BUSY:
        return 'Location is busy; try again';
    }
  }

  private toPersonSummary(person: PersonRecord): PersonSummary {
    return {
      id: person.id,
      fullName: fullNameOf(person),
      firstName: person.firstName,
      lastName: person.lastName,
      nickName: person.nickName,
      age: ageOn(person.birthDate, this.deps.clock.today()),
    };
  }

  private toAttendanceSummary(
    record: AttendanceRecord,
    person: PersonRecord,
    location: LocationSummary
  ): AttendanceSummary {
    return {
      attendanceId: record.id,
      occurrenceDate: record.occurrenceDate,
      person: this.toPersonSummary(person),
      location,
      startTime: record.startTime,
      endTime: record.endTime,
      securityCode: record.securityCode,
      isFirstTime: record.isFirstTime,
      note: record.note,
    };
  }
}
