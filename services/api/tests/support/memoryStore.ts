import { randomUUID } from 'node:crypto';
import type {
  AuthorizedPickup,
  CapacitySettings,
  PickupLogEntry,
  PickupPerson,
} from '@roomsafe/shared';
import type {
  AttendanceRecord,
  AttendanceStore,
  NewAttendance,
  OccurrenceRecord,
  OccurrenceSlot,
} from '../../src/checkin/types.js';
import type {
  Directory,
  LocationRecord,
  LocationSettingsStore,
  LocationStaffAssignment,
  PersonRecord,
  ScheduleRecord,
} from '../../src/directory/types.js';
import { InvalidOperationError } from '../../src/errors/domain.js';
import type {
  AuthorizedPickupPatch,
  NewAuthorizedPickup,
  NewPickupLog,
  PickupLogRange,
  PickupStore,
} from '../../src/pickup/types.js';
import type { IssuedSecurityCode, SecurityCodeStore } from '../../src/securityCodes/issuer.js';

/** Lets other pending store calls run, the way a database round trip would. */
const roundTrip = () => new Promise<void>((resolve) => setImmediate(resolve));

const ADULT_ROLES = /(adult|parent|guardian)/i;

interface FamilyMember {
  familyId: string;
  personId: string;
  role: string;
}

interface StoredAttendance {
  id: string;
  personId: string;
  occurrenceId: string;
  startTime: Date;
  endTime: Date | null;
  isFirstTime: boolean;
  note: string | null;
  securityCodeId: string | null;
}

/**
 * In-process stand-in for the Postgres stores. Every method yields once before
 * touching state, so concurrent callers interleave like real queries.
 */
export class MemoryStore
  implements Directory, LocationSettingsStore, AttendanceStore, SecurityCodeStore, PickupStore
{
  readonly people = new Map<string, PersonRecord>();
  readonly locations = new Map<string, LocationRecord>();
  readonly schedules = new Map<string, ScheduleRecord>();
  readonly familyMembers: FamilyMember[] = [];
  readonly locationStaff: LocationStaffAssignment[] = [];
  readonly occurrences: OccurrenceRecord[] = [];
  readonly attendances: StoredAttendance[] = [];
  readonly securityCodes: IssuedSecurityCode[] = [];
  readonly authorizedPickups: AuthorizedPickup[] = [];
  readonly pickupLogs: PickupLogEntry[] = [];

  addPerson(overrides: Partial<PersonRecord> & Pick<PersonRecord, 'firstName' | 'lastName'>): PersonRecord {
    const person: PersonRecord = {
      id: randomUUID(),
      nickName: null,
      birthDate: null,
      isDeceased: false,
      isActive: true,
      ...overrides,
    };
    this.people.set(person.id, person);
    return person;
  }

  addLocation(overrides: Partial<LocationRecord> & Pick<LocationRecord, 'name'>): LocationRecord {
    const location: LocationRecord = {
      id: randomUUID(),
      isActive: true,
      softCapacity: null,
      hardCapacity: null,
      staffToChildRatio: null,
      overflowLocationId: null,
      autoAssignOverflow: false,
      ...overrides,
    };
    this.locations.set(location.id, location);
    return location;
  }

  addSchedule(overrides: Partial<ScheduleRecord> & Pick<ScheduleRecord, 'name'>): ScheduleRecord {
    const schedule: ScheduleRecord = {
      id: randomUUID(),
      isActive: true,
      weeklyDayOfWeek: null,
      weeklyStartMinute: null,
      checkInStartOffsetMinutes: null,
      checkInEndOffsetMinutes: null,
      ...overrides,
    };
    this.schedules.set(schedule.id, schedule);
    return schedule;
  }

  addFamily(members: Array<{ person: PersonRecord; role: string }>): string {
    const familyId = randomUUID();
    for (const member of members) {
      this.familyMembers.push({ familyId, personId: member.person.id, role: member.role });
    }
    return familyId;
  }

  addStaff(location: LocationRecord, person: PersonRecord): void {
    this.locationStaff.push({ locationId: location.id, personId: person.id });
  }

  // Directory

  async getPerson(personId: string): Promise<PersonRecord | null> {
    await roundTrip();
    return this.people.get(personId) ?? null;
  }

  async getPeople(personIds: readonly string[]): Promise<PersonRecord[]> {
    await roundTrip();
    return personIds.flatMap((id) => {
      const person = this.people.get(id);
      return person ? [person] : [];
    });
  }

  async getLocation(locationId: string): Promise<LocationRecord | null> {
    await roundTrip();
    return this.locations.get(locationId) ?? null;
  }

  async getLocations(locationIds: readonly string[]): Promise<LocationRecord[]> {
    await roundTrip();
    return locationIds.flatMap((id) => {
      const location = this.locations.get(id);
      return location ? [location] : [];
    });
  }

  async getSchedule(scheduleId: string): Promise<ScheduleRecord | null> {
    await roundTrip();
    return this.schedules.get(scheduleId) ?? null;
  }

  async listAdultFamilyMembers(childId: string): Promise<PersonRecord[]> {
    await roundTrip();
    const families = new Set(
      this.familyMembers.filter((m) => m.personId === childId).map((m) => m.familyId)
    );
    const adults = new Map<string, PersonRecord>();
    for (const member of this.familyMembers) {
      if (!families.has(member.familyId) || member.personId === childId) continue;
      if (!ADULT_ROLES.test(member.role)) continue;
      const person = this.people.get(member.personId);
      if (person && person.isActive && !person.isDeceased) {
        adults.set(person.id, person);
      }
    }
    return [...adults.values()];
  }

  async listLocationStaff(locationIds: readonly string[]): Promise<LocationStaffAssignment[]> {
    await roundTrip();
    return this.locationStaff.filter((s) => locationIds.includes(s.locationId));
  }

  // LocationSettingsStore

  async updateCapacitySettings(
    locationId: string,
    settings: CapacitySettings
  ): Promise<LocationRecord | null> {
    await roundTrip();
    const location = this.locations.get(locationId);
    if (!location) return null;
    const updated: LocationRecord = { ...location, ...settings };
    this.locations.set(locationId, updated);
    return updated;
  }

  // AttendanceStore

  async getOrCreateOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord> {
    await roundTrip();
    const existing = this.matchOccurrence(slot);
    if (existing) return existing;
    const created: OccurrenceRecord = { id: randomUUID(), ...slot };
    this.occurrences.push(created);
    return created;
  }

  async findOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord | null> {
    await roundTrip();
    return this.matchOccurrence(slot);
  }

  async findOpenAttendance(personId: string, occurrenceId: string): Promise<AttendanceRecord | null> {
    await roundTrip();
    const row = this.attendances.find(
      (a) => a.personId === personId && a.occurrenceId === occurrenceId && a.endTime === null
    );
    return row ? this.toRecord(row) : null;
  }

  async countOpenAttendances(locationId: string, occurrenceDate: string): Promise<number> {
    await roundTrip();
    return this.openAt(locationId, occurrenceDate).length;
  }

  async hasAttendedLocation(personId: string, locationId: string): Promise<boolean> {
    await roundTrip();
    return this.attendances.some(
      (a) => a.personId === personId && this.occurrenceOf(a).locationId === locationId
    );
  }

  async insertAttendance(input: NewAttendance): Promise<AttendanceRecord | null> {
    await roundTrip();
    const duplicate = this.attendances.some(
      (a) => a.personId === input.personId && a.occurrenceId === input.occurrenceId && a.endTime === null
    );
    if (duplicate) return null;

    const row: StoredAttendance = { id: randomUUID(), endTime: null, ...input };
    this.attendances.push(row);
    return this.toRecord(row);
  }

  async getAttendance(attendanceId: string): Promise<AttendanceRecord | null> {
    await roundTrip();
    const row = this.attendances.find((a) => a.id === attendanceId);
    return row ? this.toRecord(row) : null;
  }

  async closeAttendance(attendanceId: string, endTime: Date): Promise<AttendanceRecord | null> {
    await roundTrip();
    const row = this.attendances.find((a) => a.id === attendanceId && a.endTime === null);
    if (!row) return null;
    row.endTime = endTime;
    return this.toRecord(row);
  }

  async listOpenAttendances(locationId: string, occurrenceDate: string): Promise<AttendanceRecord[]> {
    await roundTrip();
    return this.openAt(locationId, occurrenceDate).map((row) => this.toRecord(row));
  }

  async listOpenAttendancesAt(
    locationIds: readonly string[],
    occurrenceDate: string
  ): Promise<AttendanceRecord[]> {
    await roundTrip();
    return locationIds.flatMap((id) => this.openAt(id, occurrenceDate).map((row) => this.toRecord(row)));
  }

  async listAttendanceForPerson(personId: string, since: Date): Promise<AttendanceRecord[]> {
    await roundTrip();
    return this.attendances
      .filter((a) => a.personId === personId && a.startTime >= since)
      .sort((a, b) => b.startTime.getTime() - a.startTime.getTime())
      .map((row) => this.toRecord(row));
  }

  // SecurityCodeStore

  async tryInsertCode(issueDate: string, code: string): Promise<IssuedSecurityCode | null> {
    await roundTrip();
    if (this.securityCodes.some((c) => c.issueDate === issueDate && c.code === code)) {
      return null;
    }
    const issued: IssuedSecurityCode = { id: randomUUID(), code, issueDate };
    this.securityCodes.push(issued);
    return issued;
  }

  async countCodesIssued(issueDate: string): Promise<number> {
    await roundTrip();
    return this.securityCodes.filter((c) => c.issueDate === issueDate).length;
  }

  // PickupStore

  async listAuthorizedPickups(
    childId: string,
    opts: { includeInactive: boolean }
  ): Promise<AuthorizedPickup[]> {
    await roundTrip();
    return this.authorizedPickups
      .filter((a) => a.childId === childId && (opts.includeInactive || a.isActive))
      .sort(
        (a, b) =>
          Number(b.isActive) - Number(a.isActive) || a.createdAt.getTime() - b.createdAt.getTime()
      )
      .map((a) => ({ ...a }));
  }

  async getAuthorizedPickup(id: string): Promise<AuthorizedPickup | null> {
    await roundTrip();
    const found = this.authorizedPickups.find((a) => a.id === id);
    return found ? { ...found } : null;
  }

  async findActiveAuthorization(
    childId: string,
    person: PickupPerson
  ): Promise<AuthorizedPickup | null> {
    await roundTrip();
    const found = this.matchActive(childId, person);
    return found ? { ...found } : null;
  }

  async insertAuthorizedPickup(input: NewAuthorizedPickup, now: Date): Promise<AuthorizedPickup> {
    await roundTrip();
    if (this.conflictsWithActive(input)) {
      throw new InvalidOperationError('An active authorization already exists for this person');
    }
    return { ...this.storeAuthorization(input, now) };
  }

  async updateAuthorizedPickup(
    id: string,
    patch: AuthorizedPickupPatch,
    now: Date
  ): Promise<AuthorizedPickup | null> {
    await roundTrip();
    const found = this.authorizedPickups.find((a) => a.id === id);
    if (!found) return null;
    Object.assign(found, patch, { updatedAt: now });
    return { ...found };
  }

  async deactivateAuthorizedPickup(id: string, now: Date): Promise<AuthorizedPickup | null> {
    await roundTrip();
    const found = this.authorizedPickups.find((a) => a.id === id);
    if (!found) return null;
    found.isActive = false;
    found.updatedAt = now;
    return { ...found };
  }

  async upsertStandingAuthorization(input: NewAuthorizedPickup, now: Date): Promise<boolean> {
    await roundTrip();
    if (this.conflictsWithActive(input)) return false;
    this.storeAuthorization(input, now);
    return true;
  }

  async recordPickup(entry: NewPickupLog): Promise<PickupLogEntry | null> {
    await roundTrip();
    if (this.pickupLogs.some((log) => log.attendanceId === entry.attendanceId)) {
      return null;
    }
    const stored: PickupLogEntry = { id: randomUUID(), ...entry };
    this.pickupLogs.push(stored);

    const attendance = this.attendances.find((a) => a.id === entry.attendanceId);
    if (attendance && attendance.endTime === null) {
      attendance.endTime = entry.checkoutTime;
    }
    return { ...stored };
  }

  async getPickupLogForAttendance(attendanceId: string): Promise<PickupLogEntry | null> {
    await roundTrip();
    const found = this.pickupLogs.find((log) => log.attendanceId === attendanceId);
    return found ? { ...found } : null;
  }

  async listPickupLogs(childId: string, range: PickupLogRange): Promise<PickupLogEntry[]> {
    await roundTrip();
    return this.pickupLogs
      .filter(
        (log) =>
          log.childId === childId &&
          (range.from === null || log.checkoutTime >= range.from) &&
          (range.to === null || log.checkoutTime < range.to)
      )
      .sort((a, b) => b.checkoutTime.getTime() - a.checkoutTime.getTime())
      .map((log) => ({ ...log }));
  }

  private matchOccurrence(slot: OccurrenceSlot): OccurrenceRecord | null {
    return (
      this.occurrences.find(
        (o) =>
          o.locationId === slot.locationId &&
          o.scheduleId === slot.scheduleId &&
          o.occurrenceDate === slot.occurrenceDate
      ) ?? null
    );
  }

  private occurrenceOf(row: StoredAttendance): OccurrenceRecord {
    const occurrence = this.occurrences.find((o) => o.id === row.occurrenceId);
    if (!occurrence) {
      throw new Error(`Attendance ${row.id} references a missing occurrence`);
    }
    return occurrence;
  }

  private openAt(locationId: string, occurrenceDate: string): StoredAttendance[] {
    return this.attendances.filter((a) => {
      if (a.endTime !== null) return false;
      const occurrence = this.occurrenceOf(a);
      return occurrence.locationId === locationId && occurrence.occurrenceDate === occurrenceDate;
    });
  }

  private toRecord(row: StoredAttendance): AttendanceRecord {
    const occurrence = this.occurrenceOf(row);
    const code = this.securityCodes.find((c) => c.id === row.securityCodeId);
    return {
      ...row,
      locationId: occurrence.locationId,
      occurrenceDate: occurrence.occurrenceDate,
      didAttend: true,
      securityCode: code?.code ?? null,
    };
  }

  private matchActive(childId: string, person: PickupPerson): AuthorizedPickup | undefined {
    if (person.kind === 'KNOWN_PERSON') {
      return this.authorizedPickups.find(
        (a) => a.childId === childId && a.isActive && a.authorizedPersonId === person.personId
      );
    }
    const name = person.name.trim().toLowerCase();
    return this.authorizedPickups.find(
      (a) => a.childId === childId && a.isActive && a.name?.trim().toLowerCase() === name
    );
  }

  private conflictsWithActive(input: NewAuthorizedPickup): boolean {
    if (input.authorizedPersonId !== null) {
      return this.matchActive(input.childId, {
        kind: 'KNOWN_PERSON',
        personId: input.authorizedPersonId,
      }) !== undefined;
    }
    return (
      input.name !== null &&
      this.authorizedPickups.some(
        (a) =>
          a.childId === input.childId &&
          a.isActive &&
          a.authorizedPersonId === null &&
          a.name?.trim().toLowerCase() === input.name?.trim().toLowerCase()
      )
    );
  }

  private storeAuthorization(input: NewAuthorizedPickup, now: Date): AuthorizedPickup {
    const stored: AuthorizedPickup = {
      id: randomUUID(),
      ...input,
      isActive: true,
      createdAt: now,
      updatedAt: now,
    };
    this.authorizedPickups.push(stored);
    return stored;
  }
}
