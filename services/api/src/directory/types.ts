import type { CapacitySettings } from '@roomsafe/shared';

export interface PersonRecord {
  id: string;
  firstName: string;
  lastName: string;
  nickName: string | null;
  /** YYYY-MM-DD */
  birthDate: string | null;
  isDeceased: boolean;
  isActive: boolean;
}

export interface LocationRecord {
  id: string;
  name: string;
  isActive: boolean;
  softCapacity: number | null;
  hardCapacity: number | null;
  /** Children per staff member; null when no ratio applies. */
  staffToChildRatio: number | null;
  overflowLocationId: string | null;
  autoAssignOverflow: boolean;
}

/** A person on the staff roster of a location. */
export interface LocationStaffAssignment {
  locationId: string;
  personId: string;
}

export interface ScheduleRecord {
  id: string;
  name: string;
  isActive: boolean;
  /** 0 = Sunday; null when the schedule has no weekly slot. */
  weeklyDayOfWeek: number | null;
  /** Minutes after local midnight. */
  weeklyStartMinute: number | null;
  checkInStartOffsetMinutes: number | null;
  checkInEndOffsetMinutes: number | null;
}

/**
 * Read-only view of the person/group/location directory owned by another system.
 */
export interface Directory {
  getPerson(personId: string): Promise<PersonRecord | null>;
  getPeople(personIds: readonly string[]): Promise<PersonRecord[]>;
  getLocation(locationId: string): Promise<LocationRecord | null>;
  getLocations(locationIds: readonly string[]): Promise<LocationRecord[]>;
  getSchedule(scheduleId: string): Promise<ScheduleRecord | null>;
  /**
   * Adults (Adult, Parent or Guardian roles) sharing a family with the child,
   * excluding the child.
   */
  listAdultFamilyMembers(childId: string): Promise<PersonRecord[]>;
  listLocationStaff(locationIds: readonly string[]): Promise<LocationStaffAssignment[]>;
}

/**
 * Capacity settings are the only location fields this service writes.
 */
export interface LocationSettingsStore {
  /** Returns null when the location does not exist. */
  updateCapacitySettings(locationId: string, settings: CapacitySettings): Promise<LocationRecord | null>;
}

export function fullNameOf(person: Pick<PersonRecord, 'firstName' | 'lastName' | 'nickName'>): string {
  return `${person.nickName ?? person.firstName} ${person.lastName}`;
}
