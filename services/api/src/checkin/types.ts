export interface OccurrenceSlot {
  locationId: string;
  scheduleId: string | null;
  /** YYYY-MM-DD */
  occurrenceDate: string;
}

export interface OccurrenceRecord extends OccurrenceSlot {
  id: string;
}

export interface AttendanceRecord {
  id: string;
  personId: string;
  occurrenceId: string;
  locationId: string;
  occurrenceDate: string;
  startTime: Date;
  endTime: Date | null;
  didAttend: boolean;
  isFirstTime: boolean;
  note: string | null;
  securityCodeId: string | null;
  securityCode: string | null;
}

export interface NewAttendance {
  personId: string;
  occurrenceId: string;
  startTime: Date;
  isFirstTime: boolean;
  note: string | null;
  securityCodeId: string | null;
}

/**
 * Persistence for occurrences and attendance rows. Attendance rows are never
 * deleted; check-out only sets the end time.
 */
export interface AttendanceStore {
  /** Safe under concurrent callers: every caller gets the same row. */
  getOrCreateOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord>;
  findOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord | null>;
  findOpenAttendance(personId: string, occurrenceId: string): Promise<AttendanceRecord | null>;
  /** Open attendances across every occurrence of the location on that date. */
  countOpenAttendances(locationId: string, occurrenceDate: string): Promise<number>;
  hasAttendedLocation(personId: string, locationId: string): Promise<boolean>;
  /** Returns null when the person already holds an open attendance for the occurrence. */
  insertAttendance(input: NewAttendance): Promise<AttendanceRecord | null>;
  getAttendance(attendanceId: string): Promise<AttendanceRecord | null>;
  /** Returns null when the attendance is missing or already closed. */
  closeAttendance(attendanceId: string, endTime: Date): Promise<AttendanceRecord | null>;
  listOpenAttendances(locationId: string, occurrenceDate: string): Promise<AttendanceRecord[]>;
  /** Open attendances at any of the locations on that date, in no particular order. */
  listOpenAttendancesAt(locationIds: readonly string[], occurrenceDate: string): Promise<AttendanceRecord[]>;
  /** Attendances started at or after `since`, most recent first. */
  listAttendanceForPerson(personId: string, since: Date): Promise<AttendanceRecord[]>;
}
