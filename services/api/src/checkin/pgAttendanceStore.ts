import type pg from 'pg';
import { insertAuditLog } from '../audit/auditLog.js';
import { PG_UNIQUE_VIOLATION, getPgErrorCode, transaction } from '../db/index.js';
import type {
  AttendanceRecord,
  AttendanceStore,
  NewAttendance,
  OccurrenceRecord,
  OccurrenceSlot,
} from './types.js';

interface OccurrenceRow {
  id: string;
  location_id: string;
  schedule_id: string | null;
  occurrence_date: string;
}

interface AttendanceRow {
  id: string;
  person_id: string;
  occurrence_id: string;
  location_id: string;
  occurrence_date: string;
  start_time: Date;
  end_time: Date | null;
  did_attend: boolean;
  is_first_time: boolean;
  note: string | null;
  security_code_id: string | null;
  security_code: string | null;
}

const OCCURRENCE_COLUMNS = `id, location_id, schedule_id, to_char(occurrence_date, 'YYYY-MM-DD') AS occurrence_date`;

const ATTENDANCE_SELECT = `
  SELECT a.id, a.person_id, a.occurrence_id, o.location_id,
         to_char(o.occurrence_date, 'YYYY-MM-DD') AS occurrence_date,
         a.start_time, a.end_time, a.did_attend, a.is_first_time, a.note,
         a.security_code_id, sc.code AS security_code
  FROM attendances a
  JOIN attendance_occurrences o ON o.id = a.occurrence_id
  LEFT JOIN security_codes sc ON sc.id = a.security_code_id`;

const OCCURRENCE_CREATE_ATTEMPTS = 3;

function toOccurrence(row: OccurrenceRow): OccurrenceRecord {
  return {
    id: row.id,
    locationId: row.location_id,
    scheduleId: row.schedule_id,
    occurrenceDate: row.occurrence_date,
  };
}

function toAttendance(row: AttendanceRow): AttendanceRecord {
  return {
    id: row.id,
    personId: row.person_id,
    occurrenceId: row.occurrence_id,
    locationId: row.location_id,
    occurrenceDate: row.occurrence_date,
    startTime: row.start_time,
    endTime: row.end_time,
    didAttend: row.did_attend,
    isFirstTime: row.is_first_time,
    note: row.note,
    securityCodeId: row.security_code_id,
    securityCode: row.security_code,
  };
}

export class PgAttendanceStore implements AttendanceStore {
  constructor(private readonly pool: pg.Pool) {}

  async getOrCreateOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord> {
    for (let attempt = 1; attempt <= OCCURRENCE_CREATE_ATTEMPTS; attempt++) {
      const inserted = await this.pool.query<OccurrenceRow>(
        `INSERT INTO attendance_occurrences (location_id, schedule_id, occurrence_date)
         VALUES ($1, $2, $3::date)
         ON CONFLICT DO NOTHING
         RETURNING ${OCCURRENCE_COLUMNS}`,
        [slot.locationId, slot.scheduleId, slot.occurrenceDate]
      );
      const row = inserted.rows[0];
      if (row) return toOccurrence(row);

      // Lost the race: the winner's row is committed, read it.
      const existing = await this.findOccurrence(slot);
      if (existing) return existing;
    }
    throw new Error(
      `Could not create occurrence for location ${slot.locationId} on ${slot.occurrenceDate}`
    );
  }

  async findOccurrence(slot: OccurrenceSlot): Promise<OccurrenceRecord | null> {
    const result = await this.pool.query<OccurrenceRow>(
      `SELECT ${OCCURRENCE_COLUMNS}
       FROM attendance_occurrences
       WHERE location_id = $1
         AND occurrence_date = $2::date
         AND schedule_id IS NOT DISTINCT FROM $3::uuid`,
      [slot.locationId, slot.occurrenceDate, slot.scheduleId]
    );
    const row = result.rows[0];
    return row ? toOccurrence(row) : null;
  }

  async findOpenAttendance(personId: string, occurrenceId: string): Promise<AttendanceRecord | null> {
    const result = await this.pool.query<AttendanceRow>(
      `${ATTENDANCE_SELECT}
       WHERE a.person_id = $1 AND a.occurrence_id = $2 AND a.end_time IS NULL`,
      [personId, occurrenceId]
    );
    const row = result.rows[0];
    return row ? toAttendance(row) : null;
  }

  async countOpenAttendances(locationId: string, occurrenceDate: string): Promise<number> {
    const result = await this.pool.query<{ count: number }>(
      `SELECT COUNT(*)::int AS count
       FROM attendances a
       JOIN attendance_occurrences o ON o.id = a.occurrence_id
       WHERE o.location_id = $1
         AND o.occurrence_date = $2::date
         AND a.end_time IS NULL`,
      [locationId, occurrenceDate]
    );
    return result.rows[0]?.count ?? 0;
  }

  async hasAttendedLocation(personId: string, locationId: string): Promise<boolean> {
    const result = await this.pool.query<{ attended: boolean }>(
      `SELECT EXISTS (
         SELECT 1
         FROM attendances a
         JOIN attendance_occurrences o ON o.id = a.occurrence_id
         WHERE a.person_id = $1 AND o.location_id = $2 AND a.did_attend
       ) AS attended`,
      [personId, locationId]
    );
    return result.rows[0]?.attended ?? false;
  }

  async insertAttendance(input: NewAttendance): Promise<AttendanceRecord | null> {
    let attendanceId: string;
    try {
      attendanceId = await transaction(this.pool, async (client) => {
        const inserted = await client.query<{ id: string }>(
          `INSERT INTO attendances
             (person_id, occurrence_id, start_time, did_attend, is_first_time, note, security_code_id)
           VALUES ($1, $2, $3, TRUE, $4, $5, $6)
           RETURNING id`,
          [
            input.personId,
            input.occurrenceId,
            input.startTime,
            input.isFirstTime,
            input.note,
            input.securityCodeId,
          ]
        );
        const row = inserted.rows[0];
        if (!row) {
          throw new Error('Attendance insert returned no row');
        }

        await insertAuditLog(client, {
          action: 'CHECK_IN',
          entityType: 'attendance',
          entityId: row.id,
          newValue: {
            personId: input.personId,
            occurrenceId: input.occurrenceId,
            startTime: input.startTime.toISOString(),
          },
        });
        return row.id;
      });
    } catch (error) {
      // Open-attendance unique index: the person is already checked in.
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) return null;
      throw error;
    }

    return this.getAttendance(attendanceId);
  }

  async getAttendance(attendanceId: string): Promise<AttendanceRecord | null> {
    const result = await this.pool.query<AttendanceRow>(`${ATTENDANCE_SELECT} WHERE a.id = $1`, [
      attendanceId,
    ]);
    const row = result.rows[0];
    return row ? toAttendance(row) : null;
  }

  async closeAttendance(attendanceId: string, endTime: Date): Promise<AttendanceRecord | null> {
    const closed = await transaction(this.pool, async (client) => {
      const updated = await client.query<{ id: string }>(
        `UPDATE attendances
         SET end_time = GREATEST($2::timestamptz, start_time)
         WHERE id = $1 AND end_time IS NULL
         RETURNING id`,
        [attendanceId, endTime]
      );
      if (updated.rowCount === 0) return false;

      await insertAuditLog(client, {
        action: 'CHECK_OUT',
        entityType: 'attendance',
        entityId: attendanceId,
        newValue: { endTime: endTime.toISOString() },
      });
      return true;
    });

    return closed ? this.getAttendance(attendanceId) : null;
  }

  async listOpenAttendances(locationId: string, occurrenceDate: string): Promise<AttendanceRecord[]> {
    const result = await this.pool.query<AttendanceRow>(
      `${ATTENDANCE_SELECT}
       WHERE o.location_id = $1
         AND o.occurrence_date = $2::date
         AND a.end_time IS NULL`,
      [locationId, occurrenceDate]
    );
    return result.rows.map(toAttendance);
  }

  async listOpenAttendancesAt(
    locationIds: readonly string[],
    occurrenceDate: string
  ): Promise<AttendanceRecord[]> {
    if (locationIds.length === 0) return [];
    const result = await this.pool.query<AttendanceRow>(
      `${ATTENDANCE_SELECT}
       WHERE o.location_id = ANY($1::uuid[])
         AND o.occurrence_date = $2::date
         AND a.end_time IS NULL`,
      [locationIds, occurrenceDate]
    );
    return result.rows.map(toAttendance);
  }

  async listAttendanceForPerson(personId: string, since: Date): Promise<AttendanceRecord[]> {
    const result = await this.pool.query<AttendanceRow>(
      `${ATTENDANCE_SELECT}
       WHERE a.person_id = $1 AND a.start_time >= $2
       ORDER BY a.start_time DESC`,
      [personId, since]
    );
    return result.rows.map(toAttendance);
  }
}
