import type pg from 'pg';
import type { CapacitySettings } from '@roomsafe/shared';
import { insertAuditLog } from '../audit/auditLog.js';
import { transaction } from '../db/index.js';
import type {
  Directory,
  LocationRecord,
  LocationSettingsStore,
  LocationStaffAssignment,
  PersonRecord,
  ScheduleRecord,
} from './types.js';

interface PersonRow {
  id: string;
  first_name: string;
  last_name: string;
  nick_name: string | null;
  birth_date: string | null;
  is_deceased: boolean;
  is_active: boolean;
}

interface LocationRow {
  id: string;
  name: string;
  is_active: boolean;
  soft_capacity: number | null;
  hard_capacity: number | null;
  staff_to_child_ratio: number | null;
  overflow_location_id: string | null;
  auto_assign_overflow: boolean;
}

interface ScheduleRow {
  id: string;
  name: string;
  is_active: boolean;
  weekly_day_of_week: number | null;
  weekly_start_minute: number | null;
  check_in_start_offset_minutes: number | null;
  check_in_end_offset_minutes: number | null;
}

const PERSON_COLUMNS = `
  p.id, p.first_name, p.last_name, p.nick_name,
  to_char(p.birth_date, 'YYYY-MM-DD') AS birth_date,
  p.is_deceased, p.is_active`;

const LOCATION_COLUMNS = `
  id, name, is_active, soft_capacity, hard_capacity,
  staff_to_child_ratio, overflow_location_id, auto_assign_overflow`;

// Family roles whose members count as adults for standing authorizations.
const ADULT_ROLE_PATTERN = '(adult|parent|guardian)';

function toPerson(row: PersonRow): PersonRecord {
  return {
    id: row.id,
    firstName: row.first_name,
    lastName: row.last_name,
    nickName: row.nick_name,
    birthDate: row.birth_date,
    isDeceased: row.is_deceased,
    isActive: row.is_active,
  };
}

function toLocation(row: LocationRow): LocationRecord {
  return {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    softCapacity: row.soft_capacity,
    hardCapacity: row.hard_capacity,
    staffToChildRatio: row.staff_to_child_ratio,
    overflowLocationId: row.overflow_location_id,
    autoAssignOverflow: row.auto_assign_overflow,
  };
}

function capacitySettingsOf(location: LocationRecord): CapacitySettings {
  return {
    softCapacity: location.softCapacity,
    hardCapacity: location.hardCapacity,
    staffToChildRatio: location.staffToChildRatio,
    overflowLocationId: location.overflowLocationId,
    autoAssignOverflow: location.autoAssignOverflow,
  };
}

export class PgDirectory implements Directory, LocationSettingsStore {
  constructor(private readonly pool: pg.Pool) {}

  async getPerson(personId: string): Promise<PersonRecord | null> {
    const result = await this.pool.query<PersonRow>(
      `SELECT ${PERSON_COLUMNS} FROM people p WHERE p.id = $1`,
      [personId]
    );
    const row = result.rows[0];
    return row ? toPerson(row) : null;
  }

  async getPeople(personIds: readonly string[]): Promise<PersonRecord[]> {
    if (personIds.length === 0) return [];
    const result = await this.pool.query<PersonRow>(
      `SELECT ${PERSON_COLUMNS} FROM people p WHERE p.id = ANY($1::uuid[])`,
      [personIds]
    );
    return result.rows.map(toPerson);
  }

  async getLocation(locationId: string): Promise<LocationRecord | null> {
    const result = await this.pool.query<LocationRow>(
      `SELECT ${LOCATION_COLUMNS} FROM locations WHERE id = $1`,
      [locationId]
    );
    const row = result.rows[0];
    return row ? toLocation(row) : null;
  }

  async getLocations(locationIds: readonly string[]): Promise<LocationRecord[]> {
    if (locationIds.length === 0) return [];
    const result = await this.pool.query<LocationRow>(
      `SELECT ${LOCATION_COLUMNS} FROM locations WHERE id = ANY($1::uuid[])`,
      [locationIds]
    );
    return result.rows.map(toLocation);
  }

  async getSchedule(scheduleId: string): Promise<ScheduleRecord | null> {
    const result = await this.pool.query<ScheduleRow>(
      `SELECT id, name, is_active, weekly_day_of_week,
              (EXTRACT(HOUR FROM weekly_time_of_day) * 60
                + EXTRACT(MINUTE FROM weekly_time_of_day))::int AS weekly_start_minute,
              check_in_start_offset_minutes, check_in_end_offset_minutes
       FROM schedules
       WHERE id = $1`,
      [scheduleId]
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      id: row.id,
      name: row.name,
      isActive: row.is_active,
      weeklyDayOfWeek: row.weekly_day_of_week,
      weeklyStartMinute: row.weekly_start_minute,
      checkInStartOffsetMinutes: row.check_in_start_offset_minutes,
      checkInEndOffsetMinutes: row.check_in_end_offset_minutes,
    };
  }

  async listAdultFamilyMembers(childId: string): Promise<PersonRecord[]> {
    const result = await this.pool.query<PersonRow>(
      `SELECT DISTINCT ${PERSON_COLUMNS}
       FROM family_members child_fm
       JOIN family_members fm ON fm.family_id = child_fm.family_id
       JOIN people p ON p.id = fm.person_id
       WHERE child_fm.person_id = $1
         AND fm.person_id <> $1
         AND fm.role ~* $2
         AND p.is_active
         AND NOT p.is_deceased`,
      [childId, ADULT_ROLE_PATTERN]
    );
    return result.rows.map(toPerson);
  }

  async listLocationStaff(locationIds: readonly string[]): Promise<LocationStaffAssignment[]> {
    if (locationIds.length === 0) return [];
    const result = await this.pool.query<{ location_id: string; person_id: string }>(
      `SELECT location_id, person_id FROM location_staff WHERE location_id = ANY($1::uuid[])`,
      [locationIds]
    );
    return result.rows.map((row) => ({ locationId: row.location_id, personId: row.person_id }));
  }

  async updateCapacitySettings(
    locationId: string,
    settings: CapacitySettings
  ): Promise<LocationRecord | null> {
    return transaction(this.pool, async (client) => {
      const previous = await client.query<LocationRow>(
        `SELECT ${LOCATION_COLUMNS} FROM locations WHERE id = $1 FOR UPDATE`,
        [locationId]
      );
      const before = previous.rows[0];
      if (!before) return null;

      const updated = await client.query<LocationRow>(
        `UPDATE locations
         SET soft_capacity = $2,
             hard_capacity = $3,
             staff_to_child_ratio = $4,
             overflow_location_id = $5,
             auto_assign_overflow = $6
         WHERE id = $1
         RETURNING ${LOCATION_COLUMNS}`,
        [
          locationId,
          settings.softCapacity,
          settings.hardCapacity,
          settings.staffToChildRatio,
          settings.overflowLocationId,
          settings.autoAssignOverflow,
        ]
      );
      const row = updated.rows[0];
      if (!row) return null;

      await insertAuditLog(client, {
        action: 'CAPACITY_SETTINGS_UPDATED',
        entityType: 'location',
        entityId: locationId,
        oldValue: capacitySettingsOf(toLocation(before)),
        newValue: settings,
      });
      return toLocation(row);
    });
  }
}
