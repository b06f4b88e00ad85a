import type pg from 'pg';
import {
  AuthorizationLevelSchema,
  PickupRelationshipSchema,
  type AuthorizedPickup,
  type PickupLogEntry,
  type PickupPerson,
} from '@roomsafe/shared';
import { insertAuditLog } from '../audit/auditLog.js';
import { PG_UNIQUE_VIOLATION, getPgErrorCode, transaction } from '../db/index.js';
import { InvalidOperationError } from '../errors/domain.js';
import type {
  AuthorizedPickupPatch,
  NewAuthorizedPickup,
  NewPickupLog,
  PickupLogRange,
  PickupStore,
} from './types.js';

interface AuthorizedPickupRow {
  id: string;
  child_id: string;
  authorized_person_id: string | null;
  name: string | null;
  phone_number: string | null;
  relationship: string;
  authorization_level: string;
  photo_url: string | null;
  custody_notes: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

interface PickupLogRow {
  id: string;
  attendance_id: string;
  child_id: string;
  pickup_person_id: string | null;
  pickup_person_name: string | null;
  was_authorized: boolean;
  authorized_pickup_id: string | null;
  supervisor_override: boolean;
  supervisor_person_id: string | null;
  checkout_time: Date;
  notes: string | null;
}

const AUTHORIZED_PICKUP_COLUMNS = `
  id, child_id, authorized_person_id, name, phone_number, relationship,
  authorization_level, photo_url, custody_notes, is_active, created_at, updated_at`;

const PICKUP_LOG_COLUMNS = `
  id, attendance_id, child_id, pickup_person_id, pickup_person_name, was_authorized,
  authorized_pickup_id, supervisor_override, supervisor_person_id, checkout_time, notes`;

const PATCH_COLUMNS: Record<keyof AuthorizedPickupPatch, string> = {
  name: 'name',
  phoneNumber: 'phone_number',
  relationship: 'relationship',
  authorizationLevel: 'authorization_level',
  photoUrl: 'photo_url',
  custodyNotes: 'custody_notes',
};

const DUPLICATE_AUTHORIZATION_MESSAGE = 'An active authorization already exists for this person';

function toAuthorizedPickup(row: AuthorizedPickupRow): AuthorizedPickup {
  return {
    id: row.id,
    childId: row.child_id,
    authorizedPersonId: row.authorized_person_id,
    name: row.name,
    phoneNumber: row.phone_number,
    relationship: PickupRelationshipSchema.parse(row.relationship),
    authorizationLevel: AuthorizationLevelSchema.parse(row.authorization_level),
    photoUrl: row.photo_url,
    custodyNotes: row.custody_notes,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toPickupLog(row: PickupLogRow): PickupLogEntry {
  return {
    id: row.id,
    attendanceId: row.attendance_id,
    childId: row.child_id,
    pickupPersonId: row.pickup_person_id,
    pickupPersonName: row.pickup_person_name,
    wasAuthorized: row.was_authorized,
    authorizedPickupId: row.authorized_pickup_id,
    supervisorOverride: row.supervisor_override,
    supervisorPersonId: row.supervisor_person_id,
    checkoutTime: row.checkout_time,
    notes: row.notes,
  };
}

function isPatchKey(key: string): key is keyof AuthorizedPickupPatch {
  return key in PATCH_COLUMNS;
}

export class PgPickupStore implements PickupStore {
  constructor(private readonly pool: pg.Pool) {}

  async listAuthorizedPickups(
    childId: string,
    opts: { includeInactive: boolean }
  ): Promise<AuthorizedPickup[]> {
    const result = await this.pool.query<AuthorizedPickupRow>(
      `SELECT ${AUTHORIZED_PICKUP_COLUMNS}
       FROM authorized_pickups
       WHERE child_id = $1 AND ($2::boolean OR is_active)
       ORDER BY is_active DESC, created_at ASC`,
      [childId, opts.includeInactive]
    );
    return result.rows.map(toAuthorizedPickup);
  }

  async getAuthorizedPickup(id: string): Promise<AuthorizedPickup | null> {
    const result = await this.pool.query<AuthorizedPickupRow>(
      `SELECT ${AUTHORIZED_PICKUP_COLUMNS} FROM authorized_pickups WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    return row ? toAuthorizedPickup(row) : null;
  }

  async findActiveAuthorization(
    childId: string,
    person: PickupPerson
  ): Promise<AuthorizedPickup | null> {
    const result =
      person.kind === 'KNOWN_PERSON'
        ? await this.pool.query<AuthorizedPickupRow>(
            `SELECT ${AUTHORIZED_PICKUP_COLUMNS}
             FROM authorized_pickups
             WHERE child_id = $1 AND authorized_person_id = $2 AND is_active`,
            [childId, person.personId]
          )
        : await this.pool.query<AuthorizedPickupRow>(
            `SELECT ${AUTHORIZED_PICKUP_COLUMNS}
             FROM authorized_pickups
             WHERE child_id = $1 AND lower(btrim(name)) = lower(btrim($2)) AND is_active
             ORDER BY authorized_person_id NULLS FIRST
             LIMIT 1`,
            [childId, person.name]
          );
    const row = result.rows[0];
    return row ? toAuthorizedPickup(row) : null;
  }

  async insertAuthorizedPickup(input: NewAuthorizedPickup, now: Date): Promise<AuthorizedPickup> {
    try {
      return await transaction(this.pool, async (client) => {
        const result = await client.query<AuthorizedPickupRow>(
          `INSERT INTO authorized_pickups
             (child_id, authorized_person_id, name, phone_number, relationship,
              authorization_level, photo_url, custody_notes, created_at, updated_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $9)
           RETURNING ${AUTHORIZED_PICKUP_COLUMNS}`,
          [
            input.childId,
            input.authorizedPersonId,
            input.name,
            input.phoneNumber,
            input.relationship,
            input.authorizationLevel,
            input.photoUrl,
            input.custodyNotes,
            now,
          ]
        );
        const row = result.rows[0];
        if (!row) {
          throw new Error('Authorized pickup insert returned no row');
        }
        await insertAuditLog(client, {
          action: 'AUTHORIZATION_CREATED',
          entityType: 'authorized_pickup',
          entityId: row.id,
          newValue: input,
        });
        return toAuthorizedPickup(row);
      });
    } catch (error) {
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new InvalidOperationError(DUPLICATE_AUTHORIZATION_MESSAGE);
      }
      throw error;
    }
  }

  async updateAuthorizedPickup(
    id: string,
    patch: AuthorizedPickupPatch,
    now: Date
  ): Promise<AuthorizedPickup | null> {
    const assignments: string[] = [];
    const params: unknown[] = [id, now];
    for (const [key, value] of Object.entries(patch)) {
      if (!isPatchKey(key) || value === undefined) continue;
      params.push(value);
      assignments.push(`${PATCH_COLUMNS[key]} = $${params.length}`);
    }

    try {
      return await transaction(this.pool, async (client) => {
        const result = await client.query<AuthorizedPickupRow>(
          `UPDATE authorized_pickups
           SET ${[...assignments, 'updated_at = $2'].join(', ')}
           WHERE id = $1
           RETURNING ${AUTHORIZED_PICKUP_COLUMNS}`,
          params
        );
        const row = result.rows[0];
        if (!row) return null;
        await insertAuditLog(client, {
          action: 'AUTHORIZATION_UPDATED',
          entityType: 'authorized_pickup',
          entityId: id,
          newValue: patch,
        });
        return toAuthorizedPickup(row);
      });
    } catch (error) {
      if (getPgErrorCode(error) === PG_UNIQUE_VIOLATION) {
        throw new InvalidOperationError(DUPLICATE_AUTHORIZATION_MESSAGE);
      }
      throw error;
    }
  }

  async deactivateAuthorizedPickup(id: string, now: Date): Promise<AuthorizedPickup | null> {
    return transaction(this.pool, async (client) => {
      const result = await client.query<AuthorizedPickupRow>(
        `UPDATE authorized_pickups
         SET is_active = FALSE, updated_at = $2
         WHERE id = $1
         RETURNING ${AUTHORIZED_PICKUP_COLUMNS}`,
        [id, now]
      );
      const row = result.rows[0];
      if (!row) return null;
      await insertAuditLog(client, {
        action: 'AUTHORIZATION_DEACTIVATED',
        entityType: 'authorized_pickup',
        entityId: id,
      });
      return toAuthorizedPickup(row);
    });
  }

  async upsertStandingAuthorization(input: NewAuthorizedPickup, now: Date): Promise<boolean> {
    return transaction(this.pool, async (client) => {
      const result = await client.query<{ id: string }>(
        `INSERT INTO authorized_pickups
           (child_id, authorized_person_id, name, phone_number, relationship,
            authorization_level, photo_url, custody_notes, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $9)
         ON CONFLICT (child_id, authorized_person_id)
           WHERE is_active AND authorized_person_id IS NOT NULL
           DO NOTHING
         RETURNING id`,
        [
          input.childId,
          input.authorizedPersonId,
          input.name,
          input.phoneNumber,
          input.relationship,
          input.authorizationLevel,
          input.photoUrl,
          input.custodyNotes,
          now,
        ]
      );
      const row = result.rows[0];
      if (!row) return false;
      await insertAuditLog(client, {
        action: 'AUTHORIZATION_CREATED',
        entityType: 'authorized_pickup',
        entityId: row.id,
        newValue: input,
        metadata: { source: 'auto-populate' },
      });
      return true;
    });
  }

  async recordPickup(entry: NewPickupLog): Promise<PickupLogEntry | null> {
    return transaction(this.pool, async (client) => {
      const inserted = await client.query<PickupLogRow>(
        `INSERT INTO pickup_logs
           (attendance_id, child_id, pickup_person_id, pickup_person_name, was_authorized,
            authorized_pickup_id, supervisor_override, supervisor_person_id, checkout_time, notes)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
         ON CONFLICT ON CONSTRAINT uq_pickup_logs_attendance DO NOTHING
         RETURNING ${PICKUP_LOG_COLUMNS}`,
        [
          entry.attendanceId,
          entry.childId,
          entry.pickupPersonId,
          entry.pickupPersonName,
          entry.wasAuthorized,
          entry.authorizedPickupId,
          entry.supervisorOverride,
          entry.supervisorPersonId,
          entry.checkoutTime,
          entry.notes,
        ]
      );
      const row = inserted.rows[0];
      if (!row) return null;

      await client.query(
        `UPDATE attendances
         SET end_time = GREATEST($2::timestamptz, start_time)
         WHERE id = $1 AND end_time IS NULL`,
        [entry.attendanceId, entry.checkoutTime]
      );

      await insertAuditLog(client, {
        actorId: entry.supervisorPersonId,
        action: entry.supervisorOverride ? 'PICKUP_OVERRIDE' : 'PICKUP_RECORDED',
        entityType: 'pickup_log',
        entityId: row.id,
        newValue: { attendanceId: entry.attendanceId, wasAuthorized: entry.wasAuthorized },
      });

      return toPickupLog(row);
    });
  }

  async getPickupLogForAttendance(attendanceId: string): Promise<PickupLogEntry | null> {
    const result = await this.pool.query<PickupLogRow>(
      `SELECT ${PICKUP_LOG_COLUMNS} FROM pickup_logs WHERE attendance_id = $1`,
      [attendanceId]
    );
    const row = result.rows[0];
    return row ? toPickupLog(row) : null;
  }

  async listPickupLogs(childId: string, range: PickupLogRange): Promise<PickupLogEntry[]> {
    const result = await this.pool.query<PickupLogRow>(
      `SELECT ${PICKUP_LOG_COLUMNS}
       FROM pickup_logs
       WHERE child_id = $1
         AND ($2::timestamptz IS NULL OR checkout_time >= $2)
         AND ($3::timestamptz IS NULL OR checkout_time < $3)
       ORDER BY checkout_time DESC`,
      [childId, range.from, range.to]
    );
    return result.rows.map(toPickupLog);
  }
}
