import type pg from 'pg';

export type AuditLogAction =
  | 'CHECK_IN'
  | 'CHECK_OUT'
  | 'PICKUP_RECORDED'
  | 'PICKUP_OVERRIDE'
  | 'AUTHORIZATION_CREATED'
  | 'AUTHORIZATION_UPDATED'
  | 'AUTHORIZATION_DEACTIVATED'
  | 'CAPACITY_SETTINGS_UPDATED';

export type AuditEntityType = 'attendance' | 'pickup_log' | 'authorized_pickup' | 'location';

export type InsertAuditLogInput = {
  actorId?: string | null;
  action: AuditLogAction;
  entityType: AuditEntityType;
  entityId: string;
  oldValue?: unknown;
  newValue?: unknown;
  metadata?: unknown;
};

function toJsonb(value: unknown): string | null {
  if (value === undefined || value === null) return null;
  return JSON.stringify(value);
}

export type AuditLogQueryFn = (text: string, params?: unknown[]) => Promise<unknown>;

/**
 * Canonical audit log writer for `audit_log`.
 * Centralizing this prevents drift (table/column name mismatches, inconsistent column sets, etc.).
 */
export async function insertAuditLogQuery(
  queryFn: AuditLogQueryFn,
  input: InsertAuditLogInput
): Promise<void> {
  await queryFn(
    `
    INSERT INTO audit_log
      (actor_id, action, entity_type, entity_id, old_value, new_value, metadata)
    VALUES
      ($1, $2, $3, $4::uuid, $5::jsonb, $6::jsonb, $7::jsonb)
    `,
    [
      input.actorId ?? null,
      input.action,
      input.entityType,
      input.entityId,
      toJsonb(input.oldValue),
      toJsonb(input.newValue),
      toJsonb(input.metadata),
    ]
  );
}

export async function insertAuditLog(
  client: pg.PoolClient,
  input: InsertAuditLogInput
): Promise<void> {
  return insertAuditLogQuery((text, params) => client.query(text, params), input);
}
