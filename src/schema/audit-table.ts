import type { AuditRecord } from '../interfaces/audit-records.interface';
import { assertIdentifier } from '../utils/assert-identifier';

/**
 * DDL for the audit table, one statement per entry. Every statement is
 * idempotent so it can run on each process start.
 */
export function auditTableStatements(tableName: string): string[] {
  assertIdentifier(tableName);

  return [
    `CREATE TABLE IF NOT EXISTS ${tableName} (
    id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
    seq BIGSERIAL NOT NULL,
    object_id TEXT NOT NULL,
    object_type_name VARCHAR(64) NOT NULL,
    trigger_name VARCHAR(64) NOT NULL,
    source_state VARCHAR(64) NOT NULL,
    dest_state VARCHAR(64) NOT NULL,
    actor_id TEXT NOT NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT clock_timestamp()
)`,
    `CREATE INDEX IF NOT EXISTS idx_${tableName}_object
    ON ${tableName} (object_id, object_type_name)`,
    `CREATE INDEX IF NOT EXISTS idx_${tableName}_actor_id
    ON ${tableName} (actor_id)`,
  ];
}

/**
 * `created_at` takes the wall clock at insert time, and `seq` breaks ties
 * between rows written in the same microsecond.
 */
export const AUDIT_ORDER = 'created_at, seq';

export const AUDIT_COLUMNS =
  'id, object_id, object_type_name, trigger_name, source_state, dest_state, actor_id, created_at';

export interface AuditRow {
  id: string;
  object_id: string;
  object_type_name: string;
  trigger_name: string;
  source_state: string;
  dest_state: string;
  actor_id: string;
  created_at: Date | string;
}

export function toAuditRecord(row: AuditRow): AuditRecord {
  return {
    id: row.id,
    objectId: row.object_id,
    objectTypeName: row.object_type_name,
    trigger: row.trigger_name,
    sourceState: row.source_state,
    destState: row.dest_state,
    actorId: row.actor_id,
    createdAt: new Date(row.created_at),
  };
}
