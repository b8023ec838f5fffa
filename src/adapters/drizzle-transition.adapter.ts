import { sql, type SQL } from 'drizzle-orm';
import { EntityRowNotFoundError } from '../errors/entity-row-not-found.error';
import type {
  AuditRecord,
  EntityRef,
  NewAuditRecord,
} from '../interfaces/audit-records.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import {
  AUDIT_COLUMNS,
  AUDIT_ORDER,
  type AuditRow,
  auditTableStatements,
  toAuditRecord,
} from '../schema/audit-table';
import { assertIdentifier } from '../utils/assert-identifier';

/**
 * The part of a Drizzle PgDatabase (or PgTransaction) this adapter uses.
 */
export interface DrizzleSqlExecutor {
  execute(query: SQL): PromiseLike<unknown>;
  transaction<T>(cb: (tx: DrizzleSqlExecutor) => Promise<T>): Promise<T>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Extracts row array from a Drizzle execute() result.
 * Different PG drivers return different shapes:
 * - postgres-js: returns the array directly
 * - node-postgres: returns { rows: [...] }
 */
function extractRows(result: unknown): unknown[] {
  if (Array.isArray(result)) return result;
  if (isRecord(result) && Array.isArray(result.rows)) {
    return result.rows;
  }
  return [];
}

/**
 * node-postgres reports `rowCount`, postgres-js a `count` on the result
 * array. Undefined when the driver reports neither.
 */
function extractRowCount(result: unknown): number | undefined {
  if (!isRecord(result)) return undefined;
  if (typeof result.rowCount === 'number') return result.rowCount;
  if (typeof result.count === 'number') return result.count;
  return undefined;
}

function isAuditRow(row: unknown): row is AuditRow {
  return (
    isRecord(row) &&
    typeof row.id === 'string' &&
    typeof row.object_id === 'string' &&
    typeof row.trigger_name === 'string'
  );
}

export class DrizzleTransitionAdapter implements ITransitionDbAdapter {
  constructor(private readonly db: DrizzleSqlExecutor) {}

  async updateField(
    target: EntityRef,
    field: string,
    value: string,
  ): Promise<void> {
    assertIdentifier(target.tableName);
    assertIdentifier(field, 'column');
    const { id } = target;

    const result = await this.db.execute(
      sql`UPDATE ${sql.raw(target.tableName)} SET ${sql.raw(field)} = ${value} WHERE id = ${id}`,
    );

    if (extractRowCount(result) === 0) {
      throw new EntityRowNotFoundError(target.tableName, String(id));
    }
  }

  async insertAudit(tableName: string, data: NewAuditRecord): Promise<void> {
    assertIdentifier(tableName);

    await this.db.execute(
      sql`INSERT INTO ${sql.raw(tableName)} (object_id, object_type_name, trigger_name, source_state, dest_state, actor_id)
          VALUES (${data.objectId}, ${data.objectTypeName}, ${data.trigger}, ${data.sourceState}, ${data.destState}, ${data.actorId})`,
    );
  }

  async findAudit(
    tableName: string,
    objectTypeName: string,
    objectId: string,
  ): Promise<AuditRecord[]> {
    assertIdentifier(tableName);
    const result = await this.db.execute(
      sql`SELECT ${sql.raw(AUDIT_COLUMNS)} FROM ${sql.raw(tableName)} WHERE object_id = ${objectId} AND object_type_name = ${objectTypeName} ORDER BY ${sql.raw(AUDIT_ORDER)}`,
    );

    return extractRows(result).filter(isAuditRow).map(toAuditRecord);
  }

  async ensureAuditTable(tableName: string): Promise<void> {
    for (const statement of auditTableStatements(tableName)) {
      await this.db.execute(sql.raw(statement));
    }
  }

  async transaction<T>(
    cb: (adapter: ITransitionDbAdapter) => Promise<T>,
  ): Promise<T> {
    return this.db.transaction(async (tx) =>
      cb(new DrizzleTransitionAdapter(tx)),
    );
  }
}
