import type { Pool, PoolClient } from 'pg';
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

type PgQueryable = Pick<Pool, 'query'> | Pick<PoolClient, 'query'>;

export class PgTransitionAdapter implements ITransitionDbAdapter {
  constructor(
    private readonly pool: Pool,
    private readonly client?: PoolClient,
  ) {}

  async updateField(
    target: EntityRef,
    field: string,
    value: string,
  ): Promise<void> {
    assertIdentifier(target.tableName);
    assertIdentifier(field, 'column');
    const { id } = target;

    const result = await this.getConn().query(
      `UPDATE ${target.tableName} SET ${field} = $1 WHERE id = $2`,
      [value, id],
    );

    if (result.rowCount === 0) {
      throw new EntityRowNotFoundError(target.tableName, String(id));
    }
  }

  async insertAudit(tableName: string, data: NewAuditRecord): Promise<void> {
    assertIdentifier(tableName);

    await this.getConn().query(
      `INSERT INTO ${tableName}
       (object_id, object_type_name, trigger_name, source_state, dest_state, actor_id)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        data.objectId,
        data.objectTypeName,
        data.trigger,
        data.sourceState,
        data.destState,
        data.actorId,
      ],
    );
  }

  async findAudit(
    tableName: string,
    objectTypeName: string,
    objectId: string,
  ): Promise<AuditRecord[]> {
    assertIdentifier(tableName);

    const result = await this.getConn().query<AuditRow>(
      `SELECT ${AUDIT_COLUMNS}
       FROM ${tableName}
       WHERE object_id = $1 AND object_type_name = $2
       ORDER BY ${AUDIT_ORDER}`,
      [objectId, objectTypeName],
    );

    return result.rows.map((row) => toAuditRecord(row));
  }

  async ensureAuditTable(tableName: string): Promise<void> {
    const conn = this.getConn();
    for (const statement of auditTableStatements(tableName)) {
      await conn.query(statement);
    }
  }

  async transaction<T>(
    cb: (adapter: ITransitionDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.client) {
      return cb(this);
    }

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await cb(new PgTransitionAdapter(this.pool, client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  private getConn(): PgQueryable {
    return this.client ?? this.pool;
  }
}
