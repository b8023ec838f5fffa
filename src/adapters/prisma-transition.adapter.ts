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

export interface PrismaRawExecutor {
  $queryRawUnsafe<T = unknown>(query: string, ...values: unknown[]): Promise<T>;
  $executeRawUnsafe(query: string, ...values: unknown[]): Promise<number>;
}

export interface PrismaTransactionRunner<TTx = PrismaRawExecutor> {
  $transaction<T>(cb: (tx: TTx) => Promise<T>): Promise<T>;
}

function hasTransactionRunner(
  executor: PrismaRawExecutor,
): executor is PrismaRawExecutor & PrismaTransactionRunner {
  return (
    '$transaction' in executor && typeof executor.$transaction === 'function'
  );
}

/**
 * Works with a PrismaClient or the interactive transaction client handed
 * to `$transaction` callbacks. The latter has no `$transaction`, so
 * nested transactions run on the same client.
 */
export class PrismaTransitionAdapter implements ITransitionDbAdapter {
  private readonly txRunner?: PrismaTransactionRunner;

  constructor(
    private readonly executor: PrismaRawExecutor,
    txRunner?: PrismaTransactionRunner,
  ) {
    this.txRunner =
      txRunner ?? (hasTransactionRunner(executor) ? executor : undefined);
  }

  async updateField(
    target: EntityRef,
    field: string,
    value: string,
  ): Promise<void> {
    assertIdentifier(target.tableName);
    assertIdentifier(field, 'column');
    const { id } = target;

    const affected = await this.executor.$executeRawUnsafe(
      `UPDATE ${target.tableName} SET ${field} = $1 WHERE id = $2`,
      value,
      id,
    );

    if (affected === 0) {
      throw new EntityRowNotFoundError(target.tableName, String(id));
    }
  }

  async insertAudit(tableName: string, data: NewAuditRecord): Promise<void> {
    assertIdentifier(tableName);

    await this.executor.$executeRawUnsafe(
      `INSERT INTO ${tableName} (object_id, object_type_name, trigger_name, source_state, dest_state, actor_id)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      data.objectId,
      data.objectTypeName,
      data.trigger,
      data.sourceState,
      data.destState,
      data.actorId,
    );
  }

  async findAudit(
    tableName: string,
    objectTypeName: string,
    objectId: string,
  ): Promise<AuditRecord[]> {
    assertIdentifier(tableName);
    const rows = await this.executor.$queryRawUnsafe<AuditRow[]>(
      `SELECT ${AUDIT_COLUMNS} FROM ${tableName} WHERE object_id = $1 AND object_type_name = $2 ORDER BY ${AUDIT_ORDER}`,
      objectId,
      objectTypeName,
    );

    return rows.map((row) => toAuditRecord(row));
  }

  async ensureAuditTable(tableName: string): Promise<void> {
    // Prepared statements take one command each
    for (const statement of auditTableStatements(tableName)) {
      await this.executor.$executeRawUnsafe(statement);
    }
  }

  async transaction<T>(
    cb: (adapter: ITransitionDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (!this.txRunner) {
      return cb(this);
    }

    return this.txRunner.$transaction(async (tx: PrismaRawExecutor) =>
      cb(new PrismaTransitionAdapter(tx)),
    );
  }
}
