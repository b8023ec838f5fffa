import type {
  AuditRecord,
  EntityRef,
  NewAuditRecord,
} from './audit-records.interface';

export interface ITransitionDbAdapter {
  /**
   * Write a single column of one entity row, leaving every other column
   * untouched. Throws EntityRowNotFoundError when no row matches.
   */
  updateField(target: EntityRef, field: string, value: string): Promise<void>;

  /**
   * Append one audit record.
   * @param tableName - The audit table name
   */
  insertAudit(tableName: string, data: NewAuditRecord): Promise<void>;

  /**
   * Audit records of one entity, oldest first.
   */
  findAudit(
    tableName: string,
    objectTypeName: string,
    objectId: string,
  ): Promise<AuditRecord[]>;

  /**
   * Create the audit table and its indexes if they do not exist yet.
   */
  ensureAuditTable(tableName: string): Promise<void>;

  /**
   * Execute a callback within a database transaction.
   * The callback receives an adapter instance bound to the transaction.
   */
  transaction<T>(cb: (adapter: ITransitionDbAdapter) => Promise<T>): Promise<T>;
}
