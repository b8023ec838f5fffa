import { randomUUID } from 'crypto';
import { EntityRowNotFoundError } from '../errors/entity-row-not-found.error';
import type {
  AuditRecord,
  EntityId,
  EntityRef,
  NewAuditRecord,
} from '../interfaces/audit-records.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import { assertIdentifier } from '../utils/assert-identifier';

export type InMemoryRow = Record<string, unknown> & { id: EntityId };

export interface InMemoryState {
  rowsByTable: Map<string, Map<string, InMemoryRow>>;
  auditByTable: Map<string, AuditRecord[]>;
}

function cloneRow(row: InMemoryRow): InMemoryRow {
  return { ...row };
}

function cloneAuditRecord(record: AuditRecord): AuditRecord {
  return { ...record, createdAt: new Date(record.createdAt) };
}

function createEmptyState(): InMemoryState {
  return {
    rowsByTable: new Map<string, Map<string, InMemoryRow>>(),
    auditByTable: new Map<string, AuditRecord[]>(),
  };
}

function cloneState(state: InMemoryState): InMemoryState {
  const rowsByTable = new Map<string, Map<string, InMemoryRow>>();
  for (const [tableName, rows] of state.rowsByTable.entries()) {
    const clonedRows = new Map<string, InMemoryRow>();
    for (const [id, row] of rows.entries()) {
      clonedRows.set(id, cloneRow(row));
    }
    rowsByTable.set(tableName, clonedRows);
  }

  const auditByTable = new Map<string, AuditRecord[]>();
  for (const [tableName, records] of state.auditByTable.entries()) {
    auditByTable.set(tableName, records.map(cloneAuditRecord));
  }

  return { rowsByTable, auditByTable };
}

function rowsOf(state: InMemoryState, tableName: string): Map<string, InMemoryRow> {
  const table = state.rowsByTable.get(tableName);
  if (table) return table;

  const next = new Map<string, InMemoryRow>();
  state.rowsByTable.set(tableName, next);
  return next;
}

function auditOf(state: InMemoryState, tableName: string): AuditRecord[] {
  const table = state.auditByTable.get(tableName);
  if (table) return table;

  const next: AuditRecord[] = [];
  state.auditByTable.set(tableName, next);
  return next;
}

/** A write that can be applied to any copy of the state. */
type InMemoryWrite = (state: InMemoryState) => void;

/**
 * Keeps entity rows and audit records in process. A transaction reads
 * and writes a private copy of the state and journals its writes; commit
 * replays the journal onto the live state, so concurrent transactions on
 * different rows do not overwrite each other.
 */
export class InMemoryTransitionAdapter implements ITransitionDbAdapter {
  private readonly state: InMemoryState;

  constructor(
    state?: InMemoryState,
    private readonly journal?: InMemoryWrite[],
  ) {
    this.state = state ?? createEmptyState();
  }

  /** Stores a row as-is, replacing any row with the same id. */
  seedRow(tableName: string, row: InMemoryRow): void {
    assertIdentifier(tableName);
    rowsOf(this.state, tableName).set(String(row.id), cloneRow(row));
  }

  findRow(tableName: string, id: EntityId): InMemoryRow | null {
    assertIdentifier(tableName);
    const row = rowsOf(this.state, tableName).get(String(id));
    return row ? cloneRow(row) : null;
  }

  async updateField(
    target: EntityRef,
    field: string,
    value: string,
  ): Promise<void> {
    assertIdentifier(target.tableName);
    assertIdentifier(field, 'column');
    const id = String(target.id);

    if (!rowsOf(this.state, target.tableName).has(id)) {
      throw new EntityRowNotFoundError(target.tableName, id);
    }
    this.apply((state) => {
      const row = rowsOf(state, target.tableName).get(id);
      if (row) row[field] = value;
    });
  }

  async insertAudit(tableName: string, data: NewAuditRecord): Promise<void> {
    assertIdentifier(tableName);

    const record: AuditRecord = {
      id: randomUUID(),
      objectId: data.objectId,
      objectTypeName: data.objectTypeName,
      trigger: data.trigger,
      sourceState: data.sourceState,
      destState: data.destState,
      actorId: data.actorId,
      createdAt: new Date(),
    };
    this.apply((state) => {
      auditOf(state, tableName).push(cloneAuditRecord(record));
    });
  }

  async findAudit(
    tableName: string,
    objectTypeName: string,
    objectId: string,
  ): Promise<AuditRecord[]> {
    assertIdentifier(tableName);

    return auditOf(this.state, tableName)
      .filter(
        (record) =>
          record.objectId === objectId &&
          record.objectTypeName === objectTypeName,
      )
      .map(cloneAuditRecord);
  }

  async ensureAuditTable(tableName: string): Promise<void> {
    assertIdentifier(tableName);
    this.apply((state) => {
      auditOf(state, tableName);
    });
  }

  async transaction<T>(
    cb: (adapter: ITransitionDbAdapter) => Promise<T>,
  ): Promise<T> {
    if (this.journal) {
      return cb(this);
    }

    const journal: InMemoryWrite[] = [];
    const result = await cb(
      new InMemoryTransitionAdapter(cloneState(this.state), journal),
    );
    for (const write of journal) {
      write(this.state);
    }
    return result;
  }

  private apply(write: InMemoryWrite): void {
    write(this.state);
    this.journal?.push(write);
  }
}
