export type EntityId = string | number;

export interface AuditRecord {
  id: string;
  objectId: string;
  objectTypeName: string;
  trigger: string;
  sourceState: string;
  destState: string;
  actorId: string;
  createdAt: Date;
}

export type NewAuditRecord = Omit<AuditRecord, 'id' | 'createdAt'>;

/** Row address used for single-column updates. */
export interface EntityRef {
  tableName: string;
  id: EntityId;
}
