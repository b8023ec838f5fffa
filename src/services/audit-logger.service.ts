import {
  Inject,
  Injectable,
  Logger,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import type {
  AuditRecord,
  EntityId,
  NewAuditRecord,
} from '../interfaces/audit-records.interface';
import type { ResolvedStateMachineOptions } from '../interfaces/state-machine-module-options.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import {
  STATE_MACHINE_MODULE_OPTIONS,
  TRANSITION_DB_ADAPTER,
} from '../state-machine.constants';

export type AuditLoggerOptions = Pick<
  ResolvedStateMachineOptions,
  'auditTableName' | 'autoCreateAuditTable'
>;

@Injectable()
export class AuditLogger implements OnModuleInit {
  private readonly logger = new Logger(AuditLogger.name);

  constructor(
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    private readonly options: AuditLoggerOptions,
    @Optional()
    @Inject(TRANSITION_DB_ADAPTER)
    private readonly adapter?: ITransitionDbAdapter,
  ) {}

  get tableName(): string {
    return this.options.auditTableName;
  }

  async onModuleInit(): Promise<void> {
    if (!this.options.autoCreateAuditTable) {
      this.logger.log('Audit table creation disabled by configuration');
      return;
    }
    if (!this.adapter) {
      this.logger.warn('No transition adapter provided, audit table not created');
      return;
    }

    await this.adapter.ensureAuditTable(this.options.auditTableName);
    this.logger.log(`Audit table ready: ${this.options.auditTableName}`);
  }

  /**
   * Writes through the caller's handle so the record shares the state
   * update's transaction. Errors propagate; nothing is retried here.
   */
  async append(
    handle: ITransitionDbAdapter,
    record: NewAuditRecord,
  ): Promise<void> {
    await handle.insertAudit(this.options.auditTableName, record);
  }

  async history(
    handle: ITransitionDbAdapter,
    objectTypeName: string,
    objectId: EntityId,
  ): Promise<AuditRecord[]> {
    return handle.findAudit(
      this.options.auditTableName,
      objectTypeName,
      String(objectId),
    );
  }
}
