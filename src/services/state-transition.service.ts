import { Inject, Injectable } from '@nestjs/common';
import { TransitionEngine } from '../engines/transition.engine';
import type {
  AuditRecord,
  EntityId,
} from '../interfaces/audit-records.interface';
import type { StatefulEntity } from '../interfaces/stateful-entity.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import { TRANSITION_DB_ADAPTER } from '../state-machine.constants';
import { AuditLogger } from './audit-logger.service';
import { StateDescriptorRegistry } from './state-descriptor-registry.service';

/**
 * Runs one trigger per database transaction on the module's adapter.
 * Only registered entity types are accepted.
 */
@Injectable()
export class StateTransitionService {
  constructor(
    private readonly engine: TransitionEngine,
    private readonly auditLogger: AuditLogger,
    private readonly registry: StateDescriptorRegistry,
    @Inject(TRANSITION_DB_ADAPTER)
    private readonly adapter: ITransitionDbAdapter,
  ) {}

  /**
   * Any error rolls the transaction back, including an after-hook
   * failure. The entity object keeps whatever state the engine set.
   */
  async fire<TState extends string>(
    entity: StatefulEntity<TState>,
    trigger: string,
    actorId: EntityId,
    ...args: unknown[]
  ): Promise<void> {
    this.registry.getOrThrow(entity.descriptor().typeName);

    await this.adapter.transaction((tx) =>
      this.engine.do(tx, entity, trigger, actorId, ...args),
    );
  }

  async history(
    typeName: string,
    objectId: EntityId,
  ): Promise<AuditRecord[]> {
    this.registry.getOrThrow(typeName);
    return this.auditLogger.history(this.adapter, typeName, objectId);
  }
}
