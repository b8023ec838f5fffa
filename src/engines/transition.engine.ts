import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { HookFailureError, type HookPhase } from '../errors/hook-failure.error';
import { InvalidTransitionError } from '../errors/invalid-transition.error';
import {
  PersistenceFailureError,
  type PersistenceOperation,
} from '../errors/persistence-failure.error';
import { UnknownTriggerError } from '../errors/unknown-trigger.error';
import { StateEventType } from '../events/state-event-type.enum';
import type { StateTransitionedEvent } from '../events/state-events';
import type {
  EntityId,
  NewAuditRecord,
} from '../interfaces/audit-records.interface';
import type {
  AvailableTrigger,
  StateDescriptor,
} from '../interfaces/state-descriptor.interface';
import type { StatefulEntity } from '../interfaces/stateful-entity.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import type { ITranslationProvider } from '../interfaces/translation-provider.interface';
import { AuditLogger } from '../services/audit-logger.service';
import { TRANSLATION_PROVIDER } from '../state-machine.constants';
import { validateStateDescriptor } from '../utils/validate-state-descriptor';

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Executes triggers against entities. Holds no per-entity state; the
 * caller supplies the transactional handle and owns commit/rollback.
 */
@Injectable()
export class TransitionEngine {
  private readonly logger = new Logger(TransitionEngine.name);
  private readonly validated = new WeakSet<StateDescriptor>();

  constructor(
    private readonly auditLogger: AuditLogger,
    @Inject(TRANSLATION_PROVIDER)
    private readonly translator: ITranslationProvider,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {}

  /** Wires a freshly loaded entity to this engine and returns it. */
  bind<TEntity extends Pick<StatefulEntity, 'bindEngine'>>(
    entity: TEntity,
  ): TEntity {
    entity.bindEngine(this);
    return entity;
  }

  bindAll<TEntity extends Pick<StatefulEntity, 'bindEngine'>>(
    entities: TEntity[],
  ): TEntity[] {
    return entities.map((entity) => this.bind(entity));
  }

  /**
   * Triggers firable from the entity's current state, sorted by name.
   */
  availableTriggers<TState extends string, THandle extends ITransitionDbAdapter>(
    entity: StatefulEntity<TState, THandle>,
  ): AvailableTrigger<TState, THandle>[] {
    const { typeName } = entity.descriptor();
    const current = entity.getState();

    return [...entity.triggers().entries()]
      .filter(([, definition]) => definition.sourceStates.has(current))
      .sort(([a], [b]) => compareNames(a, b))
      .map(([trigger, definition]) => ({
        trigger,
        translatedTrigger: this.translator.translate(`${typeName}:${trigger}`),
        definition,
      }));
  }

  translatedState<TState extends string, THandle extends ITransitionDbAdapter>(
    entity: StatefulEntity<TState, THandle>,
  ): string {
    const { typeName } = entity.descriptor();
    return this.translator.translate(`${typeName}:${entity.getState()}`);
  }

  /**
   * Fires `trigger` on `entity`. Resolves without any change when the
   * guard returns false.
   *
   * The state column is written before the after-hook runs, so an
   * after-hook failure leaves the new state persisted without an audit
   * record unless the surrounding transaction is rolled back.
   */
  async do<TState extends string, THandle extends ITransitionDbAdapter>(
    handle: THandle,
    entity: StatefulEntity<TState, THandle>,
    trigger: string,
    actorId: EntityId,
    ...args: unknown[]
  ): Promise<void> {
    const descriptor = entity.descriptor();
    this.assertValid(descriptor);
    const { typeName } = descriptor;

    const definition = entity.triggers().get(trigger);
    if (!definition) {
      throw new UnknownTriggerError(typeName, trigger);
    }

    const sourceState = entity.getState();
    if (!definition.sourceStates.has(sourceState)) {
      throw new InvalidTransitionError(typeName, trigger, sourceState);
    }

    if (definition.guard) {
      const allowed = await definition.guard(handle, ...args);
      if (typeof allowed !== 'boolean') {
        throw new TypeError(
          `Guard of trigger "${trigger}" on ${typeName} must return a boolean`,
        );
      }
      if (!allowed) {
        this.logger.debug(
          `${typeName} ${String(entity.id)}: trigger ${trigger} skipped by guard`,
        );
        return;
      }
    }

    await this.runHook('before', typeName, trigger, () =>
      definition.before?.(handle, ...args),
    );

    const destState = definition.destState;
    entity.setState(destState);

    await this.persist('update-state', () =>
      handle.updateField(
        { tableName: descriptor.tableName, id: entity.id },
        descriptor.stateField,
        destState,
      ),
    );

    await this.runHook('after', typeName, trigger, () =>
      definition.after?.(handle, ...args),
    );

    const record: NewAuditRecord = {
      objectId: String(entity.id),
      objectTypeName: typeName,
      trigger,
      sourceState,
      destState,
      actorId: String(actorId),
    };
    await this.persist('insert-audit', () =>
      this.auditLogger.append(handle, record),
    );

    this.logger.log(
      `${typeName} ${record.objectId}: ${trigger} ${sourceState} -> ${destState} (actor ${record.actorId})`,
    );

    this.eventEmitter?.emit(StateEventType.TRANSITIONED, {
      ...record,
      timestamp: new Date(),
    } satisfies StateTransitionedEvent);
  }

  private assertValid(descriptor: StateDescriptor): void {
    if (this.validated.has(descriptor)) return;
    validateStateDescriptor(descriptor);
    this.validated.add(descriptor);
  }

  private async runHook(
    phase: HookPhase,
    typeName: string,
    trigger: string,
    hook: () => void | Promise<void>,
  ): Promise<void> {
    try {
      await hook();
    } catch (error) {
      throw new HookFailureError(phase, typeName, trigger, error);
    }
  }

  private async persist(
    operation: PersistenceOperation,
    write: () => Promise<void>,
  ): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new PersistenceFailureError(operation, error);
    }
  }
}
