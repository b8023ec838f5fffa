import type { TransitionEngine } from '../engines/transition.engine';
import { EngineNotBoundError } from '../errors/engine-not-bound.error';
import type { EntityId } from '../interfaces/audit-records.interface';
import type {
  AvailableTrigger,
  StateDescriptor,
  TriggerDefinition,
} from '../interfaces/state-descriptor.interface';
import type { StatefulEntity } from '../interfaces/stateful-entity.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';

/**
 * Base for entities holding their state in a `state` property. Subclasses
 * supply `id`, `state` and the type's descriptor; the forwarding methods
 * need an engine bound first.
 *
 * @example
 * ```typescript
 * class Order extends StateMachineEntity<OrderState> {
 *   constructor(public readonly id: number, public state: OrderState) {
 *     super();
 *   }
 *
 *   descriptor() {
 *     return orderStates;
 *   }
 * }
 *
 * const order = engine.bind(new Order(row.id, row.state));
 * await order.do(tx, 'pay', actorId, amount);
 * ```
 */
export abstract class StateMachineEntity<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> implements StatefulEntity<TState, THandle>
{
  abstract readonly id: EntityId;
  abstract state: TState;

  private engine?: TransitionEngine;

  abstract descriptor(): StateDescriptor<TState, THandle>;

  validStates(): ReadonlySet<TState> {
    return this.descriptor().validStates;
  }

  triggers(): ReadonlyMap<string, TriggerDefinition<TState, THandle>> {
    return this.descriptor().triggers;
  }

  getState(): TState {
    return this.state;
  }

  setState(state: TState): void {
    this.state = state;
  }

  bindEngine(engine: TransitionEngine): void {
    this.engine = engine;
  }

  isBound(): boolean {
    return this.engine !== undefined;
  }

  do(
    handle: THandle,
    trigger: string,
    actorId: EntityId,
    ...args: unknown[]
  ): Promise<void> {
    return this.boundEngine().do(handle, this, trigger, actorId, ...args);
  }

  availableTriggers(): AvailableTrigger<TState, THandle>[] {
    return this.boundEngine().availableTriggers(this);
  }

  translatedState(): string {
    return this.boundEngine().translatedState(this);
  }

  private boundEngine(): TransitionEngine {
    if (!this.engine) {
      throw new EngineNotBoundError(
        this.descriptor().typeName,
        String(this.id),
      );
    }
    return this.engine;
  }
}
