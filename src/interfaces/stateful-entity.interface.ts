import type { TransitionEngine } from '../engines/transition.engine';
import type { EntityId } from './audit-records.interface';
import type {
  StateDescriptor,
  TriggerDefinition,
} from './state-descriptor.interface';
import type { ITransitionDbAdapter } from './transition-db-adapter.interface';

/**
 * What an entity type exposes to take part in transitions. Implemented
 * per type; StateMachineEntity covers the common case.
 */
export interface StatefulEntity<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  readonly id: EntityId;
  descriptor(): StateDescriptor<TState, THandle>;
  validStates(): ReadonlySet<TState>;
  triggers(): ReadonlyMap<string, TriggerDefinition<TState, THandle>>;
  getState(): TState;
  setState(state: TState): void;
  /** Called once per loaded entity, before any forwarding call. */
  bindEngine(engine: TransitionEngine): void;
}
