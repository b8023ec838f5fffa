import type {
  StateDescriptor,
  StateDescriptorConfig,
  TriggerConfig,
  TriggerDefinition,
} from '../interfaces/state-descriptor.interface';
import type { ITransitionDbAdapter } from '../interfaces/transition-db-adapter.interface';
import { DEFAULT_STATE_FIELD } from '../state-machine.constants';
import { deriveTableName } from './derive-table-name';
import { validateStateDescriptor } from './validate-state-descriptor';

function toSources<TState extends string>(
  source: TState | readonly TState[],
): TState[] {
  const sources: TState[] = [];
  return sources.concat(source);
}

function toDefinition<TState extends string, THandle extends ITransitionDbAdapter>(
  name: string,
  config: TriggerConfig<TState, THandle>,
): TriggerDefinition<TState, THandle> {
  return Object.freeze({
    name,
    sourceStates: new Set(toSources(config.source)),
    destState: config.dest,
    guard: config.guard,
    before: config.before,
    after: config.after,
  });
}

/**
 * Builds the immutable descriptor for one entity type and validates that
 * every trigger only names declared states.
 *
 * @example
 * ```typescript
 * export const orderStates = defineStateDescriptor({
 *   typeName: 'Order',
 *   states: ['Created', 'Paid', 'Shipped'],
 *   triggers: {
 *     pay: { source: 'Created', dest: 'Paid' },
 *     ship: { source: 'Paid', dest: 'Shipped' },
 *   },
 * });
 * ```
 */
export function defineStateDescriptor<
  TState extends string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
>(
  config: StateDescriptorConfig<TState, THandle>,
): StateDescriptor<TState, THandle> {
  const triggers = new Map<string, TriggerDefinition<TState, THandle>>();
  for (const [name, trigger] of Object.entries(config.triggers)) {
    triggers.set(name, toDefinition(name, trigger));
  }

  const descriptor: StateDescriptor<TState, THandle> = Object.freeze({
    typeName: config.typeName,
    tableName: config.tableName ?? deriveTableName(config.typeName),
    stateField: config.stateField ?? DEFAULT_STATE_FIELD,
    validStates: new Set(config.states),
    triggers,
  });

  validateStateDescriptor(descriptor);
  return descriptor;
}
