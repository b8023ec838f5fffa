import type { ITransitionDbAdapter } from './transition-db-adapter.interface';

/**
 * Guards and hooks are declared as methods so that a trigger taking
 * `(tx, amount: number)` still fits a table typed with `unknown[]` args.
 */
export interface TriggerDefinition<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  readonly name: string;
  readonly sourceStates: ReadonlySet<TState>;
  readonly destState: TState;
  /** Returning false skips the trigger silently. */
  guard?(handle: THandle, ...args: unknown[]): boolean | Promise<boolean>;
  before?(handle: THandle, ...args: unknown[]): void | Promise<void>;
  after?(handle: THandle, ...args: unknown[]): void | Promise<void>;
}

export interface StateDescriptor<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  readonly typeName: string;
  readonly tableName: string;
  readonly stateField: string;
  readonly validStates: ReadonlySet<TState>;
  readonly triggers: ReadonlyMap<string, TriggerDefinition<TState, THandle>>;
}

export interface TriggerConfig<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  /** One source state or several. */
  source: TState | readonly TState[];
  dest: TState;
  guard?(handle: THandle, ...args: unknown[]): boolean | Promise<boolean>;
  before?(handle: THandle, ...args: unknown[]): void | Promise<void>;
  after?(handle: THandle, ...args: unknown[]): void | Promise<void>;
}

export interface StateDescriptorConfig<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  typeName: string;
  /** Database table name. If omitted, derived from typeName. */
  tableName?: string;
  /** Column holding the state. Default: 'state' */
  stateField?: string;
  states: readonly TState[];
  triggers: Record<string, TriggerConfig<TState, THandle>>;
}

export interface AvailableTrigger<
  TState extends string = string,
  THandle extends ITransitionDbAdapter = ITransitionDbAdapter,
> {
  trigger: string;
  translatedTrigger: string;
  definition: TriggerDefinition<TState, THandle>;
}
