import { StateMachineEntity } from '../../src/entities/state-machine.entity';
import type { StateDescriptor } from '../../src/interfaces/state-descriptor.interface';
import type { ITransitionDbAdapter } from '../../src/interfaces/transition-db-adapter.interface';
import { defineStateDescriptor } from '../../src/utils/define-state-descriptor';

export const ORDER_STATES = ['Created', 'Paid', 'Shipped', 'Cancelled'] as const;

export type OrderState = (typeof ORDER_STATES)[number];

export function isOrderState(value: unknown): value is OrderState {
  return ORDER_STATES.some((state) => state === value);
}

export interface OrderHooks {
  before?: (tx: ITransitionDbAdapter, ...args: unknown[]) => void | Promise<void>;
  after?: (tx: ITransitionDbAdapter, ...args: unknown[]) => void | Promise<void>;
}

/**
 * `pay` takes the paid amount and only fires for a positive one.
 */
export function createOrderStates(
  hooks: OrderHooks = {},
): StateDescriptor<OrderState> {
  return defineStateDescriptor<OrderState>({
    typeName: 'Order',
    states: ORDER_STATES,
    triggers: {
      pay: {
        source: 'Created',
        dest: 'Paid',
        guard: (_tx, amount) => typeof amount === 'number' && amount > 0,
        before: hooks.before,
        after: hooks.after,
      },
      ship: { source: 'Paid', dest: 'Shipped' },
      cancel: { source: ['Created', 'Paid'], dest: 'Cancelled' },
    },
  });
}

export const orderStates = createOrderStates();

export class Order extends StateMachineEntity<OrderState> {
  constructor(
    public readonly id: number,
    public state: OrderState,
    private readonly states: StateDescriptor<OrderState> = orderStates,
  ) {
    super();
  }

  descriptor(): StateDescriptor<OrderState> {
    return this.states;
  }
}
