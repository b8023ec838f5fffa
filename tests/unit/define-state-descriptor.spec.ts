import type { StateDescriptor } from '../../src/interfaces/state-descriptor.interface';
import { defineStateDescriptor } from '../../src/utils/define-state-descriptor';
import { validateStateDescriptor } from '../../src/utils/validate-state-descriptor';
import { orderStates } from '../fixtures/order';

describe('defineStateDescriptor', () => {
  it('should derive table name and state field defaults', () => {
    expect(orderStates.typeName).toBe('Order');
    expect(orderStates.tableName).toBe('orders');
    expect(orderStates.stateField).toBe('state');
    expect([...orderStates.validStates]).toEqual([
      'Created',
      'Paid',
      'Shipped',
      'Cancelled',
    ]);
  });

  it('should keep an explicit table name and state field', () => {
    const descriptor = defineStateDescriptor({
      typeName: 'Invoice',
      tableName: 'billing_invoices',
      stateField: 'status',
      states: ['Draft', 'Sent'],
      triggers: { send: { source: 'Draft', dest: 'Sent' } },
    });

    expect(descriptor.tableName).toBe('billing_invoices');
    expect(descriptor.stateField).toBe('status');
  });

  it('should accept a single source state or a list', () => {
    const pay = orderStates.triggers.get('pay');
    const cancel = orderStates.triggers.get('cancel');

    expect(pay && [...pay.sourceStates]).toEqual(['Created']);
    expect(cancel && [...cancel.sourceStates]).toEqual(['Created', 'Paid']);
    expect(cancel?.destState).toBe('Cancelled');
    expect(cancel?.name).toBe('cancel');
  });

  it('should freeze the descriptor and its trigger definitions', () => {
    expect(Object.isFrozen(orderStates)).toBe(true);
    expect(Object.isFrozen(orderStates.triggers.get('ship'))).toBe(true);
  });

  it('should reject an unknown source state', () => {
    expect(() =>
      defineStateDescriptor({
        typeName: 'Order',
        states: ['Created', 'Paid'],
        triggers: { pay: { source: ['Created', 'Pending'], dest: 'Paid' } },
      }),
    ).toThrow('State descriptor Order: trigger "pay" has unknown source state "Pending"');
  });

  it('should reject an unknown destination state', () => {
    expect(() =>
      defineStateDescriptor({
        typeName: 'Order',
        states: ['Created', 'Paid'],
        triggers: { refund: { source: 'Paid', dest: 'Refunded' } },
      }),
    ).toThrow('State descriptor Order: trigger "refund" has unknown destination state "Refunded"');
  });

  it('should reject a trigger without source states', () => {
    expect(() =>
      defineStateDescriptor({
        typeName: 'Order',
        states: ['Created', 'Paid'],
        triggers: { pay: { source: [], dest: 'Paid' } },
      }),
    ).toThrow('State descriptor Order: trigger "pay" has no source states');
  });

  it('should reject a descriptor without states', () => {
    expect(() =>
      defineStateDescriptor({ typeName: 'Order', states: [], triggers: {} }),
    ).toThrow('State descriptor Order: at least one state is required');
  });

  it('should reject an empty type name', () => {
    expect(() =>
      defineStateDescriptor({
        typeName: '',
        tableName: 'orders',
        states: ['Created'],
        triggers: {},
      }),
    ).toThrow('State descriptor typeName must be a non-empty string');
  });

  it('should reject a state field that is not a plain identifier', () => {
    expect(() =>
      defineStateDescriptor({
        typeName: 'Order',
        stateField: 'state; DROP TABLE orders',
        states: ['Created'],
        triggers: {},
      }),
    ).toThrow(
      'Invalid column name "state; DROP TABLE orders". Only alphanumeric characters and underscores are allowed.',
    );
  });
});

describe('validateStateDescriptor', () => {
  it('should reject a trigger stored under another name', () => {
    const pay = orderStates.triggers.get('pay');
    if (!pay) throw new Error('fixture has no pay trigger');
    const descriptor: StateDescriptor<string> = {
      ...orderStates,
      triggers: new Map([['checkout', pay]]),
    };

    expect(() => validateStateDescriptor(descriptor)).toThrow(
      'State descriptor Order: trigger "checkout" is registered under a different name "pay"',
    );
  });

  it('should accept the order descriptor', () => {
    expect(() => validateStateDescriptor(orderStates)).not.toThrow();
  });
});
