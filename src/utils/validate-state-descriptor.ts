import type { StateDescriptor } from '../interfaces/state-descriptor.interface';
import { assertIdentifier } from './assert-identifier';

function assertKnownState(
  descriptor: StateDescriptor,
  state: string,
  trigger: string,
  role: 'source' | 'destination',
): void {
  if (!descriptor.validStates.has(state)) {
    throw new Error(
      `State descriptor ${descriptor.typeName}: trigger "${trigger}" has unknown ${role} state "${state}"`,
    );
  }
}

export function validateStateDescriptor(descriptor: StateDescriptor): void {
  if (!descriptor.typeName || typeof descriptor.typeName !== 'string') {
    throw new Error('State descriptor typeName must be a non-empty string');
  }

  assertIdentifier(descriptor.tableName, 'table');
  assertIdentifier(descriptor.stateField, 'column');

  if (descriptor.validStates.size === 0) {
    throw new Error(
      `State descriptor ${descriptor.typeName}: at least one state is required`,
    );
  }

  for (const [key, trigger] of descriptor.triggers) {
    if (trigger.name !== key) {
      throw new Error(
        `State descriptor ${descriptor.typeName}: trigger "${key}" is registered under a different name "${trigger.name}"`,
      );
    }

    if (trigger.sourceStates.size === 0) {
      throw new Error(
        `State descriptor ${descriptor.typeName}: trigger "${key}" has no source states`,
      );
    }

    for (const source of trigger.sourceStates) {
      assertKnownState(descriptor, source, key, 'source');
    }
    assertKnownState(descriptor, trigger.destState, key, 'destination');
  }
}
