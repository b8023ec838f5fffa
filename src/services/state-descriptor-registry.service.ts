import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DescriptorNotRegisteredError } from '../errors/descriptor-not-registered.error';
import { DuplicateRegistrationError } from '../errors/duplicate-registration.error';
import type { StateDescriptor } from '../interfaces/state-descriptor.interface';
import type { ResolvedStateMachineOptions } from '../interfaces/state-machine-module-options.interface';
import { STATE_MACHINE_MODULE_OPTIONS } from '../state-machine.constants';
import { validateStateDescriptor } from '../utils/validate-state-descriptor';

@Injectable()
export class StateDescriptorRegistry implements OnModuleInit {
  private readonly logger = new Logger(StateDescriptorRegistry.name);
  private readonly registrations = new Map<string, StateDescriptor>();

  constructor(
    @Inject(STATE_MACHINE_MODULE_OPTIONS)
    private readonly options: Pick<ResolvedStateMachineOptions, 'descriptors'>,
  ) {}

  onModuleInit(): void {
    for (const descriptor of this.options.descriptors) {
      this.register(descriptor);
      this.logger.log(
        `Registered state descriptor: ${descriptor.typeName} -> ${descriptor.tableName}`,
      );
    }
  }

  register(descriptor: StateDescriptor): void {
    if (this.registrations.has(descriptor.typeName)) {
      throw new DuplicateRegistrationError(descriptor.typeName);
    }
    validateStateDescriptor(descriptor);
    this.registrations.set(descriptor.typeName, descriptor);
  }

  get(typeName: string): StateDescriptor | undefined {
    return this.registrations.get(typeName);
  }

  getAll(): StateDescriptor[] {
    return Array.from(this.registrations.values());
  }

  getOrThrow(typeName: string): StateDescriptor {
    const descriptor = this.registrations.get(typeName);
    if (!descriptor) {
      throw new DescriptorNotRegisteredError(typeName);
    }
    return descriptor;
  }
}
