import { DynamicModule, Module, Provider } from '@nestjs/common';
import { EventEmitterModule } from '@nestjs/event-emitter';
import { TransitionEngine } from './engines/transition.engine';
import { AuditLogger } from './services/audit-logger.service';
import { StateDescriptorRegistry } from './services/state-descriptor-registry.service';
import { StateTransitionService } from './services/state-transition.service';
import { CatalogTranslationProvider } from './translation/catalog-translation.provider';
import {
  ResolvedStateMachineOptions,
  StateMachineModuleAsyncOptions,
  StateMachineModuleOptions,
} from './interfaces/state-machine-module-options.interface';
import {
  DEFAULT_AUDIT_TABLE,
  STATE_MACHINE_ASYNC_OPTIONS,
  STATE_MACHINE_MODULE_OPTIONS,
  TRANSITION_DB_ADAPTER,
  TRANSLATION_PROVIDER,
} from './state-machine.constants';
import { assertIdentifier } from './utils/assert-identifier';

function resolveOptions(
  options: StateMachineModuleOptions,
): ResolvedStateMachineOptions {
  const auditTableName = options.auditTableName ?? DEFAULT_AUDIT_TABLE;
  assertIdentifier(auditTableName);

  return {
    auditTableName,
    autoCreateAuditTable: options.autoCreateAuditTable ?? true,
    descriptors: options.descriptors ?? [],
  };
}

const services: Provider[] = [
  AuditLogger,
  TransitionEngine,
  StateDescriptorRegistry,
  StateTransitionService,
];

const exported = [
  TransitionEngine,
  StateTransitionService,
  StateDescriptorRegistry,
  AuditLogger,
  TRANSITION_DB_ADAPTER,
  TRANSLATION_PROVIDER,
];

@Module({})
export class StateMachineModule {
  static forRoot(options: StateMachineModuleOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [EventEmitterModule.forRoot()],
      providers: [
        {
          provide: TRANSITION_DB_ADAPTER,
          useValue: options.adapter,
        },
        {
          provide: TRANSLATION_PROVIDER,
          useValue: options.translator ?? new CatalogTranslationProvider(),
        },
        {
          provide: STATE_MACHINE_MODULE_OPTIONS,
          useValue: resolveOptions(options),
        },
        ...services,
      ],
      exports: exported,
      global: true,
    };
  }

  static forRootAsync(options: StateMachineModuleAsyncOptions): DynamicModule {
    return {
      module: StateMachineModule,
      imports: [EventEmitterModule.forRoot(), ...(options.imports ?? [])],
      providers: [
        {
          provide: STATE_MACHINE_ASYNC_OPTIONS,
          useFactory: options.useFactory,
          inject: options.inject ?? [],
        },
        {
          provide: TRANSITION_DB_ADAPTER,
          useFactory: (opts: StateMachineModuleOptions) => opts.adapter,
          inject: [STATE_MACHINE_ASYNC_OPTIONS],
        },
        {
          provide: TRANSLATION_PROVIDER,
          useFactory: (opts: StateMachineModuleOptions) =>
            opts.translator ?? new CatalogTranslationProvider(),
          inject: [STATE_MACHINE_ASYNC_OPTIONS],
        },
        {
          provide: STATE_MACHINE_MODULE_OPTIONS,
          useFactory: resolveOptions,
          inject: [STATE_MACHINE_ASYNC_OPTIONS],
        },
        ...services,
      ],
      exports: exported,
      global: true,
    };
  }
}
