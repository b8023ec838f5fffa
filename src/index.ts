import 'reflect-metadata';

// Module
export { StateMachineModule } from './state-machine.module';

// Engine and entities
export { TransitionEngine } from './engines/transition.engine';
export { StateMachineEntity } from './entities/state-machine.entity';

// Services
export { AuditLogger } from './services/audit-logger.service';
export type { AuditLoggerOptions } from './services/audit-logger.service';
export { StateDescriptorRegistry } from './services/state-descriptor-registry.service';
export { StateTransitionService } from './services/state-transition.service';

// Descriptors
export { defineStateDescriptor } from './utils/define-state-descriptor';
export { validateStateDescriptor } from './utils/validate-state-descriptor';
export { deriveTableName } from './utils/derive-table-name';

// Translation
export { CatalogTranslationProvider } from './translation/catalog-translation.provider';

// Interfaces
export type {
  AvailableTrigger,
  StateDescriptor,
  StateDescriptorConfig,
  TriggerConfig,
  TriggerDefinition,
} from './interfaces/state-descriptor.interface';
export type { StatefulEntity } from './interfaces/stateful-entity.interface';
export type { ITransitionDbAdapter } from './interfaces/transition-db-adapter.interface';
export type { ITranslationProvider } from './interfaces/translation-provider.interface';
export type {
  AuditRecord,
  EntityId,
  EntityRef,
  NewAuditRecord,
} from './interfaces/audit-records.interface';
export type {
  StateMachineModuleOptions,
  StateMachineModuleAsyncOptions,
} from './interfaces/state-machine-module-options.interface';

// Adapters
export { DrizzleTransitionAdapter } from './adapters/drizzle-transition.adapter';
export type { DrizzleSqlExecutor } from './adapters/drizzle-transition.adapter';
export { InMemoryTransitionAdapter } from './adapters/in-memory-transition.adapter';
export type { InMemoryRow } from './adapters/in-memory-transition.adapter';
export { PgTransitionAdapter } from './adapters/pg-transition.adapter';
export { PrismaTransitionAdapter } from './adapters/prisma-transition.adapter';
export type {
  PrismaRawExecutor,
  PrismaTransactionRunner,
} from './adapters/prisma-transition.adapter';

// Errors
export { UnknownTriggerError } from './errors/unknown-trigger.error';
export { InvalidTransitionError } from './errors/invalid-transition.error';
export { HookFailureError } from './errors/hook-failure.error';
export type { HookPhase } from './errors/hook-failure.error';
export { PersistenceFailureError } from './errors/persistence-failure.error';
export type { PersistenceOperation } from './errors/persistence-failure.error';
export { EntityRowNotFoundError } from './errors/entity-row-not-found.error';
export { EngineNotBoundError } from './errors/engine-not-bound.error';
export { DuplicateRegistrationError } from './errors/duplicate-registration.error';
export { DescriptorNotRegisteredError } from './errors/descriptor-not-registered.error';

// Events
export { StateEventType } from './events/state-event-type.enum';
export type { StateTransitionedEvent } from './events/state-events';

// Schema and CLI
export { auditTableStatements } from './schema/audit-table';
export { generateMigration } from './cli/generate-migration';

// Constants
export {
  STATE_MACHINE_MODULE_OPTIONS,
  TRANSITION_DB_ADAPTER,
  TRANSLATION_PROVIDER,
  DEFAULT_AUDIT_TABLE,
  DEFAULT_STATE_FIELD,
} from './state-machine.constants';
