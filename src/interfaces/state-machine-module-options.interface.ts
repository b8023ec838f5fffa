import type { FactoryProvider, ModuleMetadata } from '@nestjs/common';
import type { ITransitionDbAdapter } from './transition-db-adapter.interface';
import type { ITranslationProvider } from './translation-provider.interface';
import type { StateDescriptor } from './state-descriptor.interface';

export interface StateMachineModuleOptions {
  /** Database adapter instance implementing ITransitionDbAdapter */
  adapter: ITransitionDbAdapter;

  /** Label lookup for states and triggers. Default: keys returned as-is */
  translator?: ITranslationProvider;

  /** Descriptors registered on module init */
  descriptors?: StateDescriptor[];

  /** Audit table name. Default: 'state_machine_logs' */
  auditTableName?: string;

  /** Create the audit table on module init. Default: true */
  autoCreateAuditTable?: boolean;
}

export interface StateMachineModuleAsyncOptions {
  imports?: ModuleMetadata['imports'];
  useFactory: FactoryProvider<StateMachineModuleOptions>['useFactory'];
  inject?: FactoryProvider['inject'];
}

/** Options after defaults are applied. */
export interface ResolvedStateMachineOptions {
  auditTableName: string;
  autoCreateAuditTable: boolean;
  descriptors: StateDescriptor[];
}
