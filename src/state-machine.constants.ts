export const STATE_MACHINE_MODULE_OPTIONS = 'STATE_MACHINE_MODULE_OPTIONS';
export const TRANSITION_DB_ADAPTER = 'TRANSITION_DB_ADAPTER';
export const TRANSLATION_PROVIDER = 'TRANSLATION_PROVIDER';

export const DEFAULT_AUDIT_TABLE = 'state_machine_logs';
export const DEFAULT_STATE_FIELD = 'state';
export const STATE_MACHINE_ASYNC_OPTIONS = 'STATE_MACHINE_ASYNC_OPTIONS';
