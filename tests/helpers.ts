import { TransitionEngine } from '../src/engines/transition.engine';
import type { ITransitionDbAdapter } from '../src/interfaces/transition-db-adapter.interface';
import type { ITranslationProvider } from '../src/interfaces/translation-provider.interface';
import { AuditLogger } from '../src/services/audit-logger.service';
import { CatalogTranslationProvider } from '../src/translation/catalog-translation.provider';
import { DEFAULT_AUDIT_TABLE } from '../src/state-machine.constants';

export function createMockAdapter(): jest.Mocked<ITransitionDbAdapter> {
  const mockAdapter: jest.Mocked<ITransitionDbAdapter> = {
    updateField: jest.fn().mockResolvedValue(undefined),
    insertAudit: jest.fn().mockResolvedValue(undefined),
    findAudit: jest.fn().mockResolvedValue([]),
    ensureAuditTable: jest.fn().mockResolvedValue(undefined),
    transaction: jest.fn().mockImplementation(async (cb) => cb(mockAdapter)),
  };
  return mockAdapter;
}

export function createAuditLogger(
  adapter?: ITransitionDbAdapter,
  auditTableName = DEFAULT_AUDIT_TABLE,
): AuditLogger {
  return new AuditLogger({ auditTableName, autoCreateAuditTable: true }, adapter);
}

export function createEngine(
  translator: ITranslationProvider = new CatalogTranslationProvider(),
): TransitionEngine {
  return new TransitionEngine(createAuditLogger(), translator);
}
