export type PersistenceOperation = 'update-state' | 'insert-audit';

export class PersistenceFailureError extends Error {
  constructor(
    public readonly operation: PersistenceOperation,
    cause: unknown,
  ) {
    super(
      `Persistence failure during ${operation}: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
    this.name = 'PersistenceFailureError';
  }
}
