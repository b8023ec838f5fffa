export type HookPhase = 'before' | 'after';

/**
 * Raised when a before or after hook throws. The hook's own error is kept
 * on `cause`. After-phase failures happen once the state column is
 * already written.
 */
export class HookFailureError extends Error {
  constructor(
    public readonly phase: HookPhase,
    public readonly typeName: string,
    public readonly trigger: string,
    cause: unknown,
  ) {
    super(
      `${phase} hook of trigger "${trigger}" on ${typeName} failed: ` +
        (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    );
    this.name = 'HookFailureError';
  }
}
