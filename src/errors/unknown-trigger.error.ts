export class UnknownTriggerError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly trigger: string,
  ) {
    super(`Trigger "${trigger}" is not declared for ${typeName}.`);
    this.name = 'UnknownTriggerError';
  }
}
