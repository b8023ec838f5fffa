export class InvalidTransitionError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly trigger: string,
    public readonly currentState: string,
  ) {
    super(
      `Cannot fire trigger "${trigger}" on ${typeName} in state "${currentState}".`,
    );
    this.name = 'InvalidTransitionError';
  }
}
