export class EngineNotBoundError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly id: string,
  ) {
    super(
      `${typeName} ${id} is not bound to a TransitionEngine. ` +
        `Call engine.bind(entity) after loading it.`,
    );
    this.name = 'EngineNotBoundError';
  }
}
