export class DuplicateRegistrationError extends Error {
  constructor(public readonly typeName: string) {
    super(
      `Duplicate state descriptor for type "${typeName}". ` +
        `Each entity type can be registered only once.`,
    );
    this.name = 'DuplicateRegistrationError';
  }
}
