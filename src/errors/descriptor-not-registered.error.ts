export class DescriptorNotRegisteredError extends Error {
  constructor(public readonly typeName: string) {
    super(`No state descriptor registered for type "${typeName}".`);
    this.name = 'DescriptorNotRegisteredError';
  }
}
