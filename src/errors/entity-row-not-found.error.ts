export class EntityRowNotFoundError extends Error {
  constructor(
    public readonly tableName: string,
    public readonly id: string,
  ) {
    super(`No row with id "${id}" in table "${tableName}".`);
    this.name = 'EntityRowNotFoundError';
  }
}
