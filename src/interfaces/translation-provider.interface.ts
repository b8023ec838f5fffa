/**
 * Resolves display labels. Keys have the form `<TypeName>:<StateOrTrigger>`.
 */
export interface ITranslationProvider {
  translate(key: string): string;
}
