import * as fs from 'fs';
import type { ITranslationProvider } from '../interfaces/translation-provider.interface';

/**
 * Label catalog keyed by `<TypeName>:<StateOrTrigger>`. Unknown keys come
 * back unchanged.
 */
export class CatalogTranslationProvider implements ITranslationProvider {
  private readonly catalog: ReadonlyMap<string, string>;

  constructor(entries: Record<string, string> = {}) {
    this.catalog = new Map(Object.entries(entries));
  }

  /** Loads a flat JSON object of string labels. */
  static fromFile(filePath: string): CatalogTranslationProvider {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`Translation catalog ${filePath} must be a JSON object`);
    }

    const entries: Record<string, string> = {};
    for (const [key, label] of Object.entries(parsed)) {
      if (typeof label !== 'string') {
        throw new Error(
          `Translation catalog ${filePath}: label for "${key}" must be a string`,
        );
      }
      entries[key] = label;
    }

    return new CatalogTranslationProvider(entries);
  }

  translate(key: string): string {
    return this.catalog.get(key) ?? key;
  }
}
