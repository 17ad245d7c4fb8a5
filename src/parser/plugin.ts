import type { ParsedEntity } from '../model/entity.js';

export interface SourceParserPlugin {
  id: string;
  extensions: string[];
  /** Entities in source order, each with its fingerprint computed. */
  extractEntities(content: string, filePath: string): ParsedEntity[];
}
