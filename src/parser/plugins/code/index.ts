import type { SourceParserPlugin } from '../../plugin.js';
import type { ParsedEntity } from '../../../model/entity.js';
import { getAllCodeExtensions, getLanguageConfig } from './languages.js';
import { loadGrammar, loadParser } from './grammar-loader.js';
import { extractEntities, moduleEntity } from './entity-extractor.js';
import { getExtension } from '../../../utils/path.js';
import { createLogger } from '../../../utils/logger.js';

const debug = createLogger('parser');

export class CodeParserPlugin implements SourceParserPlugin {
  id = 'code';
  extensions: string[];

  constructor(languages?: string[]) {
    this.extensions = getAllCodeExtensions(languages);
  }

  extractEntities(content: string, filePath: string): ParsedEntity[] {
    const ext = getExtension(filePath);
    const config = getLanguageConfig(ext);
    if (!config) return [];

    const ParserClass = loadParser();
    if (!ParserClass) {
      debug('tree-sitter not available, %s parsed as a single module', filePath);
      return [moduleEntity(filePath, config.id, content)];
    }

    let grammar: unknown;
    try {
      grammar = loadGrammar(config, ext);
    } catch (err) {
      debug('%s', err instanceof Error ? err.message : String(err));
      return [moduleEntity(filePath, config.id, content)];
    }

    const parser = new ParserClass();
    parser.setLanguage(grammar);

    // The default 32 KiB buffer rejects larger files
    const tree = parser.parse(content, null, { bufferSize: Math.max(32 * 1024, content.length * 2) });
    return extractEntities(tree, filePath, config, content);
  }
}
