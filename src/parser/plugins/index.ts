import { ParserRegistry } from '../registry.js';
import { CodeParserPlugin } from './code/index.js';

export function createDefaultRegistry(languages?: string[]): ParserRegistry {
  const registry = new ParserRegistry();
  registry.register(new CodeParserPlugin(languages));
  return registry;
}
