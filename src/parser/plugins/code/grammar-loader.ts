import { createRequire } from 'node:module';
import type { LanguageConfig } from './languages.js';

// Native tree-sitter packages are CommonJS
const require = createRequire(import.meta.url);

export interface TreeSitterPoint {
  row: number;
  column: number;
}

export interface TreeSitterNode {
  type: string;
  text: string;
  startPosition: TreeSitterPoint;
  endPosition: TreeSitterPoint;
  namedChildren: TreeSitterNode[];
  childForFieldName(name: string): TreeSitterNode | null;
}

export interface TreeSitterTree {
  rootNode: TreeSitterNode;
}

export interface TreeSitterParser {
  setLanguage(language: unknown): void;
  parse(input: string, oldTree?: TreeSitterTree | null, options?: { bufferSize?: number }): TreeSitterTree;
}

export type TreeSitterParserClass = new () => TreeSitterParser;

// Lazy-loaded Parser; null once loading failed
let parserClass: TreeSitterParserClass | null | undefined;

function isParserClass(value: unknown): value is TreeSitterParserClass {
  return typeof value === 'function';
}

export function loadParser(): TreeSitterParserClass | null {
  if (parserClass === undefined) {
    try {
      const mod: unknown = require('tree-sitter');
      parserClass = isParserClass(mod) ? mod : null;
    } catch {
      parserClass = null;
    }
  }
  return parserClass;
}

// Lazy-loaded grammar cache
const grammarCache = new Map<string, unknown>();

export function loadGrammar(config: LanguageConfig, extension: string): unknown {
  const cacheKey = config.grammarPackage === 'tree-sitter-typescript'
    ? (extension === '.tsx' ? 'tsx' : 'typescript')
    : config.id;

  const cached = grammarCache.get(cacheKey);
  if (cached !== undefined) return cached;

  try {
    let grammar: unknown;

    if (config.grammarPackage === 'tree-sitter-typescript') {
      // tree-sitter-typescript exports { typescript, tsx }
      const pkg: unknown = require('tree-sitter-typescript');
      if (typeof pkg !== 'object' || pkg === null || !('typescript' in pkg) || !('tsx' in pkg)) {
        throw new Error('unexpected tree-sitter-typescript exports');
      }
      grammarCache.set('typescript', pkg.typescript);
      grammarCache.set('tsx', pkg.tsx);
      grammar = extension === '.tsx' ? pkg.tsx : pkg.typescript;
    } else {
      grammar = require(config.grammarPackage);
    }

    grammarCache.set(cacheKey, grammar);
    return grammar;
  } catch (err) {
    throw new Error(`Failed to load grammar for ${config.id} (${extension}): ${err instanceof Error ? err.message : String(err)}`);
  }
}
