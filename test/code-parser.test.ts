import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { CodeParserPlugin } from '../src/parser/plugins/code/index.js';
import { moduleEntity } from '../src/parser/plugins/code/entity-extractor.js';
import { loadGrammar, loadParser } from '../src/parser/plugins/code/grammar-loader.js';
import { getLanguageConfig } from '../src/parser/plugins/code/languages.js';
import { createDefaultRegistry } from '../src/parser/plugins/index.js';
import { fingerprint } from '../src/utils/hash.js';

const fixture = (name: string) => readFileSync(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');

function requireGrammar(extension: string): void {
  const config = getLanguageConfig(extension);
  if (!config) throw new Error(`no language config for ${extension}`);
  if (!loadParser()) throw new Error('tree-sitter did not load; install the optional dependencies');
  loadGrammar(config, extension);
}

describe('moduleEntity', () => {
  it('spans the whole file', () => {
    const entity = moduleEntity('pkg/util.py', 'python', 'a = 1\nb = 2\n');
    expect(entity).toEqual({
      scope: 'module',
      name: 'util',
      filePath: 'pkg/util.py',
      startLine: 1,
      endLine: 2,
      source: 'a = 1\nb = 2\n',
      language: 'python',
      fingerprint: fingerprint('a = 1\nb = 2\n', 'python'),
    });
  });
});

describe('default registry', () => {
  it('covers the configured languages only', () => {
    const registry = createDefaultRegistry(['python']);
    expect(registry.supports('a.py')).toBe(true);
    expect(registry.supports('a.ts')).toBe(false);
    expect(registry.parseFile('x', 'notes.md')).toEqual([]);
  });

  it('always yields the module entity first', () => {
    const [first] = new CodeParserPlugin().extractEntities(fixture('calc.py'), 'calc.py');
    expect(first).toMatchObject({ scope: 'module', name: 'calc', startLine: 1, endLine: 16 });
  });
});

describe('CodeParserPlugin (python)', () => {
  it('loads the python grammar', () => {
    expect(() => requireGrammar('.py')).not.toThrow();
  });

  const entities = new CodeParserPlugin().extractEntities(fixture('calc.py'), 'calc.py');

  it('extracts classes, methods and nested functions with qualified names', () => {
    expect(entities.map(e => [e.scope, e.name, e.startLine, e.endLine])).toEqual([
      ['module', 'calc', 1, 16],
      ['class', 'Calculator', 4, 10],
      ['function', 'Calculator.add', 5, 6],
      ['function', 'Calculator.hypot', 8, 10],
      ['function', 'main', 13, 16],
      ['function', 'main.helper', 14, 15],
    ]);
  });

  it('includes decorators in the source', () => {
    const hypot = entities.find(e => e.name === 'Calculator.hypot');
    expect(hypot?.source.startsWith('@staticmethod')).toBe(true);
    expect(hypot?.parentName).toBe('Calculator');
  });

  it('fingerprints each entity from its own source', () => {
    for (const entity of entities) {
      expect(entity.fingerprint).toBe(fingerprint(entity.source, 'python'));
    }
  });
});

describe('CodeParserPlugin (typescript)', () => {
  it('loads the typescript grammar', () => {
    expect(() => requireGrammar('.ts')).not.toThrow();
  });

  it('unwraps exports and treats arrow constants as functions', () => {
    const entities = new CodeParserPlugin().extractEntities(fixture('greeter.ts'), 'src/greeter.ts');
    expect(entities.map(e => [e.scope, e.name])).toEqual([
      ['module', 'greeter'],
      ['class', 'Greeter'],
      ['function', 'Greeter.greet'],
      ['function', 'shout'],
    ]);
  });
});
