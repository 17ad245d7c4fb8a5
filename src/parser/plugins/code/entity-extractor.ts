import { basename, extname } from 'node:path';
import type { ParsedEntity } from '../../../model/entity.js';
import { qualifyName } from '../../../model/entity.js';
import type { Scope } from '../../../model/scope.js';
import { fingerprint } from '../../../utils/hash.js';
import type { LanguageConfig } from './languages.js';
import type { TreeSitterNode, TreeSitterTree } from './grammar-loader.js';

interface VisitContext {
  filePath: string;
  config: LanguageConfig;
  entities: ParsedEntity[];
}

/** The whole file as one entity. Emitted even when no grammar is available. */
export function moduleEntity(filePath: string, language: string, content: string): ParsedEntity {
  const lines = content.split(/\r?\n/);
  const lineCount = lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
  return {
    scope: 'module',
    name: basename(filePath, extname(filePath)),
    filePath,
    startLine: 1,
    endLine: Math.max(1, lineCount),
    source: content,
    language,
    fingerprint: fingerprint(content, language),
  };
}

export function extractEntities(
  tree: TreeSitterTree,
  filePath: string,
  config: LanguageConfig,
  sourceCode: string,
): ParsedEntity[] {
  const ctx: VisitContext = { filePath, config, entities: [moduleEntity(filePath, config.id, sourceCode)] };
  for (const child of tree.rootNode.namedChildren) {
    visitNode(child, ctx, undefined);
  }
  return ctx.entities;
}

function visitNode(node: TreeSitterNode, ctx: VisitContext, parentName: string | undefined): void {
  // Describe the declaration, not the export wrapper
  if (node.type === 'export_statement') {
    const declaration = node.childForFieldName('declaration');
    if (declaration) {
      visitNode(declaration, ctx, parentName);
      return;
    }
  }

  // Decorators belong to the entity's source; scope and name come from the inner definition
  const target = node.type === 'decorated_definition' ? (node.childForFieldName('definition') ?? node) : node;

  let nextParent = parentName;
  const scope = classifyNode(target, ctx.config);
  const name = scope ? extractName(target) : undefined;

  if (scope && name) {
    const owner = receiverType(target) ?? parentName;
    const qualified = qualifyName(name, owner);
    ctx.entities.push({
      scope,
      name: qualified,
      parentName: owner,
      filePath: ctx.filePath,
      startLine: node.startPosition.row + 1,
      endLine: node.endPosition.row + 1,
      source: node.text,
      language: ctx.config.id,
      fingerprint: fingerprint(node.text, ctx.config.id),
    });
    nextParent = qualified;
  } else if (node.type === 'impl_item') {
    // Rust methods are qualified by the type they are implemented for
    const implType = node.childForFieldName('type');
    if (implType) nextParent = qualifyName(implType.text, parentName);
  }

  for (const child of target.namedChildren) {
    visitNode(child, ctx, nextParent);
  }
}

function classifyNode(node: TreeSitterNode, config: LanguageConfig): Scope | undefined {
  if (config.functionNodeTypes.includes(node.type)) return 'function';
  if (node.type === 'type_declaration') return isGoStructOrInterface(node) ? 'class' : undefined;
  if (config.classNodeTypes.includes(node.type)) return 'class';
  if ((node.type === 'lexical_declaration' || node.type === 'variable_declaration') && isFunctionLikeDeclaration(node)) {
    return 'function';
  }
  return undefined;
}

function extractName(node: TreeSitterNode): string | undefined {
  const nameNode = node.childForFieldName('name');
  if (nameNode) return nameNode.text;

  // const handler = () => {}
  if (node.type === 'lexical_declaration' || node.type === 'variable_declaration') {
    for (const child of node.namedChildren) {
      if (child.type === 'variable_declarator') {
        const declName = child.childForFieldName('name');
        if (declName) return declName.text;
      }
    }
  }

  // Go: type Calculator struct { ... }
  if (node.type === 'type_declaration') {
    for (const spec of node.namedChildren) {
      const specName = spec.type === 'type_spec' ? spec.childForFieldName('name') : null;
      if (specName) return specName.text;
    }
  }

  return undefined;
}

/** Go method receivers: `func (c *Calculator) Add(...)` belongs to Calculator. */
function receiverType(node: TreeSitterNode): string | undefined {
  if (node.type !== 'method_declaration') return undefined;
  const receiver = node.childForFieldName('receiver');
  const match = receiver ? /(\w+)(?:\[[^\]]*\])?\s*\)$/.exec(receiver.text) : null;
  return match?.[1];
}

function isGoStructOrInterface(node: TreeSitterNode): boolean {
  return node.namedChildren.some(spec => {
    if (spec.type !== 'type_spec') return false;
    const type = spec.childForFieldName('type');
    return type?.type === 'struct_type' || type?.type === 'interface_type';
  });
}

function isFunctionLikeDeclaration(node: TreeSitterNode): boolean {
  for (const child of node.namedChildren) {
    if (child.type !== 'variable_declarator') continue;

    const value = child.childForFieldName('value');
    if (value && isFunctionLikeNodeType(value.type)) {
      return true;
    }
  }

  return false;
}

function isFunctionLikeNodeType(nodeType: string): boolean {
  return (
    nodeType === 'arrow_function' ||
    nodeType === 'function' ||
    nodeType === 'function_expression' ||
    nodeType === 'generator_function'
  );
}
