export interface LanguageConfig {
  id: string;
  extensions: string[];
  grammarPackage: string;
  /** tree-sitter node types described at function scope */
  functionNodeTypes: string[];
  /** tree-sitter node types described at class scope */
  classNodeTypes: string[];
}

export const LANGUAGE_CONFIGS: LanguageConfig[] = [
  {
    id: 'typescript',
    extensions: ['.ts', '.tsx', '.mts', '.cts'],
    grammarPackage: 'tree-sitter-typescript',
    functionNodeTypes: ['function_declaration', 'generator_function_declaration', 'method_definition'],
    classNodeTypes: ['class_declaration', 'abstract_class_declaration', 'interface_declaration'],
  },
  {
    id: 'javascript',
    extensions: ['.js', '.jsx', '.mjs', '.cjs'],
    grammarPackage: 'tree-sitter-javascript',
    functionNodeTypes: ['function_declaration', 'generator_function_declaration', 'method_definition'],
    classNodeTypes: ['class_declaration'],
  },
  {
    id: 'python',
    extensions: ['.py'],
    grammarPackage: 'tree-sitter-python',
    functionNodeTypes: ['function_definition'],
    classNodeTypes: ['class_definition'],
  },
  {
    id: 'go',
    extensions: ['.go'],
    grammarPackage: 'tree-sitter-go',
    functionNodeTypes: ['function_declaration', 'method_declaration'],
    classNodeTypes: ['type_declaration'],
  },
  {
    id: 'rust',
    extensions: ['.rs'],
    grammarPackage: 'tree-sitter-rust',
    functionNodeTypes: ['function_item'],
    classNodeTypes: ['struct_item', 'enum_item', 'trait_item'],
  },
];

export function getLanguageConfig(extension: string): LanguageConfig | undefined {
  return LANGUAGE_CONFIGS.find(c => c.extensions.includes(extension));
}

export function getAllCodeExtensions(languages?: string[]): string[] {
  return LANGUAGE_CONFIGS.filter(c => !languages || languages.includes(c.id)).flatMap(c => c.extensions);
}
