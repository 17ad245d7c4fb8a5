import type { ParsedEntity } from '../model/entity.js';
import type { DescriptionGenerator, GenerateOptions } from './generator.js';

/** Placeholder text without a model call. Used in tests and before a provider is configured. */
export class MockDescriptionGenerator implements DescriptionGenerator {
  readonly provider = 'mock' as const;

  async generate(entity: ParsedEntity, _options?: GenerateOptions): Promise<string> {
    return mockDescription(entity);
  }

  async generateBatch(entities: ParsedEntity[], options?: GenerateOptions): Promise<string[]> {
    return Promise.all(entities.map(entity => this.generate(entity, options)));
  }
}

export function mockDescription(entity: Pick<ParsedEntity, 'scope' | 'name' | 'language' | 'filePath'>): string {
  switch (entity.scope) {
    case 'function':
      return `Function ${entity.name} in ${entity.language}.`;
    case 'class':
      return `Class ${entity.name} in ${entity.language}.`;
    case 'module':
      return `Module ${entity.name} written in ${entity.language}.`;
    case 'package':
      return `Package ${entity.name} containing related modules.`;
    case 'project':
      return `Project at ${entity.filePath}.`;
  }
}
