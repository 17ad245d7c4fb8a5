import type { ParsedEntity } from '../model/entity.js';

export const PROVIDERS = ['mock', 'anthropic', 'openai', 'ollama'] as const;

export type Provider = (typeof PROVIDERS)[number];

export const MAX_SOURCE_LENGTH = 8192;

export interface GenerateOptions {
  /** Extra text about the surrounding codebase, appended to the prompt. */
  context?: string;
  /** Overrides the generator's default model for this call. */
  model?: string;
  signal?: AbortSignal;
}

/**
 * Produces the description text for one entity. Failures propagate to the
 * caller; generators never substitute text of their own.
 */
export interface DescriptionGenerator {
  readonly provider: Provider;
  generate(entity: ParsedEntity, options?: GenerateOptions): Promise<string>;
  generateBatch(entities: ParsedEntity[], options?: GenerateOptions): Promise<string[]>;
}

export function isProvider(value: unknown): value is Provider {
  return typeof value === 'string' && (PROVIDERS as readonly string[]).includes(value);
}

export function buildPrompt(entity: ParsedEntity, context?: string): string {
  const suffix = context ? `\n\nContext: ${context}` : '';

  switch (entity.scope) {
    case 'function':
      return `You are a code documentation expert. Generate a clear, concise description of the following function.

Function name: ${entity.name}
Language: ${entity.language}

Provide a 1-2 sentence description of what this function does, its inputs, and its output.${suffix}`;
    case 'class':
      return `You are a code documentation expert. Generate a clear, concise description of the following class.

Class name: ${entity.name}
Language: ${entity.language}

Provide a 1-2 sentence description of this class's purpose and key functionality.${suffix}`;
    case 'module':
      return `You are a code documentation expert. Generate a clear, concise description of the following module.

Module name: ${entity.name}
Language: ${entity.language}

Provide a 2-3 sentence overview of this module's purpose and main exports.${suffix}`;
    default:
      return `Generate a concise 1-2 sentence description for this ${entity.scope} named ${entity.name} in ${entity.language}.${suffix}`;
  }
}

export function truncateSource(source: string, limit = MAX_SOURCE_LENGTH): string {
  return source.length > limit ? `${source.slice(0, limit)}\n... (truncated)` : source;
}

/** The single user message every chat-style provider sends. */
export function buildUserMessage(entity: ParsedEntity, context?: string): string {
  return `${buildPrompt(entity, context)}\n\nSource code:\n\`\`\`\n${truncateSource(entity.source)}\n\`\`\``;
}
