import Anthropic from '@anthropic-ai/sdk';
import type { ParsedEntity } from '../model/entity.js';
import { ConfigError, GenerationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { buildUserMessage, type DescriptionGenerator, type GenerateOptions } from './generator.js';

const debug = createLogger('generator:anthropic');

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5-20250929';

/** The fields of a Messages API response this generator reads. */
export interface MessageResponse {
  content: Array<{ type: string; text?: string }>;
  stop_reason: string | null;
}

/** The part of the SDK client this generator calls. */
export interface MessagesClient {
  messages: {
    create(
      body: Anthropic.Messages.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): Promise<MessageResponse>;
  };
}

export interface AnthropicGeneratorOptions {
  /** Defaults to ANTHROPIC_API_KEY. */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  client?: MessagesClient;
}

export class AnthropicDescriptionGenerator implements DescriptionGenerator {
  readonly provider = 'anthropic' as const;
  readonly model: string;
  private readonly maxTokens: number;
  private readonly client: MessagesClient;

  constructor(options: AnthropicGeneratorOptions = {}) {
    this.model = options.model ?? DEFAULT_ANTHROPIC_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.client = options.client ?? createClient(options.apiKey);
  }

  async generate(entity: ParsedEntity, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.model;

    debug('describing %s %s with %s', entity.scope, entity.name, model);
    const response = await this.client.messages.create(
      {
        model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: buildUserMessage(entity, options.context) }],
      },
      { signal: options.signal },
    );

    const text = response.content
      .flatMap(block => (block.type === 'text' && block.text ? [block.text] : []))
      .join('\n')
      .trim();
    if (!text) {
      throw new GenerationError(entity.name, new Error(`empty response (stop_reason: ${response.stop_reason})`));
    }
    return text;
  }

  async generateBatch(entities: ParsedEntity[], options?: GenerateOptions): Promise<string[]> {
    const results: string[] = [];
    for (const entity of entities) {
      results.push(await this.generate(entity, options));
    }
    return results;
  }
}

function createClient(apiKey = process.env.ANTHROPIC_API_KEY): MessagesClient {
  if (!apiKey) {
    throw new ConfigError('The anthropic provider needs ANTHROPIC_API_KEY to be set', { provider: 'anthropic' });
  }
  return new Anthropic({ apiKey });
}
