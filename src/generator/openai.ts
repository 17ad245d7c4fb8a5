import OpenAI from 'openai';
import type { ParsedEntity } from '../model/entity.js';
import { ConfigError, GenerationError } from '../errors.js';
import { createLogger } from '../utils/logger.js';
import { buildUserMessage, type DescriptionGenerator, type GenerateOptions, type Provider } from './generator.js';

const debug = createLogger('generator:openai');

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';

/** The fields of a chat completion this generator reads. */
export interface ChatCompletionResponse {
  choices: Array<{ message: { content: string | null }; finish_reason: string | null }>;
}

/** The part of the SDK client this generator calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal },
      ): Promise<ChatCompletionResponse>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  /** Defaults to OPENAI_API_KEY. */
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  /** OpenAI-compatible endpoint, e.g. a local server's `/v1`. */
  baseURL?: string;
  client?: ChatCompletionsClient;
}

/** Chat Completions API; also the base for OpenAI-compatible servers. */
export class OpenAIDescriptionGenerator implements DescriptionGenerator {
  readonly provider: Provider = 'openai';
  readonly model: string;
  private readonly maxTokens: number;
  private readonly client: ChatCompletionsClient;

  constructor(options: OpenAIGeneratorOptions = {}) {
    this.model = options.model ?? DEFAULT_OPENAI_MODEL;
    this.maxTokens = options.maxTokens ?? 1024;
    this.client = options.client ?? createClient(options.apiKey, options.baseURL);
  }

  async generate(entity: ParsedEntity, options: GenerateOptions = {}): Promise<string> {
    const model = options.model ?? this.model;

    debug('describing %s %s with %s (%s)', entity.scope, entity.name, model, this.provider);
    const response = await this.client.chat.completions.create(
      {
        model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: buildUserMessage(entity, options.context) }],
      },
      { signal: options.signal },
    );

    const [choice] = response.choices;
    const text = choice?.message.content?.trim();
    if (!text) {
      throw new GenerationError(entity.name, new Error(`empty response (finish_reason: ${choice?.finish_reason ?? null})`));
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

function createClient(apiKey = process.env.OPENAI_API_KEY, baseURL?: string): ChatCompletionsClient {
  if (!apiKey) {
    throw new ConfigError('The openai provider needs OPENAI_API_KEY to be set', { provider: 'openai' });
  }
  return new OpenAI({ apiKey, baseURL });
}
