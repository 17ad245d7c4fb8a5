import type { Provider } from './generator.js';
import { OpenAIDescriptionGenerator, type ChatCompletionsClient } from './openai.js';

export const DEFAULT_OLLAMA_MODEL = 'llama3.2';
export const DEFAULT_OLLAMA_HOST = 'http://localhost:11434';

export interface OllamaGeneratorOptions {
  model?: string;
  /** Defaults to OLLAMA_HOST, then the local default port. */
  host?: string;
  maxTokens?: number;
  client?: ChatCompletionsClient;
}

/**
 * A local Ollama server through its OpenAI-compatible endpoint. No API key is
 * involved; the SDK still wants a non-empty one.
 */
export class OllamaDescriptionGenerator extends OpenAIDescriptionGenerator {
  readonly provider: Provider = 'ollama';
  readonly host: string;

  constructor(options: OllamaGeneratorOptions = {}) {
    const host = normalizeHost(options.host ?? process.env.OLLAMA_HOST ?? DEFAULT_OLLAMA_HOST);
    super({
      apiKey: 'ollama',
      model: options.model ?? DEFAULT_OLLAMA_MODEL,
      maxTokens: options.maxTokens,
      baseURL: `${host}/v1`,
      client: options.client,
    });
    this.host = host;
  }
}

/** `localhost:11434` and `http://localhost:11434/` both become `http://localhost:11434`. */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');
  return /^https?:\/\//.test(trimmed) ? trimmed : `http://${trimmed}`;
}
