import { ConfigError } from '../errors.js';
import type { DescriptionGenerator, Provider } from './generator.js';
import { MockDescriptionGenerator } from './mock.js';
import { AnthropicDescriptionGenerator, type MessagesClient } from './anthropic.js';
import { OpenAIDescriptionGenerator, type ChatCompletionsClient } from './openai.js';
import { OllamaDescriptionGenerator } from './ollama.js';

export interface GeneratorOptions {
  model?: string;
  apiKey?: string;
  /** Injected SDK client for the anthropic provider. */
  client?: MessagesClient;
  /** Injected SDK client for the openai and ollama providers. */
  chatClient?: ChatCompletionsClient;
  /** Ollama server URL. */
  host?: string;
}

export type GeneratorFactory = (options: GeneratorOptions) => DescriptionGenerator;

const factories = new Map<Provider, GeneratorFactory>([
  ['mock', () => new MockDescriptionGenerator()],
  ['anthropic', options => new AnthropicDescriptionGenerator(options)],
  ['openai', ({ model, apiKey, chatClient }) => new OpenAIDescriptionGenerator({ model, apiKey, client: chatClient })],
  ['ollama', ({ model, host, chatClient }) => new OllamaDescriptionGenerator({ model, host, client: chatClient })],
]);

export function registerGenerator(provider: Provider, factory: GeneratorFactory): void {
  factories.set(provider, factory);
}

export function createGenerator(provider: Provider, options: GeneratorOptions = {}): DescriptionGenerator {
  const factory = factories.get(provider);
  if (!factory) {
    throw new ConfigError(`No description generator registered for provider "${provider}"`, { provider });
  }
  return factory(options);
}
