import type {
  ModelConfig,
  ProviderMetadata,
  ProviderOptions,
  SecretStore,
} from '@chatbridge/shared';
import { ConfigStore } from '../../config/config.store.js';
import { createModelConfig } from '../../model/model.config.js';
import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible.provider.js';

export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';
export const OPENROUTER_DEFAULT_MODEL = 'anthropic/claude-3.5-sonnet';
export const OPENROUTER_KNOWN_MODELS = [
  'anthropic/claude-3.5-sonnet',
  'openai/gpt-4o',
  'openai/gpt-4o-mini',
  'google/gemini-pro-1.5',
  'meta-llama/llama-3.1-70b-instruct',
] as const;
export const OPENROUTER_DOC_URL = 'https://openrouter.ai/models';
export const OPENROUTER_API_KEY = 'OPENROUTER_API_KEY';

// OpenRouter attributes traffic by these two headers
const ATTRIBUTION_HEADERS = {
  'HTTP-Referer': 'https://github.com/chatbridge/chatbridge',
  'X-Title': 'chatbridge',
};

export interface OpenRouterProviderOptions extends ProviderOptions {
  apiKey: string;
  model: ModelConfig;
}

export class OpenRouterProvider extends OpenAICompatibleProvider {
  constructor(options: OpenRouterProviderOptions) {
    super('openrouter', {
      apiKey: options.apiKey,
      model: options.model,
      baseUrl: options.baseUrl ?? OPENROUTER_BASE_URL,
      extraHeaders: ATTRIBUTION_HEADERS,
      timeoutMs: options.timeoutMs,
    });
  }

  static metadata(): ProviderMetadata {
    return {
      name: 'openrouter',
      displayName: 'OpenRouter',
      description: 'Router for many model providers',
      defaultModel: OPENROUTER_DEFAULT_MODEL,
      knownModels: [...OPENROUTER_KNOWN_MODELS],
      modelDocLink: OPENROUTER_DOC_URL,
      configKeys: [{ name: OPENROUTER_API_KEY, required: true, secret: true }],
    };
  }

  static fromEnv(
    model: ModelConfig,
    secrets: SecretStore = ConfigStore.global(),
    options: ProviderOptions = {},
  ): OpenRouterProvider {
    const apiKey = secrets.getSecret(OPENROUTER_API_KEY);
    return new OpenRouterProvider({ ...options, apiKey, model });
  }

  static default(): OpenRouterProvider {
    const model = createModelConfig(OpenRouterProvider.metadata().defaultModel);
    try {
      return OpenRouterProvider.fromEnv(model);
    } catch (err) {
      throw new Error('Failed to initialize OpenRouter provider', { cause: err });
    }
  }
}
