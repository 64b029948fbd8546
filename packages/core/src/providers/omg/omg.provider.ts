import type {
  ModelConfig,
  ProviderMetadata,
  ProviderOptions,
  SecretStore,
} from '@chatbridge/shared';
import { ConfigStore } from '../../config/config.store.js';
import { createModelConfig } from '../../model/model.config.js';
import { OpenAICompatibleProvider } from '../openai-compatible/openai-compatible.provider.js';

export const OMG_API_URL = 'https://api.ohmygpt.com/v1';
export const OMG_DEFAULT_MODEL = 'gpt-4o';
export const OMG_KNOWN_MODELS = ['gpt-4o', 'claude-3-5-sonnet'] as const;
export const OMG_DOC_URL = 'https://docs.ohmygpt.com';
export const OMG_API_KEY = 'OMG_API_KEY';

export interface OmgProviderOptions extends ProviderOptions {
  apiKey: string;
  model: ModelConfig;
}

/** GPT and Claude models through the OhMyGPT OpenAI-compatible gateway. */
export class OmgProvider extends OpenAICompatibleProvider {
  constructor(options: OmgProviderOptions) {
    super('omg', {
      apiKey: options.apiKey,
      model: options.model,
      baseUrl: options.baseUrl ?? OMG_API_URL,
      timeoutMs: options.timeoutMs,
    });
  }

  static metadata(): ProviderMetadata {
    return {
      name: 'omg',
      displayName: 'Omg',
      description: 'Access GPT models through Omg API',
      defaultModel: OMG_DEFAULT_MODEL,
      knownModels: [...OMG_KNOWN_MODELS],
      modelDocLink: OMG_DOC_URL,
      configKeys: [{ name: OMG_API_KEY, required: true, secret: true }],
    };
  }

  /** Throws SecretNotFoundError when OMG_API_KEY is not configured. */
  static fromEnv(
    model: ModelConfig,
    secrets: SecretStore = ConfigStore.global(),
    options: ProviderOptions = {},
  ): OmgProvider {
    const apiKey = secrets.getSecret(OMG_API_KEY);
    return new OmgProvider({ ...options, apiKey, model });
  }

  /**
   * Default model with the globally configured key. Only for startup paths
   * where the key is known to exist: a missing key is fatal here.
   */
  static default(): OmgProvider {
    const model = createModelConfig(OmgProvider.metadata().defaultModel);
    try {
      return OmgProvider.fromEnv(model);
    } catch (err) {
      throw new Error('Failed to initialize Omg provider', { cause: err });
    }
  }
}
