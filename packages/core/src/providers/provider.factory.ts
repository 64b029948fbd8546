import type {
  ChatbridgeConfig,
  ModelConfig,
  Provider,
  ProviderClass,
  ProviderMetadata,
  SecretStore,
} from '@chatbridge/shared';
import { ConfigError } from '../config/config.errors.js';
import { ConfigStore } from '../config/config.store.js';
import { createModelConfig } from '../model/model.config.js';
import { OmgProvider } from './omg/omg.provider.js';
import { OpenRouterProvider } from './openrouter/openrouter.provider.js';

export const PROVIDERS: ReadonlyMap<string, ProviderClass> = new Map<string, ProviderClass>([
  ['omg', OmgProvider],
  ['openrouter', OpenRouterProvider],
]);

/** Metadata of every registered provider; constructs nothing. */
export function providersMetadata(): ProviderMetadata[] {
  return [...PROVIDERS.values()].map((provider) => provider.metadata());
}

export function createProvider(
  name: string,
  model?: ModelConfig,
  secrets: SecretStore = ConfigStore.global(),
  timeoutMs?: number,
): Provider {
  const providerClass = PROVIDERS.get(name);
  if (!providerClass) {
    throw new ConfigError(`Unknown provider: ${name}`);
  }
  const modelConfig = model ?? createModelConfig(providerClass.metadata().defaultModel);
  return providerClass.fromEnv(modelConfig, secrets, { timeoutMs });
}

export function createProviderFromConfig(
  config: ChatbridgeConfig,
  secrets: SecretStore = ConfigStore.global(),
): Provider {
  const { name, model, timeout_ms } = config.provider;
  return createProvider(name, createModelConfig(model), secrets, timeout_ms);
}
