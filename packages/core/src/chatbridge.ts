import type { Provider, SecretStore } from '@chatbridge/shared';
import { loadConfig } from './config/config.loader.js';
import { ConfigStore } from './config/config.store.js';
import { setLogLevel } from './logging/logger.js';
import { createProviderFromConfig } from './providers/provider.factory.js';

/**
 * Load ~/.chatbridge/config.yaml, apply its log level and build the
 * provider it selects.
 */
export async function initProvider(secrets: SecretStore = ConfigStore.global()): Promise<Provider> {
  const config = await loadConfig();
  setLogLevel(config.logs.level);
  return createProviderFromConfig(config, secrets);
}
