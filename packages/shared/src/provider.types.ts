import type { Message, Tool } from './message.types.js';

export interface ModelConfig {
  readonly modelName: string;
  readonly contextLimit?: number;
  readonly temperature?: number;
  readonly maxTokens?: number;
}

/** Token accounting. A counter the backend did not report stays undefined. */
export interface Usage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface ProviderUsage {
  /** Model name reported by the backend, or the requested one */
  model: string;
  usage: Usage;
}

export interface ConfigKey {
  name: string;
  required: boolean;
  secret: boolean;
  default?: string;
}

export interface ProviderMetadata {
  name: string;
  displayName: string;
  description: string;
  defaultModel: string;
  knownModels: string[];
  modelDocLink: string;
  configKeys: ConfigKey[];
}

export interface CompleteOptions {
  signal?: AbortSignal;
}

export interface CompletionResult {
  message: Message;
  usage: ProviderUsage;
}

export interface Provider {
  getModelConfig(): ModelConfig;
  /** One round trip to the backend. Never mutates `messages` or `tools`. */
  complete(
    system: string,
    messages: readonly Message[],
    tools: readonly Tool[],
    options?: CompleteOptions,
  ): Promise<CompletionResult>;
}

/** Read-only view of the process secret configuration. */
export interface SecretStore {
  getSecret(key: string): string;
}

/** Connection overrides accepted by every provider factory. */
export interface ProviderOptions {
  baseUrl?: string;
  timeoutMs?: number;
}

/** Static side of a provider implementation. */
export interface ProviderClass {
  metadata(): ProviderMetadata;
  fromEnv(model: ModelConfig, secrets?: SecretStore, options?: ProviderOptions): Provider;
}
