// @chatbridge/shared — barrel export
export type {
  Role,
  TextContent,
  ImageContent,
  ToolCall,
  ToolRequestContent,
  ToolResponseContent,
  MessageContent,
  Message,
  Tool,
} from './message.types.js';
export type {
  ModelConfig,
  Usage,
  ProviderUsage,
  ConfigKey,
  ProviderMetadata,
  CompleteOptions,
  CompletionResult,
  Provider,
  SecretStore,
  ProviderOptions,
  ProviderClass,
} from './provider.types.js';
export type { LogLevel, ProviderSelection, ChatbridgeConfig } from './config.types.js';
