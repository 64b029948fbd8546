// @chatbridge/core — entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export * from './config/config.errors.js';
export { ConfigStore } from './config/config.store.js';
export { chatbridgeDir, configPath, secretsPath } from './config/config.paths.js';
export { createLogger, setLogLevel, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
export * from './messages/message.js';
export * from './model/model.config.js';
export * from './providers/provider.errors.js';
export * from './providers/formats/openai.format.js';
export { OpenAICompatibleProvider } from './providers/openai-compatible/openai-compatible.provider.js';
export type { OpenAICompatibleOptions } from './providers/openai-compatible/openai-compatible.provider.js';
export * from './providers/omg/omg.provider.js';
export * from './providers/openrouter/openrouter.provider.js';
export * from './providers/provider.factory.js';
export { initProvider } from './chatbridge.js';
