import type { ModelConfig } from '@chatbridge/shared';
import { ConfigError } from '../config/config.errors.js';

const DEFAULT_CONTEXT_LIMIT = 128_000;

// Longest prefix wins
const CONTEXT_LIMITS: ReadonlyArray<[prefix: string, limit: number]> = [
  ['gpt-4o', 128_000],
  ['gpt-4-turbo', 128_000],
  ['gpt-4', 8_192],
  ['gpt-3.5-turbo', 16_385],
  ['o1', 200_000],
  ['claude-3-5-sonnet', 200_000],
  ['claude', 200_000],
  ['anthropic/claude', 200_000],
  ['openai/gpt-4o', 128_000],
  ['google/gemini', 1_000_000],
  ['meta-llama/llama-3', 128_000],
];

export function contextLimitFor(modelName: string): number {
  let best: [string, number] | undefined;
  for (const entry of CONTEXT_LIMITS) {
    if (modelName.startsWith(entry[0]) && (!best || entry[0].length > best[0].length)) {
      best = entry;
    }
  }
  return best ? best[1] : DEFAULT_CONTEXT_LIMIT;
}

export function createModelConfig(
  modelName: string,
  overrides: Omit<ModelConfig, 'modelName'> = {},
): ModelConfig {
  if (modelName.trim().length === 0) {
    throw new ConfigError('Model name must be a non-empty string');
  }
  return Object.freeze({
    modelName,
    contextLimit: overrides.contextLimit ?? contextLimitFor(modelName),
    ...(overrides.temperature !== undefined ? { temperature: overrides.temperature } : {}),
    ...(overrides.maxTokens !== undefined ? { maxTokens: overrides.maxTokens } : {}),
  });
}
