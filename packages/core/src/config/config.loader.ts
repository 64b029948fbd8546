import fs from 'node:fs';
import yaml from 'js-yaml';
import type { ChatbridgeConfig } from '@chatbridge/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigError } from './config.errors.js';
import { chatbridgeDir, configPath } from './config.paths.js';
import { createLogger, isLogLevel } from '../logging/logger.js';
import { isPlainObject, type PlainObject } from './plain-object.js';

const log = createLogger('config');

function deepMerge(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const key of Object.keys(override)) {
    const overrideVal = override[key];
    const baseVal = base[key];
    if (isPlainObject(overrideVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal;
    }
  }
  return result;
}

function toPlainObject(config: ChatbridgeConfig): PlainObject {
  return { provider: { ...config.provider }, logs: { ...config.logs } };
}

function validateConfig(raw: PlainObject): ChatbridgeConfig {
  const { provider, logs } = raw;

  if (!isPlainObject(provider)) {
    throw new ConfigError('Config validation failed: provider must be a mapping');
  }
  const { name, model, timeout_ms } = provider;
  if (typeof name !== 'string' || name.length === 0) {
    throw new ConfigError('Config validation failed: provider.name must be a non-empty string');
  }
  if (typeof model !== 'string' || model.length === 0) {
    throw new ConfigError('Config validation failed: provider.model must be a non-empty string');
  }
  let timeoutMs: number | undefined;
  if (timeout_ms !== undefined) {
    if (typeof timeout_ms !== 'number' || !Number.isInteger(timeout_ms) || timeout_ms <= 0) {
      throw new ConfigError(
        'Config validation failed: provider.timeout_ms must be a positive integer',
      );
    }
    timeoutMs = timeout_ms;
  }

  const level = isPlainObject(logs) ? logs.level : undefined;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      'Config validation failed: logs.level must be one of fatal, error, warn, info, debug, trace, silent',
    );
  }

  return {
    provider: timeoutMs === undefined ? { name, model } : { name, model, timeout_ms: timeoutMs },
    logs: { level },
  };
}

export function writeConfig(config: ChatbridgeConfig): void {
  const valid = validateConfig(toPlainObject(config));
  fs.mkdirSync(chatbridgeDir(), { recursive: true });
  fs.writeFileSync(configPath(), yaml.dump(valid), 'utf8');
}

export async function loadConfig(): Promise<ChatbridgeConfig> {
  fs.mkdirSync(chatbridgeDir(), { recursive: true });

  let userConfig: PlainObject = {};
  const file = configPath();

  if (fs.existsSync(file)) {
    const raw = fs.readFileSync(file, 'utf8');
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (err) {
      throw new ConfigError(`Failed to parse ${file}`, { cause: err });
    }
    if (isPlainObject(parsed)) {
      userConfig = parsed;
    }
  } else {
    fs.writeFileSync(file, yaml.dump(DEFAULT_CONFIG), 'utf8');
    log.info({ path: file }, 'created default config');
  }

  return validateConfig(deepMerge(toPlainObject(DEFAULT_CONFIG), userConfig));
}
