import fs from 'node:fs';
import yaml from 'js-yaml';
import type { SecretStore } from '@chatbridge/shared';
import { ConfigError, SecretNotFoundError } from './config.errors.js';
import { secretsPath } from './config.paths.js';
import { isPlainObject } from './plain-object.js';

function readSecretsFile(file: string): Record<string, string> {
  if (!fs.existsSync(file)) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(fs.readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigError(`Failed to parse ${file}`, { cause: err });
  }
  if (!isPlainObject(parsed)) {
    return {};
  }
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Secrets resolved from the environment first, then from
 * ~/.chatbridge/secrets.yaml. The file is read on each lookup.
 */
export class ConfigStore implements SecretStore {
  private static instance: ConfigStore | null = null;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  static global(): ConfigStore {
    if (!ConfigStore.instance) {
      ConfigStore.instance = new ConfigStore();
    }
    return ConfigStore.instance;
  }

  getSecret(key: string): string {
    const fromEnv = this.env[key];
    if (fromEnv) {
      return fromEnv;
    }
    const fromFile = readSecretsFile(secretsPath())[key];
    if (fromFile) {
      return fromFile;
    }
    throw new SecretNotFoundError(key);
  }
}
