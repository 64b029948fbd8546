import path from 'node:path';
import os from 'node:os';

export function chatbridgeDir(): string {
  return path.join(os.homedir(), '.chatbridge');
}

export function configPath(): string {
  return path.join(chatbridgeDir(), 'config.yaml');
}

export function secretsPath(): string {
  return path.join(chatbridgeDir(), 'secrets.yaml');
}
