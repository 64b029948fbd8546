import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

const MOCK_HOME = `/tmp/chatbridge-secrets-test-${process.pid}`;
const CHATBRIDGE_DIR = path.join(MOCK_HOME, '.chatbridge');
const SECRETS_PATH = path.join(CHATBRIDGE_DIR, 'secrets.yaml');

vi.mock('node:os', () => ({
  default: { homedir: () => MOCK_HOME },
  homedir: () => MOCK_HOME,
}));

describe('ConfigStore', () => {
  beforeEach(() => {
    vi.resetModules();
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(CHATBRIDGE_DIR, { recursive: true, force: true });
  });

  it('prefers the environment', async () => {
    const { ConfigStore } = await import('./config.store.js');
    fs.writeFileSync(SECRETS_PATH, 'OMG_API_KEY: from-file\n');
    const store = new ConfigStore({ OMG_API_KEY: 'from-env' });
    expect(store.getSecret('OMG_API_KEY')).toBe('from-env');
  });

  it('falls back to the secrets file', async () => {
    const { ConfigStore } = await import('./config.store.js');
    fs.writeFileSync(SECRETS_PATH, 'OMG_API_KEY: from-file\n');
    const store = new ConfigStore({});
    expect(store.getSecret('OMG_API_KEY')).toBe('from-file');
  });

  it('throws SecretNotFoundError naming the key', async () => {
    const { ConfigStore } = await import('./config.store.js');
    const { SecretNotFoundError } = await import('./config.errors.js');
    const store = new ConfigStore({});

    const error = (() => {
      try {
        store.getSecret('OMG_API_KEY');
        return undefined;
      } catch (err) {
        return err;
      }
    })();

    expect(error).toBeInstanceOf(SecretNotFoundError);
    expect(error).toMatchObject({ key: 'OMG_API_KEY' });
  });

  it('ignores non-string values in the secrets file', async () => {
    const { ConfigStore } = await import('./config.store.js');
    fs.writeFileSync(SECRETS_PATH, 'OMG_API_KEY: 12345\n');
    const store = new ConfigStore({});
    expect(() => store.getSecret('OMG_API_KEY')).toThrow('Secret "OMG_API_KEY" not found');
  });

  it('global() returns one shared instance', async () => {
    const { ConfigStore } = await import('./config.store.js');
    expect(ConfigStore.global()).toBe(ConfigStore.global());
  });
});
