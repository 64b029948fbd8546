import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';

// Use a hardcoded temp path to avoid needing os.tmpdir() inside the mock
const MOCK_HOME = `/tmp/chatbridge-config-test-${process.pid}`;
const CHATBRIDGE_DIR = path.join(MOCK_HOME, '.chatbridge');
const CONFIG_PATH = path.join(CHATBRIDGE_DIR, 'config.yaml');

vi.mock('node:os', () => ({
  default: { homedir: () => MOCK_HOME },
  homedir: () => MOCK_HOME,
}));

describe('config.loader', () => {
  beforeEach(() => {
    vi.resetModules();
    if (fs.existsSync(CHATBRIDGE_DIR)) {
      fs.rmSync(CHATBRIDGE_DIR, { recursive: true });
    }
  });

  afterEach(() => {
    if (fs.existsSync(CHATBRIDGE_DIR)) {
      fs.rmSync(CHATBRIDGE_DIR, { recursive: true });
    }
  });

  it('returns defaults when config file is missing', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { DEFAULT_CONFIG } = await import('./config.defaults.js');
    const config = await loadConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('writes a default config file on first load', async () => {
    const { loadConfig } = await import('./config.loader.js');
    expect(fs.existsSync(CONFIG_PATH)).toBe(false);
    await loadConfig();
    expect(fs.readFileSync(CONFIG_PATH, 'utf8')).toBe(
      'provider:\n  name: omg\n  model: gpt-4o\nlogs:\n  level: info\n',
    );
  });

  it('loads user overrides and merges with defaults', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(
      CONFIG_PATH,
      `
provider:
  model: claude-3-5-sonnet
  timeout_ms: 30000
`,
    );

    const config = await loadConfig();
    expect(config).toEqual({
      provider: { name: 'omg', model: 'claude-3-5-sonnet', timeout_ms: 30000 },
      logs: { level: 'info' },
    });
  });

  it('handles an empty config file by using defaults', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { DEFAULT_CONFIG } = await import('./config.defaults.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, '');

    const config = await loadConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('rejects an empty model name', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, 'provider:\n  model: ""\n');

    await expect(loadConfig()).rejects.toThrow(
      'Config validation failed: provider.model must be a non-empty string',
    );
  });

  it('rejects an unknown log level', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, 'logs:\n  level: loud\n');

    await expect(loadConfig()).rejects.toThrow('logs.level must be one of');
  });

  it('rejects a non-positive timeout', async () => {
    const { loadConfig } = await import('./config.loader.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, 'provider:\n  timeout_ms: 0\n');

    await expect(loadConfig()).rejects.toThrow(
      'Config validation failed: provider.timeout_ms must be a positive integer',
    );
  });

  it('reports unparseable YAML as a ConfigError', async () => {
    const { loadConfig } = await import('./config.loader.js');
    const { ConfigError } = await import('./config.errors.js');
    fs.mkdirSync(CHATBRIDGE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, 'provider: [unclosed\n');

    await expect(loadConfig()).rejects.toBeInstanceOf(ConfigError);
  });

  it('writeConfig() round-trips through loadConfig()', async () => {
    const { loadConfig, writeConfig } = await import('./config.loader.js');
    writeConfig({ provider: { name: 'openrouter', model: 'openai/gpt-4o' }, logs: { level: 'debug' } });

    const config = await loadConfig();
    expect(config).toEqual({
      provider: { name: 'openrouter', model: 'openai/gpt-4o' },
      logs: { level: 'debug' },
    });
  });
});
