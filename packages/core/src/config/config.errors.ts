export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class SecretNotFoundError extends ConfigError {
  readonly key: string;

  constructor(key: string) {
    super(`Secret "${key}" not found in environment or secrets file`);
    this.name = 'SecretNotFoundError';
    this.key = key;
  }
}
