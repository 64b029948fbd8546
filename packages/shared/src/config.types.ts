export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface ProviderSelection {
  name: string;
  model: string;
  timeout_ms?: number;
}

export interface ChatbridgeConfig {
  provider: ProviderSelection;
  logs: {
    level: LogLevel;
  };
}
