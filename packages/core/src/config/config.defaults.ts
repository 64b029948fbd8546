import type { ChatbridgeConfig } from '@chatbridge/shared';

export const DEFAULT_CONFIG: ChatbridgeConfig = {
  provider: {
    name: 'omg',
    model: 'gpt-4o',
  },
  logs: {
    level: 'info',
  },
};
