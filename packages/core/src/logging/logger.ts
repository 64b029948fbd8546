import { pino, type Logger } from 'pino';
import type { LogLevel } from '@chatbridge/shared';

const LOG_LEVELS: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.CHATBRIDGE_LOG_LEVEL;
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return process.env.VITEST ? 'silent' : 'info';
}

const rootLogger = pino({
  name: 'chatbridge',
  level: initialLevel(),
  redact: {
    paths: ['apiKey', 'headers.authorization', 'headers.Authorization'],
    censor: '[redacted]',
  },
});

// One child per component name
const children = new Map<string, Logger>();

/** Child logger tagged with the component that owns it. */
export function createLogger(component: string): Logger {
  let child = children.get(component);
  if (!child) {
    child = rootLogger.child({ component });
    children.set(component, child);
  }
  return child;
}

export function setLogLevel(level: LogLevel): void {
  rootLogger.level = level;
  // pino children snapshot the level at creation time
  for (const child of children.values()) {
    child.level = level;
  }
}

export { LOG_LEVELS };
export type { Logger };
