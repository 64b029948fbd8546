import type { Logger } from 'pino';
import type { Usage } from '@chatbridge/shared';
import { ExecutionError, RequestFailedError } from './provider.errors.js';

// Visible ASCII plus horizontal tab
const HEADER_VALUE_RE = /^[\t\x20-\x7e]*$/;

export function isValidHeaderValue(value: string): boolean {
  return HEADER_VALUE_RE.test(value);
}

export function describeError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  // undici reports socket problems as "fetch failed" with the real reason in `cause`
  if (err.cause instanceof Error && err.cause.message && err.cause.message !== err.message) {
    return `${err.message}: ${err.cause.message}`;
  }
  return err.message;
}

export async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (err) {
    throw new ExecutionError(`Failed to read response body: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/**
 * Non-2xx becomes RequestFailedError carrying the body exactly as received.
 * A 2xx body must be JSON.
 */
export async function handleResponseOpenAICompat(response: Response): Promise<unknown> {
  const text = await readBody(response);
  if (!response.ok) {
    throw new RequestFailedError(response.status, text);
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new ExecutionError(`Response body is not valid JSON: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export function emitDebugTrace(
  log: Logger,
  payload: unknown,
  response: unknown,
  usage: Usage,
): void {
  log.debug({ input: payload, output: response, usage }, 'completion trace');
}
