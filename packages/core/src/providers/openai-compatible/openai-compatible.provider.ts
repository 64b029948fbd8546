import type {
  CompleteOptions,
  CompletionResult,
  Message,
  ModelConfig,
  Provider,
  Tool,
  Usage,
} from '@chatbridge/shared';
import type { Logger } from 'pino';
import { ConfigError } from '../../config/config.errors.js';
import { createLogger } from '../../logging/logger.js';
import {
  createRequest,
  getModel,
  getUsage,
  responseToMessage,
  type ChatCompletionRequest,
} from '../formats/openai.format.js';
import { ExecutionError, RequestFailedError, UsageError } from '../provider.errors.js';
import {
  describeError,
  emitDebugTrace,
  handleResponseOpenAICompat,
  isValidHeaderValue,
  readBody,
} from '../provider.utils.js';
import { parseModelList } from './openai-compatible.models.js';

const AVAILABILITY_TIMEOUT_MS = 5000;

export interface OpenAICompatibleOptions {
  apiKey: string;
  model: ModelConfig;
  baseUrl: string;
  /** Sent with every request, after the standard headers. */
  extraHeaders?: Record<string, string>;
  /** Per-request deadline. No deadline when unset. */
  timeoutMs?: number;
}

interface RequestScope {
  signal: AbortSignal;
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Joins the caller's signal with the optional per-request timeout into one
 * signal for a single fetch.
 */
function requestScope(timeoutMs: number | undefined, signal?: AbortSignal): RequestScope {
  const controller = new AbortController();
  let timedOut = false;
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, timeoutMs);
  const onAbort = () => controller.abort();
  if (signal?.aborted) {
    controller.abort();
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }
  return {
    signal: controller.signal,
    timedOut: () => timedOut,
    dispose: () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

/**
 * Adapter for any backend that speaks the OpenAI chat-completions protocol.
 * Instances hold no per-call state and may serve concurrent calls.
 */
export abstract class OpenAICompatibleProvider implements Provider {
  protected readonly log: Logger;
  private readonly apiKey: string;
  private readonly model: ModelConfig;
  private readonly baseUrl: string;
  private readonly extraHeaders: Readonly<Record<string, string>>;
  private readonly timeoutMs: number | undefined;

  protected constructor(component: string, options: OpenAICompatibleOptions) {
    if (options.model.modelName.trim().length === 0) {
      throw new ConfigError('Model name must be a non-empty string');
    }
    this.log = createLogger(component);
    this.apiKey = options.apiKey;
    this.model = options.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.extraHeaders = { ...options.extraHeaders };
    this.timeoutMs = options.timeoutMs;
  }

  getModelConfig(): ModelConfig {
    return this.model;
  }

  getBaseUrl(): string {
    return this.baseUrl;
  }

  protected createHeaders(): Record<string, string> {
    const authorization = `Bearer ${this.apiKey}`;
    if (!isValidHeaderValue(authorization)) {
      throw new ExecutionError('API key contains characters not allowed in an HTTP header');
    }
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Authorization: authorization,
    };
    for (const [name, value] of Object.entries(this.extraHeaders)) {
      if (!isValidHeaderValue(value)) {
        throw new ExecutionError(`Header "${name}" contains characters not allowed in an HTTP header`);
      }
      headers[name] = value;
    }
    return headers;
  }

  protected async post(payload: ChatCompletionRequest, signal?: AbortSignal): Promise<unknown> {
    const headers = this.createHeaders();

    let body: string;
    try {
      body = JSON.stringify(payload);
    } catch (err) {
      throw new ExecutionError(`Failed to encode request: ${describeError(err)}`, { cause: err });
    }

    const scope = requestScope(this.timeoutMs, signal);
    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/chat/completions`, {
          method: 'POST',
          headers,
          body,
          signal: scope.signal,
        });
      } catch (err) {
        if (scope.timedOut()) {
          throw new ExecutionError(`Request timed out after ${this.timeoutMs}ms`, { cause: err });
        }
        if (signal?.aborted) {
          throw new ExecutionError('Request aborted', { cause: err });
        }
        throw new ExecutionError(describeError(err), { cause: err });
      }
      return await handleResponseOpenAICompat(response);
    } finally {
      scope.dispose();
    }
  }

  async complete(
    system: string,
    messages: readonly Message[],
    tools: readonly Tool[],
    options: CompleteOptions = {},
  ): Promise<CompletionResult> {
    const { payload, droppedContentParts } = createRequest(this.model, system, messages, tools);
    if (droppedContentParts > 0) {
      this.log.debug({ dropped: droppedContentParts }, 'skipped content parts with no text form');
    }

    const response = await this.post(payload, options.signal);
    const message = responseToMessage(response);

    let usage: Usage;
    try {
      usage = getUsage(response);
    } catch (err) {
      if (!(err instanceof UsageError)) {
        throw err;
      }
      this.log.warn(`Failed to get usage data: ${err.message}`);
      usage = {};
    }

    const model = getModel(response, this.model.modelName);
    emitDebugTrace(this.log, payload, response, usage);
    return { message, usage: { model, usage } };
  }

  /** True when GET /models answers 2xx within five seconds. */
  async isAvailable(): Promise<boolean> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), AVAILABILITY_TIMEOUT_MS);
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: this.createHeaders(),
        signal: controller.signal,
      });
      await response.body?.cancel();
      return response.ok;
    } catch (err) {
      this.log.debug(`availability check failed: ${describeError(err)}`);
      return false;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Model ids the backend lists under GET /models, sorted. */
  async fetchSupportedModels(signal?: AbortSignal): Promise<string[]> {
    const scope = requestScope(this.timeoutMs, signal);
    try {
      let response: Response;
      try {
        response = await fetch(`${this.baseUrl}/models`, {
          headers: this.createHeaders(),
          signal: scope.signal,
        });
      } catch (err) {
        throw new ExecutionError(describeError(err), { cause: err });
      }
      const text = await readBody(response);
      if (!response.ok) {
        throw new RequestFailedError(response.status, text);
      }
      return parseModelList(text);
    } finally {
      scope.dispose();
    }
  }
}
