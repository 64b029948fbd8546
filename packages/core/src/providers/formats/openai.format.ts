import { z } from 'zod';
import type {
  Message,
  MessageContent,
  ModelConfig,
  Role,
  Tool,
  Usage,
} from '@chatbridge/shared';
import { createMessage, textContent } from '../../messages/message.js';
import { ExecutionError, UsageError } from '../provider.errors.js';
import { isPlainObject } from '../../config/plain-object.js';

export type WireRole = 'system' | Role;

export interface WireMessage {
  role: WireRole;
  content: string;
}

export interface WireTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ChatCompletionRequest {
  model: string;
  messages: WireMessage[];
  tools?: WireTool[];
  temperature?: number;
  max_tokens?: number;
}

export interface BuiltRequest {
  payload: ChatCompletionRequest;
  /** Content parts with no wire representation (images, tool traffic). */
  droppedContentParts: number;
}

const ROLE_MAP: Record<Role, WireRole> = {
  user: 'user',
  assistant: 'assistant',
};

/**
 * One wire message per text part, text copied verbatim. Every other content
 * type is left out and counted.
 */
export function formatMessages(messages: readonly Message[]): {
  messages: WireMessage[];
  dropped: number;
} {
  const out: WireMessage[] = [];
  let dropped = 0;
  for (const message of messages) {
    const role = ROLE_MAP[message.role];
    for (const part of message.content) {
      if (part.type === 'text') {
        out.push({ role, content: part.text });
      } else {
        dropped++;
      }
    }
  }
  return { messages: out, dropped };
}

export function formatTools(tools: readonly Tool[]): WireTool[] {
  return tools.map((tool): WireTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

export function createRequest(
  model: ModelConfig,
  system: string,
  messages: readonly Message[],
  tools: readonly Tool[],
): BuiltRequest {
  const formatted = formatMessages(messages);
  const wireMessages: WireMessage[] = system
    ? [{ role: 'system', content: system }, ...formatted.messages]
    : formatted.messages;

  const payload: ChatCompletionRequest = { model: model.modelName, messages: wireMessages };
  if (tools.length > 0) {
    payload.tools = formatTools(tools);
  }
  if (model.temperature !== undefined) {
    payload.temperature = model.temperature;
  }
  if (model.maxTokens !== undefined) {
    payload.max_tokens = model.maxTokens;
  }
  return { payload, droppedContentParts: formatted.dropped };
}

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').optional(),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const ChatCompletionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
          tool_calls: z.array(ToolCallSchema).optional(),
        }),
      }),
    )
    .min(1),
});

export type ChatCompletionResponse = z.infer<typeof ChatCompletionResponseSchema>;

function decodeArguments(raw: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = raw.trim() === '' ? {} : JSON.parse(raw);
    return isPlainObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function parseResponse(body: unknown): ChatCompletionResponse {
  const result = ChatCompletionResponseSchema.safeParse(body);
  if (!result.success) {
    throw new ExecutionError(
      `Unexpected response shape: ${result.error.issues
        .map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`)
        .join('; ')}`,
    );
  }
  return result.data;
}

/** Assistant message from `choices[0]`, stamped with the current time. */
export function responseToMessage(body: unknown): Message {
  const { choices } = parseResponse(body);
  const wire = choices[0].message;
  const content: MessageContent[] = [];

  if (typeof wire.content === 'string') {
    content.push(textContent(wire.content));
  }

  for (const call of wire.tool_calls ?? []) {
    const args = decodeArguments(call.function.arguments);
    if (args) {
      content.push({
        type: 'toolRequest',
        id: call.id,
        toolCall: { name: call.function.name, arguments: args },
      });
    } else {
      content.push({
        type: 'toolRequest',
        id: call.id,
        error: `Could not interpret tool use parameters for id ${call.id}: ${call.function.arguments}`,
      });
    }
  }

  if (content.length === 0) {
    throw new ExecutionError('Response message has neither text content nor tool calls');
  }
  return createMessage('assistant', content);
}

function counter(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export function getUsage(body: unknown): Usage {
  const usage = isPlainObject(body) ? body.usage : undefined;
  if (usage === undefined || usage === null) {
    throw new UsageError('No usage data in response');
  }
  if (!isPlainObject(usage)) {
    throw new UsageError('Usage data is not an object');
  }

  const promptTokens = counter(usage.prompt_tokens);
  const completionTokens = counter(usage.completion_tokens);
  let totalTokens = counter(usage.total_tokens);
  if (totalTokens === undefined && promptTokens !== undefined && completionTokens !== undefined) {
    totalTokens = promptTokens + completionTokens;
  }

  const result: Usage = {};
  if (promptTokens !== undefined) result.promptTokens = promptTokens;
  if (completionTokens !== undefined) result.completionTokens = completionTokens;
  if (totalTokens !== undefined) result.totalTokens = totalTokens;
  return result;
}

/** Model the backend says it used, or the requested one when it says nothing. */
export function getModel(body: unknown, requested: string): string {
  const model = isPlainObject(body) ? body.model : undefined;
  return typeof model === 'string' && model.length > 0 ? model : requested;
}
