import type { Message, MessageContent, Role, TextContent } from '@chatbridge/shared';

/** Current wall clock in whole Unix seconds. */
export function nowSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

export function textContent(text: string): TextContent {
  return { type: 'text', text };
}

export function createMessage(role: Role, content: readonly MessageContent[] = []): Message {
  return { role, created: nowSeconds(), content: [...content] };
}

export function userMessage(text: string): Message {
  return createMessage('user', [textContent(text)]);
}

export function assistantMessage(text: string): Message {
  return createMessage('assistant', [textContent(text)]);
}

/** Returns a copy of `message` with one more text part. */
export function withText(message: Message, text: string): Message {
  return { ...message, content: [...message.content, textContent(text)] };
}

export function getText(message: Message): string {
  return message.content
    .filter((part): part is TextContent => part.type === 'text')
    .map((part) => part.text)
    .join('\n');
}
