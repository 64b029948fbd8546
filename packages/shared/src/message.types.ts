export type Role = 'user' | 'assistant';

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ImageContent {
  type: 'image';
  data: string;
  mimeType: string;
}

export interface ToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolRequestContent {
  type: 'toolRequest';
  id: string;
  /** Set when the backend returned a call that could not be decoded. */
  error?: string;
  toolCall?: ToolCall;
}

export interface ToolResponseContent {
  type: 'toolResponse';
  id: string;
  output: string;
}

export type MessageContent =
  | TextContent
  | ImageContent
  | ToolRequestContent
  | ToolResponseContent;

export interface Message {
  readonly role: Role;
  /** Unix seconds (UTC) */
  readonly created: number;
  readonly content: readonly MessageContent[];
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}
