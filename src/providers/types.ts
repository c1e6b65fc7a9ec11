import type { ToolDefinition } from '../tools/types.js';

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  role: MessageRole;
  content: string;
  toolCallId?: string;
}

export interface ToolCall {
  id: string;
  name: string;
  /** Backends send either a JSON string or an already-decoded object. */
  arguments: Record<string, unknown> | string;
}

export interface GenerationOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  tools?: ToolDefinition[];
}

export interface AIResponse {
  content: string;
  model: string;
  provider: string;
  tokensUsed: number;
  toolCalls?: ToolCall[];
  finishReason?: string;
}

export interface ProviderStats {
  name: string;
  type: string;
  priority: number;
  defaultModel: string;
  requests: number;
  errors: number;
}

export interface LLMProvider {
  readonly name: string;
  readonly type: string;
  readonly priority: number;
  readonly defaultModel: string;

  chat(messages: Message[], options?: GenerationOptions): Promise<AIResponse>;
  stream(messages: Message[], options?: GenerationOptions): AsyncIterable<string>;
  isAvailable(): Promise<boolean>;
  getStats(): ProviderStats;
}

/** Fully resolved settings a provider instance runs with. */
export interface ProviderSettings {
  name: string;
  type: string;
  apiKey?: string;
  baseUrl: string;
  defaultModel: string;
  priority: number;
  timeoutMs: number;
  maxRetries: number;
  backoffFactor: number;
}

/** Reply from a single backend call, before the provider stamps its name on it. */
export interface BackendReply {
  content: string;
  model: string;
  tokensUsed: number;
  toolCalls?: ToolCall[];
  finishReason?: string;
}
