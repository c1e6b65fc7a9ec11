/**
 * OpenAI-compatible provider. DeepSeek and OpenAI both speak the chat
 * completions protocol, so one class serves them, parameterized by the preset
 * base URL and default model.
 *
 * Uses the `openai` npm package with its `baseURL` parameter. The SDK's own
 * retries are disabled; attempts and backoff are owned by BaseProvider.
 */

import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from 'openai';
import { BaseProvider, type BackendRequest, type ProviderRuntime } from './base.js';
import { resolveProviderConfig } from './presets.js';
import { errorForStatus } from './retry-policy.js';
import type { BackendReply, Message, ToolCall } from './types.js';
import type { ProviderEntryInput } from '../core/types.js';
import {
  ProviderApiError,
  ProviderConnectionError,
  ProviderTimeoutError,
  type ProviderError,
} from '../core/errors.js';

export type OpenAICompatibleConfig = Omit<ProviderEntryInput, 'type'> & { type: 'deepseek' | 'openai' };

export class OpenAICompatibleProvider extends BaseProvider {
  private client: OpenAI | null = null;

  constructor(config: OpenAICompatibleConfig, runtime: ProviderRuntime = {}) {
    super(resolveProviderConfig(config), runtime);
  }

  private getClient(): OpenAI {
    if (!this.client) {
      this.client = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
    }
    return this.client;
  }

  protected async checkAvailability(): Promise<boolean> {
    return Boolean(this.config.apiKey);
  }

  protected async sendChat(messages: Message[], request: BackendRequest, signal: AbortSignal): Promise<BackendReply> {
    const tools = request.tools?.map(t => ({
      type: 'function' as const,
      function: {
        name: t.name,
        description: t.description,
        parameters: t.parameters,
      },
    }));

    const response = await this.getClient().chat.completions.create({
      model: request.model,
      messages: messages.map(toChatMessage),
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(tools && tools.length > 0 ? { tools } : {}),
    }, { signal });

    const choice = response.choices.at(0);
    if (!choice) {
      throw new ProviderApiError(`${this.name} returned no choices`, this.name);
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? []).map(tc => ({
      id: tc.id,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: choice.message.content ?? '',
      model: response.model,
      tokensUsed: response.usage?.total_tokens ?? 0,
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
      finishReason: choice.finish_reason,
    };
  }

  protected async *sendStream(messages: Message[], request: BackendRequest, signal: AbortSignal): AsyncIterable<string> {
    const stream = await this.getClient().chat.completions.create({
      model: request.model,
      messages: messages.map(toChatMessage),
      stream: true,
      ...(request.maxTokens !== undefined ? { max_tokens: request.maxTokens } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    }, { signal });

    for await (const chunk of stream) {
      const delta = chunk.choices.at(0)?.delta.content;
      if (delta) {
        yield delta;
      }
    }
  }

  protected override classify(err: unknown): ProviderError {
    // the timeout class extends the connection class, which extends APIError
    if (err instanceof APIConnectionTimeoutError) {
      return new ProviderTimeoutError(`Request to ${this.name} timed out`, this.name, err);
    }
    if (err instanceof APIConnectionError) {
      return new ProviderConnectionError(`Could not reach ${this.name}: ${err.message}`, this.name, err);
    }
    if (err instanceof APIError && err.status !== undefined) {
      return errorForStatus(err.status, `${this.name} API error: ${err.message}`, this.name, err);
    }
    return super.classify(err);
  }
}

function toChatMessage(m: Message): OpenAI.ChatCompletionMessageParam {
  switch (m.role) {
    case 'system':
      return { role: 'system', content: m.content };
    case 'assistant':
      return { role: 'assistant', content: m.content };
    case 'tool':
      return { role: 'tool', tool_call_id: m.toolCallId ?? '', content: m.content };
    case 'user':
      return { role: 'user', content: m.content };
  }
}
