import Anthropic, { APIConnectionError, APIConnectionTimeoutError, APIError } from '@anthropic-ai/sdk';
import { BaseProvider, type BackendRequest, type ProviderRuntime } from './base.js';
import { resolveProviderConfig } from './presets.js';
import { errorForStatus } from './retry-policy.js';
import type { BackendReply, Message, ToolCall } from './types.js';
import type { ProviderEntryInput } from '../core/types.js';
import { ProviderConnectionError, ProviderTimeoutError, type ProviderError } from '../core/errors.js';
import { isRecord } from '../utils/guards.js';

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider extends BaseProvider {
  private client: Anthropic | null = null;

  constructor(config: Omit<ProviderEntryInput, 'type'> = {}, runtime: ProviderRuntime = {}) {
    super(resolveProviderConfig({ ...config, type: 'anthropic' }), runtime);
  }

  private getClient(): Anthropic {
    if (!this.client) {
      this.client = new Anthropic({
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
      name: t.name,
      description: t.description,
      input_schema: t.parameters,
    }));
    const system = systemPrompt(messages);

    const response = await this.getClient().messages.create({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: messages.filter(m => m.role !== 'system').map(toMessageParam),
      ...(system ? { system } : {}),
      ...(tools && tools.length > 0 ? { tools } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    }, { signal });

    let content = '';
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        content += block.text;
      } else if (block.type === 'tool_use') {
        toolCalls.push({
          id: block.id,
          name: block.name,
          arguments: isRecord(block.input) ? block.input : {},
        });
      }
    }

    return {
      content,
      model: response.model,
      tokensUsed: response.usage.input_tokens + response.usage.output_tokens,
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
      ...(response.stop_reason ? { finishReason: response.stop_reason } : {}),
    };
  }

  protected async *sendStream(messages: Message[], request: BackendRequest, signal: AbortSignal): AsyncIterable<string> {
    const system = systemPrompt(messages);
    const stream = await this.getClient().messages.create({
      model: request.model,
      max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
      messages: messages.filter(m => m.role !== 'system').map(toMessageParam),
      stream: true,
      ...(system ? { system } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
    }, { signal });

    for await (const event of stream) {
      if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
        yield event.delta.text;
      }
    }
  }

  protected override classify(err: unknown): ProviderError {
    if (err instanceof APIConnectionTimeoutError) {
      return new ProviderTimeoutError(`Request to ${this.name} timed out`, this.name, err);
    }
    if (err instanceof APIConnectionError) {
      return new ProviderConnectionError(`Could not reach ${this.name}: ${err.message}`, this.name, err);
    }
    if (err instanceof APIError && err.status !== undefined) {
      // 529 "overloaded" lands in the 5xx branch
      return errorForStatus(err.status, `${this.name} API error: ${err.message}`, this.name, err);
    }
    return super.classify(err);
  }
}

/** Anthropic takes system text as a parameter, not as a message. */
function systemPrompt(messages: Message[]): string {
  return messages
    .filter(m => m.role === 'system')
    .map(m => m.content)
    .join('\n\n');
}

function toMessageParam(m: Message): Anthropic.MessageParam {
  if (m.role === 'tool') {
    return {
      role: 'user',
      content: [{ type: 'tool_result', tool_use_id: m.toolCallId ?? '', content: m.content }],
    };
  }
  return { role: m.role === 'assistant' ? 'assistant' : 'user', content: m.content };
}
