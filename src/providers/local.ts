/**
 * Local fallback provider, speaking the Ollama REST API
 * (default: http://localhost:11434). Meant to sit last in the failover order.
 *
 * - Chat completions via POST /api/chat
 * - Streaming as newline-delimited JSON from the same endpoint
 * - Health check via GET /api/tags
 */

import { z } from 'zod';
import { BaseProvider, type BackendRequest, type ProviderRuntime } from './base.js';
import { resolveProviderConfig } from './presets.js';
import { errorForStatus } from './retry-policy.js';
import type { BackendReply, Message, ToolCall } from './types.js';
import type { ProviderEntryInput } from '../core/types.js';
import { ProviderApiError } from '../core/errors.js';

const HEALTH_TIMEOUT_MS = 3000;

const ChatChunkSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      content: z.string().default(''),
      tool_calls: z
        .array(
          z.object({
            function: z.object({
              name: z.string(),
              arguments: z.union([z.record(z.unknown()), z.string()]).default({}),
            }),
          }),
        )
        .optional(),
    })
    .optional(),
  done: z.boolean().optional(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});
type ChatChunk = z.infer<typeof ChatChunkSchema>;

export class LocalProvider extends BaseProvider {
  constructor(config: Omit<ProviderEntryInput, 'type'> = {}, runtime: ProviderRuntime = {}) {
    super(resolveProviderConfig({ ...config, type: 'local' }), runtime);
  }

  protected async checkAvailability(): Promise<boolean> {
    const response = await fetch(`${this.config.baseUrl}/api/tags`, {
      signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
    });
    return response.ok;
  }

  protected async sendChat(messages: Message[], request: BackendRequest, signal: AbortSignal): Promise<BackendReply> {
    const response = await this.post(messages, request, false, signal);
    const data = this.parseChunk(await response.text());

    const toolCalls: ToolCall[] = (data.message?.tool_calls ?? []).map((tc, idx) => ({
      id: `call_local_${idx}`,
      name: tc.function.name,
      arguments: tc.function.arguments,
    }));

    return {
      content: data.message?.content ?? '',
      model: data.model ?? request.model,
      // prompt_eval_count is input, eval_count output
      tokensUsed: (data.prompt_eval_count ?? 0) + (data.eval_count ?? 0),
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
      ...(data.done_reason ? { finishReason: data.done_reason } : {}),
    };
  }

  protected async *sendStream(messages: Message[], request: BackendRequest, signal: AbortSignal): AsyncIterable<string> {
    const response = await this.post(messages, { ...request, tools: undefined }, true, signal);
    if (!response.body) {
      throw new ProviderApiError(`${this.name} streaming response has no body`, this.name);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';

        for (const line of lines) {
          if (!line.trim()) continue;
          const content = this.parseChunk(line).message?.content;
          if (content) yield content;
        }
      }
      if (buffer.trim()) {
        const content = this.parseChunk(buffer).message?.content;
        if (content) yield content;
      }
    } finally {
      reader.releaseLock();
    }
  }

  /**
   * The signal comes from the current attempt. The timeout that fires it
   * bounds the wait for each reply or fragment, never the whole stream.
   */
  private async post(messages: Message[], request: BackendRequest, stream: boolean, signal: AbortSignal): Promise<Response> {
    const tools = request.tools?.map(t => ({
      type: 'function',
      function: { name: t.name, description: t.description, parameters: t.parameters },
    }));

    const response = await fetch(`${this.config.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: request.model,
        messages: messages.map(m => ({ role: m.role, content: m.content })),
        stream,
        options: {
          ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
          ...(request.maxTokens !== undefined ? { num_predict: request.maxTokens } : {}),
        },
        ...(tools && tools.length > 0 ? { tools } : {}),
      }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw errorForStatus(
        response.status,
        `${this.name} API error (${response.status}): ${errorText}`,
        this.name,
      );
    }
    return response;
  }

  private parseChunk(text: string): ChatChunk {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new ProviderApiError(`${this.name} returned malformed JSON`, this.name);
    }
    const parsed = ChatChunkSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProviderApiError(`${this.name} returned an unexpected payload: ${parsed.error.message}`, this.name);
    }
    return parsed.data;
  }
}
