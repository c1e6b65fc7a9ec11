import type pino from 'pino';
import { ZodError } from 'zod';
import type { ToolArgs, ToolResult } from './types.js';
import type { ToolCall } from '../providers/types.js';
import type { ToolRegistry } from './registry.js';
import { formatIssues } from './schema.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import {
  ToolError,
  ToolExecutionError,
  ToolValidationError,
  toError,
} from '../core/errors.js';
import { isRecord } from '../utils/guards.js';

/**
 * Thrown by a tool handler when its arguments passed the schema but are still
 * unusable (an unparsable expression, a division by zero).
 */
export class ToolArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolArgumentError';
  }
}

export class ToolExecutor {
  private logger: pino.Logger;
  private events?: EventBus;

  constructor(
    private registry: ToolRegistry,
    options: { logger?: pino.Logger; events?: EventBus } = {},
  ) {
    this.logger = options.logger ?? getLogger();
    this.events = options.events;
  }

  async executeTool(call: ToolCall): Promise<ToolResult> {
    try {
      return await this.run(call);
    } catch (err) {
      const error = err instanceof ToolError ? err : new ToolExecutionError(call.name, toError(err));
      this.logger.error({ tool: call.name, code: error.code, error: error.message }, 'Tool execution failed');
      this.events?.emit('tool:failed', { tool: call.name, code: error.code, error: error.message });
      throw error;
    }
  }

  /** Run calls one after another, in the order the backend issued them. */
  async executeAll(calls: ToolCall[]): Promise<ToolResult[]> {
    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await this.executeTool(call));
    }
    return results;
  }

  private async run(call: ToolCall): Promise<ToolResult> {
    const { tool, validator } = this.registry.get(call.name);

    const parsed = validator.safeParse(decodeArguments(call));
    if (!parsed.success) {
      throw new ToolValidationError(call.name, formatIssues(parsed.error), parsed.error);
    }

    this.logger.debug({ tool: call.name, args: Object.keys(parsed.data) }, 'Executing tool');
    const started = Date.now();
    let output: unknown;
    try {
      output = await tool.execute(parsed.data);
    } catch (err) {
      if (err instanceof ToolArgumentError) {
        throw new ToolValidationError(call.name, [err.message], err);
      }
      if (err instanceof ZodError) {
        throw new ToolValidationError(call.name, formatIssues(err), err);
      }
      throw new ToolExecutionError(call.name, toError(err));
    }

    const durationMs = Date.now() - started;
    this.logger.debug({ tool: call.name, durationMs }, 'Tool result');
    this.events?.emit('tool:executed', { tool: call.name, durationMs });
    return { tool: call.name, callId: call.id, output, durationMs };
  }
}

function decodeArguments(call: ToolCall): ToolArgs {
  if (typeof call.arguments !== 'string') return call.arguments;

  const text = call.arguments.trim();
  if (text === '') return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (err) {
    throw new ToolValidationError(call.name, ['arguments are not valid JSON'], toError(err));
  }
  if (!isRecord(decoded)) {
    throw new ToolValidationError(call.name, ['arguments must be a JSON object']);
  }
  return decoded;
}
