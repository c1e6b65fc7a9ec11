import type pino from 'pino';
import type { z } from 'zod';
import type { Tool, ToolArgs, ToolDefinition, ToolHandler, ToolParameters } from './types.js';
import { compileToolSchema } from './schema.js';
import { InvalidInputError, ToolNotFoundError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';

/** Backends accept function names matching this. */
const TOOL_NAME = /^[a-zA-Z0-9_-]{1,64}$/;

export interface RegisteredTool {
  tool: Tool;
  validator: z.ZodType<ToolArgs>;
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();
  private logger: pino.Logger;

  constructor(options: { logger?: pino.Logger } = {}) {
    this.logger = options.logger ?? getLogger();
  }

  /**
   * Register a tool. Registering an existing name replaces it in place, so the
   * advertised order and uniqueness are kept.
   */
  register(tool: Tool): void {
    if (!TOOL_NAME.test(tool.name)) {
      throw new InvalidInputError(`Invalid tool name "${tool.name}": use 1-64 letters, digits, _ or -`);
    }
    if (tool.parameters.type !== 'object') {
      throw new InvalidInputError(`Tool "${tool.name}" parameters must be an object schema`);
    }

    const replaced = this.tools.has(tool.name);
    this.tools.set(tool.name, { tool, validator: compileToolSchema(tool.parameters) });
    this.logger.debug({ tool: tool.name, replaced }, replaced ? 'Tool replaced' : 'Tool registered');
  }

  registerTool(name: string, handler: ToolHandler, description: string, parameters: ToolParameters): void {
    this.register({ name, description, parameters, execute: handler });
  }

  get(name: string): RegisteredTool {
    const entry = this.tools.get(name);
    if (!entry) {
      throw new ToolNotFoundError(name, this.listTools());
    }
    return entry;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  listTools(): string[] {
    return Array.from(this.tools.keys());
  }

  get size(): number {
    return this.tools.size;
  }

  /** Definitions in registration order, in the shape backends advertise. */
  getToolDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values(), ({ tool }) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }
}
