export type JsonSchemaType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export type ToolProperty = {
  type: JsonSchemaType;
  description?: string;
  enum?: Array<string | number>;
  items?: ToolProperty;
  properties?: Record<string, ToolProperty>;
  required?: string[];
  default?: unknown;
  minimum?: number;
  maximum?: number;
};

/** JSON-schema object describing a tool's arguments, as the backends expect it. */
export type ToolParameters = {
  type: 'object';
  properties: Record<string, ToolProperty>;
  required?: string[];
};

export type ToolArgs = Record<string, unknown>;

export type ToolHandler = (args: ToolArgs) => unknown;

/** What is advertised to a backend. */
export type ToolDefinition = {
  name: string;
  description: string;
  parameters: ToolParameters;
};

export interface Tool extends ToolDefinition {
  execute: ToolHandler;
}

export interface ToolResult {
  tool: string;
  callId?: string;
  output: unknown;
  durationMs: number;
}
