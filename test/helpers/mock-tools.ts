/**
 * Mock tools for testing
 */

import type { Tool } from '../../src/tools/types.js';

export function createMockTool(name: string, output?: unknown): Tool {
  return {
    name,
    description: `Mock ${name} tool`,
    parameters: {
      type: 'object',
      properties: {
        input: { type: 'string', description: 'Input parameter' },
      },
    },
    execute: args => output ?? `Mock result from ${name}: ${String(args.input ?? '')}`,
  };
}

export function createFailingTool(name: string, errorMessage: string): Tool {
  return {
    name,
    description: `Failing mock ${name} tool`,
    parameters: { type: 'object', properties: {} },
    execute: () => {
      throw new Error(errorMessage);
    },
  };
}
