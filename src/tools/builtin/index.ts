import type pino from 'pino';
import type { Tool } from '../types.js';
import { ToolRegistry } from '../registry.js';
import { calculateTool } from './calculate.js';

export { calculateTool, evaluateArithmetic } from './calculate.js';

export const BUILTIN_TOOLS: readonly Tool[] = [calculateTool];

export function createDefaultToolRegistry(options: { logger?: pino.Logger } = {}): ToolRegistry {
  const registry = new ToolRegistry(options);
  for (const tool of BUILTIN_TOOLS) {
    registry.register(tool);
  }
  return registry;
}
