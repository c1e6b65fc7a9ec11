import { Command } from 'commander';
import { createDefaultToolRegistry } from '../../tools/builtin/index.js';
import type { ToolDefinition } from '../../tools/types.js';

export function formatToolLine(tool: ToolDefinition): string {
  const params = Object.entries(tool.parameters.properties)
    .map(([name, prop]) => `${name}${tool.parameters.required?.includes(name) ? '' : '?'}: ${prop.type}`)
    .join(', ');
  return `${tool.name}(${params}) - ${tool.description}`;
}

/** `promptgate tools` lists the built-in tools a model can call. */
export function createToolsCommand(): Command {
  return new Command('tools').description('List built-in tools').action(() => {
    const registry = createDefaultToolRegistry();
    for (const tool of registry.getToolDefinitions()) {
      console.log(formatToolLine(tool));
    }
  });
}
