/**
 * CLI bootstrap: builds the Commander program and runs it.
 */

import { Command } from 'commander';
import { VERSION, NAME } from '../version.js';
import { createChatCommand } from './commands/chat.js';
import { createConfigCommand } from './commands/config.js';
import { createProvidersCommand } from './commands/providers.js';
import { createToolsCommand } from './commands/tools.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Budget-aware gateway for chat-completion providers with retries and failover');

  program.addCommand(createChatCommand());
  program.addCommand(createProvidersCommand());
  program.addCommand(createToolsCommand());
  program.addCommand(createConfigCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
