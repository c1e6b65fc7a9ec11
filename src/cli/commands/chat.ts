/**
 * `promptgate chat` sends one prompt, or starts an interactive session when
 * no prompt is given. Supports /clear, /usage, /exit in the session.
 */

import { Command } from 'commander';
import * as readline from 'node:readline';
import { loadSession } from '../session.js';
import { createOrchestrator } from '../../orchestrator/factory.js';
import type { AIOrchestrator } from '../../orchestrator/orchestrator.js';
import type { ChatOptions, OrchestratorResponse } from '../../orchestrator/types.js';
import { toError } from '../../core/errors.js';
import type { UsageSnapshot } from '../../cost/types.js';
import { formatCost, formatTokens } from '../../utils/tokens.js';

interface ChatCommandOptions {
  dir: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  system?: string;
  stream?: boolean;
  cache: boolean;
  tools?: boolean;
  conversation?: boolean;
  quiet?: boolean;
  verbose?: boolean;
}

export function createChatCommand(): Command {
  const cmd = new Command('chat');

  cmd
    .description('Send a prompt through the configured providers (interactive when no prompt is given)')
    .argument('[prompt...]', 'Prompt text')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('-m, --model <model>', 'Model to request from every provider')
    .option('--max-tokens <n>', 'Maximum tokens to generate', parsePositiveInt)
    .option('--temperature <t>', 'Sampling temperature', parseFloat)
    .option('--system <prompt>', 'System prompt')
    .option('--stream', 'Stream the reply as it arrives')
    .option('--no-cache', 'Bypass the response cache')
    .option('--tools', 'Advertise and run built-in tools')
    .option('--conversation', 'Keep conversation history between prompts')
    .option('-q, --quiet', 'Print only the reply')
    .option('-v, --verbose', 'Debug logging to stderr')
    .action(async (promptParts: string[], options: ChatCommandOptions) => {
      const config = loadSession(options, options.tools ? { tools: { enabled: true } } : undefined);
      const orchestrator = createOrchestrator(config);

      if (promptParts.length === 0) {
        await startSession(orchestrator, options);
        return;
      }
      await sendPrompt(orchestrator, promptParts.join(' '), options);
    });

  return cmd;
}

function chatOptions(options: ChatCommandOptions): ChatOptions {
  return {
    model: options.model,
    maxTokens: options.maxTokens,
    temperature: options.temperature,
    systemPrompt: options.system,
    useCache: options.cache,
    useTools: options.tools ?? false,
    useConversation: options.conversation ?? false,
  };
}

async function sendPrompt(orchestrator: AIOrchestrator, prompt: string, options: ChatCommandOptions): Promise<void> {
  if (options.stream) {
    for await (const fragment of orchestrator.chatStream(prompt, chatOptions(options))) {
      process.stdout.write(fragment);
    }
    process.stdout.write('\n');
    return;
  }

  const response = await orchestrator.chat(prompt, chatOptions(options));
  console.log(response.content);
  if (!options.quiet) {
    printDetails(response);
  }
}

export function describeResponse(response: OrchestratorResponse): string[] {
  const lines = [
    `${response.cached ? 'cache' : response.provider} | ${response.model} | ${formatTokens(response.tokensUsed)} tokens`,
  ];
  for (const result of response.toolResults) {
    lines.push(`tool ${result.tool}: ${JSON.stringify(result.output)} (${result.durationMs}ms)`);
  }
  return lines;
}

function printDetails(response: OrchestratorResponse): void {
  console.error();
  for (const line of describeResponse(response)) {
    console.error(`  ${line}`);
  }
}

async function startSession(orchestrator: AIOrchestrator, options: ChatCommandOptions): Promise<void> {
  if (!process.stdin.isTTY) {
    throw new Error('promptgate chat needs a prompt argument or an interactive terminal (TTY)');
  }

  const sessionOptions: ChatCommandOptions = { ...options, conversation: true };
  console.log(`promptgate chat | providers: ${orchestrator.getProviders().join(', ') || '(none)'}`);
  console.log('Commands: /clear /usage /exit');
  console.log('─'.repeat(50));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: '> ' });
  rl.prompt();

  for await (const line of rl) {
    const input = line.trim();
    if (input.startsWith('/')) {
      if (handleSlashCommand(input, orchestrator) === 'exit') break;
    } else if (input) {
      try {
        await sendPrompt(orchestrator, input, sessionOptions);
      } catch (err) {
        console.error(`\nError: ${toError(err).message}\n`);
      }
    }
    rl.prompt();
  }

  rl.close();
  console.log(`\n${formatUsageLine(orchestrator.costController.getCurrentUsage())}`);
}

function handleSlashCommand(input: string, orchestrator: AIOrchestrator): 'exit' | undefined {
  const command = input.toLowerCase().split(/\s+/)[0];

  switch (command) {
    case '/exit':
    case '/quit':
    case '/q':
      return 'exit';
    case '/clear':
      orchestrator.resetConversation();
      console.log('\nConversation cleared.\n');
      return undefined;
    case '/usage':
      console.log(`\n${formatUsageLine(orchestrator.costController.getCurrentUsage())}\n`);
      return undefined;
    default:
      console.log(`\nUnknown command: ${command}. Available: /clear /usage /exit\n`);
      return undefined;
  }
}

export function formatUsageLine(usage: UsageSnapshot): string {
  return `This hour: ${formatTokens(usage.hourly.tokens)} / ${formatTokens(usage.hourly.limit)} tokens, ${formatCost(usage.hourly.cost)}`;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}
