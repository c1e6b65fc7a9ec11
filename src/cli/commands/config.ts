import { Command } from 'commander';
import { stringify } from 'yaml';
import { redactConfig } from '../../core/config.js';
import { loadSession } from '../session.js';

/** `promptgate config` prints the merged configuration with keys redacted. */
export function createConfigCommand(): Command {
  return new Command('config')
    .description('Show the effective configuration (API keys redacted)')
    .option('-d, --dir <directory>', 'Project directory', '.')
    .option('--json', 'Print JSON instead of YAML')
    .action((options: { dir: string; json?: boolean }) => {
      const config = redactConfig(loadSession(options));
      console.log(options.json ? JSON.stringify(config, null, 2) : stringify(config).trimEnd());
    });
}
