/**
 * S3Bridge CLI
 */

import { Command, Option } from 'commander';
import { createCheckCommand } from './commands/check';
import { createConfigCommand } from './commands/config';
import { createCredentialsCommand } from './commands/credentials';
import { createTestCommand } from './commands/test';
import { configureOutput, isOutputFormat } from './utils/output';

export function createCli(): Command {
  const program = new Command()
    .name('s3bridge')
    .description('Diagnostic CLI for the S3Bridge credential broker')
    .version('0.1.0')
    .addOption(new Option('-o, --output <format>', 'Output format').choices(['json', 'table']).default('table'))
    .option('-q, --quiet', 'Suppress informational output')
    .option('-v, --verbose', 'Verbose output')
    .option('--api-url <url>', 'Credential API URL (overrides config and S3BRIDGE_API_URL)')
    .option('--api-key <key>', 'API key (overrides config and S3BRIDGE_API_KEY)')
    .hook('preAction', (thisCommand) => {
      const opts = thisCommand.opts();
      configureOutput({
        format: isOutputFormat(opts.output) ? opts.output : 'table',
        quiet: opts.quiet === true,
        verbose: opts.verbose === true,
      });
    });

  program.addCommand(createCredentialsCommand());
  program.addCommand(createCheckCommand());
  program.addCommand(createTestCommand());
  program.addCommand(createConfigCommand());

  return program;
}
