import { Command } from 'commander';
import { createAuthCommand } from './commands/auth.js';
import { createFetchCommand } from './commands/fetch.js';
import { isLogLevel, setLogLevel, type LogLevel } from './lib/logger.js';

export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * --verbose wins over --quiet; otherwise GRAPH_LOG_LEVEL, then 'info'
 */
export function resolveLogLevel(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (options.verbose) return 'debug';
  if (options.quiet) return 'error';

  const fromEnv = env.GRAPH_LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

export function createCli(): Command {
  const cli = new Command();

  cli
    .name('graph-collector')
    .description('Collect paged Microsoft Graph resources with client-credentials auth')
    .version('0.1.0');

  // Global options
  cli
    .option('-c, --config <path>', 'config file (default: ~/.config/graph-collector/config.json)')
    .option('-v, --verbose', 'debug logging')
    .option('-q, --quiet', 'log errors only');

  cli.hook('preAction', (_thisCommand, actionCommand) => {
    setLogLevel(resolveLogLevel(actionCommand.optsWithGlobals<GlobalOptions>()));
  });

  cli.addCommand(createFetchCommand());
  cli.addCommand(createAuthCommand());

  return cli;
}
