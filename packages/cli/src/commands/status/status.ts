import { Command } from 'commander';
import { StatusCommand } from './status-command';
import type { StatusCommandOptions } from './status-command';
import type { StoreContext } from '../../services/store-context';

/**
 * Registers the status command
 */
export function registerStatusCommands(program: Command, context: StoreContext): void {
  const statusCommand = new StatusCommand(context);

  // colmago status
  program
    .command('status')
    .description('Show the application version and the active connection mode')
    .option('--json', 'Output results in JSON format')
    .option('--verbose', 'Enable verbose output with detailed information')
    .option('--quiet', 'Suppress non-essential output')
    .action(async (options: StatusCommandOptions) => {
      await statusCommand.execute(options);
    });
}
