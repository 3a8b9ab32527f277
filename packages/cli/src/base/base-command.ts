/**
 * Base Command Class for the ColmaGo CLI
 *
 * Provides the shared output conventions (JSON, quiet, verbose) and gives
 * every command the injected StoreContext.
 */

import { Command } from 'commander';
import type { StoreContext } from '../services/store-context';
import type { BaseCommandOptions, ICommand } from '../interfaces/command';

/**
 * Abstract base class for all CLI commands
 */
export abstract class BaseCommand<TOptions extends BaseCommandOptions = BaseCommandOptions>
  implements ICommand {

  constructor(protected readonly context: StoreContext) { }

  /**
   * Register the command with Commander.js
   * Must be implemented by each command
   */
  abstract register(program: Command): void;

  /**
   * Handle errors consistently across all commands
   */
  protected handleError(message: string, options: TOptions, error?: Error, exitCode: number = 1): void {
    const isJson = options.json || false;
    const isVerbose = options.verbose || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: false,
        error: message,
        exitCode
      }, null, 2));
    } else {
      // Only add ❌ if message doesn't already have it
      const formattedMessage = message.startsWith('❌') ? message : `❌ ${message}`;
      console.error(formattedMessage);
      if (isVerbose && error) {
        console.error(`🔍 Technical details: ${error.stack}`);
      }
    }

    process.exit(exitCode);
  }

  /**
   * Handle successful output consistently.
   * In text mode `data` is printed after the message when given.
   */
  protected handleSuccess(data: unknown, options: TOptions, message?: string): void {
    const isJson = options.json || false;
    const isQuiet = options.quiet || false;

    if (isJson) {
      console.log(JSON.stringify({
        success: true,
        data
      }, null, 2));
    } else {
      if (message && !isQuiet) {
        console.log(`✅ ${message}`);
      }
      if (data !== undefined && !isQuiet) {
        console.log(data);
      }
    }
  }
}
