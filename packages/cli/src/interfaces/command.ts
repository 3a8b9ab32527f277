/**
 * Standard Command Interface for the ColmaGo CLI
 *
 * All commands implement this interface so they can be registered
 * the same way and tested with an injected StoreContext.
 */

import { Command } from 'commander';

/**
 * Base options that all commands should support
 */
export interface BaseCommandOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Command registration interface for Commander.js integration
 */
export interface ICommand {
  /**
   * Register the command with Commander.js program
   * @param program - The Commander.js program instance
   */
  register(program: Command): void;
}
