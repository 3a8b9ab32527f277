import { Command } from 'commander';
import { Config } from '@colmago/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';

export interface StatusCommandOptions extends BaseCommandOptions {}

export type StatusSummary = {
  title: string;
  version: string;
  status: string;
  backupDir?: string;
  fallbackReason?: string;
};

export class StatusCommand extends BaseCommand<StatusCommandOptions> {

  register(_program: Command): void {
    // Registration handled by registerStatusCommands() in status.ts
  }

  async execute(options: StatusCommandOptions): Promise<void> {
    try {
      const store = await this.context.getStore();

      const summary: StatusSummary = {
        title: Config.APP_TITLE,
        version: Config.APP_VERSION,
        status: store.getConnectionStatus(),
      };
      const lines = [
        `${summary.title} v${summary.version}`,
        `   Connection: ${summary.status}`,
      ];

      if (store.getMode() === 'local-file') {
        summary.backupDir = store.getBackupDir();
        lines.push(`   Backup directory: ${summary.backupDir}`);

        const reason = store.getFallbackReason();
        if (reason) {
          summary.fallbackReason = reason;
          lines.push(`   Reason: ${reason}`);
        }
      }

      this.handleSuccess(options.json ? summary : undefined, options, lines.join('\n'));
    } catch (error) {
      this.handleError(
        `Failed to read connection status: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
