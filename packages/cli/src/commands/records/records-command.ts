import { Command } from 'commander';
import { Config } from '@colmago/core';
import type { RecordStore, Store } from '@colmago/core';
import { BaseCommand } from '../../base/base-command';
import type { BaseCommandOptions } from '../../interfaces/command';
import { parseAssignments } from '../../utils/assignments';

export interface RecordSelectOptions extends BaseCommandOptions {
  where?: string[];
}

export interface RecordWriteOptions extends BaseCommandOptions {
  set?: string[];
}

export interface RecordDeleteOptions extends BaseCommandOptions {}

export interface TablesOptions extends BaseCommandOptions {}

/**
 * Generic table access for the domain modules' tables (or any other table).
 * Uses the typed `try*` operations so failures are reported, not shown as empty.
 */
export class RecordsCommand extends BaseCommand {

  register(_program: Command): void {
    // Registration handled by registerRecordCommands() in records.ts
  }

  async executeTables(options: TablesOptions): Promise<void> {
    const tables = Object.values(Config.DOMAIN_TABLES);
    this.handleSuccess(options.json ? tables : undefined, options, `Domain tables: ${tables.join(', ')}`);
  }

  async executeSelect(table: string, options: RecordSelectOptions): Promise<void> {
    await this.withStore(`read ${table}`, options, async (store) => {
      const filters = parseAssignments(options.where ?? []);
      const result = await store.trySelect(table, filters);
      if (!result.ok) {
        this.reportFailure(`read ${table}`, result.error, options);
        return;
      }
      const rows = result.value;
      this.handleSuccess(rows, options, `${rows.length} record(s) in ${table}`);
    });
  }

  async executeInsert(table: string, options: RecordWriteOptions): Promise<void> {
    await this.withStore(`insert into ${table}`, options, async (store) => {
      const record = parseAssignments(options.set ?? []);
      if (Object.keys(record).length === 0) {
        this.handleError('Nothing to insert. Use --set field=value', options);
        return;
      }
      const result = await store.tryInsert(table, record);
      if (!result.ok) {
        this.reportFailure(`insert into ${table}`, result.error, options);
        return;
      }
      const id = result.value['id'];
      const suffix = id !== undefined && id !== null ? ` with id ${id}` : '';
      this.handleSuccess(result.value, options, `Record inserted into ${table}${suffix}`);
    });
  }

  async executeUpdate(table: string, id: string, options: RecordWriteOptions): Promise<void> {
    await this.withStore(`update ${table}`, options, async (store) => {
      const patch = parseAssignments(options.set ?? []);
      if (Object.keys(patch).length === 0) {
        this.handleError('Nothing to update. Use --set field=value', options);
        return;
      }
      const result = await store.tryUpdate(table, id, patch);
      if (!result.ok) {
        this.reportFailure(`update ${table}`, result.error, options);
        return;
      }
      this.handleSuccess(options.json ? { table, id, fields: patch } : undefined, options, `Record ${id} updated in ${table}`);
    });
  }

  async executeDelete(table: string, id: string, options: RecordDeleteOptions): Promise<void> {
    await this.withStore(`delete from ${table}`, options, async (store) => {
      const result = await store.tryDelete(table, id);
      if (!result.ok) {
        this.reportFailure(`delete from ${table}`, result.error, options);
        return;
      }
      this.handleSuccess(options.json ? { table, id } : undefined, options, `Record ${id} deleted from ${table}`);
    });
  }

  private async withStore(
    action: string,
    options: BaseCommandOptions,
    run: (store: RecordStore) => Promise<void>
  ): Promise<void> {
    try {
      const store = await this.context.getStore();
      await run(store);
    } catch (error) {
      this.handleError(
        `Failed to ${action}: ${error instanceof Error ? error.message : String(error)}`,
        options,
        error instanceof Error ? error : undefined
      );
    }
  }

  private reportFailure(action: string, failure: Store.StoreFailure, options: BaseCommandOptions): void {
    this.handleError(`Failed to ${action} [${failure.code}]: ${failure.message}`, options);
  }
}
