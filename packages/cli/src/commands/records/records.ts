import { Command } from 'commander';
import { RecordsCommand } from './records-command';
import type {
  RecordDeleteOptions,
  RecordSelectOptions,
  RecordWriteOptions,
  TablesOptions,
} from './records-command';
import type { StoreContext } from '../../services/store-context';

export function registerRecordCommands(program: Command, context: StoreContext): void {
  const recordsCommand = new RecordsCommand(context);

  // colmago tables
  program
    .command('tables')
    .description('List the tables used by the domain modules')
    .option('--json', 'Output as JSON')
    .option('-q, --quiet', 'Quiet output')
    .action(async (options: TablesOptions) => {
      await recordsCommand.executeTables(options);
    });

  // colmago select clientes -w ciudad=Lima
  program
    .command('select <table>')
    .description('List records, optionally keeping exact matches only')
    .alias('ls')
    .option('-w, --where <field=value...>', 'Exact-match filter (repeatable, combined with AND)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (table: string, options: RecordSelectOptions) => {
      await recordsCommand.executeSelect(table, options);
    });

  // colmago insert productos -s nombre=Arroz -s precio=1.25
  program
    .command('insert <table>')
    .description('Insert a record (local mode assigns the next id when none is given)')
    .alias('add')
    .option('-s, --set <field=value...>', 'Field value (repeatable)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (table: string, options: RecordWriteOptions) => {
      await recordsCommand.executeInsert(table, options);
    });

  // colmago update productos 3 -s precio=1.30
  program
    .command('update <table> <id>')
    .description('Overwrite the given fields of a record, keeping the rest')
    .option('-s, --set <field=value...>', 'Field value (repeatable)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (table: string, id: string, options: RecordWriteOptions) => {
      await recordsCommand.executeUpdate(table, id, options);
    });

  // colmago delete ventas 12
  program
    .command('delete <table> <id>')
    .description('Delete every record with the given id')
    .alias('rm')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output')
    .option('-q, --quiet', 'Quiet output')
    .action(async (table: string, id: string, options: RecordDeleteOptions) => {
      await recordsCommand.executeDelete(table, id, options);
    });
}
