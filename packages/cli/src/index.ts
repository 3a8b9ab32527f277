#!/usr/bin/env node

import { Command } from 'commander';
import { Config } from '@colmago/core';
import { registerStatusCommands } from './commands/status/status';
import { registerRecordCommands } from './commands/records/records';
import { StoreContext } from './services/store-context';

const program = new Command();

program
  .name('colmago')
  .description(`${Config.APP_TITLE} - records for clientes, productos, compras, ventas and empleados`)
  .version(Config.APP_VERSION);

// One store per process; the connection mode is chosen on first use
const context = new StoreContext();

registerStatusCommands(program, context);
registerRecordCommands(program, context);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
