export type { TableStore } from './table_store';
export { CsvTableStore } from './csv';
export type { CsvTableStoreOptions } from './csv';
export { MemoryTableStore } from './memory';
export type { MemoryTableStoreOptions } from './memory';
export { SupabaseTableStore } from './supabase';
export { ID_FIELD, validateTableName, matchesFilters } from './local_table';
