export { CsvTableStore } from './csv_table_store';
export type { CsvTableStoreOptions } from './csv_table_store';
