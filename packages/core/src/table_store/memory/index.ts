export { MemoryTableStore } from './memory_table_store';
export type { MemoryTableStoreOptions } from './memory_table_store';
