import type { Filters, RecordId, StoreRecord } from '../record_store/record_store.types';

/**
 * TableStore - backend for one connection mode
 *
 * Operates on named tables of schema-less records. Implementations throw
 * RecordStoreError on failure; RecordStore is the layer that turns failures
 * into neutral results, so nothing here swallows errors.
 *
 * Implementations:
 * - CsvTableStore: one CSV file per table (local-file mode)
 * - SupabaseTableStore: remote backend
 * - MemoryTableStore: in-process tables for tests
 */
export interface TableStore {
  /**
   * Reads a table, keeping only records where every filter field matches.
   * A table that was never written reads as empty.
   */
  select(table: string, filters?: Filters): Promise<StoreRecord[]>;

  /**
   * Adds a record.
   * @returns The record as stored (local stores fill in `id` when absent)
   */
  insert(table: string, record: StoreRecord): Promise<StoreRecord>;

  /**
   * Merges `patch` into the record with the given id.
   * No matching record is not an error.
   */
  update(table: string, id: RecordId, patch: StoreRecord): Promise<void>;

  /**
   * Removes every record with the given id.
   * No matching record is not an error.
   */
  delete(table: string, id: RecordId): Promise<void>;
}
