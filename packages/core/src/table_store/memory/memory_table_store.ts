import type { Filters, RecordId, StoreRecord } from '../../record_store/record_store.types';
import type { TableStore } from '../table_store';
import { applyFilters, deleteRows, insertRow, updateRow } from '../local_table';

type Row = Record<string, string>;

/**
 * Options for MemoryTableStore
 */
export interface MemoryTableStoreOptions {
  /** Initial tables */
  initial?: Record<string, StoreRecord[]>;
}

/**
 * MemoryTableStore - In-memory implementation of TableStore
 *
 * Same row semantics as CsvTableStore (string values, max + 1 ids,
 * first-match update) without touching the disk.
 *
 * @example
 * const store = new MemoryTableStore({ initial: { clientes: [{ id: '1', nombre: 'Ana' }] } });
 * await store.update('clientes', 1, { ciudad: 'Lima' });
 *
 * expect(store.getTable('clientes')).toEqual([{ id: '1', nombre: 'Ana', ciudad: 'Lima' }]);
 */
export class MemoryTableStore implements TableStore {
  private readonly tables: Map<string, Row[]> = new Map();

  constructor(options: MemoryTableStoreOptions = {}) {
    for (const [table, records] of Object.entries(options.initial ?? {})) {
      let rows: Row[] = [];
      for (const record of records) {
        rows = insertRow(rows, record, table).records;
      }
      this.tables.set(table, rows);
    }
  }

  async select(table: string, filters?: Filters): Promise<StoreRecord[]> {
    return applyFilters(this.read(table), filters).map((row) => ({ ...row }));
  }

  async insert(table: string, record: StoreRecord): Promise<StoreRecord> {
    const { records, stored } = insertRow(this.read(table), record, table);
    this.tables.set(table, records);
    return { ...stored };
  }

  async update(table: string, id: RecordId, patch: StoreRecord): Promise<void> {
    this.tables.set(table, updateRow(this.read(table), id, patch));
  }

  async delete(table: string, id: RecordId): Promise<void> {
    this.tables.set(table, deleteRows(this.read(table), id));
  }

  // ─────────────────────────────────────────────────────────
  // Test Helpers (not part of TableStore, only for tests)
  // ─────────────────────────────────────────────────────────

  /** Returns a copy of a table's rows */
  getTable(table: string): StoreRecord[] {
    return this.read(table).map((row) => ({ ...row }));
  }

  /** Removes every table */
  clear(): void {
    this.tables.clear();
  }

  private read(table: string): Row[] {
    return this.tables.get(table) ?? [];
  }
}
