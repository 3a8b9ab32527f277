import * as fs from 'fs/promises';
import * as path from 'path';
import Papa from 'papaparse';
import { RecordStoreError } from '../../record_store/errors';
import type { Filters, RecordId, StoreRecord } from '../../record_store/record_store.types';
import type { TableStore } from '../table_store';
import { applyFilters, deleteRows, insertRow, updateRow, validateTableName } from '../local_table';

type Row = Record<string, string>;

/**
 * Options for CsvTableStore
 */
export interface CsvTableStoreOptions {
  /** Directory holding one file per table */
  basePath: string;

  /** File extension (default: ".csv") */
  extension?: string;

  /** Create the directory on first write if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}

const LINE_BREAK = '\r\n';

/**
 * CsvTableStore - local-file implementation of TableStore
 *
 * Persists each table as `<basePath>/<table>.csv` (UTF-8). The header line
 * comes from the keys of the first record; every mutation rewrites the whole
 * file through a temp file and a rename.
 *
 * Operations on one table run one at a time, in call order, even when the
 * caller does not await between them. This holds within one instance only:
 * two processes writing the same table race and the last rewrite wins.
 *
 * @example
 * const store = new CsvTableStore({ basePath: 'data_backup' });
 *
 * const stored = await store.insert('clientes', { nombre: 'Ana' });
 * // stored.id === '1'
 * const rows = await store.select('clientes', { nombre: 'Ana' });
 */
export class CsvTableStore implements TableStore {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly createIfMissing: boolean;
  private readonly queues: Map<string, Promise<void>> = new Map();

  constructor(options: CsvTableStoreOptions) {
    this.basePath = options.basePath;
    this.extension = options.extension ?? '.csv';
    this.createIfMissing = options.createIfMissing ?? true;
  }

  getFilePath(table: string): string {
    validateTableName(table);
    return path.join(this.basePath, `${table}${this.extension}`);
  }

  async select(table: string, filters?: Filters): Promise<StoreRecord[]> {
    return this.serialize(table, async () => applyFilters(await this.readTable(table), filters));
  }

  async insert(table: string, record: StoreRecord): Promise<StoreRecord> {
    return this.serialize(table, async () => {
      const { records, stored } = insertRow(await this.readTable(table), record, table);
      await this.writeTable(table, records);
      return stored;
    });
  }

  async update(table: string, id: RecordId, patch: StoreRecord): Promise<void> {
    return this.serialize(table, async () => {
      await this.writeTable(table, updateRow(await this.readTable(table), id, patch));
    });
  }

  async delete(table: string, id: RecordId): Promise<void> {
    return this.serialize(table, async () => {
      await this.writeTable(table, deleteRows(await this.readTable(table), id));
    });
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  /**
   * Runs `task` after every earlier operation on the same table has settled.
   * A failed operation does not block the ones queued behind it.
   */
  private serialize<T>(table: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(table) ?? Promise.resolve();
    const result = previous.then(task);
    const tail: Promise<void> = result.then(
      () => this.release(table, tail),
      () => this.release(table, tail),
    );
    this.queues.set(table, tail);
    return result;
  }

  private release(table: string, tail: Promise<void>): void {
    if (this.queues.get(table) === tail) {
      this.queues.delete(table);
    }
  }

  private async readTable(table: string): Promise<Row[]> {
    const filePath = this.getFilePath(table);
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }
    return this.parse(content, table);
  }

  private parse(content: string, table: string): Row[] {
    // Only the line break that ends the last row is dropped: an empty line
    // before it is a row whose single value is empty.
    const body = content.endsWith(LINE_BREAK)
      ? content.slice(0, -LINE_BREAK.length)
      : content.endsWith('\n') ? content.slice(0, -1) : content;
    if (body === '') return [];

    const result = Papa.parse<Row>(body, {
      header: true,
      delimiter: ',',
      skipEmptyLines: false,
    });

    const [first] = result.errors;
    if (first) {
      const where = first.row !== undefined ? ` (row ${first.row + 1})` : '';
      throw new RecordStoreError(
        `Malformed table file for "${table}": ${first.message}${where}`,
        'MALFORMED_TABLE',
        table,
      );
    }

    return result.data;
  }

  /**
   * Rewrites the table file. An empty table removes the file instead, so a
   * missing file and an empty table read the same.
   */
  private async writeTable(table: string, rows: Row[]): Promise<void> {
    const filePath = this.getFilePath(table);
    const [head] = rows;

    if (!head) {
      await fs.rm(filePath, { force: true });
      return;
    }

    const columns = Object.keys(head);
    for (const row of rows) {
      const unknown = Object.keys(row).filter((field) => !columns.includes(field));
      if (unknown.length > 0) {
        throw new RecordStoreError(
          `Record has fields not in the "${table}" header: ${unknown.join(', ')}`,
          'INVALID_RECORD',
          table,
        );
      }
    }

    if (this.createIfMissing) {
      await fs.mkdir(this.basePath, { recursive: true });
    }

    const content = Papa.unparse(rows, { columns, newline: LINE_BREAK });
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, `${content}${LINE_BREAK}`, 'utf-8');
    await fs.rename(tmpPath, filePath);
  }
}
