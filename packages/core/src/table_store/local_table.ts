import { RecordStoreError } from '../record_store/errors';
import type { Filters, RecordId, RecordValue, StoreRecord } from '../record_store/record_store.types';

/**
 * Row semantics shared by the local stores (CSV and memory).
 *
 * Local tables keep every value as a string, in insertion order, and own
 * id assignment. Each helper returns a new array; callers persist it whole.
 */

export const ID_FIELD = 'id';

const INTEGER_PATTERN = /^\s*[+-]?\d+\s*$/;

/**
 * String form of a value as written to a local table: null becomes '',
 * arrays and objects become JSON text.
 */
export function toCell(value: RecordValue): string {
  if (value === null) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** Converts every value of a record to its local string form. */
export function toLocalRecord(record: StoreRecord): Record<string, string> {
  const local: Record<string, string> = {};
  for (const [field, value] of Object.entries(record)) {
    local[field] = toCell(value);
  }
  return local;
}

export function hasOwnField(record: StoreRecord, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field);
}

/**
 * Validates that a table name can be used as a file name.
 * Blocks: empty names, `..`, `/`, `\`
 */
export function validateTableName(table: string): void {
  if (!table || typeof table !== 'string') {
    throw new RecordStoreError('Table name must be a non-empty string', 'INVALID_TABLE');
  }
  if (table.includes('..') || /[\/\\]/.test(table)) {
    throw new RecordStoreError(
      `Invalid table name: "${table}". Table names cannot contain /, \\, or ..`,
      'INVALID_TABLE',
      table,
    );
  }
}

export function matchesFilters(record: StoreRecord, filters: Filters): boolean {
  return Object.entries(filters).every(([field, expected]) => {
    const stored = record[field];
    return stored !== undefined && toCell(stored) === toCell(expected);
  });
}

export function applyFilters<T extends StoreRecord>(records: T[], filters?: Filters): T[] {
  if (!filters || Object.keys(filters).length === 0) return records;
  return records.filter((record) => matchesFilters(record, filters));
}

/**
 * Next synthetic id: highest existing integer id plus one.
 * Records without an id count as 0; an id that is not an integer is an error.
 */
export function nextId(records: StoreRecord[], table: string): string {
  let max = 0n;
  for (const record of records) {
    const raw = record[ID_FIELD];
    if (raw === undefined) continue;
    const text = toCell(raw);
    if (!INTEGER_PATTERN.test(text)) {
      throw new RecordStoreError(
        `Cannot assign id in "${table}": existing id "${text}" is not an integer`,
        'MALFORMED_TABLE',
        table,
      );
    }
    const id = BigInt(text.trim());
    if (id > max) max = id;
  }
  return String(max + 1n);
}

export function insertRow(
  records: Record<string, string>[],
  record: StoreRecord,
  table: string,
): { records: Record<string, string>[]; stored: Record<string, string> } {
  const stored = toLocalRecord(record);
  if (!hasOwnField(record, ID_FIELD)) {
    stored[ID_FIELD] = nextId(records, table);
  }
  return { records: [...records, stored], stored };
}

/**
 * Merges `patch` into the first record whose id matches.
 * The `id` field of the patch is ignored; ids are never reassigned.
 */
export function updateRow(
  records: Record<string, string>[],
  id: RecordId,
  patch: StoreRecord,
): Record<string, string>[] {
  const key = String(id);
  const index = records.findIndex((record) => record[ID_FIELD] === key);
  if (index === -1) return records;

  const fields = toLocalRecord(patch);
  delete fields[ID_FIELD];
  const next = [...records];
  next[index] = { ...records[index], ...fields };
  return next;
}

export function deleteRows(records: Record<string, string>[], id: RecordId): Record<string, string>[] {
  const key = String(id);
  return records.filter((record) => record[ID_FIELD] !== key);
}
