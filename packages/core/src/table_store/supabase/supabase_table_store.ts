import type { SupabaseClient } from '@supabase/supabase-js';
import { RecordStoreError } from '../../record_store/errors';
import type { Filters, RecordId, StoreRecord } from '../../record_store/record_store.types';
import type { TableStore } from '../table_store';
import { ID_FIELD } from '../local_table';

/**
 * What every awaited query builder resolves to.
 */
type QueryResponse = {
  data: unknown;
  error: { message: string; code?: string } | null;
};

/**
 * A row as decoded from the response body. Field values are JSON, so any
 * plain object is a valid record.
 */
function isStoreRecord(value: unknown): value is StoreRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * SupabaseTableStore - remote implementation of TableStore
 *
 * Delegates every operation to a Supabase (PostgREST) backend. Values
 * travel with their native types, JSON and array columns included. Ids are
 * assigned by the backend; uniqueness and ordering are the backend's.
 * Both `{ error }` responses and thrown client errors surface as
 * RecordStoreError with code REMOTE_ERROR.
 *
 * @example
 * const store = new SupabaseTableStore(createClient(url, key));
 * await store.probe('clientes');
 * const rows = await store.select('productos', { categoria: 'bebidas' });
 */
export class SupabaseTableStore implements TableStore {
  constructor(private readonly client: SupabaseClient) {}

  /**
   * Bounded read (one row) used to validate the connection.
   * Throws when the backend cannot be reached or rejects the request.
   */
  async probe(table: string): Promise<void> {
    const data = await this.execute('probe', table, () =>
      this.client.from(table).select('*').limit(1),
    );
    this.toRecords(data, table);
  }

  async select(table: string, filters?: Filters): Promise<StoreRecord[]> {
    const data = await this.execute('select', table, () => {
      let query = this.client.from(table).select('*');
      for (const [field, value] of Object.entries(filters ?? {})) {
        query = query.eq(field, value);
      }
      return query;
    });
    return this.toRecords(data, table);
  }

  async insert(table: string, record: StoreRecord): Promise<StoreRecord> {
    await this.execute('insert', table, () => this.client.from(table).insert(record));
    return { ...record };
  }

  async update(table: string, id: RecordId, patch: StoreRecord): Promise<void> {
    const fields = { ...patch };
    delete fields[ID_FIELD];
    if (Object.keys(fields).length === 0) return;

    await this.execute('update', table, () =>
      this.client.from(table).update(fields).eq(ID_FIELD, id),
    );
  }

  async delete(table: string, id: RecordId): Promise<void> {
    await this.execute('delete', table, () =>
      this.client.from(table).delete().eq(ID_FIELD, id),
    );
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  private async execute(
    operation: string,
    table: string,
    build: () => PromiseLike<QueryResponse>,
  ): Promise<unknown> {
    let response: QueryResponse;
    try {
      response = await build();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RecordStoreError(`Supabase ${operation} on "${table}" failed: ${message}`, 'REMOTE_ERROR', table);
    }

    if (response.error) {
      const code = response.error.code ? ` [${response.error.code}]` : '';
      throw new RecordStoreError(
        `Supabase ${operation} on "${table}" failed${code}: ${response.error.message}`,
        'REMOTE_ERROR',
        table,
      );
    }

    return response.data;
  }

  private toRecords(data: unknown, table: string): StoreRecord[] {
    if (!Array.isArray(data) || !data.every(isStoreRecord)) {
      throw new RecordStoreError(`Malformed response from Supabase for "${table}"`, 'REMOTE_ERROR', table);
    }
    return data;
  }
}
