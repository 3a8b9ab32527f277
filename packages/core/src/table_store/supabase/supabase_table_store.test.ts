/**
 * SupabaseTableStore Unit Tests
 *
 * The supabase-js client is replaced by an in-process fake that records
 * every query the store builds.
 */

import { SupabaseTableStore } from './supabase_table_store';
import { createFakeSupabase, failed, ok } from './supabase_test_helpers';
import { RecordStoreError } from '../../record_store/errors';

describe('SupabaseTableStore', () => {
  // ─────────────────────────────────────────────────────────
  // Query construction
  // ─────────────────────────────────────────────────────────

  describe('Query construction', () => {
    it('should select every column of the table without filters', async () => {
      const rows = [{ id: 1, nombre: 'Ana' }];
      const { client, queries } = createFakeSupabase(() => ok(rows));
      const store = new SupabaseTableStore(client);

      const result = await store.select('clientes');

      expect(result).toEqual(rows);
      expect(queries).toEqual([{ table: 'clientes', action: 'select', columns: '*', filters: [] }]);
    });

    it('should add one equality clause per filter field', async () => {
      const { client, queries } = createFakeSupabase(() => ok([]));
      const store = new SupabaseTableStore(client);

      await store.select('productos', { categoria: 'bebidas', activo: true });

      expect(queries[0]?.filters).toEqual([
        ['categoria', 'bebidas'],
        ['activo', true],
      ]);
    });

    it('should send inserts as-is without assigning an id', async () => {
      const { client, queries } = createFakeSupabase(() => ok());
      const store = new SupabaseTableStore(client);

      const stored = await store.insert('ventas', { total: 25.5, cliente_id: 3 });

      expect(stored).toEqual({ total: 25.5, cliente_id: 3 });
      expect(queries[0]).toMatchObject({ action: 'insert', payload: { total: 25.5, cliente_id: 3 } });
    });

    it('should filter updates by id and drop the id from the patch', async () => {
      const { client, queries } = createFakeSupabase(() => ok());
      const store = new SupabaseTableStore(client);

      await store.update('empleados', 7, { id: 99, cargo: 'cajero' });

      expect(queries[0]).toMatchObject({
        table: 'empleados',
        action: 'update',
        payload: { cargo: 'cajero' },
        filters: [['id', 7]],
      });
    });

    it('should skip an update with nothing but an id', async () => {
      const { client, queries } = createFakeSupabase(() => ok());
      const store = new SupabaseTableStore(client);

      await store.update('empleados', 7, { id: 7 });

      expect(queries).toEqual([]);
    });

    it('should filter deletes by id', async () => {
      const { client, queries } = createFakeSupabase(() => ok());
      const store = new SupabaseTableStore(client);

      await store.delete('compras', '12');

      expect(queries[0]).toMatchObject({ table: 'compras', action: 'delete', filters: [['id', '12']] });
    });

    it('should probe with a one-row read', async () => {
      const { client, queries } = createFakeSupabase(() => ok([]));
      const store = new SupabaseTableStore(client);

      await store.probe('clientes');

      expect(queries[0]).toMatchObject({ table: 'clientes', action: 'select', limit: 1 });
    });
  });

  // ─────────────────────────────────────────────────────────
  // Error handling
  // ─────────────────────────────────────────────────────────

  describe('Error handling', () => {
    it('should turn an error response into REMOTE_ERROR', async () => {
      const { client } = createFakeSupabase(() => failed('permission denied for table ventas', '42501'));
      const store = new SupabaseTableStore(client);

      await expect(store.insert('ventas', { total: 1 })).rejects.toMatchObject({
        code: 'REMOTE_ERROR',
        table: 'ventas',
        message: 'Supabase insert on "ventas" failed [42501]: permission denied for table ventas',
      });
    });

    it('should wrap errors thrown by the client', async () => {
      const { client } = createFakeSupabase(() => new Error('fetch failed'));
      const store = new SupabaseTableStore(client);

      await expect(store.delete('ventas', 1)).rejects.toMatchObject({
        code: 'REMOTE_ERROR',
        message: 'Supabase delete on "ventas" failed: fetch failed',
      });
    });

    it('should reject a select response that is not a list of records', async () => {
      const { client } = createFakeSupabase(() => ok({ rows: [] }));
      const store = new SupabaseTableStore(client);

      await expect(store.select('clientes')).rejects.toBeInstanceOf(RecordStoreError);
    });

    it('should pass JSON and array columns through unchanged', async () => {
      const row = { id: 1, nombre: 'Ana', tags: ['vip'], meta: { puntos: 3, notas: null } };
      const { client } = createFakeSupabase(() => ok([row]));
      const store = new SupabaseTableStore(client);

      expect(await store.select('clientes')).toEqual([row]);
    });

    it('should fail the probe when the backend refuses the key', async () => {
      const { client } = createFakeSupabase(() => failed('Invalid API key'));
      const store = new SupabaseTableStore(client);

      await expect(store.probe('clientes')).rejects.toThrow('Supabase probe on "clientes" failed: Invalid API key');
    });
  });
});
