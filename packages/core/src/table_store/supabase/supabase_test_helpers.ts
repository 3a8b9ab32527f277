/**
 * In-process stand-in for the supabase-js query builder, for unit tests.
 * Records each awaited query and answers it through `respond`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';

export type FakeQuery = {
  table: string;
  action: 'select' | 'insert' | 'update' | 'delete';
  columns?: string;
  payload?: unknown;
  filters: Array<[string, unknown]>;
  limit?: number;
};

export type FakeResponse = {
  data: unknown;
  error: { message: string; code?: string } | null;
};

export type FakeResponder = (query: FakeQuery) => FakeResponse | Error;

export function ok(data: unknown = null): FakeResponse {
  return { data, error: null };
}

export function failed(message: string, code?: string): FakeResponse {
  return { data: null, error: code ? { message, code } : { message } };
}

export function createFakeSupabase(respond: FakeResponder = () => ok([])) {
  const queries: FakeQuery[] = [];

  const from = jest.fn((table: string) => {
    const query: FakeQuery = { table, action: 'select', filters: [] };

    const builder = {
      select(columns: string) {
        query.columns = columns;
        return builder;
      },
      insert(payload: unknown) {
        query.action = 'insert';
        query.payload = payload;
        return builder;
      },
      update(payload: unknown) {
        query.action = 'update';
        query.payload = payload;
        return builder;
      },
      delete() {
        query.action = 'delete';
        return builder;
      },
      eq(field: string, value: unknown) {
        query.filters.push([field, value]);
        return builder;
      },
      limit(count: number) {
        query.limit = count;
        return builder;
      },
      then<T1 = FakeResponse, T2 = never>(
        onFulfilled?: ((value: FakeResponse) => T1 | PromiseLike<T1>) | null,
        onRejected?: ((reason: unknown) => T2 | PromiseLike<T2>) | null,
      ): Promise<T1 | T2> {
        queries.push(query);
        const response = respond(query);
        const settled: Promise<FakeResponse> =
          response instanceof Error ? Promise.reject(response) : Promise.resolve(response);
        return settled.then(onFulfilled, onRejected);
      },
    };

    return builder;
  });

  const client = { from } as unknown as SupabaseClient;

  return { client, from, queries };
}
