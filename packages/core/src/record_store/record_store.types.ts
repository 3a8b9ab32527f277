import type { SupabaseClient } from '@supabase/supabase-js';
import type { Logger } from '../logger';
import type { RemoteCredentials } from '../config';
import type { TableStore } from '../table_store/table_store';

/**
 * A single field value. Local tables hold strings only; remote tables
 * return whatever native types the backend stores, JSON columns included.
 */
export type RecordValue =
  | string
  | number
  | boolean
  | null
  | RecordValue[]
  | { [field: string]: RecordValue };

/**
 * A schema-less row: field name to value. The `id` field is the table's
 * synthetic key.
 */
export type StoreRecord = Record<string, RecordValue>;

/** Key accepted by update/delete. Compared as a string in local mode. */
export type RecordId = string | number;

/** Exact-match filters, combined with AND. */
export type Filters = Record<string, string | number | boolean>;

export type ConnectionMode = 'remote' | 'local-file';

export type ConnectionStatus = 'Supabase' | 'CSV Local' | 'Disconnected';

export type StoreErrorCode =
  | 'NOT_CONNECTED'
  | 'INVALID_TABLE'
  | 'INVALID_RECORD'
  | 'MALFORMED_TABLE'
  | 'IO_ERROR'
  | 'REMOTE_ERROR';

export type StoreFailure = {
  code: StoreErrorCode;
  message: string;
  table?: string;
};

/**
 * Outcome of a `try*` operation. Lets callers tell "no rows" apart from
 * "the read failed", which the plain operations collapse.
 */
export type StoreResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: StoreFailure };

/**
 * Options for RecordStore
 */
export type RecordStoreOptions = {
  /** Remote credentials; null or undefined forces local mode */
  remote?: RemoteCredentials | null;

  /** Directory holding one CSV file per table (default: "data_backup") */
  backupDir?: string;

  /** Table read by the connection probe (default: "clientes") */
  probeTable?: string;

  /** Builds the remote client (default: supabase-js createClient) */
  clientFactory?: (url: string, key: string) => SupabaseClient;

  /** Store used after a fallback (default: CsvTableStore on backupDir) */
  localStore?: TableStore;

  logger?: Logger;
};
