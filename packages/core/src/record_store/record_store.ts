import * as fs from 'fs/promises';
import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';
import { DEFAULT_BACKUP_DIR, DEFAULT_PROBE_TABLE } from '../config';
import type { RemoteCredentials } from '../config';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import { CsvTableStore } from '../table_store/csv';
import { SupabaseTableStore } from '../table_store/supabase';
import type { TableStore } from '../table_store/table_store';
import { RecordStoreError, toStoreFailure } from './errors';
import type {
  ConnectionMode,
  ConnectionStatus,
  Filters,
  RecordId,
  RecordStoreOptions,
  StoreRecord,
  StoreResult,
} from './record_store.types';

/**
 * RecordStore - the data access layer used by the domain modules
 *
 * Chooses a connection mode once, at initialization: Supabase when
 * credentials are present and a one-row probe succeeds, otherwise one CSV
 * file per table under the backup directory. There is no reconnection and
 * no per-call fallback; the mode holds for the life of the instance.
 *
 * Every operation catches its own failures. The plain operations
 * (`select`, `insert`, `update`, `delete`) keep the neutral contract: an
 * empty array or `false`. The `try*` variants return a StoreResult so a
 * caller can tell "no rows" from "read failed".
 *
 * Updating or deleting an id that does not exist succeeds without changes.
 *
 * @example
 * const config = await loadConfig();
 * const store = await RecordStore.connect({ remote: config.remote, backupDir: config.backupDir });
 *
 * await store.insert('clientes', { nombre: 'Ana', ciudad: 'Lima' });
 * const limenos = await store.select('clientes', { ciudad: 'Lima' });
 * store.getConnectionStatus(); // 'Supabase' | 'CSV Local'
 */
export class RecordStore {
  private readonly remote: RemoteCredentials | null;
  private readonly backupDir: string;
  private readonly probeTable: string;
  private readonly clientFactory: (url: string, key: string) => SupabaseClient;
  private readonly localStore: TableStore | undefined;
  private readonly logger: Logger;

  private mode: ConnectionMode | null = null;
  private backend: TableStore | null = null;
  private fallbackReason: string | null = null;
  private pending: Promise<ConnectionMode> | null = null;

  constructor(options: RecordStoreOptions = {}) {
    this.remote = options.remote ?? null;
    this.backupDir = options.backupDir ?? DEFAULT_BACKUP_DIR;
    this.probeTable = options.probeTable ?? DEFAULT_PROBE_TABLE;
    this.clientFactory = options.clientFactory ?? ((url, key) => createClient(url, key));
    this.localStore = options.localStore;
    this.logger = options.logger ?? createLogger('[RecordStore] ');
  }

  /**
   * Creates a store and selects its connection mode.
   */
  static async connect(options: RecordStoreOptions = {}): Promise<RecordStore> {
    const store = new RecordStore(options);
    await store.initialize();
    return store;
  }

  /**
   * Selects the connection mode. Never rejects; later calls return the
   * mode chosen by the first one.
   */
  async initialize(): Promise<ConnectionMode> {
    if (!this.pending) {
      this.pending = this.selectMode();
    }
    return this.pending;
  }

  // ─────────────────────────────────────────────────────────
  // Caller contract
  // ─────────────────────────────────────────────────────────

  /**
   * Reads a table, optionally keeping only rows where every filter field
   * matches exactly. Returns [] on failure.
   */
  async select(table: string, filters?: Filters): Promise<StoreRecord[]> {
    const result = await this.trySelect(table, filters);
    return result.ok ? result.value : [];
  }

  /**
   * Adds a record. In local mode a missing `id` is assigned as max + 1.
   */
  async insert(table: string, record: StoreRecord): Promise<boolean> {
    return (await this.tryInsert(table, record)).ok;
  }

  /**
   * Merges `record` into the row with the given id. Fields not listed are kept.
   */
  async update(table: string, id: RecordId, record: StoreRecord): Promise<boolean> {
    return (await this.tryUpdate(table, id, record)).ok;
  }

  async delete(table: string, id: RecordId): Promise<boolean> {
    return (await this.tryDelete(table, id)).ok;
  }

  getConnectionStatus(): ConnectionStatus {
    switch (this.mode) {
      case 'remote':
        return 'Supabase';
      case 'local-file':
        return 'CSV Local';
      default:
        return 'Disconnected';
    }
  }

  getMode(): ConnectionMode | null {
    return this.mode;
  }

  /** Why the remote connection was not used, when in local mode */
  getFallbackReason(): string | null {
    return this.fallbackReason;
  }

  getBackupDir(): string {
    return this.backupDir;
  }

  // ─────────────────────────────────────────────────────────
  // Typed results
  // ─────────────────────────────────────────────────────────

  async trySelect(table: string, filters?: Filters): Promise<StoreResult<StoreRecord[]>> {
    return this.run('select', table, (backend) => backend.select(table, filters));
  }

  /**
   * @returns The record as stored, including an assigned id in local mode
   */
  async tryInsert(table: string, record: StoreRecord): Promise<StoreResult<StoreRecord>> {
    return this.run('insert', table, (backend) => backend.insert(table, { ...record }));
  }

  async tryUpdate(table: string, id: RecordId, record: StoreRecord): Promise<StoreResult<void>> {
    return this.run('update', table, (backend) => backend.update(table, id, { ...record }));
  }

  async tryDelete(table: string, id: RecordId): Promise<StoreResult<void>> {
    return this.run('delete', table, (backend) => backend.delete(table, id));
  }

  // ─────────────────────────────────────────────────────────
  // Private helpers
  // ─────────────────────────────────────────────────────────

  private async run<T>(
    operation: string,
    table: string,
    action: (backend: TableStore) => Promise<T>,
  ): Promise<StoreResult<T>> {
    const backend = this.backend;
    if (!backend) {
      const message = `Cannot ${operation} on "${table}": store is not initialized`;
      this.logger.error(message);
      return { ok: false, error: { code: 'NOT_CONNECTED', message, table } };
    }

    try {
      return { ok: true, value: await action(backend) };
    } catch (error: unknown) {
      const failure = toStoreFailure(error, table, this.mode === 'remote' ? 'REMOTE_ERROR' : 'IO_ERROR');
      this.logger.error(`Error during ${operation} on "${table}": ${failure.message}`);
      return { ok: false, error: failure };
    }
  }

  private async selectMode(): Promise<ConnectionMode> {
    let mode: ConnectionMode;
    try {
      this.backend = await this.connectRemote();
      mode = 'remote';
      this.logger.info('Connected to Supabase');
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      this.fallbackReason = reason;
      this.logger.warn(`Could not connect to Supabase: ${reason}`);
      this.logger.warn(`Using local CSV mode in ${this.backupDir}`);
      this.backend = await this.openLocal();
      mode = 'local-file';
    }
    this.mode = mode;
    return mode;
  }

  private async connectRemote(): Promise<TableStore> {
    if (!this.remote) {
      throw new RecordStoreError('Supabase credentials are not configured', 'NOT_CONNECTED');
    }
    const store = new SupabaseTableStore(this.clientFactory(this.remote.url, this.remote.key));
    await store.probe(this.probeTable);
    return store;
  }

  private async openLocal(): Promise<TableStore> {
    if (this.localStore) {
      return this.localStore;
    }
    try {
      await fs.mkdir(this.backupDir, { recursive: true });
    } catch (error: unknown) {
      // Writes will report their own failures; initialization still completes.
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Could not create backup directory ${this.backupDir}: ${message}`);
    }
    return new CsvTableStore({ basePath: this.backupDir });
  }
}
