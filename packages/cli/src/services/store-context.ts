import { Config, Logger, RecordStore } from '@colmago/core';

/**
 * Options for StoreContext
 */
export interface StoreContextOptions {
  /** Where and how to read `.env` and the environment */
  config?: Config.LoadConfigOptions;

  /** Builds the store from the loaded config (default: RecordStore.connect) */
  storeFactory?: (config: Config.AppConfig) => Promise<RecordStore>;
}

/**
 * Store context for the ColmaGo CLI
 *
 * Owns the one RecordStore of the process. Commands receive the context
 * explicitly instead of reaching for a global; the config is loaded and the
 * connection mode selected on first use, then reused.
 */
export class StoreContext {
  private configPromise: Promise<Config.AppConfig> | null = null;
  private storePromise: Promise<RecordStore> | null = null;

  constructor(private readonly options: StoreContextOptions = {}) { }

  getConfig(): Promise<Config.AppConfig> {
    if (!this.configPromise) {
      this.configPromise = Config.loadConfig(this.options.config);
    }
    return this.configPromise;
  }

  getStore(): Promise<RecordStore> {
    if (!this.storePromise) {
      this.storePromise = this.getConfig().then((config) => {
        const factory = this.options.storeFactory ?? StoreContext.connect;
        return factory(config);
      });
    }
    return this.storePromise;
  }

  private static connect(config: Config.AppConfig): Promise<RecordStore> {
    return RecordStore.connect({
      remote: config.remote,
      backupDir: config.backupDir,
      probeTable: config.probeTable,
      logger: Logger.createLogger('[RecordStore] ', config.logLevel),
    });
  }
}
