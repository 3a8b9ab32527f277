export { loadConfig } from './config';
export type { AppConfig, EnvSettings, LoadConfigOptions, RemoteCredentials } from './config.types';
export {
  APP_TITLE,
  APP_VERSION,
  DOMAIN_TABLES,
  DEFAULT_BACKUP_DIR,
  DEFAULT_PROBE_TABLE,
  ENV_KEYS,
} from './constants';
export type { DomainTable, EnvKey } from './constants';
