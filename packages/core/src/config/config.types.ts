import type { LogLevel } from '../logger';

/**
 * Remote backend credentials
 */
export type RemoteCredentials = {
  url: string;
  key: string;
};

/**
 * Settings resolved from `.env` and the process environment
 */
export type AppConfig = {
  /** null when credentials are missing or invalid */
  remote: RemoteCredentials | null;
  /** Directory for local CSV tables */
  backupDir: string;
  /** Table read by the connection probe */
  probeTable: string;
  /** LOG_LEVEL, when set to a known level */
  logLevel?: LogLevel;
  /** Problems found while loading; never fatal */
  warnings: string[];
};

export type LoadConfigOptions = {
  /** Environment to read (default: process.env). Takes precedence over the file. */
  env?: Record<string, string | undefined>;
  /** Path of the dotenv file (default: `<cwd>/.env`) */
  envFile?: string;
  /** Base directory for the default env file and a relative backup dir (default: process.cwd()) */
  cwd?: string;
};

/**
 * Raw variables as read, before defaults
 */
export type EnvSettings = {
  SUPABASE_URL?: string;
  SUPABASE_KEY?: string;
  COLMAGO_BACKUP_DIR?: string;
  COLMAGO_PROBE_TABLE?: string;
  LOG_LEVEL?: LogLevel;
};
