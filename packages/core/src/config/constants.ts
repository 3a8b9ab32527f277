export const APP_TITLE = 'Sistema de Programa ColmaGo';
export const APP_VERSION = '1.0.0';

/** Tables used by the five domain modules */
export const DOMAIN_TABLES = {
  clientes: 'clientes',
  productos: 'productos',
  compras: 'compras',
  ventas: 'ventas',
  empleados: 'empleados',
} as const;

export type DomainTable = (typeof DOMAIN_TABLES)[keyof typeof DOMAIN_TABLES];

export const DEFAULT_BACKUP_DIR = 'data_backup';
export const DEFAULT_PROBE_TABLE = DOMAIN_TABLES.clientes;

export const ENV_KEYS = [
  'SUPABASE_URL',
  'SUPABASE_KEY',
  'COLMAGO_BACKUP_DIR',
  'COLMAGO_PROBE_TABLE',
  'LOG_LEVEL',
] as const;

export type EnvKey = (typeof ENV_KEYS)[number];
