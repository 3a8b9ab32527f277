import * as fs from 'fs/promises';
import * as path from 'path';
import Ajv from 'ajv';
import type { ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { parse as parseDotenv } from 'dotenv';
import { LOG_LEVELS, createLogger, isLogLevel } from '../logger';
import type { Logger } from '../logger';
import type { AppConfig, EnvSettings, LoadConfigOptions } from './config.types';
import { DEFAULT_BACKUP_DIR, DEFAULT_PROBE_TABLE, ENV_KEYS } from './constants';
import type { EnvKey } from './constants';

const ENV_SCHEMA = {
  type: 'object',
  properties: {
    SUPABASE_URL: { type: 'string', format: 'uri', pattern: '^https?://' },
    SUPABASE_KEY: { type: 'string', minLength: 1 },
    COLMAGO_BACKUP_DIR: { type: 'string', minLength: 1 },
    COLMAGO_PROBE_TABLE: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
    LOG_LEVEL: { type: 'string', enum: [...LOG_LEVELS] },
  },
  additionalProperties: false,
};

let envValidator: ValidateFunction<EnvSettings> | null = null;

function getEnvValidator(): ValidateFunction<EnvSettings> {
  if (!envValidator) {
    const ajv = new Ajv({ allErrors: true });
    addFormats(ajv);
    envValidator = ajv.compile<EnvSettings>(ENV_SCHEMA);
  }
  return envValidator;
}

function isEnvKey(value: string): value is EnvKey {
  return ENV_KEYS.some((key) => key === value);
}

async function readEnvFile(envFile: string): Promise<Record<string, string>> {
  try {
    const content = await fs.readFile(envFile, 'utf-8');
    return parseDotenv(content);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {};
    }
    throw error;
  }
}

/**
 * Keeps the known keys with a non-blank value. The environment wins over
 * the file, as dotenv never overrides variables that are already set.
 */
function collectSettings(
  fileVars: Record<string, string>,
  env: Record<string, string | undefined>,
): Partial<Record<EnvKey, string>> {
  const settings: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = (env[key] ?? fileVars[key])?.trim();
    if (value) {
      settings[key] = value;
    }
  }
  return settings;
}

/**
 * Loads application settings from a dotenv file and the environment.
 *
 * Invalid values are dropped with a warning instead of failing: a bad
 * SUPABASE_URL only means the store starts in local mode.
 */
export async function loadConfig(
  options: LoadConfigOptions = {},
  logger?: Logger,
): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const envFile = options.envFile ?? path.join(cwd, '.env');
  const env = options.env ?? process.env;

  const settings = collectSettings(await readEnvFile(envFile), env);
  const warnings: string[] = [];

  const validate = getEnvValidator();
  if (!validate(settings)) {
    for (const error of validate.errors ?? []) {
      const field = error.instancePath.slice(1);
      if (isEnvKey(field) && settings[field] !== undefined) {
        warnings.push(`${field} ${error.message ?? 'is invalid'}; ignoring it`);
        delete settings[field];
      }
    }
  }

  const url = settings.SUPABASE_URL;
  const key = settings.SUPABASE_KEY;
  if (!url && !key) {
    warnings.push('Supabase credentials are not configured. Create a .env file with SUPABASE_URL and SUPABASE_KEY');
  } else if (!url || !key) {
    warnings.push(`Supabase credentials are incomplete: ${url ? 'SUPABASE_KEY' : 'SUPABASE_URL'} is missing`);
  }

  const logLevel = settings.LOG_LEVEL;
  const config: AppConfig = {
    remote: url && key ? { url, key } : null,
    backupDir: path.resolve(cwd, settings.COLMAGO_BACKUP_DIR ?? DEFAULT_BACKUP_DIR),
    probeTable: settings.COLMAGO_PROBE_TABLE ?? DEFAULT_PROBE_TABLE,
    warnings,
  };
  if (isLogLevel(logLevel)) {
    config.logLevel = logLevel;
  }

  // Built after parsing so LOG_LEVEL from the .env file applies here too
  const log = logger ?? createLogger('[Config] ', config.logLevel);
  for (const warning of warnings) {
    log.warn(warning);
  }

  return config;
}
