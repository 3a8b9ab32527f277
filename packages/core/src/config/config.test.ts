import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { loadConfig } from './config';
import type { Logger } from '../logger';

describe('loadConfig', () => {
  let tempDir: string;
  let logger: jest.Mocked<Logger>;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
    logger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  const writeEnvFile = (content: string) => fs.writeFile(path.join(tempDir, '.env'), content, 'utf-8');

  it('should read credentials from the .env file in cwd', async () => {
    await writeEnvFile('SUPABASE_URL=https://test-project.supabase.co\nSUPABASE_KEY=test-key\n');

    const config = await loadConfig({ cwd: tempDir, env: {} }, logger);

    expect(config.remote).toEqual({ url: 'https://test-project.supabase.co', key: 'test-key' });
    expect(config.warnings).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should let the environment override the file', async () => {
    await writeEnvFile('SUPABASE_URL=https://file.supabase.co\nSUPABASE_KEY=file-key\n');

    const config = await loadConfig({ cwd: tempDir, env: { SUPABASE_KEY: 'env-key' } }, logger);

    expect(config.remote).toEqual({ url: 'https://file.supabase.co', key: 'env-key' });
  });

  it('should apply defaults when nothing is configured', async () => {
    const config = await loadConfig({ cwd: tempDir, env: {} }, logger);

    expect(config).toEqual({
      remote: null,
      backupDir: path.join(tempDir, 'data_backup'),
      probeTable: 'clientes',
      warnings: [
        'Supabase credentials are not configured. Create a .env file with SUPABASE_URL and SUPABASE_KEY',
      ],
    });
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('should read an explicit env file path', async () => {
    const envFile = path.join(tempDir, 'custom.env');
    await fs.writeFile(envFile, 'COLMAGO_PROBE_TABLE=productos\nLOG_LEVEL=debug\n', 'utf-8');

    const config = await loadConfig({ cwd: tempDir, envFile, env: {} }, logger);

    expect(config.probeTable).toBe('productos');
    expect(config.logLevel).toBe('debug');
  });

  it('should resolve a relative backup directory against cwd and keep an absolute one', async () => {
    const relative = await loadConfig({ cwd: tempDir, env: { COLMAGO_BACKUP_DIR: 'respaldo' } }, logger);
    const absolute = await loadConfig({ cwd: tempDir, env: { COLMAGO_BACKUP_DIR: '/var/colmago' } }, logger);

    expect(relative.backupDir).toBe(path.join(tempDir, 'respaldo'));
    expect(absolute.backupDir).toBe('/var/colmago');
  });

  it('should treat blank values as missing', async () => {
    const config = await loadConfig(
      { cwd: tempDir, env: { SUPABASE_URL: '  ', SUPABASE_KEY: '' } },
      logger,
    );

    expect(config.remote).toBeNull();
  });

  it('should drop an invalid URL and report incomplete credentials', async () => {
    const config = await loadConfig(
      { cwd: tempDir, env: { SUPABASE_URL: 'not-a-url', SUPABASE_KEY: 'test-key' } },
      logger,
    );

    expect(config.remote).toBeNull();
    expect(config.warnings).toHaveLength(2);
    expect(config.warnings[0]).toMatch(/^SUPABASE_URL must match .*; ignoring it$/);
    expect(config.warnings[1]).toBe('Supabase credentials are incomplete: SUPABASE_URL is missing');
  });

  it('should ignore unknown log levels and invalid probe tables', async () => {
    const config = await loadConfig(
      { cwd: tempDir, env: { LOG_LEVEL: 'verbose', COLMAGO_PROBE_TABLE: 'drop table;' } },
      logger,
    );

    expect(config.logLevel).toBeUndefined();
    expect(config.probeTable).toBe('clientes');
    expect(config.warnings).toEqual(
      expect.arrayContaining([
        'LOG_LEVEL must be equal to one of the allowed values; ignoring it',
        expect.stringMatching(/^COLMAGO_PROBE_TABLE must match pattern/),
      ]),
    );
  });

  it('should log its warnings at the LOG_LEVEL read from the .env file', async () => {
    const consoleWarn = jest.spyOn(console, 'warn').mockImplementation();
    await writeEnvFile('LOG_LEVEL=warn\n');

    try {
      await loadConfig({ cwd: tempDir, env: {} });

      expect(consoleWarn).toHaveBeenCalledTimes(1);
      expect(consoleWarn).toHaveBeenCalledWith(
        '[Config] Supabase credentials are not configured. Create a .env file with SUPABASE_URL and SUPABASE_KEY'
      );
    } finally {
      consoleWarn.mockRestore();
    }
  });

  it('should ignore variables it does not know', async () => {
    const config = await loadConfig({ cwd: tempDir, env: { HOME: '/root', PATH: '/bin' } }, logger);

    expect(config.remote).toBeNull();
    expect(config.warnings).toHaveLength(1);
  });
});
