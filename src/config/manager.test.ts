import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ConfigManager } from './manager.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { join } from 'path';
import { mkdtemp, rm, writeFile, readFile, readdir, mkdir } from 'fs/promises';
import { tmpdir } from 'os';

describe('ConfigManager', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'aliash-config-'));
    configPath = join(tempDir, 'config.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('exposes the config path', () => {
    expect(new ConfigManager(configPath).getConfigPath()).toBe(configPath);
  });

  it('falls back to defaults when the file is missing', async () => {
    const manager = new ConfigManager(configPath);
    expect(await manager.loadOrDefault()).toEqual(DEFAULT_CONFIG);
  });

  it('merges file values over defaults', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, shellName: 'box', maxAliases: 3 }));
    const manager = new ConfigManager(configPath);

    expect(await manager.loadOrDefault()).toEqual({ ...DEFAULT_CONFIG, shellName: 'box', maxAliases: 3 });
  });

  it('throws on an invalid file', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, maxAliases: 0 }));
    const manager = new ConfigManager(configPath);

    await expect(manager.loadOrDefault()).rejects.toThrow('Invalid config: maxAliases: maxAliases must be a positive integer');
  });

  it('throws from load when the file is missing', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.load()).rejects.toThrow(`Config file not found: ${configPath}`);
  });

  it('creates the default config once', async () => {
    const manager = new ConfigManager(join(tempDir, 'nested', 'config.json'));

    const first = await manager.init();
    const second = await manager.init();

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    const written = JSON.parse(await readFile(first.path, 'utf-8'));
    expect(written).toEqual(DEFAULT_CONFIG);
  });

  it('overwrites with force', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, shellName: 'old' }));
    const manager = new ConfigManager(configPath);

    const result = await manager.init(true);

    expect(result.created).toBe(true);
    expect((await manager.load()).shellName).toBe(DEFAULT_CONFIG.shellName);
  });

  it('replaces the file on save without leaving staging files behind', async () => {
    await writeFile(configPath, JSON.stringify({ version: 1, shellName: 'old' }));
    const manager = new ConfigManager(configPath);

    await manager.save({ version: 1, shellName: 'new' });

    expect(await readFile(configPath, 'utf-8')).toBe('{\n  "version": 1,\n  "shellName": "new"\n}\n');
    expect(await readdir(tempDir)).toEqual(['config.json']);
  });

  it('propagates read errors other than a missing file', async () => {
    await mkdir(configPath);
    const manager = new ConfigManager(configPath);

    const error = await manager.load().catch((e: unknown) => e);

    expect(error instanceof Error && 'code' in error && error.code).toBe('EISDIR');
  });

  it('refuses to save an invalid config', async () => {
    const manager = new ConfigManager(configPath);
    await expect(manager.save({ version: 1, maxAliases: -2 })).rejects.toThrow('Invalid config');
  });

  it('validates the file on disk', async () => {
    const manager = new ConfigManager(configPath);
    expect(await manager.validate()).toEqual({
      valid: false,
      errors: [{ path: '', message: 'Config file not found' }],
    });

    await writeFile(configPath, JSON.stringify({ version: 1, terminator: '$' }));
    expect(await manager.validate()).toEqual({ valid: true, errors: [] });
  });
});
