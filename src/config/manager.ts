/**
 * Config manager - handles reading, writing, and validating config
 */

import { type Config, DEFAULT_CONFIG } from '../types/index.js';
import { resolveConfigPath } from '../utils/config-path.js';
import { parseConfig, validateConfig, type ValidationResult } from './schema.js';
import { access, mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { randomUUID } from 'crypto';
import { basename, dirname, join } from 'path';

/**
 * Config file contents, or null when there is no file
 */
async function readConfigText(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Write beside the target, then rename over it
 */
async function writeConfigText(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  await mkdir(dir, { recursive: true });

  const staging = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);
  try {
    await writeFile(staging, content, 'utf-8');
    await rename(staging, path);
  } catch (error) {
    await rm(staging, { force: true });
    throw error;
  }
}

export class ConfigManager {
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = resolveConfigPath({ configPath });
  }

  getConfigPath(): string {
    return this.configPath;
  }

  async exists(): Promise<boolean> {
    return access(this.configPath).then(() => true, () => false);
  }

  async load(): Promise<Config> {
    const content = await readConfigText(this.configPath);
    if (content === null) {
      throw new Error(`Config file not found: ${this.configPath}`);
    }

    const { config, errors } = parseConfig(content);
    if (!config) {
      throw new Error(`Invalid config: ${errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    return config;
  }

  /**
   * Load config, falling back to defaults when the file is missing.
   * An invalid file still throws so the caller can report it.
   */
  async loadOrDefault(): Promise<Config> {
    if (!(await this.exists())) {
      return { ...DEFAULT_CONFIG };
    }
    return { ...DEFAULT_CONFIG, ...(await this.load()) };
  }

  async save(config: Config): Promise<void> {
    const result = validateConfig(config);
    if (!result.valid) {
      throw new Error(`Invalid config: ${result.errors.map(e => `${e.path}: ${e.message}`).join(', ')}`);
    }

    await writeConfigText(this.configPath, JSON.stringify(config, null, 2) + '\n');
  }

  async init(force: boolean = false): Promise<{ created: boolean; path: string }> {
    const exists = await this.exists();
    if (exists && !force) {
      return { created: false, path: this.configPath };
    }

    await this.save({ ...DEFAULT_CONFIG });
    return { created: true, path: this.configPath };
  }

  async validate(): Promise<ValidationResult> {
    const content = await readConfigText(this.configPath);
    if (content === null) {
      return { valid: false, errors: [{ path: '', message: 'Config file not found' }] };
    }

    const { errors } = parseConfig(content);
    return { valid: errors.length === 0, errors };
  }
}
