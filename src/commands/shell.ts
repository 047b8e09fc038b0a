/**
 * Shell command - interactive REPL (default command)
 */

import { Command, InvalidArgumentError } from 'commander';
import { ShellRepl, type ShellSettings } from '../shell/index.js';
import { ConfigManager } from '../config/index.js';
import {
  type Config,
  type LogLevel,
  DEFAULT_CONFIG,
  DEFAULT_SHELL_NAME,
  DEFAULT_TERMINATOR,
  DEFAULT_MAX_ALIASES,
  DEFAULT_LOG_LEVEL,
} from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { getOutputOptions, outputError } from '../utils/output.js';

export interface ShellFlags {
  name?: string;
  terminator?: string;
  maxAliases?: number;
  aliases?: string;
}

/**
 * Commander parser for --max-aliases
 */
export function parseMaxAliases(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('must be a positive integer');
  }
  return parsed;
}

/**
 * Merge defaults < config file < CLI flags
 */
export function resolveShellSettings(config: Config, flags: ShellFlags): ShellSettings {
  return {
    shellName: flags.name ?? config.shellName ?? DEFAULT_SHELL_NAME,
    terminator: flags.terminator ?? config.terminator ?? DEFAULT_TERMINATOR,
    maxAliases: flags.maxAliases ?? config.maxAliases ?? DEFAULT_MAX_ALIASES,
    aliasFile: flags.aliases ?? config.aliasFile,
  };
}

/**
 * --verbose wins over the configured level
 */
export function resolveLogLevel(config: Config, verbose?: boolean): LogLevel {
  if (verbose) return 'debug';
  return config.logLevel ?? DEFAULT_LOG_LEVEL;
}

/**
 * Load config for the shell; an invalid file is reported and defaults are used
 */
async function loadShellConfig(configPath: string): Promise<Config> {
  const manager = new ConfigManager(configPath);
  try {
    return await manager.loadOrDefault();
  } catch (error) {
    outputError('Failed to load config, using defaults', error instanceof Error ? error : undefined);
    createLogger().warn({
      event: 'config_invalid',
      path: configPath,
      error: error instanceof Error ? error.message : String(error),
    });
    return { ...DEFAULT_CONFIG };
  }
}

export function createShellCommand(getConfigPath: () => string): Command {
  const cmd = new Command('shell')
    .description('Start the interactive shell (default)')
    .option('-n, --name <name>', 'Initial shell name')
    .option('-t, --terminator <text>', 'Initial prompt terminator')
    .option('-m, --max-aliases <n>', 'Maximum number of aliases', parseMaxAliases)
    .option('-a, --aliases <file>', 'Alias file to load at startup')
    .action(async (flags: ShellFlags) => {
      // Check if stdin is a TTY
      if (!process.stdin.isTTY) {
        console.error('Error: Shell requires an interactive terminal (TTY)');
        process.exit(1);
      }

      const config = await loadShellConfig(getConfigPath());
      const logger = createLogger(undefined, resolveLogLevel(config, getOutputOptions().verbose));

      const repl = new ShellRepl(resolveShellSettings(config, flags), { logger });
      await repl.start();
    });

  return cmd;
}
