/**
 * Configuration types for aliash
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Config {
  version: 1;
  /** Initial shell name shown in the prompt */
  shellName?: string;
  /** Initial prompt terminator */
  terminator?: string;
  /** Upper bound on the alias table size */
  maxAliases?: number;
  /** Alias file loaded at startup */
  aliasFile?: string;
  logLevel?: LogLevel;
}

export const DEFAULT_SHELL_NAME = 'My Shell';
export const DEFAULT_TERMINATOR = '>';
export const DEFAULT_MAX_ALIASES = 10;
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const DEFAULT_CONFIG: Config = {
  version: 1,
  shellName: DEFAULT_SHELL_NAME,
  terminator: DEFAULT_TERMINATOR,
  maxAliases: DEFAULT_MAX_ALIASES,
  logLevel: DEFAULT_LOG_LEVEL,
};
