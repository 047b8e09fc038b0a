/**
 * Config schema validation
 */

import { LOG_LEVELS, type Config } from '../types/index.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

function isOptionalString(value: unknown): boolean {
  return value === undefined || typeof value === 'string';
}

export function validateConfig(config: unknown): ValidationResult {
  const errors: ValidationError[] = [];

  if (!config || typeof config !== 'object' || Array.isArray(config)) {
    return { valid: false, errors: [{ path: '', message: 'config must be an object' }] };
  }

  const cfg = config as Record<string, unknown>;

  if (cfg.version !== 1) {
    errors.push({ path: 'version', message: 'version must be 1' });
  }

  if (!isOptionalString(cfg.shellName)) {
    errors.push({ path: 'shellName', message: 'shellName must be a string' });
  }

  if (!isOptionalString(cfg.terminator)) {
    errors.push({ path: 'terminator', message: 'terminator must be a string' });
  }

  if (cfg.maxAliases !== undefined) {
    if (typeof cfg.maxAliases !== 'number' || !Number.isInteger(cfg.maxAliases) || cfg.maxAliases < 1) {
      errors.push({ path: 'maxAliases', message: 'maxAliases must be a positive integer' });
    }
  }

  if (cfg.aliasFile !== undefined && (typeof cfg.aliasFile !== 'string' || !cfg.aliasFile.trim())) {
    errors.push({ path: 'aliasFile', message: 'aliasFile must be a non-empty string' });
  }

  if (cfg.logLevel !== undefined && !LOG_LEVELS.some(level => level === cfg.logLevel)) {
    errors.push({ path: 'logLevel', message: `logLevel must be one of: ${LOG_LEVELS.join(', ')}` });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * Parse and validate config JSON
 */
export function parseConfig(jsonString: string): { config: Config | null; errors: ValidationError[] } {
  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonString);
  } catch (e) {
    return {
      config: null,
      errors: [{ path: '', message: `Invalid JSON: ${e instanceof Error ? e.message : 'parse error'}` }],
    };
  }

  const result = validateConfig(parsed);
  if (!result.valid) {
    return { config: null, errors: result.errors };
  }

  return { config: parsed as Config, errors: [] };
}
