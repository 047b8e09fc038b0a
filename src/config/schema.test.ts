import { describe, it, expect } from 'vitest';
import { parseConfig, validateConfig } from './schema.js';

describe('validateConfig', () => {
  it('accepts a minimal config', () => {
    expect(validateConfig({ version: 1 })).toEqual({ valid: true, errors: [] });
  });

  it('accepts a full config', () => {
    const result = validateConfig({
      version: 1,
      shellName: 'dev',
      terminator: '$',
      maxAliases: 25,
      aliasFile: '/home/user/.aliases',
      logLevel: 'debug',
    });
    expect(result.valid).toBe(true);
  });

  it('rejects non-objects', () => {
    expect(validateConfig(null).errors).toEqual([{ path: '', message: 'config must be an object' }]);
    expect(validateConfig([]).valid).toBe(false);
  });

  it('requires version 1', () => {
    expect(validateConfig({ version: 2 }).errors).toEqual([{ path: 'version', message: 'version must be 1' }]);
  });

  it('rejects a maxAliases that is not a positive integer', () => {
    for (const maxAliases of [0, -1, 1.5, '3']) {
      const result = validateConfig({ version: 1, maxAliases });
      expect(result.errors).toEqual([{ path: 'maxAliases', message: 'maxAliases must be a positive integer' }]);
    }
  });

  it('rejects unknown log levels', () => {
    const result = validateConfig({ version: 1, logLevel: 'loud' });
    expect(result.errors).toEqual([{ path: 'logLevel', message: 'logLevel must be one of: debug, info, warn, error' }]);
  });

  it('collects every error', () => {
    const result = validateConfig({ version: 1, shellName: 5, terminator: false, aliasFile: ' ' });
    expect(result.errors.map(e => e.path)).toEqual(['shellName', 'terminator', 'aliasFile']);
  });
});

describe('parseConfig', () => {
  it('returns the parsed config when valid', () => {
    const { config, errors } = parseConfig('{"version":1,"shellName":"box"}');
    expect(errors).toEqual([]);
    expect(config).toEqual({ version: 1, shellName: 'box' });
  });

  it('reports invalid JSON', () => {
    const { config, errors } = parseConfig('{not json');
    expect(config).toBeNull();
    expect(errors).toHaveLength(1);
    expect(errors[0].message.startsWith('Invalid JSON:')).toBe(true);
  });
});
