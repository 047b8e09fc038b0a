import { describe, it, expect } from 'vitest';
import { createLogger } from './logger.js';

describe('createLogger', () => {
  it('writes one JSON object per entry', () => {
    const lines: string[] = [];
    const logger = createLogger((line) => lines.push(line), 'info');

    logger.info({ event: 'alias_load', path: '/tmp/a.txt', loaded: 2 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({ level: 'info', event: 'alias_load', path: '/tmp/a.txt', loaded: 2 });
    expect(typeof entry.timestamp).toBe('string');
    expect(Number.isNaN(Date.parse(entry.timestamp))).toBe(false);
  });

  it('drops entries below the minimum level', () => {
    const lines: string[] = [];
    const logger = createLogger((line) => lines.push(line), 'warn');

    logger.debug({ event: 'dispatch' });
    logger.info({ event: 'alias_save' });
    logger.warn({ event: 'external_failed' });
    logger.error({ event: 'config_invalid' });

    expect(lines.map(line => JSON.parse(line).event)).toEqual(['external_failed', 'config_invalid']);
  });

  it('logs everything at debug level', () => {
    const lines: string[] = [];
    const logger = createLogger((line) => lines.push(line), 'debug');

    logger.debug({ event: 'dispatch', selector: 'NEWNAME', arity: 3 });

    expect(JSON.parse(lines[0])).toMatchObject({ level: 'debug', selector: 'NEWNAME', arity: 3 });
  });
});
