/**
 * Shell module tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { generatePrompt, generatePlainPrompt, supportsColor } from './prompt.js';
import { tokenize } from './dispatcher.js';
import { isBuiltin, SHELL_BUILTINS } from './types.js';
import { ShellError, UsageError, toShellError } from './errors.js';

describe('prompt', () => {
  describe('generatePlainPrompt', () => {
    it('renders name, terminator and a trailing space', () => {
      expect(generatePlainPrompt({ name: 'My Shell', terminator: '>' })).toBe('My Shell> ');
    });

    it('renders an empty name as just the terminator', () => {
      expect(generatePlainPrompt({ name: '', terminator: '$' })).toBe('$ ');
    });
  });

  describe('generatePrompt', () => {
    const originalNoColor = process.env.NO_COLOR;

    beforeEach(() => {
      process.env.NO_COLOR = '1';
    });

    afterEach(() => {
      if (originalNoColor === undefined) {
        delete process.env.NO_COLOR;
      } else {
        process.env.NO_COLOR = originalNoColor;
      }
    });

    it('disables color when NO_COLOR is set', () => {
      expect(supportsColor()).toBe(false);
    });

    it('matches the plain prompt without color', () => {
      const state = { name: 'dev box', terminator: '%' };
      expect(generatePrompt(state)).toBe(generatePlainPrompt(state));
    });
  });
});

describe('tokenize', () => {
  it('splits on runs of whitespace', () => {
    expect(tokenize('  ls   -la \t /tmp ')).toEqual(['ls', '-la', '/tmp']);
  });

  it('returns no tokens for blank input', () => {
    expect(tokenize('')).toEqual([]);
    expect(tokenize('   \t ')).toEqual([]);
  });
});

describe('isBuiltin', () => {
  it('recognizes every built-in selector', () => {
    for (const selector of SHELL_BUILTINS) {
      expect(isBuiltin(selector)).toBe(true);
    }
  });

  it('matches case-sensitively', () => {
    expect(isBuiltin('newname')).toBe(false);
    expect(isBuiltin('ls')).toBe(false);
  });
});

describe('toShellError', () => {
  it('passes shell errors through unchanged', () => {
    const error = new UsageError('Usage: SAVENEWNAMES <file_name>');
    expect(toShellError(error)).toBe(error);
  });

  it('wraps anything else as an external failure', () => {
    const wrapped = toShellError(new TypeError('bad input'));

    expect(wrapped).toBeInstanceOf(ShellError);
    expect(wrapped.code).toBe('EXTERNAL');
    expect(wrapped.message).toBe('bad input');
    expect(toShellError('plain').message).toBe('plain');
  });
});
