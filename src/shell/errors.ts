/**
 * Shell error types
 *
 * Every failure a handler can report is a ShellError. The REPL prints the
 * message and keeps looping; none of these terminate the process.
 */

export type ShellErrorCode = 'USAGE' | 'ALIAS_LIMIT' | 'IO' | 'EXTERNAL';

export class ShellError extends Error {
  constructor(
    message: string,
    public readonly code: ShellErrorCode,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'ShellError';
  }
}

/**
 * Wrong arity for a built-in
 */
export class UsageError extends ShellError {
  constructor(message: string) {
    super(message, 'USAGE');
    this.name = 'UsageError';
  }
}

/**
 * Interactive alias definition would grow the table past its bound
 */
export class AliasLimitError extends ShellError {
  constructor(public readonly maxAliases: number) {
    super(`Alias limit of ${maxAliases} reached; delete an alias before defining a new one.`, 'ALIAS_LIMIT');
    this.name = 'AliasLimitError';
  }
}

/**
 * Open/create/read/write failure on an alias file
 */
export class AliasFileError extends ShellError {
  constructor(
    message: string,
    public readonly path: string,
    cause?: unknown
  ) {
    super(cause instanceof Error ? `${message}: ${cause.message}` : message, 'IO', { cause });
    this.name = 'AliasFileError';
  }
}

/**
 * Launch failure or non-zero exit of an external program
 */
export class ExternalCommandError extends ShellError {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode?: number
  ) {
    super(message, 'EXTERNAL');
    this.name = 'ExternalCommandError';
  }
}

/**
 * Normalize anything thrown inside a handler into a ShellError
 */
export function toShellError(error: unknown): ShellError {
  if (error instanceof ShellError) {
    return error;
  }
  return new ShellError(error instanceof Error ? error.message : String(error), 'EXTERNAL');
}
