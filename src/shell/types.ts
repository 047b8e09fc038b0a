/**
 * Shell types and interfaces
 */

import type { ShellError } from './errors.js';
import type { Logger } from '../utils/logger.js';

/**
 * Shell state - name and terminator rendered into the prompt
 */
export interface ShellState {
  name: string;
  terminator: string;
}

/**
 * Built-in selectors (exact, case-sensitive match on token 0)
 */
export const SHELL_BUILTINS = [
  'STOP',
  'SETSHELLNAME',
  'SETTERMINATOR',
  'NEWNAME',
  'READNEWNAMES',
  'LISTNEWNAMES',
  'SAVENEWNAMES',
] as const;

export type BuiltinSelector = typeof SHELL_BUILTINS[number];

export function isBuiltin(token: string): token is BuiltinSelector {
  return SHELL_BUILTINS.some(builtin => builtin === token);
}

/**
 * Outcome of dispatching one tokenized line.
 * 'stop' is the terminate signal; the dispatcher never exits the process itself.
 */
export type DispatchResult =
  | { kind: 'ok' }
  | { kind: 'failed'; error: ShellError }
  | { kind: 'stop'; exitCode: number };

/**
 * Runs an external program; resolves on success, rejects with ExternalCommandError
 */
export type ProgramRunner = (command: string, args: string[]) => Promise<void>;

/**
 * Where handlers report to the user
 */
export interface ShellOutput {
  /** Plain line (listings) */
  print(line: string): void;
  success(message: string): void;
  info(message: string): void;
  error(message: string): void;
}

export interface DispatchOptions {
  maxAliases: number;
  runProgram: ProgramRunner;
  output: ShellOutput;
  logger?: Logger;
}
