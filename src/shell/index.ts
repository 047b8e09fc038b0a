/**
 * Shell module exports
 */

export { ShellRepl, type ShellSettings, type ShellReplDeps, type RawModeTerminal } from './repl.js';
export { dispatch, tokenize, listAliases } from './dispatcher.js';
export {
  AliasStore,
  loadAliases,
  saveAliases,
  parseAliasLine,
  formatAliasLine,
  type AliasEntry,
  type LoadReport,
} from './alias-store.js';
export { runExternal } from './runner.js';
export { generatePrompt, supportsColor, consoleOutput } from './prompt.js';
export {
  ShellError,
  UsageError,
  AliasLimitError,
  AliasFileError,
  ExternalCommandError,
  type ShellErrorCode,
} from './errors.js';
export type {
  ShellState,
  DispatchResult,
  DispatchOptions,
  ProgramRunner,
  ShellOutput,
  BuiltinSelector,
} from './types.js';
export { SHELL_BUILTINS, isBuiltin } from './types.js';
