/**
 * Input dispatch - routes a tokenized line to a built-in or to program invocation
 *
 * Built-ins (exact, case-sensitive):
 *   STOP                      terminate with status 0
 *   SETSHELLNAME [words...]   set the shell name
 *   SETTERMINATOR [text]      set the prompt terminator
 *   NEWNAME                   list aliases
 *   NEWNAME <alias>           delete an alias
 *   NEWNAME <alias> <cmd>     define or overwrite an alias
 *   READNEWNAMES <file>       load aliases from a file
 *   LISTNEWNAMES              list aliases
 *   SAVENEWNAMES <file>       save aliases to a file
 *
 * Anything else is resolved through the alias table, then run as a program.
 */

import { AliasStore, loadAliases, saveAliases } from './alias-store.js';
import { ExternalCommandError, UsageError, toShellError } from './errors.js';
import { isBuiltin, type DispatchOptions, type DispatchResult, type ShellOutput, type ShellState } from './types.js';
import { silentLogger, type Logger } from '../utils/logger.js';

const OK: DispatchResult = { kind: 'ok' };

/**
 * Split a raw line into whitespace-delimited tokens
 */
export function tokenize(line: string): string[] {
  return line.trim().split(/\s+/).filter(t => t !== '');
}

/**
 * Dispatch one tokenized line.
 * Handler failures come back as 'failed' results; only STOP yields 'stop'.
 */
export async function dispatch(
  tokens: readonly string[],
  state: ShellState,
  aliases: AliasStore,
  options: DispatchOptions
): Promise<DispatchResult> {
  if (tokens.length === 0) {
    return OK;
  }

  const selector = tokens[0];
  const logger = options.logger ?? silentLogger;
  logger.debug({ event: 'dispatch', selector, arity: tokens.length, builtin: isBuiltin(selector) });

  try {
    switch (selector) {
      case 'STOP':
        return { kind: 'stop', exitCode: 0 };

      case 'SETSHELLNAME':
        handleSetShellName(tokens, state, options.output);
        break;

      case 'SETTERMINATOR':
        handleSetTerminator(tokens, state, options.output);
        break;

      case 'NEWNAME':
        handleNewName(tokens, aliases, options);
        break;

      case 'READNEWNAMES':
        await handleReadNewNames(tokens, aliases, options);
        break;

      case 'LISTNEWNAMES':
        listAliases(aliases, options.output);
        break;

      case 'SAVENEWNAMES':
        await handleSaveNewNames(tokens, aliases, options);
        break;

      default:
        await invokeProgram(tokens, aliases, options);
    }
    return OK;
  } catch (error) {
    return { kind: 'failed', error: toShellError(error) };
  }
}

/**
 * SETSHELLNAME - join everything after the selector
 */
export function handleSetShellName(tokens: readonly string[], state: ShellState, output: ShellOutput): void {
  state.name = tokens.slice(1).join(' ');
  output.success(`Shell name set to: ${state.name}`);
}

/**
 * SETTERMINATOR - second token verbatim, or keep the current one
 */
export function handleSetTerminator(tokens: readonly string[], state: ShellState, output: ShellOutput): void {
  if (tokens.length < 2) {
    output.info(`No terminator specified. Using the current terminator: ${state.terminator}`);
    return;
  }
  state.terminator = tokens[1];
  output.success(`Terminator set to: ${state.terminator}`);
}

/**
 * NEWNAME - list (1 token), delete (2), define (3)
 */
export function handleNewName(tokens: readonly string[], aliases: AliasStore, options: DispatchOptions): void {
  const { output } = options;

  switch (tokens.length) {
    case 1:
      listAliases(aliases, output);
      return;

    case 2: {
      const name = tokens[1];
      if (aliases.delete(name)) {
        output.success(`Alias '${name}' deleted.`);
      } else {
        output.info(`Alias '${name}' does not exist.`);
      }
      return;
    }

    case 3: {
      const [, name, command] = tokens;
      aliases.set(name, command, options.maxAliases);
      output.success(`Alias '${name}' defined for '${command}'.`);
      return;
    }

    default:
      throw new UsageError('Invalid usage of NEWNAME command.');
  }
}

/**
 * LISTNEWNAMES / NEWNAME - render "name - command" per alias
 */
export function listAliases(aliases: AliasStore, output: ShellOutput): void {
  output.print('Aliases:');
  const entries = aliases.entries();
  if (entries.length === 0) {
    output.print('(no aliases defined)');
    return;
  }
  for (const { name, command } of entries) {
    output.print(`${name} - ${command}`);
  }
}

/**
 * READNEWNAMES <file>
 */
export async function handleReadNewNames(
  tokens: readonly string[],
  aliases: AliasStore,
  options: DispatchOptions
): Promise<void> {
  if (tokens.length !== 2) {
    throw new UsageError('Usage: READNEWNAMES <file_name>');
  }

  const path = tokens[1];
  const report = await loadAliases(path, aliases, options.maxAliases);
  (options.logger ?? silentLogger).info({
    event: 'alias_load',
    path,
    loaded: report.loaded,
    skipped: report.skipped,
    limit_reached: report.limitReached,
  });

  options.output.success(`Loaded ${report.loaded} alias(es) from file: ${path}`);
  if (report.limitReached) {
    options.output.info(`Alias limit of ${options.maxAliases} reached; loading stopped.`);
  }
}

/**
 * SAVENEWNAMES <file>
 */
export async function handleSaveNewNames(
  tokens: readonly string[],
  aliases: AliasStore,
  options: DispatchOptions
): Promise<void> {
  if (tokens.length !== 2) {
    throw new UsageError('Usage: SAVENEWNAMES <file_name>');
  }

  const path = tokens[1];
  const written = await saveAliases(path, aliases);
  (options.logger ?? silentLogger).info({ event: 'alias_save', path, written });
  options.output.success(`Aliases saved to file: ${path}`);
}

/**
 * Resolve token 0 through the alias table and run the result.
 * An alias replaces the whole line: the original arguments are dropped.
 */
export async function invokeProgram(
  tokens: readonly string[],
  aliases: AliasStore,
  options: DispatchOptions
): Promise<void> {
  const [selector, ...rest] = tokens;
  const logger = options.logger ?? silentLogger;

  const aliased = aliases.get(selector);
  if (aliased === undefined) {
    await runWithContext('Error executing command', selector, rest, options.runProgram, logger);
    return;
  }

  const resolved = tokenize(aliased);
  if (resolved.length === 0) {
    throw new ExternalCommandError(`Alias '${selector}' resolves to an empty command`, selector);
  }
  const [command, ...args] = resolved;
  await runWithContext('Error executing alias command', command, args, options.runProgram, logger);
}

async function runWithContext(
  context: string,
  command: string,
  args: string[],
  runProgram: DispatchOptions['runProgram'],
  logger: Logger
): Promise<void> {
  logger.debug({ event: 'external_run', command, args: args.length });
  try {
    await runProgram(command, args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn({ event: 'external_failed', command, error: message });
    throw new ExternalCommandError(
      `${context}: ${message}`,
      command,
      error instanceof ExternalCommandError ? error.exitCode : undefined
    );
  }
}
