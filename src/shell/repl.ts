/**
 * Shell REPL implementation
 */

import * as readline from 'readline';
import type { DispatchOptions, DispatchResult, ProgramRunner, ShellOutput, ShellState } from './types.js';
import { AliasStore } from './alias-store.js';
import { dispatch, handleReadNewNames, tokenize } from './dispatcher.js';
import { toShellError } from './errors.js';
import { consoleOutput, generatePrompt } from './prompt.js';
import { runExternal } from './runner.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Startup settings (defaults < config file < CLI flags, merged by the caller)
 */
export interface ShellSettings {
  shellName: string;
  terminator: string;
  maxAliases: number;
  /** Alias file loaded before the first prompt */
  aliasFile?: string;
}

/**
 * The part of stdin whose line discipline readline takes over
 */
export interface RawModeTerminal {
  isTTY?: boolean;
  setRawMode(mode: boolean): void;
}

/**
 * Collaborators the REPL delegates to; all default to the real ones
 */
export interface ShellReplDeps {
  runProgram?: ProgramRunner;
  output?: ShellOutput;
  logger?: Logger;
  exit?: (code: number) => void;
  terminal?: RawModeTerminal;
}

/**
 * Shell REPL class
 */
export class ShellRepl {
  private state: ShellState;
  private aliases = new AliasStore();
  private rl: readline.Interface | null = null;
  private running = false;
  private aliasFile?: string;
  private dispatchOptions: DispatchOptions;
  private exit: (code: number) => void;
  private terminal: RawModeTerminal;
  /** Lines are handled one at a time, in arrival order */
  private queue: Promise<void> = Promise.resolve();

  constructor(settings: ShellSettings, deps: ShellReplDeps = {}) {
    this.state = { name: settings.shellName, terminator: settings.terminator };
    this.aliasFile = settings.aliasFile;
    this.terminal = deps.terminal ?? process.stdin;
    const runProgram = deps.runProgram ?? runExternal;
    this.dispatchOptions = {
      maxAliases: settings.maxAliases,
      runProgram: (command, args) => this.withCookedTerminal(() => runProgram(command, args)),
      output: deps.output ?? consoleOutput,
      logger: deps.logger ?? silentLogger,
    };
    this.exit = deps.exit ?? ((code) => process.exit(code));
  }

  getState(): Readonly<ShellState> {
    return this.state;
  }

  getAliases(): AliasStore {
    return this.aliases;
  }

  /**
   * Load the startup alias file, if any. Failure is reported, not fatal.
   */
  async preload(): Promise<void> {
    if (!this.aliasFile) return;

    try {
      await handleReadNewNames(['READNEWNAMES', this.aliasFile], this.aliases, this.dispatchOptions);
    } catch (error) {
      this.dispatchOptions.output.error(toShellError(error).message);
    }
  }

  /**
   * Start the REPL
   */
  async start(): Promise<void> {
    await this.preload();

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: generatePrompt(this.state),
      historySize: 0,
    });

    this.running = true;

    this.dispatchOptions.output.info('aliash - type STOP to exit');
    this.rl.prompt();

    this.rl.on('line', (line) => {
      this.queue = this.queue
        .then(() => this.handleLine(line))
        .catch((err) => {
          this.dispatchOptions.output.error(toShellError(err).message);
        });
    });

    this.rl.on('close', () => {
      if (!this.running) return;
      this.running = false;
      console.log();
      this.dispatchOptions.output.info('Goodbye!');
    });

    // Ctrl+C clears the current line
    this.rl.on('SIGINT', () => {
      if (!this.rl) return;
      this.rl.write(null, { ctrl: true, name: 'u' });
      console.log();
      this.rl.prompt();
    });
  }

  private async handleLine(line: string): Promise<void> {
    if (!this.running || !this.rl) return;

    // Keep the child's stdin to itself while a command runs
    this.rl.pause();
    const result = await this.processLine(line);
    if (result.kind === 'stop' || !this.running) return;

    this.rl.resume();
    // Update prompt (name/terminator may have changed)
    this.rl.setPrompt(generatePrompt(this.state));
    this.rl.prompt();
  }

  /**
   * Process a line of input
   */
  private async processLine(line: string): Promise<DispatchResult> {
    const result = await dispatch(tokenize(line), this.state, this.aliases, this.dispatchOptions);

    switch (result.kind) {
      case 'failed':
        this.dispatchOptions.output.error(result.error.message);
        break;
      case 'stop':
        this.stop(result.exitCode);
        break;
    }

    return result;
  }

  /**
   * Run a child with the terminal out of readline's raw mode, then put it back
   */
  private async withCookedTerminal(run: () => Promise<void>): Promise<void> {
    if (!this.terminal.isTTY) {
      return run();
    }

    this.terminal.setRawMode(false);
    try {
      await run();
    } finally {
      this.terminal.setRawMode(true);
    }
  }

  private stop(exitCode: number): void {
    this.running = false;
    this.rl?.close();
    this.exit(exitCode);
  }
}
