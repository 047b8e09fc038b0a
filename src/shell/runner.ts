/**
 * External program execution
 */

import { spawn } from 'child_process';
import { ExternalCommandError } from './errors.js';

/**
 * Run a program with inherited stdio and wait for it.
 * Resolves on exit code 0; rejects on launch failure, non-zero exit or signal.
 */
export function runExternal(command: string, args: string[]): Promise<void> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const settle = (error?: ExternalCommandError) => {
      if (settled) return;
      settled = true;
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    };

    const proc = spawn(command, args, {
      stdio: 'inherit',
      shell: false,
    });

    proc.on('error', (err) => {
      settle(new ExternalCommandError(`Failed to run command '${command}': ${err.message}`, command));
    });

    proc.on('close', (code, signal) => {
      if (code === 0) {
        settle();
      } else if (code !== null) {
        settle(new ExternalCommandError(
          `Command '${command}' returned a non-zero exit status (${code})`,
          command,
          code
        ));
      } else {
        settle(new ExternalCommandError(
          `Command '${command}' was terminated by signal ${signal ?? 'unknown'}`,
          command
        ));
      }
    });
  });
}
