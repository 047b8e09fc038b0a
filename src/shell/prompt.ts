/**
 * Shell prompt generation with color support
 */

import type { ShellOutput, ShellState } from './types.js';

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
};

/**
 * Check if color output is supported
 */
export function supportsColor(): boolean {
  // Respect NO_COLOR environment variable
  if (process.env.NO_COLOR !== undefined) {
    return false;
  }

  // Check if stdout is a TTY
  return process.stdout.isTTY === true;
}

/**
 * Apply color if supported
 */
function color(text: string, colorCode: string): string {
  if (!supportsColor()) {
    return text;
  }
  return `${colorCode}${text}${COLORS.reset}`;
}

/**
 * Generate the shell prompt string
 * Format: {name}{terminator} (name cyan, terminator yellow)
 *
 * Examples:
 *   My Shell>
 *   dev$
 */
export function generatePrompt(state: ShellState): string {
  if (!supportsColor()) {
    return generatePlainPrompt(state);
  }
  return `${COLORS.cyan}${state.name}${COLORS.reset}${COLORS.yellow}${state.terminator}${COLORS.reset} `;
}

/**
 * Generate a plain prompt (no colors)
 */
export function generatePlainPrompt(state: ShellState): string {
  return `${state.name}${state.terminator} `;
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(color('✓ ' + message, COLORS.green));
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(color('✗ ' + message, COLORS.red));
}

/**
 * Print info message
 */
export function printInfo(message: string): void {
  console.log(color(message, COLORS.dim));
}

/**
 * Console-backed output used by the interactive shell
 */
export const consoleOutput: ShellOutput = {
  print: (line) => console.log(line),
  success: printSuccess,
  info: printInfo,
  error: printError,
};
