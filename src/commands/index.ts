/**
 * Command exports
 */

export { createShellCommand } from './shell.js';
export { createConfigCommand } from './config.js';
