#!/usr/bin/env node
/**
 * aliash CLI
 * Interactive command shell with named aliases
 *
 * Command structure:
 *   aliash             # Start the interactive shell (default)
 *   aliash shell       # Same, with startup options
 *   aliash config      # Configuration
 */

import { Command } from 'commander';
import { createRequire } from 'module';
import { resolveConfigPath } from './utils/config-path.js';
import { setOutputOptions } from './utils/output.js';
import { createConfigCommand, createShellCommand } from './commands/index.js';

// Read version from package.json
const require = createRequire(import.meta.url);
const packageJson: { version: string } = require('../package.json');

const program = new Command();

// Global state for config path
let globalConfigPath: string | undefined;

function getConfigPath(): string {
  return resolveConfigPath({ configPath: globalConfigPath });
}

const HELP_HEADER = `
aliash - interactive command shell with named aliases

Built-ins (inside the shell):
  STOP                      Exit the shell
  SETSHELLNAME [words...]   Set the shell name
  SETTERMINATOR [text]      Set the prompt terminator
  NEWNAME                   List aliases
  NEWNAME <alias>           Delete an alias
  NEWNAME <alias> <cmd>     Define an alias
  READNEWNAMES <file>       Load aliases from a file
  LISTNEWNAMES              List aliases
  SAVENEWNAMES <file>       Save aliases to a file

Anything else runs as a program (after alias lookup).
`;

program
  .name('aliash')
  .description('Interactive command shell with named aliases')
  .version(packageJson.version)
  .option('-c, --config <path>', 'Path to config file')
  .option('--json', 'Output in JSON format (config commands)')
  .option('-v, --verbose', 'Verbose output (debug logging)')
  .addHelpText('before', HELP_HEADER)
  .hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string; json?: boolean; verbose?: boolean }>();
    globalConfigPath = opts.config;
    setOutputOptions({
      json: opts.json,
      verbose: opts.verbose,
    });
  });

program.addCommand(createShellCommand(getConfigPath), { isDefault: true });
program.addCommand(createConfigCommand(getConfigPath));

program.parseAsync().catch((err: unknown) => {
  console.error('Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
