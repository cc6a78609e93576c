#!/usr/bin/env node

/**
 * cfgtree CLI entry point.
 */

/* eslint-disable no-console */
import { createCliApp } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { handleMergeCommand } from './commands/merge.js';
import { handleRenderCommand } from './commands/render.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { USAGE_HINT, withErrorHandling } from './utils/errorHandling.js';

const HELP_TEXT = `
cfgtree - sectioned configuration files with references and merging

USAGE:
  cfgtree <command> [options]

COMMANDS:
  render      Print a configuration file in canonical form
  merge       Merge an override file over a base file
  check       Verify that a file parses and all references resolve
  help        Show this help message
  version     Show version information

SETTINGS:
  cfgtree.toml in the working directory, overridden by
  CFGTREE_INTERPOLATE, CFGTREE_SECTION_ORDER and CFGTREE_LOG_LEVEL.

EXAMPLES:
  cfgtree render train.cfg --interpolate
  cfgtree render train.cfg --set training.dropout=0.3
  cfgtree merge base.cfg experiment.cfg --out run.cfg
  cfgtree check train.cfg
`;

const COMMAND_HELP: Readonly<Record<string, string>> = {
  render: `
USAGE: cfgtree render <file> [options]

Parses a configuration file and prints it with sorted keys.

OPTIONS:
  --interpolate, --no-interpolate   Resolve \${...} references (default from settings)
  --order <a,b,...>                 Top-level sections to print first
  --set <path=value>                Override a value after parsing (repeatable)
  --out <file>                      Write to a file instead of stdout
`,
  merge: `
USAGE: cfgtree merge <base> <override> [options]

Merges the override file over the base file. References in the base are kept,
and a block naming a different registered function replaces the base block.
Discarded values are logged as warnings.

OPTIONS:
  --interpolate, --no-interpolate   Resolve \${...} references after merging
  --order <a,b,...>                 Top-level sections to print first
  --set <path=value>                Override a value after merging (repeatable)
  --out <file>                      Write to a file instead of stdout
`,
  check: `
USAGE: cfgtree check <file> [--set path=value]...

Parses the file, applies any overrides, resolves every reference, and lists
the blocks that name registered functions. Exits with 1 on the first error.
`,
};

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  render: handleRenderCommand,
  merge: handleMergeCommand,
  check: handleCheckCommand,
};

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const help = Object.prototype.hasOwnProperty.call(COMMAND_HELP, commandName)
    ? COMMAND_HELP[commandName]
    : undefined;
  if (help !== undefined) {
    console.log(help);
  } else {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "cfgtree help" to see all available commands.');
  }
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const [command = '', ...commandArgs] = process.argv.slice(2);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        console.log(HELP_TEXT);
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    default: {
      const handler = Object.prototype.hasOwnProperty.call(COMMANDS, command)
        ? COMMANDS[command]
        : undefined;
      if (handler === undefined) {
        console.error(`Error: Unknown command: ${command}`);
        console.error(`\n${USAGE_HINT}`);
        process.exit(1);
      }
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(0);
      }
      withErrorHandling(async () => handler(await createCliApp(commandArgs)));
    }
  }
}

main();
