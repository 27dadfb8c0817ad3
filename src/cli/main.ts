/**
 * @fileoverview klocfix CLI dispatcher
 *
 * Commands:
 *   klocfix fix <path>     - Detect violations and apply engine patches
 *   klocfix scan <path>    - Detect violations only
 *   klocfix rules          - List the rule catalog
 *   klocfix help [command] - Show help
 *
 * Returns the process exit code instead of setting it, so tests can drive
 * the whole CLI in-process.
 */

import { parseArgs } from 'node:util';
import { KLOCFIX_VERSION } from '../index.js';
import { CliError, createError, formatError, formatErrorJson, getExitCode, toCliError } from './errors.js';
import { showHelp } from './help.js';
import { fixCommand } from './commands/fix.js';
import { rulesCommand } from './commands/rules.js';
import { scanCommand } from './commands/scan.js';

type Command = 'fix' | 'scan' | 'rules' | 'help';

const COMMANDS: Record<Command, { description: string; usage: string }> = {
  fix: {
    description: 'Detect violations and apply engine patches',
    usage: 'klocfix fix <path> [--mode STRICT|IMPROVE|ADVISE] [--output <dir>]',
  },
  scan: {
    description: 'Detect violations without remediating',
    usage: 'klocfix scan <path> [--no-classify] [--json]',
  },
  rules: {
    description: 'List the rule catalog',
    usage: 'klocfix rules [--kb <dir>] [--json]',
  },
  help: {
    description: 'Show help information',
    usage: 'klocfix help [command]',
  },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

export interface RunCliOptions {
  env?: NodeJS.ProcessEnv;
  /** Overrides the TTY check for the progress bar. */
  progress?: boolean;
}

export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const jsonMode = args.includes('--json');

  const { values, positionals } = parseArgs({
    args,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
      version: { type: 'boolean', short: 'v', default: false },
      workspace: { type: 'string', short: 'w' },
    },
    allowPositionals: true,
    strict: false,
  });

  if (values.version === true) {
    console.log(`klocfix ${KLOCFIX_VERSION.string}`);
    return 0;
  }

  // strict: false leaves unknown flags in place; the command is the first bare word.
  const command = args.find((arg) => !arg.startsWith('-') && positionals.includes(arg));
  if (values.help === true || !command || command === 'help') {
    const topic = command === 'help' ? positionals[1] : command;
    showHelp(topic);
    return 0;
  }

  const workspace = typeof values.workspace === 'string' ? values.workspace : process.cwd();
  const commandArgs = args.filter((arg, index) => index !== args.indexOf(command));

  try {
    if (!isCommand(command)) {
      throw createError('INVALID_ARGUMENT', `Unknown command: ${command}`, {
        available: Object.keys(COMMANDS),
      });
    }
    const commandOptions = { workspace, args: commandArgs, env: options.env };
    switch (command) {
      case 'fix':
        await fixCommand({ ...commandOptions, progress: options.progress });
        break;
      case 'scan':
        await scanCommand(commandOptions);
        break;
      case 'rules':
        await rulesCommand(commandOptions);
        break;
    }
    return 0;
  } catch (error) {
    const cliError: CliError = toCliError(error);
    console.error(jsonMode ? formatErrorJson(cliError) : formatError(cliError));
    return getExitCode(cliError);
  }
}
