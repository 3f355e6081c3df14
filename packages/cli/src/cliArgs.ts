import { CliUsageError } from '@termfix/core';

export type CliCommand =
  | { kind: 'ask'; query: string; execute: boolean; debug: boolean }
  | { kind: 'run'; command: string; debug: boolean }
  | { kind: 'analyze'; command: string; exitCode: number; debug: boolean }
  | { kind: 'config'; debug: boolean }
  | { kind: 'help' }
  | { kind: 'version' };

export const USAGE = [
  'Usage: termfix <command> [options]',
  '',
  'Commands:',
  '  ask <query...> [--execute]          Generate a shell command for a request',
  '  run <command...>                    Run a command and diagnose it when it fails',
  '  run --analyze <command> --exit-code <n>',
  '                                      Diagnose a command that already failed (shell hook)',
  '  config                              Show the active model configuration',
  '',
  'Options:',
  '  --debug                             Print the collected error context',
  '  -h, --help                          Show this help',
  '  -v, --version                       Show the version',
].join('\n');

function parseExitCode(raw: string | undefined): number {
  const value = raw === undefined ? Number.NaN : Number(raw);
  if (!Number.isInteger(value)) {
    throw new CliUsageError(`--exit-code expects an integer, received "${raw ?? ''}".`);
  }
  return value;
}

function parseAsk(args: readonly string[], debugFlag: boolean): CliCommand {
  let execute = false;
  let debug = debugFlag;
  const words: string[] = [];

  for (const arg of args) {
    if (arg === '--execute') {
      execute = true;
    } else if (arg === '--debug') {
      debug = true;
    } else {
      words.push(arg);
    }
  }

  const query = words.join(' ').trim();
  if (!query) {
    throw new CliUsageError('ask requires a query, for example: termfix ask "list all files"');
  }
  return { kind: 'ask', query, execute, debug };
}

type ExitCodeOption = { value: number; consumed: number };

function readExitCodeOption(arg: string, next: string | undefined): ExitCodeOption | null {
  if (arg === '--exit-code') {
    return { value: parseExitCode(next), consumed: 2 };
  }
  if (arg.startsWith('--exit-code=')) {
    return { value: parseExitCode(arg.slice('--exit-code='.length)), consumed: 1 };
  }
  return null;
}

/**
 * Options are read up to the first command word; after it everything belongs
 * to the command, except `--exit-code` in analyze mode where the shell hook
 * appends it.
 */
function parseRun(args: readonly string[], debugFlag: boolean): CliCommand {
  let analyze = false;
  let debug = debugFlag;
  let exitCode: number | null = null;
  const words: string[] = [];
  let index = 0;

  while (index < args.length) {
    const arg = args[index];
    if (arg === '--') {
      index += 1;
      break;
    }
    if (arg === '--analyze' || arg === '--debug') {
      analyze = analyze || arg === '--analyze';
      debug = debug || arg === '--debug';
      index += 1;
      continue;
    }
    const option = readExitCodeOption(arg, args[index + 1]);
    if (!option) {
      break;
    }
    exitCode = option.value;
    index += option.consumed;
  }

  while (index < args.length) {
    const arg = args[index];
    const option = analyze ? readExitCodeOption(arg, args[index + 1]) : null;
    if (option) {
      exitCode = option.value;
      index += option.consumed;
      continue;
    }
    words.push(arg);
    index += 1;
  }

  const command = words.join(' ').trim();
  if (!command) {
    throw new CliUsageError('run requires a command, for example: termfix run git push');
  }

  if (analyze) {
    if (exitCode === null) {
      throw new CliUsageError('run --analyze requires --exit-code <n>.');
    }
    return { kind: 'analyze', command, exitCode, debug };
  }
  return { kind: 'run', command, debug };
}

export function parseCliArgs(argv: readonly string[] = process.argv): CliCommand {
  const args = argv.slice(2);
  let debug = false;
  let index = 0;

  for (; index < args.length; index += 1) {
    const arg = args[index];
    if (arg === '--debug') {
      debug = true;
    } else if (arg === '--help' || arg === '-h') {
      return { kind: 'help' };
    } else if (arg === '--version' || arg === '-v') {
      return { kind: 'version' };
    } else {
      break;
    }
  }

  const subcommand = args[index];
  const rest = args.slice(index + 1);

  switch (subcommand) {
    case undefined:
      return { kind: 'help' };
    case 'ask':
      return parseAsk(rest, debug);
    case 'run':
      return parseRun(rest, debug);
    case 'config':
      return { kind: 'config', debug };
    case 'help':
      return { kind: 'help' };
    default:
      throw new CliUsageError(`Unknown command "${subcommand}". Run termfix --help for usage.`);
  }
}
