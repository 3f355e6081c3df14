/**
 * CLI bootstrap: parse argv, dispatch to a command and translate failures
 * into a red message plus a non-zero exit code.
 */
import * as path from 'node:path';
import chalk from 'chalk';

import { describeBackend, describeError, type RuntimeSettings } from '@termfix/core';

import { runAsk } from './askCommand.js';
import { USAGE, parseCliArgs, type CliCommand } from './cliArgs.js';
import {
  createDefaultDependencies,
  type CliDependencies,
  type CliIo,
} from './cliDependencies.js';
import { analyzeFailure, runAndDiagnose } from './errorInterceptor.js';
import { CLI_NAME, CLI_VERSION } from './version.js';

export type { CliIo } from './cliDependencies.js';

function resolveIo(io?: Partial<CliIo>): CliIo {
  const target = io ?? {};
  const stdout = typeof target.stdout === 'function' ? target.stdout : console.log;
  const stderr = typeof target.stderr === 'function' ? target.stderr : console.error;
  return { stdout, stderr };
}

function describeSettings(settings: RuntimeSettings): string[] {
  const { backend } = settings;
  const lines = [`Mode: ${backend.mode}`, `Model: ${backend.model}`];
  if (backend.mode === 'local') {
    lines.push(`Ollama host: ${backend.host}`);
  } else {
    lines.push(`Provider: ${backend.provider}`);
    lines.push(`API key: ${backend.apiKey ? 'configured' : 'missing'}`);
  }
  lines.push(`Active backend: ${describeBackend(backend)}`);
  return lines;
}

async function showConfig(settings: RuntimeSettings, deps: CliDependencies, io: CliIo): Promise<number> {
  io.stdout(describeSettings(settings).join('\n'));
  if (settings.backend.mode === 'local') {
    const models = await deps.listLocalModels(settings);
    io.stdout(
      models.length > 0
        ? ['Installed models:', ...models.map((model) => `  - ${model}`)].join('\n')
        : chalk.yellow(`No installed models found at ${settings.backend.host}.`),
    );
  }
  return 0;
}

async function dispatch(command: CliCommand, deps: CliDependencies, io: CliIo): Promise<number> {
  switch (command.kind) {
    case 'help':
      io.stdout(USAGE);
      return 0;
    case 'version':
      io.stdout(`${CLI_NAME} ${CLI_VERSION}`);
      return 0;
    default:
      break;
  }

  const settings = deps.resolveSettings(deps.env);
  const debug = command.debug || settings.debug;

  switch (command.kind) {
    case 'config':
      return showConfig(settings, deps, io);
    case 'ask':
      return runAsk({ query: command.query, execute: command.execute, settings }, deps, io);
    case 'run':
      return runAndDiagnose(command.command, deps, io, { settings, debug });
    case 'analyze':
      await analyzeFailure(command.command, command.exitCode, deps, io, { settings, debug });
      return 0;
  }
}

/**
 * Resolves with the exit code and mirrors it into `process.exitCode`.
 */
export async function runCli(
  argv: string[] = process.argv,
  io?: Partial<CliIo>,
  deps: CliDependencies = createDefaultDependencies(),
): Promise<number> {
  const resolvedIo = resolveIo(io);
  let exitCode: number;
  try {
    exitCode = await dispatch(parseCliArgs(argv), deps, resolvedIo);
  } catch (error: unknown) {
    resolvedIo.stderr(chalk.red(describeError(error)));
    exitCode = 1;
  }
  process.exitCode = exitCode;
  return exitCode;
}

export function maybeRunCli(
  currentFilePath: string,
  argv: string[] = process.argv,
  io?: Partial<CliIo>,
): boolean {
  const invokedPath = argv[1] ? path.resolve(argv[1]) : '';
  if (invokedPath && path.resolve(currentFilePath) === invokedPath) {
    void runCli(argv, io);
    return true;
  }
  return false;
}
