/**
 * `termfix run`: execute a command and, when it fails, diagnose it.
 */

import chalk from 'chalk';

import { diagnoseError, looksDestructive, type RuntimeSettings } from '@termfix/core';

import type { CliDependencies, CliIo } from './cliDependencies.js';
import { collectErrorContext, type FailedCommand } from './errorContext.js';
import {
  renderContextSummary,
  renderDebugContext,
  renderDiagnosis,
  renderError,
} from './render.js';
import { withThinking } from './thinking.js';

const NATIVE_ERROR_TIMEOUT_MS = 10_000;

export type InterceptorOptions = {
  settings: RuntimeSettings;
  debug: boolean;
};

export async function diagnoseFailure(
  failed: FailedCommand,
  history: readonly string[],
  deps: CliDependencies,
  io: CliIo,
  options: InterceptorOptions,
): Promise<boolean> {
  const { context, failures } = await collectErrorContext(failed, {
    cwd: deps.cwd(),
    os: deps.detectOs(),
    history,
    env: deps.env,
    runner: deps.runCommand,
    probes: deps.probes,
  });

  if (options.debug) {
    io.stdout(renderDebugContext(context).join('\n'));
    for (const failure of failures) {
      io.stdout(chalk.gray(`[DEBUG] probe ${failure.probe} failed: ${failure.message}`));
    }
  }

  io.stdout(chalk.gray('🔎 Analyzing error...'));
  const gateway = deps.createGateway(options.settings);
  const outcome = await withThinking(
    () => diagnoseError(context, { gateway }),
    deps.createIndicator(),
  );

  if (outcome.status === 'error') {
    io.stderr(renderError(outcome.message));
    return false;
  }

  io.stdout([...renderContextSummary(context), ...renderDiagnosis(outcome.records)].join('\n'));
  return true;
}

/**
 * Run `command` with its output echoed, then diagnose a non-zero exit.
 * Resolves with the command's exit code.
 */
export async function runAndDiagnose(
  command: string,
  deps: CliDependencies,
  io: CliIo,
  options: InterceptorOptions,
): Promise<number> {
  const history = deps.loadHistory();
  history.add(command);

  const result = await deps.runCommand(command, { cwd: deps.cwd(), output: 'tee' });
  const exitCode = result.exit_code ?? 1;
  if (exitCode === 0) {
    return 0;
  }

  await diagnoseFailure(
    { command, stderr: result.stderr, stdout: result.stdout, exitCode },
    history.toArray(),
    deps,
    io,
    options,
  );
  return exitCode;
}

/**
 * Shell-hook entry: the command already failed in the user's shell. Its
 * stderr is recaptured by running it again, unless it looks destructive.
 */
export async function analyzeFailure(
  command: string,
  exitCode: number,
  deps: CliDependencies,
  io: CliIo,
  options: InterceptorOptions,
): Promise<boolean> {
  const history = deps.loadHistory();
  history.add(command);

  let stderr = '';
  if (!looksDestructive(command)) {
    const rerun = await deps.runCommand(command, {
      cwd: deps.cwd(),
      output: 'capture',
      timeoutMs: NATIVE_ERROR_TIMEOUT_MS,
    });
    stderr = rerun.stderr.trim();
  }

  return diagnoseFailure(
    { command, stderr, stdout: '', exitCode },
    history.toArray(),
    deps,
    io,
    options,
  );
}
