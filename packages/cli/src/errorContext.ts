import type { CommandRunner, ErrorContext } from '@termfix/core';

import {
  NO_MANUAL_ENTRY,
  createProbeContext,
  runContextProbes,
  type ContextProbe,
  type ProbeFailure,
} from './contextProbes/index.js';
import { buildErrorOutput, findReferencedFiles } from './errorOutput.js';
import { relevantFilesFromHistory } from './relevantFiles.js';

export type FailedCommand = {
  command: string;
  stderr: string;
  stdout: string;
  exitCode: number;
};

export type CollectErrorContextOptions = {
  cwd: string;
  os: string;
  history: readonly string[];
  env: Readonly<Record<string, string | undefined>>;
  runner: CommandRunner;
  probes?: readonly ContextProbe[];
};

export type CollectedErrorContext = {
  context: ErrorContext;
  failures: ProbeFailure[];
};

/**
 * Assemble everything the diagnosis prompt can use about a failed command.
 * `history` is expected to end with the failed command.
 */
export async function collectErrorContext(
  failed: FailedCommand,
  options: CollectErrorContextOptions,
): Promise<CollectedErrorContext> {
  const probeContext = createProbeContext({
    cwd: options.cwd,
    command: failed.command,
    env: options.env,
    runner: options.runner,
  });
  const { fragment, failures } = await runContextProbes(probeContext, options.probes);

  const errorOutput = buildErrorOutput(failed.stderr, failed.stdout, {
    command: failed.command,
    history: options.history,
    user: options.env.USER,
  });

  const context: ErrorContext = {
    ...fragment,
    command: failed.command,
    errorOutput,
    cwd: options.cwd,
    exitCode: failed.exitCode,
    history: [...options.history],
    relevantFiles: relevantFilesFromHistory(options.history),
    referencedFiles: await findReferencedFiles(errorOutput, probeContext.isFile),
    manExcerpt: fragment.manExcerpt ?? NO_MANUAL_ENTRY,
    os: options.os,
  };

  return { context, failures };
}
