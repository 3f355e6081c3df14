import type { Dirent } from 'node:fs';
import { readFile, readdir, stat } from 'node:fs/promises';
import { isAbsolute, join } from 'node:path';

import {
  runCommand,
  shellSplit,
  type CommandRunner,
  type ErrorContext,
} from '@termfix/core';

export const PROBE_COMMAND_TIMEOUT_MS = 5_000;

export type ProbeField =
  | 'envVars'
  | 'fileContext'
  | 'processTree'
  | 'networkState'
  | 'gitStatus'
  | 'gitRemotes'
  | 'dockerContainers'
  | 'composeFiles'
  | 'availableUpdates'
  | 'failedServices'
  | 'manExcerpt';

export type ContextFragment = Partial<Pick<ErrorContext, ProbeField>>;

export type ProbeOutput = {
  stdout: string;
  exitCode: number | null;
};

export type ProbeContext = {
  cwd: string;
  command: string;
  baseCommand: string;
  env: Readonly<Record<string, string | undefined>>;
  exec(command: string): Promise<ProbeOutput>;
  isFile(path: string): Promise<boolean>;
  readTextFile(path: string): Promise<string | null>;
  getRootEntries(): Promise<Dirent[]>;
};

export type ContextProbe = {
  name: string;
  appliesTo?(baseCommand: string): boolean;
  run(context: ProbeContext): Promise<ContextFragment>;
};

export type ProbeContextOptions = {
  cwd: string;
  command: string;
  env?: Readonly<Record<string, string | undefined>>;
  runner?: CommandRunner;
};

export function baseCommandOf(command: string): string {
  return shellSplit(command.trim())[0] ?? '';
}

export function createProbeContext({
  cwd,
  command,
  env = process.env,
  runner = runCommand,
}: ProbeContextOptions): ProbeContext {
  let rootEntriesPromise: Promise<Dirent[]> | undefined;
  const resolvePath = (path: string): string => (isAbsolute(path) ? path : join(cwd, path));

  const exec = async (probeCommand: string): Promise<ProbeOutput> => {
    const result = await runner(probeCommand, {
      cwd,
      timeoutMs: PROBE_COMMAND_TIMEOUT_MS,
      output: 'capture',
    });
    return { stdout: result.stdout, exitCode: result.exit_code };
  };

  const isFile = async (path: string): Promise<boolean> => {
    try {
      return (await stat(resolvePath(path))).isFile();
    } catch {
      return false;
    }
  };

  const readTextFile = async (path: string): Promise<string | null> => {
    try {
      return await readFile(resolvePath(path), 'utf8');
    } catch {
      return null;
    }
  };

  const getRootEntries = (): Promise<Dirent[]> => {
    if (!rootEntriesPromise) {
      rootEntriesPromise = readdir(cwd, { withFileTypes: true }).catch((): Dirent[] => []);
    }
    return rootEntriesPromise;
  };

  return {
    cwd,
    command,
    baseCommand: baseCommandOf(command),
    env,
    exec,
    isFile,
    readTextFile,
    getRootEntries,
  };
}

export function nonEmptyLines(text: string): string[] {
  return text
    .trim()
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0);
}
