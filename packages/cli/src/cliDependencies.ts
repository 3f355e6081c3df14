import { existsSync } from 'node:fs';
import { join } from 'node:path';

import {
  createModelGateway,
  listLocalModels,
  loadShellHistory,
  resolveRuntimeSettings,
  runCommand,
  type CommandHistory,
  type CommandRunner,
  type ModelGateway,
  type RuntimeSettings,
} from '@termfix/core';

import { getContextProbes, type ContextProbe } from './contextProbes/index.js';
import { confirmInTerminal, type Confirm } from './io.js';
import { detectOsName } from './osInfo.js';
import { ThinkingIndicator, type Indicator } from './thinking.js';

export type CliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
};

/**
 * Everything the CLI touches outside its own process, so commands can be
 * exercised with in-memory stand-ins.
 */
export type CliDependencies = {
  env: Readonly<Record<string, string | undefined>>;
  cwd: () => string;
  resolveSettings: (env: Readonly<Record<string, string | undefined>>) => RuntimeSettings;
  createGateway: (settings: RuntimeSettings) => ModelGateway;
  listLocalModels: (settings: RuntimeSettings) => Promise<string[]>;
  runCommand: CommandRunner;
  confirm: Confirm;
  loadHistory: () => CommandHistory;
  detectOs: () => string;
  pathExists: (path: string) => boolean;
  probes: readonly ContextProbe[];
  createIndicator: () => Indicator;
};

export function createDefaultDependencies(): CliDependencies {
  return {
    env: process.env,
    cwd: () => process.cwd(),
    resolveSettings: (env) => resolveRuntimeSettings(env),
    createGateway: (settings) => createModelGateway(settings),
    listLocalModels: (settings) => listLocalModels(settings),
    runCommand,
    confirm: confirmInTerminal,
    loadHistory: () => loadShellHistory(),
    detectOs: () => detectOsName(),
    pathExists: existsSync,
    probes: getContextProbes(),
    createIndicator: () => new ThinkingIndicator(),
  };
}

export function isGitRepository(deps: CliDependencies, cwd: string): boolean {
  return deps.pathExists(join(cwd, '.git'));
}
