import {
  CommandHistory,
  stripAnsi,
  type CommandResult,
  type RuntimeSettings,
} from '@termfix/core';

import type { CliDependencies, CliIo } from '../cliDependencies.js';

export const LOCAL_SETTINGS: RuntimeSettings = {
  backend: { mode: 'local', model: 'llama3', host: 'http://localhost:11434' },
  timeoutMs: undefined,
  maxRetries: undefined,
  debug: false,
};

export type RecordingIo = CliIo & {
  out: string[];
  err: string[];
};

/**
 * Collects every message with ANSI styling removed.
 */
export function createRecordingIo(): RecordingIo {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (message) => {
      out.push(stripAnsi(message));
    },
    stderr: (message) => {
      err.push(stripAnsi(message));
    },
  };
}

export function commandResult(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    stdout: '',
    stderr: '',
    exit_code: 0,
    killed: false,
    runtime_ms: 1,
    ...overrides,
  };
}

export function createFakeDependencies(overrides: Partial<CliDependencies> = {}): CliDependencies {
  return {
    env: { USER: 'dev', SHELL: '/bin/bash' },
    cwd: () => '/work',
    resolveSettings: () => LOCAL_SETTINGS,
    createGateway: () => ({ label: 'test', generate: async () => '' }),
    listLocalModels: async () => [],
    runCommand: async () => commandResult(),
    confirm: async () => true,
    loadHistory: () => new CommandHistory(20),
    detectOs: () => 'Ubuntu 22.04',
    pathExists: () => false,
    probes: [],
    createIndicator: () => ({
      start: () => undefined,
      stop: () => undefined,
    }),
    ...overrides,
  };
}
