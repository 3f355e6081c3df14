import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

import type { CommandResult, OutputMode, OutputSink, RunOptions } from './commandTypes.js';

export type {
  CommandResult,
  CommandRunner,
  OutputMode,
  OutputSink,
  RunOptions,
} from './commandTypes.js';

const FORCE_KILL_DELAY_MS = 1_000;

export interface RunCommandDependencies {
  stdout?: OutputSink;
  stderr?: OutputSink;
}

interface ExecutionState {
  startTime: number;
  stdout: string;
  stderr: string;
  killed: boolean;
  timedOut: boolean;
  settled: boolean;
  timeoutHandle: NodeJS.Timeout | undefined;
  forceKillHandle: NodeJS.Timeout | undefined;
}

function appendLine(existing: string, addition: string): string {
  if (!existing) {
    return addition;
  }
  return existing.endsWith('\n') ? `${existing}${addition}` : `${existing}\n${addition}`;
}

function createSpawnOptions(options: RunOptions, mode: OutputMode): SpawnOptions {
  return {
    cwd: options.cwd,
    env: options.env,
    shell: true,
    stdio: mode === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe'],
  };
}

function terminate(child: ChildProcess, state: ExecutionState): void {
  child.kill('SIGTERM');
  state.forceKillHandle = setTimeout(() => {
    if (!state.settled) {
      child.kill('SIGKILL');
    }
  }, FORCE_KILL_DELAY_MS);
}

function clearTimers(state: ExecutionState): void {
  if (state.timeoutHandle) {
    clearTimeout(state.timeoutHandle);
    state.timeoutHandle = undefined;
  }
  if (state.forceKillHandle) {
    clearTimeout(state.forceKillHandle);
    state.forceKillHandle = undefined;
  }
}

/**
 * Run a shell command line and resolve with its captured output. Never
 * rejects: spawn failures surface as `stderr` with a null exit code.
 */
export function runCommand(
  command: string,
  options: RunOptions = {},
  deps: RunCommandDependencies = {},
): Promise<CommandResult> {
  const mode = options.output ?? 'capture';
  const echoStdout = deps.stdout ?? process.stdout;
  const echoStderr = deps.stderr ?? process.stderr;

  const state: ExecutionState = {
    startTime: Date.now(),
    stdout: '',
    stderr: '',
    killed: false,
    timedOut: false,
    settled: false,
    timeoutHandle: undefined,
    forceKillHandle: undefined,
  };

  return new Promise<CommandResult>((resolve) => {
    const finalize = (exitCode: number | null): void => {
      if (state.settled) {
        return;
      }
      state.settled = true;
      clearTimers(state);
      if (state.timedOut) {
        state.stderr = appendLine(state.stderr, 'Command timed out and was terminated.');
      }
      resolve({
        stdout: state.stdout,
        stderr: state.stderr,
        exit_code: exitCode,
        killed: state.killed,
        runtime_ms: Date.now() - state.startTime,
      });
    };

    let child: ChildProcess;
    try {
      child = spawn(command.trim(), createSpawnOptions(options, mode));
    } catch (error) {
      state.stderr = error instanceof Error ? error.message : String(error);
      finalize(null);
      return;
    }

    child.stdout?.setEncoding('utf8');
    child.stderr?.setEncoding('utf8');

    child.stdout?.on('data', (chunk: string) => {
      state.stdout += chunk;
      if (mode === 'tee') {
        echoStdout.write(chunk);
      }
    });
    child.stderr?.on('data', (chunk: string) => {
      state.stderr += chunk;
      if (mode === 'tee') {
        echoStderr.write(chunk);
      }
    });

    child.on('error', (error) => {
      state.stderr = appendLine(state.stderr, error.message);
      finalize(null);
    });
    child.on('close', (code) => {
      finalize(code);
    });

    const timeoutMs = options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      state.timeoutHandle = setTimeout(() => {
        if (state.settled) {
          return;
        }
        state.killed = true;
        state.timedOut = true;
        terminate(child, state);
      }, timeoutMs);
    }
  });
}

export default {
  runCommand,
};
