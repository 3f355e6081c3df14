/**
 * `capture` buffers both streams, `tee` buffers and echoes them, `inherit`
 * hands the terminal to the child and captures nothing.
 */
export type OutputMode = 'capture' | 'tee' | 'inherit';

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number | null;
  output?: OutputMode;
  env?: NodeJS.ProcessEnv;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exit_code: number | null;
  killed: boolean;
  runtime_ms: number;
}

export interface OutputSink {
  write(chunk: string): unknown;
}

export type CommandRunner = (command: string, options?: RunOptions) => Promise<CommandResult>;
