/**
 * Animated status line shown while a model call is pending.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';

export function formatElapsedTime(
  startTime: number | null | undefined,
  now: number = Date.now(),
): string {
  if (!startTime || startTime > now) {
    return '00:00';
  }

  const totalSeconds = Math.floor((now - startTime) / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

const DEFAULT_FRAMES = ['⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏', '⠋'] as const;

export type IndicatorStream = NodeJS.WritableStream & { isTTY?: boolean };

export type ThinkingIndicatorOptions = {
  stream?: IndicatorStream;
  frames?: readonly string[];
  label?: string;
  intervalMs?: number;
};

export class ThinkingIndicator {
  private readonly stream: IndicatorStream;
  private readonly frames: readonly string[];
  private readonly label: string;
  private readonly intervalMs: number;
  private intervalHandle: ReturnType<typeof setInterval> | null = null;
  private animationStart: number | null = null;
  private frameIndex = 0;

  constructor({
    stream = process.stderr,
    frames = DEFAULT_FRAMES,
    label = ' Analyzing',
    intervalMs = 80,
  }: ThinkingIndicatorOptions = {}) {
    this.stream = stream;
    this.frames = frames.length > 0 ? frames : DEFAULT_FRAMES;
    this.label = label;
    this.intervalMs = Math.max(16, intervalMs);
  }

  isRunning(): boolean {
    return this.intervalHandle !== null;
  }

  // Non-TTY streams (pipes, CI logs) get no animation at all.
  start(): void {
    if (this.isRunning() || !this.stream.isTTY) {
      return;
    }

    this.animationStart = Date.now();
    this.frameIndex = 0;
    this.intervalHandle = setInterval(() => {
      this.renderFrame();
    }, this.intervalMs);
  }

  stop(): void {
    if (this.intervalHandle === null) {
      return;
    }

    clearInterval(this.intervalHandle);
    this.intervalHandle = null;
    this.animationStart = null;
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
  }

  frameText(now: number = Date.now()): string {
    const frame = this.frames[this.frameIndex % this.frames.length];
    return `${frame}${this.label} (${formatElapsedTime(this.animationStart, now)})`;
  }

  private renderFrame(): void {
    readline.clearLine(this.stream, 0);
    readline.cursorTo(this.stream, 0);
    this.stream.write(chalk.dim(this.frameText()));
    this.frameIndex = (this.frameIndex + 1) % this.frames.length;
  }
}

export type Indicator = Pick<ThinkingIndicator, 'start' | 'stop'>;

/**
 * Keep the indicator running for the lifetime of `task`.
 */
export async function withThinking<T>(
  task: () => Promise<T>,
  indicator: Indicator = new ThinkingIndicator(),
): Promise<T> {
  indicator.start();
  try {
    return await task();
  } finally {
    indicator.stop();
  }
}
