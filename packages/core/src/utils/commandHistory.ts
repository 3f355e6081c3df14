import { readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import * as path from 'node:path';

import { COMMAND_HISTORY_CAPACITY } from '../constants.js';

// zsh EXTENDED_HISTORY lines look like ": 1700000000:0;git status".
const ZSH_EXTENDED_PREFIX = /^: \d+:\d+;/;

export interface HistorySourceOptions {
  env?: Readonly<Record<string, string | undefined>>;
  home?: string;
  readFile?: (file: string) => string;
}

/**
 * Bounded, append-only command buffer. The oldest entry is evicted once the
 * capacity is reached and a command equal to the newest entry is skipped.
 */
export class CommandHistory {
  private readonly entries: string[] = [];

  constructor(
    readonly capacity: number = COMMAND_HISTORY_CAPACITY,
    seed: readonly string[] = [],
  ) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError('CommandHistory capacity must be a positive integer.');
    }
    for (const command of seed) {
      this.add(command);
    }
  }

  add(command: string): void {
    const trimmed = command.trim();
    if (!trimmed || this.entries[this.entries.length - 1] === trimmed) {
      return;
    }
    this.entries.push(trimmed);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  recent(count: number = this.capacity): string[] {
    return count > 0 ? this.entries.slice(-count) : [];
  }

  toArray(): string[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}

export function historyFileCandidates(
  env: Readonly<Record<string, string | undefined>>,
  home: string,
): string[] {
  const candidates: string[] = [];
  if (env.HISTFILE) {
    candidates.push(env.HISTFILE);
  }
  candidates.push(path.join(home, '.bash_history'), path.join(home, '.zsh_history'));
  return candidates;
}

export function parseHistoryFile(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.replace(ZSH_EXTENDED_PREFIX, '').trim())
    .filter((line) => line.length > 0);
}

/**
 * Seed a history buffer from the first readable shell history file.
 * Unreadable or missing files leave the buffer empty.
 */
export function loadShellHistory(
  options: HistorySourceOptions = {},
  capacity: number = COMMAND_HISTORY_CAPACITY,
): CommandHistory {
  const env = options.env ?? process.env;
  const home = options.home ?? homedir();
  const readFile = options.readFile ?? ((file: string) => readFileSync(file, 'utf8'));

  for (const candidate of historyFileCandidates(env, home)) {
    let content: string;
    try {
      content = readFile(candidate);
    } catch (_error) {
      continue;
    }
    return new CommandHistory(capacity, parseHistoryFile(content).slice(-capacity));
  }

  return new CommandHistory(capacity);
}

export default {
  CommandHistory,
  loadShellHistory,
  parseHistoryFile,
  historyFileCandidates,
};
