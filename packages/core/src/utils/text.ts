/**
 * Text and shell helpers shared by the prompt builders and the CLI context
 * probes.
 */

const SHELL_SPLIT_PATTERN = /"([^"\\]*(?:\\.[^"\\]*)*)"|'([^'\\]*(?:\\.[^'\\]*)*)'|\S+/g;

// CSI sequences plus OSC sequences terminated by BEL or ST.
const ANSI_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)/g;

export const ELLIPSIS = '...';

/**
 * Keep the first `limit` characters, marking a cut with a trailing ellipsis.
 */
export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  return `${text.slice(0, limit)}${ELLIPSIS}`;
}

export function headLines(text: string, lines: number): string[] {
  return splitLines(text).slice(0, lines);
}

function splitLines(text: string): string[] {
  if (!text) {
    return [];
  }
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

export function shellSplit(str: string): string[] {
  SHELL_SPLIT_PATTERN.lastIndex = 0; // reset global regex state between invocations
  const out: string[] = [];
  let match: RegExpExecArray | null;
  while ((match = SHELL_SPLIT_PATTERN.exec(str))) {
    out.push(match[1] ?? match[2] ?? match[0]);
  }
  return out;
}

const textUtils = {
  truncate,
  headLines,
  stripAnsi,
  shellSplit,
};

export default textUtils;
