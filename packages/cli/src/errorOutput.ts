import { stripAnsi } from '@termfix/core';

export const HINTS = {
  permission: (user: string) => `Hint: This may be a permissions issue. Current user: ${user}`,
  notFound: 'Hint: Command may not be installed or not in PATH',
  noSuchFile: 'Hint: File or directory does not exist in the current context',
  gitAdd: "Hint: No files staged for commit. Did you forget 'git add'?",
} as const;

export type ErrorOutputOptions = {
  command: string;
  history: readonly string[];
  user?: string;
};

/**
 * stderr first, then stdout on its own line, with ANSI sequences removed.
 */
export function combineOutput(stderr: string, stdout: string): string {
  let combined = stderr;
  if (stdout) {
    combined += `\n${stdout}`;
  }
  return stripAnsi(combined).trim();
}

export function appendHints(cleanError: string, options: ErrorOutputOptions): string {
  const lowered = cleanError.toLowerCase();
  const hints: string[] = [];

  if (lowered.includes('permission denied')) {
    hints.push(HINTS.permission(options.user || 'unknown'));
  } else if (lowered.includes('command not found')) {
    hints.push(HINTS.notFound);
  } else if (lowered.includes('no such file')) {
    hints.push(HINTS.noSuchFile);
  }

  const stagedBefore = options.history.some((entry) => entry.toLowerCase().includes('git add'));
  if (
    options.command.toLowerCase().includes('git commit') &&
    !stagedBefore &&
    lowered.includes('no changes added to commit')
  ) {
    hints.push(HINTS.gitAdd);
  }

  return [cleanError, ...hints].join('\n');
}

export function buildErrorOutput(
  stderr: string,
  stdout: string,
  options: ErrorOutputOptions,
): string {
  return appendHints(combineOutput(stderr, stdout), options);
}

const REFERENCE_PATTERN = /'(.*?)'|"(.*?)"|\b([/\w.-]+\.\w+)\b/g;

/**
 * Quoted strings and path-like tokens from the error output, in order of
 * appearance and without repeats. Existence is checked by the caller.
 */
export function referenceCandidates(errorOutput: string): string[] {
  const candidates: string[] = [];
  for (const match of errorOutput.matchAll(REFERENCE_PATTERN)) {
    const value = match[1] ?? match[2] ?? match[3];
    if (value && !candidates.includes(value)) {
      candidates.push(value);
    }
  }
  return candidates;
}

export async function findReferencedFiles(
  errorOutput: string,
  isFile: (path: string) => Promise<boolean>,
): Promise<string[]> {
  const found: string[] = [];
  for (const candidate of referenceCandidates(errorOutput)) {
    if (await isFile(candidate)) {
      found.push(candidate);
    }
  }
  return found;
}
