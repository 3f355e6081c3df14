const GIT_FILE_OPERATIONS = new Set(['add', 'commit', 'push', 'pull']);
const FILE_COMMANDS = new Set(['touch', 'mkdir', 'cp', 'mv', 'vim', 'nano']);
const MAX_RELEVANT_FILES = 3;

/**
 * Files named by earlier history entries, newest first. The last entry is
 * the failing command itself and is skipped.
 */
export function relevantFilesFromHistory(history: readonly string[]): string[] {
  const files: string[] = [];
  const earlier = history.slice(0, -1).reverse();

  for (const entry of earlier) {
    const parts = entry.trim().split(/\s+/);
    const [program, subcommand] = parts;
    const last = parts[parts.length - 1];

    if (program === 'git' && subcommand && GIT_FILE_OPERATIONS.has(subcommand) && parts.length > 2) {
      files.push(last);
    } else if (program && FILE_COMMANDS.has(program) && parts.length > 1) {
      files.push(last);
    }

    if (files.length >= MAX_RELEVANT_FILES) {
      break;
    }
  }

  return files;
}
