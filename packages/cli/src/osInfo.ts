import { readFileSync } from 'node:fs';
import * as os from 'node:os';

export const OS_RELEASE_PATH = '/etc/os-release';

export type OsInfoSources = {
  readFile?: (path: string) => string;
  type?: () => string;
  release?: () => string;
};

/**
 * Value of `PRETTY_NAME` in an os-release file, unquoted.
 */
export function parseOsRelease(content: string): string | null {
  for (const line of content.split('\n')) {
    const match = /^PRETTY_NAME=(.*)$/.exec(line.trim());
    if (!match) {
      continue;
    }
    const value = match[1].trim().replace(/^(["'])(.*)\1$/, '$2').trim();
    return value || null;
  }
  return null;
}

export function detectOsName(sources: OsInfoSources = {}): string {
  const readFile = sources.readFile ?? ((path: string) => readFileSync(path, 'utf8'));
  const type = sources.type ?? os.type;
  const release = sources.release ?? os.release;

  try {
    const pretty = parseOsRelease(readFile(OS_RELEASE_PATH));
    if (pretty) {
      return pretty;
    }
  } catch (_error) {
    // falls back to os.type() below
  }

  return `${type()} ${release()}`.trim();
}
