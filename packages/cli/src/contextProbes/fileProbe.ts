import { headLines, shellSplit } from '@termfix/core';

import type { ContextProbe } from './context.js';

const MAX_FILES = 10;
const MAX_DIRS = 5;
const MAX_SNIPPETS = 2;
const SNIPPET_LINES = 20;

export const UNREADABLE_FILE = 'Unable to read file content';

/**
 * Lists the working directory and snapshots the head of files the failed
 * command names.
 */
export const FileProbe: ContextProbe = {
  name: 'files',
  async run(context) {
    const entries = await context.getRootEntries();
    const files = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    const dirs = entries.filter((entry) => entry.isDirectory()).map((entry) => entry.name);

    const named: string[] = [];
    for (const token of shellSplit(context.command)) {
      if (named.length >= MAX_SNIPPETS) {
        break;
      }
      if (!named.includes(token) && (await context.isFile(token))) {
        named.push(token);
      }
    }

    const fileContents: Record<string, string> = {};
    for (const file of named) {
      const content = await context.readTextFile(file);
      fileContents[file] =
        content === null ? UNREADABLE_FILE : headLines(content, SNIPPET_LINES).join('\n');
    }

    return {
      fileContext: {
        files: files.slice(0, MAX_FILES),
        dirs: dirs.slice(0, MAX_DIRS),
        fileContents,
      },
    };
  },
};

export default FileProbe;
