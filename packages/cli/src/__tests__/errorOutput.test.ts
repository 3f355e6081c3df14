import { describe, expect, test } from '@jest/globals';

import {
  HINTS,
  appendHints,
  buildErrorOutput,
  combineOutput,
  findReferencedFiles,
  referenceCandidates,
} from '../errorOutput.js';

describe('combineOutput', () => {
  test('puts stderr before stdout and strips colour codes', () => {
    expect(combineOutput('\u001b[31merr\u001b[0m\n', 'out\n')).toBe('err\n\nout');
    expect(combineOutput('only err\n', '')).toBe('only err');
  });
});

describe('appendHints', () => {
  test('adds a permission hint naming the user', () => {
    expect(
      appendHints('bash: ./deploy.sh: Permission denied', { command: './deploy.sh', history: [], user: 'dev' }),
    ).toBe(`bash: ./deploy.sh: Permission denied\n${HINTS.permission('dev')}`);
  });

  test('adds only the first matching generic hint', () => {
    const output = appendHints('permission denied; command not found', { command: 'x', history: [] });

    expect(output.split('\n')).toEqual([
      'permission denied; command not found',
      'Hint: This may be a permissions issue. Current user: unknown',
    ]);
  });

  test('hints at missing commands and files', () => {
    expect(appendHints('foo: command not found', { command: 'foo', history: [] })).toBe(
      `foo: command not found\n${HINTS.notFound}`,
    );
    expect(appendHints('No such file or directory', { command: 'cat a', history: [] })).toBe(
      `No such file or directory\n${HINTS.noSuchFile}`,
    );
  });

  test('suggests git add only when nothing was staged earlier', () => {
    const error = 'no changes added to commit';

    expect(appendHints(error, { command: 'git commit -m x', history: ['git status'] })).toBe(
      `${error}\n${HINTS.gitAdd}`,
    );
    expect(appendHints(error, { command: 'git commit -m x', history: ['git add .'] })).toBe(error);
  });

  test('buildErrorOutput combines and annotates', () => {
    expect(buildErrorOutput('cat: notes.txt: No such file or directory\n', '', { command: 'cat notes.txt', history: [] })).toBe(
      `cat: notes.txt: No such file or directory\n${HINTS.noSuchFile}`,
    );
  });
});

describe('referenced files', () => {
  const output = `cat: 'notes.txt': No such file\nsee "config.yaml" and src/app.ts and notes.txt`;

  test('collects quoted strings and path-like tokens once each', () => {
    expect(referenceCandidates(output)).toEqual(['notes.txt', 'config.yaml', 'src/app.ts']);
  });

  test('keeps only the candidates that exist', async () => {
    await expect(findReferencedFiles(output, async (path) => path === 'config.yaml')).resolves.toEqual([
      'config.yaml',
    ]);
  });
});
