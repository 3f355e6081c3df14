import { describe, expect, test } from '@jest/globals';

import { relevantFilesFromHistory } from '../relevantFiles.js';

describe('relevantFilesFromHistory', () => {
  test('walks back from the newest entry and stops at three files', () => {
    expect(
      relevantFilesFromHistory([
        'touch a.txt',
        'git add a.txt',
        'ls',
        'vim b.md',
        'mkdir out',
        'cp x y',
        'make',
      ]),
    ).toEqual(['y', 'out', 'b.md']);
  });

  test('ignores the failing command and commands without a file argument', () => {
    expect(relevantFilesFromHistory(['git push', 'git add src/index.ts', 'touch', 'vim last.txt'])).toEqual([
      'src/index.ts',
    ]);
  });

  test('returns nothing for an empty history', () => {
    expect(relevantFilesFromHistory([])).toEqual([]);
  });
});
