import { describe, expect, test } from '@jest/globals';
import { PassThrough } from 'node:stream';

import { askHuman, createInterface, isAffirmative } from '../io.js';

describe('isAffirmative', () => {
  test.each([
    ['y', true],
    ['', true],
    ['yes', true],
    ['n', false],
    [' N ', false],
    ['no', true],
  ])('%j → %s', (answer, expected) => {
    expect(isAffirmative(answer)).toBe(expected);
  });
});

describe('askHuman', () => {
  test('resolves with the trimmed answer', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const rl = createInterface(input, output);

    try {
      const pending = askHuman(rl, '› Execute command? [y/n]: ');
      input.write('  n  \n');
      await expect(pending).resolves.toBe('n');
    } finally {
      rl.close();
    }
  });
});
