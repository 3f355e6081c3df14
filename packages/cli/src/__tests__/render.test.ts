import { describe, expect, test } from '@jest/globals';

import {
  DESTRUCTIVE_REPLACEMENT_WARNING,
  LISTING_ANALYSIS,
  POSIX_LISTING_DETAILS,
  stripAnsi,
  type DiagnosisRecord,
  type ErrorContext,
  type GenerationRecord,
} from '@termfix/core';

import {
  renderContextSummary,
  renderDebugContext,
  renderDiagnosis,
  renderGeneration,
  renderThinking,
} from '../render.js';

const plain = (lines: readonly string[]): string[] => lines.map((line) => stripAnsi(line));

describe('renderGeneration', () => {
  test('lays out reasoning, analysis, details and the command', () => {
    const records: GenerationRecord[] = [
      { type: 'thinking', content: 'check files' },
      { type: 'analysis', content: LISTING_ANALYSIS },
      { type: 'command', content: 'ls -la' },
      { type: 'details', content: POSIX_LISTING_DETAILS },
      { type: 'warning', content: DESTRUCTIVE_REPLACEMENT_WARNING },
    ];

    expect(plain(renderGeneration(records))).toEqual([
      '── COMMAND ANALYSIS ──',
      '',
      'Thinking Process',
      '› check files',
      '',
      'Analysis',
      `ⓘ ${LISTING_ANALYSIS}`,
      `⚠ ${DESTRUCTIVE_REPLACEMENT_WARNING}`,
      '',
      'Technical Details',
      POSIX_LISTING_DETAILS,
      '',
      'Generated Command',
      '  ls -la',
    ]);
  });

  test('reports a missing command', () => {
    const records: GenerationRecord[] = [
      { type: 'warning', content: 'Error: timeout' },
      { type: 'command', content: null },
    ];

    expect(plain(renderGeneration(records))).toEqual([
      '── COMMAND ANALYSIS ──',
      '',
      'Analysis',
      '⚠ Error: timeout',
      '',
      'No valid command generated',
    ]);
  });
});

describe('renderDiagnosis', () => {
  test('groups the diagnosis, the fix and the extra advice', () => {
    const records: DiagnosisRecord[] = [
      { type: 'cause', content: 'Missing file' },
      { type: 'fix', content: 'touch notes.txt' },
      { type: 'explanation', content: null },
      { type: 'risk', content: null },
      { type: 'prevention', content: 'Check first' },
    ];

    expect(plain(renderDiagnosis(records))).toEqual([
      '── Error Analysis ──',
      'Diagnosis',
      'Root Cause',
      '  Missing file',
      '',
      '⚡ RECOMMENDED FIX',
      '  touch notes.txt',
      '',
      'Additional Information',
      'Prevention Tip',
      '  Check first',
    ]);
  });

  test('titles reasoning as the cognitive process', () => {
    const lines = plain(renderDiagnosis([{ type: 'thinking', content: 'Step 1' }]));

    expect(lines).toEqual(['── Error Analysis ──', 'Cognitive Process', '› Step 1', '']);
  });
});

describe('context rendering', () => {
  const context: ErrorContext = {
    command: 'cat notes.txt',
    errorOutput: 'No such file',
    cwd: '/work',
    exitCode: 1,
    history: ['ls', 'cd docs', 'pwd', 'cat notes.txt'],
    relevantFiles: ['notes.txt'],
    manExcerpt: 'NAME\ncat - concatenate files',
    os: 'Ubuntu 22.04',
  };

  test('summarises recent history, related files and the manual', () => {
    expect(plain(renderContextSummary(context))).toEqual([
      'Recent Commands',
      '› cd docs',
      '› pwd',
      '› cat notes.txt',
      'Related Files',
      '› notes.txt',
      '📘 MANUAL REFERENCE',
      '  NAME',
      '  cat - concatenate files',
      '',
    ]);
  });

  test('omits a missing manual and renders nothing for an empty context', () => {
    expect(
      renderContextSummary({ ...context, history: [], relevantFiles: [], manExcerpt: 'No manual entry available' }),
    ).toEqual([]);
  });

  test('dumps the context as JSON in debug mode', () => {
    const [title, body] = plain(renderDebugContext(context));

    expect(title).toBe('[DEBUG] Error Context:');
    expect(JSON.parse(body)).toEqual(context);
  });

  test('renders no thinking block without fragments', () => {
    expect(renderThinking([])).toEqual([]);
  });
});
