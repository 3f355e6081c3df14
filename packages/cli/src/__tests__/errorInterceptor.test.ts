/* eslint-env jest */
import { describe, expect, jest, test } from '@jest/globals';

import { CommandHistory, type CommandRunner, type ModelGateway } from '@termfix/core';

import { analyzeFailure, runAndDiagnose } from '../errorInterceptor.js';
import {
  LOCAL_SETTINGS,
  commandResult,
  createFakeDependencies,
  createRecordingIo,
} from '../__testUtils__/cliDependencies.js';

const DIAGNOSIS = 'Root Cause: Missing file\nFix: `touch notes.txt`';

function diagnosingGateway(output: string | Error = DIAGNOSIS) {
  const generate = jest.fn<ModelGateway['generate']>();
  if (output instanceof Error) {
    generate.mockRejectedValue(output);
  } else {
    generate.mockResolvedValue(output);
  }
  const gateway: ModelGateway = { label: 'test', generate };
  return { gateway, generate };
}

const options = { settings: LOCAL_SETTINGS, debug: false };

describe('runAndDiagnose', () => {
  test('returns zero without diagnosing a successful command', async () => {
    const createGateway = jest.fn(() => diagnosingGateway().gateway);
    const runCommand = jest.fn<CommandRunner>().mockResolvedValue(commandResult({ stdout: 'ok\n' }));
    const deps = createFakeDependencies({ createGateway, runCommand });

    await expect(runAndDiagnose('echo ok', deps, createRecordingIo(), options)).resolves.toBe(0);
    expect(runCommand).toHaveBeenCalledWith('echo ok', { cwd: '/work', output: 'tee' });
    expect(createGateway).not.toHaveBeenCalled();
  });

  test('diagnoses a failure and passes its exit code through', async () => {
    const { gateway, generate } = diagnosingGateway();
    const runCommand = jest
      .fn<CommandRunner>()
      .mockResolvedValue(
        commandResult({ stderr: 'cat: notes.txt: No such file or directory\n', exit_code: 1 }),
      );
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand,
      loadHistory: () => new CommandHistory(20, ['ls']),
    });
    const io = createRecordingIo();

    await expect(runAndDiagnose('cat notes.txt', deps, io, options)).resolves.toBe(1);

    const [prompt] = generate.mock.calls[0];
    expect(prompt).toContain('**Recent Commands**: ls, cat notes.txt');
    expect(prompt).toContain(
      '**Error Message**: cat: notes.txt: No such file or directory\nHint: File or directory does not exist in the current context',
    );
    expect(io.out[0]).toBe('🔎 Analyzing error...');
    expect(io.out[1].split('\n')).toEqual([
      'Recent Commands',
      '› ls',
      '› cat notes.txt',
      '',
      '── Error Analysis ──',
      'Diagnosis',
      'Root Cause',
      '  Missing file',
      '',
      '⚡ RECOMMENDED FIX',
      '  touch notes.txt',
      '',
    ]);
    expect(io.err).toEqual([]);
  });

  test('treats a missing exit code as a failure', async () => {
    const { gateway } = diagnosingGateway();
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand: async () => commandResult({ stderr: 'spawn failed', exit_code: null }),
    });

    await expect(runAndDiagnose('broken', deps, createRecordingIo(), options)).resolves.toBe(1);
  });

  test('prints the context and probe failures in debug mode', async () => {
    const { gateway } = diagnosingGateway();
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand: async () => commandResult({ stderr: 'boom', exit_code: 2 }),
      probes: [
        {
          name: 'flaky',
          run: async () => {
            throw new Error('unavailable');
          },
        },
      ],
    });
    const io = createRecordingIo();

    await runAndDiagnose('make', deps, io, { ...options, debug: true });

    expect(io.out[0].startsWith('[DEBUG] Error Context:\n{')).toBe(true);
    expect(io.out[1]).toBe('[DEBUG] probe flaky failed: unavailable');
    expect(io.out[2]).toBe('🔎 Analyzing error...');
  });

  test('reports a gateway failure on stderr', async () => {
    const { gateway } = diagnosingGateway(new Error('connection refused'));
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand: async () => commandResult({ stderr: 'boom', exit_code: 2 }),
    });
    const io = createRecordingIo();

    await expect(runAndDiagnose('make', deps, io, options)).resolves.toBe(2);
    expect(io.err).toEqual(['Error: connection refused']);
  });
});

describe('analyzeFailure', () => {
  test('re-runs a harmless command to recapture its error', async () => {
    const { gateway, generate } = diagnosingGateway();
    const runCommand = jest
      .fn<CommandRunner>()
      .mockResolvedValue(commandResult({ stderr: 'cat: notes.txt: No such file or directory\n', exit_code: 1 }));
    const deps = createFakeDependencies({ createGateway: () => gateway, runCommand });

    await expect(analyzeFailure('cat notes.txt', 1, deps, createRecordingIo(), options)).resolves.toBe(true);

    expect(runCommand).toHaveBeenCalledWith('cat notes.txt', {
      cwd: '/work',
      output: 'capture',
      timeoutMs: 10_000,
    });
    const [prompt] = generate.mock.calls[0];
    expect(prompt).toContain('**Exit Code**: 1');
    expect(prompt).toContain('**Error Message**: cat: notes.txt: No such file or directory');
  });

  test('never re-runs a destructive command', async () => {
    const { gateway, generate } = diagnosingGateway();
    const runCommand = jest.fn<CommandRunner>();
    const deps = createFakeDependencies({ createGateway: () => gateway, runCommand });

    await analyzeFailure('rm -rf build', 1, deps, createRecordingIo(), options);

    expect(runCommand).not.toHaveBeenCalled();
    const [prompt] = generate.mock.calls[0];
    expect(prompt).toContain('**Failed Command**: `rm -rf build`');
  });
});
