/* eslint-env jest */
import { describe, expect, jest, test } from '@jest/globals';

import type { CommandRunner, ModelGateway } from '@termfix/core';

import { runAsk } from '../askCommand.js';
import { EXECUTE_PROMPT } from '../io.js';
import {
  LOCAL_SETTINGS,
  commandResult,
  createFakeDependencies,
  createRecordingIo,
} from '../__testUtils__/cliDependencies.js';

function gatewayReturning(output: string | Error) {
  const generate = jest.fn<ModelGateway['generate']>();
  if (output instanceof Error) {
    generate.mockRejectedValue(output);
  } else {
    generate.mockResolvedValue(output);
  }
  const gateway: ModelGateway = { label: 'test', generate };
  return { gateway, generate };
}

describe('runAsk', () => {
  test('prints the generated command without running it', async () => {
    const { gateway, generate } = gatewayReturning('🛠️ Command: ls -la');
    const runCommand = jest.fn<CommandRunner>();
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand,
      pathExists: (path) => path === '/work/.git',
    });
    const io = createRecordingIo();

    const exitCode = await runAsk({ query: 'list all files', execute: false, settings: LOCAL_SETTINGS }, deps, io);

    expect(exitCode).toBe(0);
    expect(io.out).toHaveLength(1);
    expect(io.out[0].endsWith('Generated Command\n  ls -la')).toBe(true);
    const [prompt] = generate.mock.calls[0];
    expect(prompt).toContain('- Directory: /work');
    expect(prompt).toContain('- Git repo: Yes (only relevant for Git-specific queries)');
    expect(runCommand).not.toHaveBeenCalled();
  });

  test('runs the command after confirmation', async () => {
    const { gateway } = gatewayReturning('🛠️ Command: df -h');
    const runCommand = jest.fn<CommandRunner>().mockResolvedValue(commandResult({ exit_code: 0 }));
    const confirm = jest.fn(async () => true);
    const deps = createFakeDependencies({ createGateway: () => gateway, runCommand, confirm });

    const exitCode = await runAsk(
      { query: 'disk usage', execute: true, settings: LOCAL_SETTINGS },
      deps,
      createRecordingIo(),
    );

    expect(exitCode).toBe(0);
    expect(confirm).toHaveBeenCalledWith(EXECUTE_PROMPT);
    expect(runCommand).toHaveBeenCalledWith('df -h', { cwd: '/work', output: 'inherit' });
  });

  test('returns the exit code of the executed command', async () => {
    const { gateway } = gatewayReturning('🛠️ Command: make');
    const runCommand = jest.fn<CommandRunner>().mockResolvedValue(commandResult({ exit_code: 2 }));
    const deps = createFakeDependencies({ createGateway: () => gateway, runCommand });

    await expect(
      runAsk({ query: 'build it', execute: true, settings: LOCAL_SETTINGS }, deps, createRecordingIo()),
    ).resolves.toBe(2);
  });

  test('skips execution when the user declines', async () => {
    const { gateway } = gatewayReturning('🛠️ Command: df -h');
    const runCommand = jest.fn<CommandRunner>();
    const deps = createFakeDependencies({
      createGateway: () => gateway,
      runCommand,
      confirm: async () => false,
    });

    await expect(
      runAsk({ query: 'disk usage', execute: true, settings: LOCAL_SETTINGS }, deps, createRecordingIo()),
    ).resolves.toBe(0);
    expect(runCommand).not.toHaveBeenCalled();
  });

  test('fails when no command could be generated', async () => {
    const { gateway } = gatewayReturning(new Error('timeout'));
    const confirm = jest.fn(async () => true);
    const deps = createFakeDependencies({ createGateway: () => gateway, confirm });
    const io = createRecordingIo();

    const exitCode = await runAsk({ query: 'disk usage', execute: true, settings: LOCAL_SETTINGS }, deps, io);

    expect(exitCode).toBe(1);
    expect(io.out[0].split('\n')).toEqual([
      '── COMMAND ANALYSIS ──',
      '',
      'Analysis',
      '⚠ Error: timeout',
      '',
      'No valid command generated',
    ]);
    expect(confirm).not.toHaveBeenCalled();
  });
});
