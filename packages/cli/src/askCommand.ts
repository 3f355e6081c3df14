import {
  findRecord,
  generateCommands,
  type GenerationContext,
  type RuntimeSettings,
} from '@termfix/core';

import { isGitRepository, type CliDependencies, type CliIo } from './cliDependencies.js';
import { EXECUTE_PROMPT } from './io.js';
import { renderGeneration } from './render.js';
import { withThinking } from './thinking.js';

export type AskOptions = {
  query: string;
  execute: boolean;
  settings: RuntimeSettings;
};

/**
 * `termfix ask`: generate one command for a request and optionally run it.
 * Resolves with the process exit code.
 */
export async function runAsk(options: AskOptions, deps: CliDependencies, io: CliIo): Promise<number> {
  const cwd = deps.cwd();
  const context: GenerationContext = {
    os: deps.detectOs(),
    cwd,
    git: isGitRepository(deps, cwd),
    history: deps.loadHistory().recent(),
  };

  const gateway = deps.createGateway(options.settings);
  const records = await withThinking(
    () => generateCommands(options.query, context, { gateway }),
    deps.createIndicator(),
  );
  io.stdout(renderGeneration(records).join('\n'));

  const command = findRecord(records, 'command')?.content;
  if (!command) {
    return 1;
  }

  if (!options.execute || !(await deps.confirm(EXECUTE_PROMPT))) {
    return 0;
  }

  const result = await deps.runCommand(command, { cwd, output: 'inherit' });
  return result.exit_code ?? 1;
}
