/**
 * Public entry point for the termfix CLI package.
 *
 * Re-exports the core so programmatic consumers need a single import, and
 * surfaces the CLI helpers. Runs the CLI when executed directly.
 */

import { formatElapsedTime, ThinkingIndicator, withThinking } from './src/thinking.js';
import { askHuman, createInterface, confirmInTerminal, isAffirmative } from './src/io.js';
import {
  renderContextSummary,
  renderDiagnosis,
  renderGeneration,
  renderThinking,
} from './src/render.js';
import { parseCliArgs } from './src/cliArgs.js';
import { collectErrorContext } from './src/errorContext.js';
import { runContextProbes, createProbeContext, getContextProbes } from './src/contextProbes/index.js';
import { detectOsName, parseOsRelease } from './src/osInfo.js';
import { runCli, maybeRunCli } from './src/runner.js';

export * from '@termfix/core';

export {
  formatElapsedTime,
  ThinkingIndicator,
  withThinking,
  askHuman,
  createInterface,
  confirmInTerminal,
  isAffirmative,
  renderContextSummary,
  renderDiagnosis,
  renderGeneration,
  renderThinking,
  parseCliArgs,
  collectErrorContext,
  runContextProbes,
  createProbeContext,
  getContextProbes,
  detectOsName,
  parseOsRelease,
  runCli,
  maybeRunCli,
};

maybeRunCli(__filename, process.argv);
