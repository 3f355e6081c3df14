/**
 * Aggregated library entry for the termfix core.
 *
 * Surfaces the generation and diagnosis pipelines, their building blocks and
 * the configuration helpers consumed by the CLI package.
 */

import 'dotenv/config';

import {
  generateCommands,
  runCommandGeneration,
  interpretGeneration,
  gatewayFailureRecords,
} from '../agent/commandGeneration.js';
import { diagnoseError } from '../agent/errorDiagnosis.js';
import {
  parseGenerationResponse,
  parseDiagnosisResponse,
  parseStructuredResponse,
} from '../agent/responseParser.js';
import { toResultRecords, findRecord } from '../agent/resultRecords.js';
import { applySafetyFilter, classifyIntent, looksDestructive } from '../services/commandSafetyService.js';
import { buildGenerationPrompt } from '../prompts/generationPrompt.js';
import { buildDiagnosisPrompt } from '../prompts/diagnosisPrompt.js';
import { resolveRuntimeSettings, describeBackend } from '../config/settings.js';
import { createModelGateway } from '../gateway/modelGateway.js';
import { listLocalModels } from '../gateway/localModels.js';
import { runCommand } from '../commands/run.js';
import { CommandHistory, loadShellHistory } from '../utils/commandHistory.js';

export * from '../constants.js';
export * from '../contracts/index.js';
export * from '../errors.js';
export * from '../agent/commandGeneration.js';
export * from '../agent/errorDiagnosis.js';
export * from '../agent/responseParser.js';
export * from '../agent/resultRecords.js';
export * from '../services/commandSafetyService.js';
export * from '../prompts/generationPrompt.js';
export * from '../prompts/diagnosisPrompt.js';
export * from '../config/settings.js';
export * from '../gateway/providerCatalog.js';
export * from '../gateway/modelGateway.js';
export * from '../gateway/localModels.js';
export * from '../commands/run.js';
export * from '../utils/commandHistory.js';
export * from '../utils/fetch.js';
export { truncate, headLines, stripAnsi, shellSplit } from '../utils/text.js';

const core = {
  generateCommands,
  runCommandGeneration,
  interpretGeneration,
  gatewayFailureRecords,
  diagnoseError,
  parseGenerationResponse,
  parseDiagnosisResponse,
  parseStructuredResponse,
  toResultRecords,
  findRecord,
  applySafetyFilter,
  classifyIntent,
  looksDestructive,
  buildGenerationPrompt,
  buildDiagnosisPrompt,
  resolveRuntimeSettings,
  describeBackend,
  createModelGateway,
  listLocalModels,
  runCommand,
  CommandHistory,
  loadShellHistory,
};

export default core;
