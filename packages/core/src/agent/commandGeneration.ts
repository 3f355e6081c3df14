/**
 * Command-generation pipeline: prompt, one gateway call, parse, safety
 * filter, records. Gateway failures never escape; they become a warning
 * record paired with an explicitly empty command.
 */

import { GENERATION_MAX_TOKENS } from '../constants.js';
import type { GenerationContext } from '../contracts/errorContext.js';
import {
  GENERATION_VOCABULARY,
  type GenerationResult,
  type GenerationSection,
  type ResultRecord,
} from '../contracts/sections.js';
import { describeError } from '../errors.js';
import type { ModelGateway } from '../gateway/modelGateway.js';
import { buildGenerationPrompt } from '../prompts/generationPrompt.js';
import { applySafetyFilter, type SafetyVerdict } from '../services/commandSafetyService.js';
import { parseGenerationResponse } from './responseParser.js';
import { toResultRecords } from './resultRecords.js';

export type GenerationRecord = ResultRecord<GenerationSection>;

export interface CommandGenerationDependencies {
  gateway: ModelGateway;
  buildPrompt?: (query: string, context: GenerationContext) => string;
}

export type CommandGenerationOutcome =
  | {
      readonly status: 'ok';
      readonly records: GenerationRecord[];
      readonly parsed: GenerationResult;
      readonly verdict: SafetyVerdict;
    }
  | {
      readonly status: 'gateway-error';
      readonly records: GenerationRecord[];
      readonly message: string;
    };

export function gatewayFailureRecords(message: string): GenerationRecord[] {
  return [
    { type: 'warning', content: `Error: ${message}` },
    { type: 'command', content: null },
  ];
}

/**
 * Parse and filter raw model output. Exposed separately so callers holding a
 * completion (tests, replays) can skip the gateway.
 */
export function interpretGeneration(
  query: string,
  os: string,
  rawOutput: string,
): { records: GenerationRecord[]; parsed: GenerationResult; verdict: SafetyVerdict } {
  const parsed = parseGenerationResponse(rawOutput);
  const { result, verdict } = applySafetyFilter(query, os, parsed);
  return {
    records: toResultRecords(result, GENERATION_VOCABULARY.order),
    parsed: result,
    verdict,
  };
}

export async function runCommandGeneration(
  query: string,
  context: GenerationContext,
  deps: CommandGenerationDependencies,
): Promise<CommandGenerationOutcome> {
  const buildPrompt = deps.buildPrompt ?? buildGenerationPrompt;

  let rawOutput: string;
  try {
    rawOutput = await deps.gateway.generate(buildPrompt(query, context), GENERATION_MAX_TOKENS);
  } catch (error) {
    const message = describeError(error);
    return { status: 'gateway-error', records: gatewayFailureRecords(message), message };
  }

  return { status: 'ok', ...interpretGeneration(query, context.os, rawOutput) };
}

export async function generateCommands(
  query: string,
  context: GenerationContext,
  deps: CommandGenerationDependencies,
): Promise<GenerationRecord[]> {
  const outcome = await runCommandGeneration(query, context, deps);
  return outcome.records;
}

export default {
  generateCommands,
  runCommandGeneration,
  interpretGeneration,
  gatewayFailureRecords,
};
