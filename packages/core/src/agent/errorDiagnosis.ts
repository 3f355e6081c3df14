import { DIAGNOSIS_MAX_TOKENS } from '../constants.js';
import type { ErrorContext } from '../contracts/errorContext.js';
import {
  DIAGNOSIS_VOCABULARY,
  type DiagnosisResult,
  type DiagnosisSection,
  type ResultRecord,
} from '../contracts/sections.js';
import { describeError } from '../errors.js';
import type { ModelGateway } from '../gateway/modelGateway.js';
import { buildDiagnosisPrompt } from '../prompts/diagnosisPrompt.js';
import { parseDiagnosisResponse } from './responseParser.js';
import { toResultRecords } from './resultRecords.js';

export type DiagnosisRecord = ResultRecord<DiagnosisSection>;

export interface ErrorDiagnosisDependencies {
  gateway: ModelGateway;
  buildPrompt?: (context: ErrorContext) => string;
}

export type ErrorDiagnosisOutcome =
  | {
      readonly status: 'ok';
      readonly parsed: DiagnosisResult;
      readonly records: DiagnosisRecord[];
    }
  | {
      readonly status: 'error';
      readonly message: string;
    };

/**
 * Diagnose a failed command. The diagnosis vocabulary has no warning slot, so
 * a gateway failure is reported as its own outcome instead of a record.
 */
export async function diagnoseError(
  context: ErrorContext,
  deps: ErrorDiagnosisDependencies,
): Promise<ErrorDiagnosisOutcome> {
  const buildPrompt = deps.buildPrompt ?? buildDiagnosisPrompt;

  let rawOutput: string;
  try {
    rawOutput = await deps.gateway.generate(buildPrompt(context), DIAGNOSIS_MAX_TOKENS);
  } catch (error) {
    return { status: 'error', message: `Error: ${describeError(error)}` };
  }

  const parsed = parseDiagnosisResponse(rawOutput);
  return {
    status: 'ok',
    parsed,
    records: toResultRecords(parsed, DIAGNOSIS_VOCABULARY.order),
  };
}

export default {
  diagnoseError,
};
