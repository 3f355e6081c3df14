import {
  DIAGNOSIS_VOCABULARY,
  GENERATION_VOCABULARY,
  type DiagnosisResult,
  type DiagnosisSection,
  type GenerationResult,
  type GenerationSection,
  type ParsedResult,
  type SectionRecord,
} from '../contracts/sections.js';
import type { StructuredParseOptions } from './responseParser/parserTypes.js';
import { extractReasoning, stripTags } from './responseParser/reasoningExtractor.js';
import { finalizeSections } from './responseParser/lineDedup.js';
import { createContainsMatcher, scanSections } from './responseParser/sectionScanner.js';
import {
  createLeadingLabelMatcher,
  normalizeDiagnosisText,
} from './responseParser/diagnosisNormalizer.js';
import { unwrapCommand } from './responseParser/commandNormalizer.js';

export type {
  LineMatch,
  MarkerMatcher,
  SectionCursor,
  ReasoningExtraction,
  StructuredParseOptions,
} from './responseParser/parserTypes.js';
export { extractReasoning, stripTags } from './responseParser/reasoningExtractor.js';
export { dedupeLines, finalizeSections } from './responseParser/lineDedup.js';
export { createContainsMatcher, scanSections } from './responseParser/sectionScanner.js';
export {
  createLeadingLabelMatcher,
  normalizeDiagnosisText,
} from './responseParser/diagnosisNormalizer.js';
export { unwrapCommand } from './responseParser/commandNormalizer.js';

/**
 * Shared pipeline: reasoning extraction, tag stripping, the line scan and
 * duplicate suppression. Never throws; unrecognisable text yields no sections.
 */
export function parseStructuredResponse<S extends string>(
  rawContent: unknown,
  options: StructuredParseOptions<S>,
): ParsedResult<S> {
  const raw = typeof rawContent === 'string' ? rawContent : '';
  const { thinking, finalText } = extractReasoning(raw);

  let cleaned = stripTags(finalText);
  if (options.normalizeText) {
    cleaned = options.normalizeText(cleaned);
  }

  const scanned = scanSections(cleaned, options.matcher);
  let sections = finalizeSections(scanned, options.order);
  if (options.normalizeSections) {
    sections = finalizeSections(options.normalizeSections(sections), options.order);
  }

  return { thinking, sections };
}

function unwrapSection<S extends string>(sections: SectionRecord<S>, key: S): SectionRecord<S> {
  const value = sections[key];
  if (typeof value !== 'string') {
    return sections;
  }
  const next: SectionRecord<S> = { ...sections };
  next[key] = unwrapCommand(value);
  return next;
}

const generationMatcher = createContainsMatcher(GENERATION_VOCABULARY);
const diagnosisMatcher = createLeadingLabelMatcher(DIAGNOSIS_VOCABULARY);

export function parseGenerationResponse(rawContent: unknown): GenerationResult {
  return parseStructuredResponse<GenerationSection>(rawContent, {
    order: GENERATION_VOCABULARY.order,
    matcher: generationMatcher,
    normalizeSections: (sections) => unwrapSection(sections, 'command'),
  });
}

export function parseDiagnosisResponse(rawContent: unknown): DiagnosisResult {
  return parseStructuredResponse<DiagnosisSection>(rawContent, {
    order: DIAGNOSIS_VOCABULARY.order,
    matcher: diagnosisMatcher,
    normalizeText: normalizeDiagnosisText,
    normalizeSections: (sections) => unwrapSection(sections, 'fix'),
  });
}

export default {
  parseGenerationResponse,
  parseDiagnosisResponse,
};
