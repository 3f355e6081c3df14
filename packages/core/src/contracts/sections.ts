/**
 * Section vocabularies and result shapes shared by the parser, the safety
 * filter and the presentation layer.
 */

export const GENERATION_SECTIONS = ['analysis', 'command', 'details', 'warning'] as const;
export const DIAGNOSIS_SECTIONS = ['cause', 'fix', 'explanation', 'risk', 'prevention'] as const;

export type GenerationSection = (typeof GENERATION_SECTIONS)[number];
export type DiagnosisSection = (typeof DIAGNOSIS_SECTIONS)[number];

/**
 * One optional field per section name. A missing (undefined) field means the
 * model never emitted that section; empty strings are never stored.
 */
export type SectionRecord<S extends string> = { [K in S]?: string };

export type GenerationSections = SectionRecord<GenerationSection>;
export type DiagnosisSections = SectionRecord<DiagnosisSection>;

export interface ParsedResult<S extends string> {
  readonly thinking: readonly string[];
  readonly sections: SectionRecord<S>;
}

export type GenerationResult = ParsedResult<GenerationSection>;
export type DiagnosisResult = ParsedResult<DiagnosisSection>;

export type ResultRecordType<S extends string> = S | 'thinking';

/**
 * Presentation contract: `thinking` records always come first, followed by
 * section records in vocabulary order. `content` is null for absent sections.
 */
export interface ResultRecord<S extends string = string> {
  readonly type: ResultRecordType<S>;
  readonly content: string | null;
}

export interface MarkerSet {
  readonly glyph: string;
  readonly label: string;
}

export interface SectionVocabulary<S extends string> {
  readonly order: readonly S[];
  readonly markers: Readonly<Record<S, MarkerSet>>;
}

export const GENERATION_VOCABULARY: SectionVocabulary<GenerationSection> = {
  order: GENERATION_SECTIONS,
  markers: {
    analysis: { glyph: '🧠', label: 'Analysis:' },
    command: { glyph: '🛠️', label: 'Command:' },
    details: { glyph: '📝', label: 'Details:' },
    warning: { glyph: '⚠️', label: 'Warning:' },
  },
};

export const DIAGNOSIS_VOCABULARY: SectionVocabulary<DiagnosisSection> = {
  order: DIAGNOSIS_SECTIONS,
  markers: {
    cause: { glyph: '🔍', label: 'Root Cause:' },
    fix: { glyph: '🛠️', label: 'Fix:' },
    explanation: { glyph: '📚', label: 'Technical Explanation:' },
    risk: { glyph: '⚠️', label: 'Potential Risks:' },
    prevention: { glyph: '🔒', label: 'Prevention Tip:' },
  },
};
