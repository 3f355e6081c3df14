import type { SectionRecord } from '../../contracts/sections.js';

export interface LineMatch<S extends string> {
  readonly section: S;
  readonly remainder: string;
}

/**
 * Decides whether a trimmed line opens a section. Returns the section and the
 * line with its markers removed, or null for continuation lines.
 */
export type MarkerMatcher<S extends string> = (line: string) => LineMatch<S> | null;

export type SectionCursor<S extends string> =
  | { readonly kind: 'none' }
  | { readonly kind: 'section'; readonly section: S };

export interface ReasoningExtraction {
  readonly thinking: string[];
  readonly finalText: string;
}

export interface StructuredParseOptions<S extends string> {
  readonly order: readonly S[];
  readonly matcher: MarkerMatcher<S>;
  readonly normalizeText?: (text: string) => string;
  readonly normalizeSections?: (sections: SectionRecord<S>) => SectionRecord<S>;
}
