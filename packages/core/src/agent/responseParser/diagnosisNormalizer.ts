import type { SectionVocabulary } from '../../contracts/sections.js';
import { escapeRegex, glyphPattern } from './markerPatterns.js';
import type { LineMatch, MarkerMatcher } from './parserTypes.js';

function labelPattern(label: string): string {
  return escapeRegex(label.replace(/:\s*$/, '')).replace(/ /g, '\\s+');
}

/**
 * Collapse blank-line runs and remove list numbering and bold markers so the
 * labels sit at the start of their lines.
 */
export function normalizeDiagnosisText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .replace(/\n{2,}/g, '\n')
    .replace(/\*\*/g, '')
    .replace(/^[ \t]*\d+\.[ \t]+/gm, '');
}

/**
 * Matcher used for error diagnosis: a section opens only where its label
 * starts a line, optionally preceded by its glyph or a bullet, and followed by
 * a colon or the end of the line. Everything up to the next such line belongs
 * to the section.
 */
export function createLeadingLabelMatcher<S extends string>(
  vocabulary: SectionVocabulary<S>,
): MarkerMatcher<S> {
  const patterns = vocabulary.order.map((section) => {
    const { glyph, label } = vocabulary.markers[section];
    const pattern = new RegExp(
      `^(?:[-*][ \\t]+)?(?:${glyphPattern(glyph)}\\s*)?${labelPattern(label)}\\s*(?::|$)`,
      'iu',
    );
    return { section, pattern };
  });

  return (line: string): LineMatch<S> | null => {
    for (const { section, pattern } of patterns) {
      const match = pattern.exec(line);
      if (match) {
        return { section, remainder: line.slice(match[0].length).trim() };
      }
    }
    return null;
  };
}
