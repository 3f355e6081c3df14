import type { MarkerSet, SectionRecord, SectionVocabulary } from '../../contracts/sections.js';
import { bareGlyph, glyphPattern } from './markerPatterns.js';
import type { LineMatch, MarkerMatcher, SectionCursor } from './parserTypes.js';

function removeAll(line: string, marker: string): string {
  return marker ? line.split(marker).join('') : line;
}

// The glyph is matched with or without its variation selector.
function removeGlyph(line: string, glyph: string): string {
  return glyph ? line.replace(new RegExp(glyphPattern(glyph), 'gu'), '') : line;
}

function lineHasMarker(line: string, markers: MarkerSet): boolean {
  const glyph = bareGlyph(markers.glyph);
  return (glyph !== '' && line.includes(glyph)) || line.includes(markers.label);
}

/**
 * Matcher used for command generation: a line opens a section when it
 * contains the section's glyph or label anywhere. Sections are tried in
 * vocabulary order and the first hit wins.
 */
export function createContainsMatcher<S extends string>(
  vocabulary: SectionVocabulary<S>,
): MarkerMatcher<S> {
  return (line: string): LineMatch<S> | null => {
    for (const section of vocabulary.order) {
      const markers = vocabulary.markers[section];
      if (!lineHasMarker(line, markers)) {
        continue;
      }

      const remainder = removeAll(removeGlyph(line, markers.glyph), markers.label).trim();
      return { section, remainder };
    }

    return null;
  };
}

/**
 * Single pass over the lines of `text` with an explicit section cursor.
 *
 * A marker line resets its section to the remainder of that line. Any other
 * non-blank line is appended to the section under the cursor; lines seen
 * before the first marker are dropped.
 */
export function scanSections<S extends string>(
  text: string,
  matcher: MarkerMatcher<S>,
): SectionRecord<S> {
  const sections: SectionRecord<S> = {};
  let cursor: SectionCursor<S> = { kind: 'none' };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    const match = matcher(line);
    if (match) {
      cursor = { kind: 'section', section: match.section };
      sections[match.section] = match.remainder;
      continue;
    }

    if (cursor.kind === 'none') {
      continue;
    }

    const existing = sections[cursor.section];
    sections[cursor.section] = existing ? `${existing}\n${line}` : line;
  }

  return sections;
}
