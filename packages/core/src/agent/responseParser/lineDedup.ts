import type { SectionRecord } from '../../contracts/sections.js';

/**
 * Drop lines that repeat an earlier line. First occurrence wins and the
 * relative order of the kept lines is unchanged.
 */
export function dedupeLines(content: string): string {
  const seen = new Set<string>();
  const kept: string[] = [];

  for (const line of content.split('\n')) {
    if (seen.has(line)) {
      continue;
    }
    seen.add(line);
    kept.push(line);
  }

  return kept.join('\n');
}

/**
 * Trim and dedupe every section. Sections that end up empty are omitted so an
 * absent section is never represented by an empty string.
 */
export function finalizeSections<S extends string>(
  raw: SectionRecord<S>,
  order: readonly S[],
): SectionRecord<S> {
  const finalized: SectionRecord<S> = {};

  for (const section of order) {
    const value = raw[section];
    if (typeof value !== 'string') {
      continue;
    }

    const trimmed = value.trim();
    if (!trimmed) {
      continue;
    }

    finalized[section] = dedupeLines(trimmed);
  }

  return finalized;
}
