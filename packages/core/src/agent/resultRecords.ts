import type {
  ParsedResult,
  ResultRecord,
  SectionRecord,
} from '../contracts/sections.js';
import { dedupeLines } from './responseParser/lineDedup.js';

/**
 * Flattens a parsed result into the ordered record list the presentation
 * layer consumes.
 *
 * With reasoning present, absent sections are dropped and each section is
 * deduplicated once more. Without reasoning every vocabulary slot is emitted,
 * absent ones with `null` content.
 */
export function toResultRecords<S extends string>(
  parsed: ParsedResult<S>,
  order: readonly S[],
): ResultRecord<S>[] {
  const records: ResultRecord<S>[] = parsed.thinking.map(
    (fragment): ResultRecord<S> => ({ type: 'thinking', content: fragment }),
  );

  const hasThinking = parsed.thinking.length > 0;
  const seen = new Set<S>();

  for (const section of order) {
    if (seen.has(section)) {
      continue;
    }
    seen.add(section);

    const content = parsed.sections[section];
    if (hasThinking) {
      if (typeof content === 'string' && content.length > 0) {
        records.push({ type: section, content: dedupeLines(content) });
      }
      continue;
    }

    records.push({ type: section, content: content ?? null });
  }

  return records;
}

export function findRecord<S extends string>(
  records: readonly ResultRecord<S>[],
  type: S | 'thinking',
): ResultRecord<S> | undefined {
  return records.find((record) => record.type === type);
}

export default {
  toResultRecords,
  findRecord,
};
