import { THINK_CLOSE_TAG, THINK_OPEN_TAG } from '../../constants.js';
import type { ReasoningExtraction } from './parserTypes.js';

const TAG_PATTERN = /<[^>]+>/g;

/**
 * Pull `<think>` fragments out of a raw completion, leftmost pair first.
 *
 * Each matched region (delimiters included) is cut from the working text,
 * leaving a line break between the text around it, and the scan restarts on
 * what is left. An unmatched delimiter ends extraction
 * and stays in the final text.
 */
export function extractReasoning(
  raw: string,
  openTag: string = THINK_OPEN_TAG,
  closeTag: string = THINK_CLOSE_TAG,
): ReasoningExtraction {
  const thinking: string[] = [];
  let remaining = raw;

  while (true) {
    const openIndex = remaining.indexOf(openTag);
    if (openIndex === -1) {
      break;
    }

    const contentStart = openIndex + openTag.length;
    const closeIndex = remaining.indexOf(closeTag, contentStart);
    if (closeIndex === -1) {
      break;
    }

    thinking.push(remaining.slice(contentStart, closeIndex).trim());
    const before = remaining.slice(0, openIndex);
    const after = remaining.slice(closeIndex + closeTag.length);
    // Text on either side of a removed pair stays on separate lines.
    remaining = before && after ? `${before}\n${after}` : before + after;
  }

  return { thinking, finalText: remaining.trim() };
}

/**
 * Remove any leftover `<...>` markup from the final response text.
 */
export function stripTags(text: string): string {
  return text.replace(TAG_PATTERN, '');
}
