/**
 * Post-processes a parsed command-generation result so that a benign
 * "list/show" request never surfaces a destructive or unrelated command.
 *
 * The filter is a pure function of the query, the OS name and the parsed
 * result. It never rejects a result; it only swaps the command for the
 * platform's listing command and annotates why.
 */

import type { GenerationResult, GenerationSections } from '../contracts/sections.js';
import {
  classifyIntent,
  isListingCommand,
  looksDestructive,
} from './commandSafety/intentRules.js';
import { canonicalListingCommand, isWindowsFamily } from './commandSafety/osFamily.js';
import type { SafetyFilterOutcome, SafetyVerdict } from './commandSafety/types.js';

export type {
  Intent,
  KeywordCategory,
  ReplacementReason,
  SafetyVerdict,
  SafetyFilterOutcome,
} from './commandSafety/types.js';
export {
  KEYWORD_RULES,
  classifyIntent,
  isListingCommand,
  looksDestructive,
  matchesCategory,
} from './commandSafety/intentRules.js';
export { canonicalListingCommand, isWindowsFamily } from './commandSafety/osFamily.js';

export const LISTING_ANALYSIS = 'List all files and directories in the current directory.';
export const WINDOWS_LISTING_DETAILS = "The 'dir' command lists directory contents on Windows.";
export const POSIX_LISTING_DETAILS =
  "The 'ls -la' command lists all files (including hidden) with details on Linux.";
export const DESTRUCTIVE_REPLACEMENT_WARNING =
  'Original suggestion looked destructive for a list intent; replaced with a safe listing command.';

function appendWarning(existing: string | undefined, addition: string): string {
  return existing ? `${existing}\n${addition}` : addition;
}

export function applySafetyFilter(
  query: string,
  osName: string,
  result: GenerationResult,
): SafetyFilterOutcome {
  if (classifyIntent(query ?? '') !== 'list') {
    return { result, verdict: { kind: 'unmodified' } };
  }

  const command = (result.sections.command ?? '').toLowerCase();
  const destructive = looksDestructive(command);

  if (!destructive && isListingCommand(command)) {
    return { result, verdict: { kind: 'unmodified' } };
  }

  const safeCommand = canonicalListingCommand(osName);
  const sections: GenerationSections = {
    ...result.sections,
    command: safeCommand,
    analysis: LISTING_ANALYSIS,
    details: isWindowsFamily(osName) ? WINDOWS_LISTING_DETAILS : POSIX_LISTING_DETAILS,
  };

  if (destructive) {
    sections.warning = appendWarning(result.sections.warning, DESTRUCTIVE_REPLACEMENT_WARNING);
  }

  const verdict: SafetyVerdict = {
    kind: 'replaced',
    command: safeCommand,
    reason: destructive ? 'destructive' : 'not-listing',
  };

  return { result: { thinking: result.thinking, sections }, verdict };
}

export default {
  applySafetyFilter,
};
