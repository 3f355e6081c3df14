/**
 * Keyword tables behind the command safety filter. Every test is a
 * case-insensitive substring match against the query or the command text.
 */

import type { Intent, KeywordCategory } from './types.js';

export const KEYWORD_RULES: Readonly<Record<KeywordCategory, readonly string[]>> = {
  'list-intent': [
    'list',
    'show',
    'display',
    'view',
    'enumerate',
    'see files',
    'see all files',
    'ls',
    'dir',
  ],
  'destructive-intent': [
    'delete',
    'remove',
    'clean',
    'cleanup',
    'erase',
    'wipe',
    'trash',
    'empty',
    'purge',
  ],
  'destructive-command': [
    'del',
    'erase',
    'rd',
    'rmdir',
    'rm',
    'mv',
    'move',
    'ren',
    'rename',
    'format',
    'mkfs',
    'shred',
    'sdelete',
    'rm -rf',
    'Remove-Item',
    'New-Item -Force',
  ],
  'safe-listing': ['dir', 'ls', 'ls -la', 'ls -l', 'get-childitem', 'powershell get-childitem'],
};

export function matchesCategory(text: string, category: KeywordCategory): boolean {
  const haystack = text.toLowerCase();
  return KEYWORD_RULES[category].some((keyword) => haystack.includes(keyword.toLowerCase()));
}

/**
 * Destructive-intent keywords always win over list keywords.
 */
export function classifyIntent(query: string): Intent {
  if (!matchesCategory(query, 'list-intent')) {
    return 'unclassified';
  }
  return matchesCategory(query, 'destructive-intent') ? 'unclassified' : 'list';
}

export function looksDestructive(command: string): boolean {
  return matchesCategory(command, 'destructive-command');
}

export function isListingCommand(command: string): boolean {
  return matchesCategory(command, 'safe-listing');
}
