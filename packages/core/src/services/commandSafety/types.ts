import type { GenerationResult } from '../../contracts/sections.js';

export type Intent = 'list' | 'unclassified';

export type KeywordCategory =
  | 'list-intent'
  | 'destructive-intent'
  | 'destructive-command'
  | 'safe-listing';

export type ReplacementReason = 'destructive' | 'not-listing';

export type SafetyVerdict =
  | { readonly kind: 'unmodified' }
  | { readonly kind: 'replaced'; readonly command: string; readonly reason: ReplacementReason };

export interface SafetyFilterOutcome {
  readonly result: GenerationResult;
  readonly verdict: SafetyVerdict;
}
