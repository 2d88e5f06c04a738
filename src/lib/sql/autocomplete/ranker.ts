/**
 * Ranker Module
 *
 * Order, most relevant first:
 * 1. Candidates whose insert text starts with the typed word
 * 2. Kind: table, column, keyword, function, type
 * 3. Display text, by UTF-16 code unit
 */

import type { Suggestion, SuggestionKind } from './types'

export const DEFAULT_MAX_SUGGESTIONS = 12

const KIND_PRIORITY: Record<SuggestionKind, number> = {
  table: 0,
  column: 1,
  keyword: 2,
  function: 3,
  type: 4,
}

export type MatchType = 'prefix' | 'none'

export function computeMatchType(value: string, word: string): MatchType {
  return value.toUpperCase().startsWith(word.toUpperCase()) ? 'prefix' : 'none'
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function rankCandidates(candidates: Suggestion[], word: string): Suggestion[] {
  const ranked = candidates.map((candidate) => ({
    candidate,
    matchRank: computeMatchType(candidate.insertText, word) === 'prefix' ? 0 : 1,
  }))

  ranked.sort(
    (a, b) =>
      a.matchRank - b.matchRank ||
      KIND_PRIORITY[a.candidate.kind] - KIND_PRIORITY[b.candidate.kind] ||
      compareCodeUnits(a.candidate.displayText, b.candidate.displayText)
  )

  return ranked.map((entry) => entry.candidate)
}

export function limitSuggestions(
  suggestions: Suggestion[],
  limit: number = DEFAULT_MAX_SUGGESTIONS
): Suggestion[] {
  return suggestions.slice(0, limit)
}
