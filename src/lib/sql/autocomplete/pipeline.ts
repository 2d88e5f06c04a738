/**
 * Suggestion pipeline: Word → parseTriggerMode → generateCandidates → rank → cap
 */

import type { SchemaCatalog, SuggestOptions, Suggestion } from './types'
import { generateCandidates, parseTriggerMode } from './candidate-generator'
import { DEFAULT_MAX_SUGGESTIONS, limitSuggestions, rankCandidates } from './ranker'

export const EMPTY_CATALOG: SchemaCatalog = { tables: [] }

/**
 * Ranked completions for the word being typed.
 *
 * @example
 * ```ts
 * suggest('us', { tables: [{ name: 'users', columns: [] }] })
 * // users (table), USE, USING (keywords), USER() (function)
 * ```
 */
export function suggest(
  word: string,
  catalog: SchemaCatalog = EMPTY_CATALOG,
  options: SuggestOptions = {}
): Suggestion[] {
  const trigger = parseTriggerMode(word)
  if (!trigger) return []

  const candidates = generateCandidates(trigger, catalog)
  return limitSuggestions(
    rankCandidates(candidates, word),
    options.maxSuggestions ?? DEFAULT_MAX_SUGGESTIONS
  )
}
