/**
 * SQL Suggestion Engine
 *
 * Prefix completion over the SQL name tables and a schema catalog, plus the
 * pure state transitions that drive an autocomplete popup.
 *
 * @example
 * ```ts
 * import { suggest } from './autocomplete'
 *
 * suggest('users.n', catalog) // [{ displayText: 'name (users)', insertText: 'name', kind: 'column' }]
 * ```
 */

export { suggest, EMPTY_CATALOG } from './pipeline'
export { generateCandidates, parseTriggerMode } from './candidate-generator'
export {
  rankCandidates,
  limitSuggestions,
  computeMatchType,
  DEFAULT_MAX_SUGGESTIONS,
} from './ranker'
export type { MatchType } from './ranker'
export { updateAutocomplete, moveSelection, acceptSuggestion, dismissAutocomplete } from './state'

export type {
  SchemaCatalog,
  SchemaTable,
  SchemaColumn,
  Suggestion,
  SuggestionKind,
  TriggerMode,
  SuggestOptions,
  AutocompleteState,
  AutocompleteOptions,
  EditorSnapshot,
  AcceptResult,
} from './types'
