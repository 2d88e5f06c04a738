/**
 * Suggestion Engine Types
 *
 * Word + Catalog → CandidateGenerator → Ranker → Suggestion[]
 */

// ============================================================================
// 1. SCHEMA CATALOG
// ============================================================================

export interface SchemaColumn {
  name: string
  type: string
  isPrimaryKey: boolean
}

export interface SchemaTable {
  name: string
  columns: SchemaColumn[]
}

/** Read-only snapshot of the connected database's tables, passed per call. */
export interface SchemaCatalog {
  tables: SchemaTable[]
}

// ============================================================================
// 2. SUGGESTIONS
// ============================================================================

export type SuggestionKind = 'table' | 'column' | 'keyword' | 'function' | 'type'

export interface Suggestion {
  /** Shown in the popup, e.g. `name (users)` for a column */
  displayText: string
  /** Replaces the trigger range on acceptance */
  insertText: string
  kind: SuggestionKind
}

/**
 * How the typed word is read.
 * - normal: `sel` matches keywords, types, functions, tables and columns
 * - dot: `users.na` matches columns of `users` only
 */
export type TriggerMode =
  | { mode: 'normal'; prefix: string }
  | { mode: 'dot'; table: string; prefix: string }

export interface SuggestOptions {
  /** Cap on returned suggestions (default 12) */
  maxSuggestions?: number
}

// ============================================================================
// 3. AUTOCOMPLETE STATE
// ============================================================================

/** Popup state, owned by the host and moved along by the functions in state.ts. */
export interface AutocompleteState {
  active: boolean
  suggestions: Suggestion[]
  selectedIndex: number
  /** Start of the text an accepted suggestion replaces */
  triggerFrom: number
  /** End of that text: the end of the word under the cursor, so the rest of a word is replaced too */
  triggerTo: number
}

export interface AutocompleteOptions extends SuggestOptions {
  /** Shortest word that opens the popup (default 2) */
  minTriggerLength?: number
  /** Keep the popup closed inside strings, quoted identifiers and comments (default true) */
  suppressInStrings?: boolean
}

export interface EditorSnapshot {
  text: string
  cursor: number
  /** Whether the buffer changed since the last update */
  docChanged: boolean
}

export interface AcceptResult {
  text: string
  cursor: number
  state: AutocompleteState
}
