/**
 * SQL autocomplete for CodeMirror
 *
 * Backed by the suggestion engine in src/lib/sql/autocomplete:
 * - Opens while typing once the word at the cursor is long enough
 * - Stays closed inside strings, quoted identifiers and comments
 * - After `table.` only that table's columns are offered, and accepting one
 *   replaces just the text after the dot
 * - Ordering comes from the engine, so CodeMirror's own filtering is off
 */

import {
  autocompletion,
  type Completion,
  type CompletionContext,
  type CompletionResult,
  type CompletionSource,
} from '@codemirror/autocomplete'
import {
  dismissAutocomplete,
  updateAutocomplete,
  type AutocompleteOptions,
  type SchemaCatalog,
  type Suggestion,
  type SuggestionKind,
} from '@/lib/sql/autocomplete'

// Map suggestion kinds to CodeMirror completion types (drives the option icon)
const CODEMIRROR_TYPE_MAP: Record<SuggestionKind, string> = {
  table: 'class',
  column: 'property',
  keyword: 'keyword',
  function: 'function',
  type: 'type',
}

export type SqlAutocompleteOptions = AutocompleteOptions

function toCompletion(suggestion: Suggestion): Completion {
  return {
    label: suggestion.displayText,
    apply: suggestion.insertText,
    type: CODEMIRROR_TYPE_MAP[suggestion.kind],
  }
}

export function createSqlCompletionSource(
  getCatalog: () => SchemaCatalog,
  options: SqlAutocompleteOptions = {}
): CompletionSource {
  return (ctx: CompletionContext): CompletionResult | null => {
    const state = updateAutocomplete(
      dismissAutocomplete(),
      { text: ctx.state.doc.toString(), cursor: ctx.pos, docChanged: true },
      getCatalog(),
      options
    )
    if (!state.active) {
      return null
    }

    return {
      from: state.triggerFrom,
      to: state.triggerTo,
      options: state.suggestions.map(toCompletion),
      filter: false,
    }
  }
}

/**
 * Autocomplete extension. Build `options` from the editor config with
 * `toAutocompleteOptions(config.autocomplete)`.
 */
export function sqlAutocomplete(getCatalog: () => SchemaCatalog, options: SqlAutocompleteOptions = {}) {
  return [
    autocompletion({
      override: [createSqlCompletionSource(getCatalog, options)],
      activateOnTyping: true,
      maxRenderedOptions: options.maxSuggestions ?? 12,
    }),
  ]
}
