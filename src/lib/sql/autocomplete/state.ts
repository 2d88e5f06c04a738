import { isInsideStringOrComment } from '../scanner'
import { getTriggerWord, isTriggerEligible } from '../words'
import { parseTriggerMode } from './candidate-generator'
import { suggest } from './pipeline'
import type {
  AcceptResult,
  AutocompleteOptions,
  AutocompleteState,
  EditorSnapshot,
  SchemaCatalog,
} from './types'

const DEFAULT_MIN_TRIGGER_LENGTH = 2

export function dismissAutocomplete(): AutocompleteState {
  return { active: false, suggestions: [], selectedIndex: 0, triggerFrom: 0, triggerTo: 0 }
}

/**
 * Move the popup along after an editor change.
 *
 * An edit re-reads the word at the cursor and opens (or refreshes) the popup
 * when it has suggestions. A cursor move without an edit keeps the popup only
 * while the cursor stays within the trigger range.
 */
export function updateAutocomplete(
  state: AutocompleteState,
  snapshot: EditorSnapshot,
  catalog: SchemaCatalog,
  options: AutocompleteOptions = {}
): AutocompleteState {
  const { text, cursor, docChanged } = snapshot

  if (!docChanged) {
    if (state.active && (cursor < state.triggerFrom || cursor > state.triggerTo)) {
      return dismissAutocomplete()
    }
    return state
  }

  const word = getTriggerWord(text, cursor)
  if (!isTriggerEligible(word, options.minTriggerLength ?? DEFAULT_MIN_TRIGGER_LENGTH)) {
    return dismissAutocomplete()
  }
  if ((options.suppressInStrings ?? true) && isInsideStringOrComment(text, word.to)) {
    return dismissAutocomplete()
  }

  const suggestions = suggest(word.text, catalog, { maxSuggestions: options.maxSuggestions })
  if (suggestions.length === 0) {
    return dismissAutocomplete()
  }

  // Keep the `table.` qualifier when a column is accepted
  const trigger = parseTriggerMode(word.text)
  const triggerFrom = trigger?.mode === 'dot' ? word.from + word.text.indexOf('.') + 1 : word.from

  return {
    active: true,
    suggestions,
    selectedIndex: 0,
    triggerFrom,
    triggerTo: word.end,
  }
}

/** Move the highlighted suggestion by `delta`, clamped to the list. */
export function moveSelection(state: AutocompleteState, delta: number): AutocompleteState {
  if (!state.active || state.suggestions.length === 0) return state
  const selectedIndex = Math.min(
    Math.max(state.selectedIndex + delta, 0),
    state.suggestions.length - 1
  )
  return { ...state, selectedIndex }
}

/**
 * Replace the trigger range with the chosen suggestion's insert text and put
 * the cursor right after it. Null when the popup is closed or the index is
 * out of range.
 */
export function acceptSuggestion(
  text: string,
  state: AutocompleteState,
  index: number = state.selectedIndex
): AcceptResult | null {
  if (!state.active) return null
  const suggestion = state.suggestions[index]
  if (!suggestion) return null

  const from = Math.min(state.triggerFrom, text.length)
  const to = Math.min(Math.max(state.triggerTo, from), text.length)

  return {
    text: text.slice(0, from) + suggestion.insertText + text.slice(to),
    cursor: from + suggestion.insertText.length,
    state: dismissAutocomplete(),
  }
}
