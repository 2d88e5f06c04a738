// tests/sql-autocomplete/pipeline/state.test.ts

import { describe, it, expect } from 'vitest'
import {
  updateAutocomplete,
  moveSelection,
  acceptSuggestion,
  dismissAutocomplete,
} from '../../../src/lib/sql/autocomplete/state'
import type { AutocompleteOptions, AutocompleteState } from '../../../src/lib/sql/autocomplete/types'
import { catalog } from './fixtures'

function typed(text: string, options: AutocompleteOptions = {}): AutocompleteState {
  return updateAutocomplete(
    dismissAutocomplete(),
    { text, cursor: text.length, docChanged: true },
    catalog,
    options
  )
}

describe('updateAutocomplete', () => {
  it('opens on an eligible word', () => {
    const state = typed('SELECT us')
    expect(state.active).toBe(true)
    expect(state.selectedIndex).toBe(0)
    expect(state.triggerFrom).toBe(7)
    expect(state.triggerTo).toBe(9)
    expect(state.suggestions.map((s) => s.displayText)).toEqual([
      'users',
      'user_id (orders)',
      'USE',
      'USING',
      'USER()',
    ])
  })

  it('starts the trigger range after the dot for qualified words', () => {
    const state = typed('SELECT users.n')
    expect(state.active).toBe(true)
    expect(state.triggerFrom).toBe(13)
    expect(state.triggerTo).toBe(14)
  })

  it('stays closed for short words', () => {
    expect(typed('SELECT u').active).toBe(false)
    expect(typed('SELECT u', { minTriggerLength: 1 }).active).toBe(true)
  })

  it('stays closed inside comments unless configured otherwise', () => {
    expect(typed('-- us').active).toBe(false)
    expect(typed('-- us', { suppressInStrings: false }).active).toBe(true)
  })

  it('stays closed inside strings', () => {
    expect(typed("SELECT 'us").active).toBe(false)
  })

  it('closes when nothing matches', () => {
    expect(typed('SELECT zzz')).toEqual(dismissAutocomplete())
  })

  it('caps suggestions', () => {
    expect(typed('SELECT us', { maxSuggestions: 2 }).suggestions).toHaveLength(2)
  })

  it('keeps the popup while the cursor stays in the trigger range', () => {
    const state = typed('SELECT us')
    const next = updateAutocomplete(state, { text: 'SELECT us', cursor: 8, docChanged: false }, catalog)
    expect(next).toBe(state)
  })

  it('closes when the cursor leaves the trigger range', () => {
    const state = typed('SELECT us')
    const next = updateAutocomplete(state, { text: 'SELECT us', cursor: 3, docChanged: false }, catalog)
    expect(next.active).toBe(false)
  })
})

describe('moveSelection', () => {
  it('clamps within the list', () => {
    const state = typed('SELECT us')
    expect(moveSelection(state, 1).selectedIndex).toBe(1)
    expect(moveSelection(state, 10).selectedIndex).toBe(4)
    expect(moveSelection(moveSelection(state, 2), -10).selectedIndex).toBe(0)
  })

  it('ignores an inactive state', () => {
    const state = dismissAutocomplete()
    expect(moveSelection(state, 1)).toBe(state)
  })
})

describe('acceptSuggestion', () => {
  it('replaces the trigger range with the selected suggestion', () => {
    const result = acceptSuggestion('SELECT us', typed('SELECT us'))
    expect(result).toEqual({ text: 'SELECT users', cursor: 12, state: dismissAutocomplete() })
  })

  it('accepts a suggestion by index', () => {
    const result = acceptSuggestion('SELECT us', typed('SELECT us'), 1)
    expect(result?.text).toBe('SELECT user_id')
    expect(result?.cursor).toBe(14)
  })

  it('keeps the table qualifier', () => {
    const text = 'SELECT users.n FROM users'
    const state = updateAutocomplete(
      dismissAutocomplete(),
      { text, cursor: 14, docChanged: true },
      catalog
    )
    const result = acceptSuggestion(text, state)
    expect(result?.text).toBe('SELECT users.name FROM users')
    expect(result?.cursor).toBe(17)
  })

  it('replaces the rest of the word when the cursor is inside it', () => {
    const text = 'SELECT * FROM usrs'
    const state = updateAutocomplete(
      dismissAutocomplete(),
      { text, cursor: 16, docChanged: true },
      catalog
    )
    expect(state.triggerFrom).toBe(14)
    expect(state.triggerTo).toBe(18)
    expect(state.suggestions[0].displayText).toBe('users')

    const result = acceptSuggestion(text, state)
    expect(result?.text).toBe('SELECT * FROM users')
    expect(result?.cursor).toBe(19)
  })

  it('keeps the qualifier and replaces the whole column name mid-word', () => {
    const text = 'SELECT users.nme FROM users'
    const state = updateAutocomplete(
      dismissAutocomplete(),
      { text, cursor: 14, docChanged: true },
      catalog
    )
    expect(state.triggerFrom).toBe(13)
    expect(state.triggerTo).toBe(16)
    expect(acceptSuggestion(text, state)?.text).toBe('SELECT users.name FROM users')
  })

  it('returns null when inactive', () => {
    expect(acceptSuggestion('SELECT us', dismissAutocomplete())).toBeNull()
  })

  it('returns null for an index past the list', () => {
    expect(acceptSuggestion('SELECT us', typed('SELECT us'), 99)).toBeNull()
  })
})
