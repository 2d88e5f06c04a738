import { describe, it, expect, vi } from 'vitest'
import { EditorSelection, EditorState, type StateCommand, type Transaction } from '@codemirror/state'
import {
  cursorSqlWordLeft,
  cursorSqlWordRight,
  duplicateSqlLines,
  executeSqlCommand,
  formatSqlCommand,
  indentSqlLines,
  outdentSqlLines,
  selectSqlWordRight,
  sqlEditorKeymap,
  toggleSqlComment,
} from '@/components/sql-editor/sql-commands'

function run(command: StateCommand, doc: string, anchor: number, head: number = anchor) {
  let state = EditorState.create({ doc, selection: EditorSelection.single(anchor, head) })
  const handled = command({
    state,
    dispatch: (tr: Transaction) => {
      state = tr.state
    },
  })
  const { main } = state.selection
  return { handled, doc: state.doc.toString(), anchor: main.anchor, head: main.head }
}

describe('block edit commands', () => {
  it('indents and moves the cursor with the text', () => {
    expect(run(indentSqlLines, 'SELECT 1', 0)).toEqual({
      handled: true,
      doc: '  SELECT 1',
      anchor: 2,
      head: 2,
    })
  })

  it('outdents', () => {
    expect(run(outdentSqlLines, '  SELECT 1', 4).doc).toBe('SELECT 1')
  })

  it('is not handled when nothing changes', () => {
    expect(run(outdentSqlLines, 'SELECT 1', 4)).toEqual({
      handled: false,
      doc: 'SELECT 1',
      anchor: 4,
      head: 4,
    })
  })

  it('toggles comments', () => {
    expect(run(toggleSqlComment, 'SELECT 1\nFROM t', 0, 12).doc).toBe('-- SELECT 1\n-- FROM t')
  })

  it('duplicates lines', () => {
    expect(run(duplicateSqlLines, 'SELECT 1', 3)).toEqual({
      handled: true,
      doc: 'SELECT 1\nSELECT 1',
      anchor: 12,
      head: 12,
    })
  })
})

describe('word movement commands', () => {
  const doc = 'SELECT foo_bar, baz'

  it('moves the cursor by words', () => {
    expect(run(cursorSqlWordRight, doc, 0).head).toBe(7)
    expect(run(cursorSqlWordLeft, doc, 16).head).toBe(7)
  })

  it('extends the selection when selecting', () => {
    const result = run(selectSqlWordRight, doc, 0)
    expect(result.anchor).toBe(0)
    expect(result.head).toBe(7)
  })
})

describe('formatSqlCommand', () => {
  it('replaces the document with the formatted text', () => {
    expect(run(formatSqlCommand, 'select a from t', 15)).toEqual({
      handled: true,
      doc: 'SELECT\n  a\nFROM\n  t',
      anchor: 15,
      head: 15,
    })
  })

  it('clamps the cursor to the formatted length', () => {
    const result = run(formatSqlCommand, 'select   a   from   t    ', 25)
    expect(result.doc).toBe('SELECT\n  a\nFROM\n  t')
    expect(result.head).toBe(19)
  })

  it('is not handled when the text is already formatted', () => {
    expect(run(formatSqlCommand, 'SELECT\n  a\nFROM\n  t', 0).handled).toBe(false)
  })

  it('is not handled for a blank buffer', () => {
    expect(run(formatSqlCommand, '   ', 1)).toEqual({ handled: false, doc: '   ', anchor: 1, head: 1 })
  })
})

describe('executeSqlCommand', () => {
  const doc = 'SELECT 1;\nSELECT 2;'

  it('runs the statement at the cursor', () => {
    const onExecute = vi.fn()
    expect(run(executeSqlCommand(onExecute, 'statement'), doc, 12).handled).toBe(true)
    expect(onExecute).toHaveBeenCalledWith('SELECT 2;', 'statement')
  })

  it('runs the whole buffer', () => {
    const onExecute = vi.fn()
    run(executeSqlCommand(onExecute, 'all'), doc, 12)
    expect(onExecute).toHaveBeenCalledWith('SELECT 1;\nSELECT 2;', 'all')
  })

  it('is not handled for an empty buffer', () => {
    const onExecute = vi.fn()
    expect(run(executeSqlCommand(onExecute, 'statement'), '', 0).handled).toBe(false)
    expect(onExecute).not.toHaveBeenCalled()
  })
})

describe('sqlEditorKeymap', () => {
  it('builds an extension a state accepts', () => {
    const state = EditorState.create({ doc: 'SELECT 1', extensions: [sqlEditorKeymap({ onExecute: vi.fn() })] })
    expect(state.doc.toString()).toBe('SELECT 1')
  })
})
