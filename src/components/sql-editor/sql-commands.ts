import { EditorSelection, type StateCommand } from '@codemirror/state'
import { keymap } from '@codemirror/view'
import {
  duplicateLines,
  formatSql,
  getSqlToExecute,
  indentLines,
  outdentLines,
  toggleLineComment,
  wordLeft,
  wordRight,
  type BlockEditResult,
  type ExecuteMode,
  type TextSelection,
} from '@/lib/sql'

export type ExecuteHandler = (sql: string, mode: ExecuteMode) => void

export interface SqlEditorKeymapOptions {
  onExecute: ExecuteHandler
}

type BlockEdit = (text: string, selection: TextSelection) => BlockEditResult

function blockEditCommand(edit: BlockEdit, userEvent: string): StateCommand {
  return ({ state, dispatch }) => {
    const { anchor, head } = state.selection.main
    const result = edit(state.doc.toString(), { anchor, head })
    if (!result.changed) return false

    dispatch(
      state.update({
        changes: result.changes,
        selection: EditorSelection.single(result.selection.anchor, result.selection.head),
        scrollIntoView: true,
        userEvent,
      })
    )
    return true
  }
}

export const indentSqlLines = blockEditCommand(indentLines, 'input.indent')
export const outdentSqlLines = blockEditCommand(outdentLines, 'delete.dedent')
export const toggleSqlComment = blockEditCommand(toggleLineComment, 'input.comment')
export const duplicateSqlLines = blockEditCommand(duplicateLines, 'input.copyline')

function wordMoveCommand(move: (text: string, offset: number) => number, extend: boolean): StateCommand {
  return ({ state, dispatch }) => {
    const { anchor, head } = state.selection.main
    const target = move(state.doc.toString(), head)
    dispatch(
      state.update({
        selection: extend ? EditorSelection.single(anchor, target) : EditorSelection.cursor(target),
        scrollIntoView: true,
        userEvent: 'select',
      })
    )
    return true
  }
}

export const cursorSqlWordLeft = wordMoveCommand(wordLeft, false)
export const cursorSqlWordRight = wordMoveCommand(wordRight, false)
export const selectSqlWordLeft = wordMoveCommand(wordLeft, true)
export const selectSqlWordRight = wordMoveCommand(wordRight, true)

/** Replace the document with its formatted text. Not handled for a blank buffer or when nothing changes. */
export const formatSqlCommand: StateCommand = ({ state, dispatch }) => {
  const text = state.doc.toString()
  if (!text.trim()) return false
  const formatted = formatSql(text)
  if (formatted === text) return false

  dispatch(
    state.update({
      changes: { from: 0, to: state.doc.length, insert: formatted },
      selection: EditorSelection.cursor(Math.min(state.selection.main.head, formatted.length)),
      scrollIntoView: true,
      userEvent: 'input.format',
    })
  )
  return true
}

/** Hand the SQL to run to `onExecute`: the selection, else the statement at the cursor, or the whole buffer. */
export function executeSqlCommand(onExecute: ExecuteHandler, mode: ExecuteMode): StateCommand {
  return ({ state }) => {
    const { anchor, head } = state.selection.main
    const sql = getSqlToExecute(state.doc.toString(), { anchor, head }, mode)
    if (sql === null) return false
    onExecute(sql, mode)
    return true
  }
}

export function sqlEditorKeymap({ onExecute }: SqlEditorKeymapOptions) {
  return keymap.of([
    { key: 'Mod-Enter', run: executeSqlCommand(onExecute, 'statement') },
    { key: 'Shift-Mod-Enter', run: executeSqlCommand(onExecute, 'all') },
    { key: 'Tab', run: indentSqlLines },
    { key: 'Shift-Tab', run: outdentSqlLines },
    { key: 'Mod-/', run: toggleSqlComment },
    { key: 'Mod-d', run: duplicateSqlLines },
    { key: 'Shift-Alt-f', run: formatSqlCommand },
    { key: 'Mod-ArrowLeft', run: cursorSqlWordLeft, shift: selectSqlWordLeft },
    { key: 'Mod-ArrowRight', run: cursorSqlWordRight, shift: selectSqlWordRight },
  ])
}
