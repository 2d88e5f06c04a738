/**
 * Block editing ops: indent, outdent, toggle line comment, duplicate lines.
 *
 * Every op covers whole lines: from the start of the line holding the
 * selection's first end to the end of the line holding its last end,
 * including that line's newline. Ops are pure; they hand back the new text,
 * the mapped selection and the individual changes for hosts that apply
 * edits through their own transaction system.
 */

import { normalizeSelection, type TextRange, type TextSelection } from './positions'

export interface TextChange {
  from: number
  to: number
  insert: string
}

export interface BlockEditResult {
  changed: boolean
  text: string
  selection: TextSelection
  /** Changes against the original text, sorted and non-overlapping */
  changes: TextChange[]
}

interface Line {
  from: number
  /** End of the line content, before the newline */
  to: number
  content: string
}

const INDENT_UNIT = '  '
const COMMENT_MARKER = '--'
const LEADING_WHITESPACE = /^\s*/

function lineStartAt(text: string, pos: number): number {
  return pos === 0 ? 0 : text.lastIndexOf('\n', pos - 1) + 1
}

function lineEndAt(text: string, pos: number): number {
  const newline = text.indexOf('\n', pos)
  return newline === -1 ? text.length : newline
}

/** The line-aligned span a block op works on, newline of the last line included. */
export function getLineSpan(text: string, selection: TextSelection): TextRange {
  const { from, to } = normalizeSelection(text, selection)
  const end = lineEndAt(text, to)
  return {
    from: lineStartAt(text, from),
    to: end < text.length ? end + 1 : end,
  }
}

function linesIn(text: string, span: TextRange): Line[] {
  const lines: Line[] = []
  let pos = span.from
  do {
    const end = lineEndAt(text, pos)
    lines.push({ from: pos, to: end, content: text.slice(pos, end) })
    pos = end + 1
  } while (pos < span.to && pos <= text.length)
  return lines
}

function isEmptyLine(line: Line): boolean {
  return line.content === '' || line.content === '\r'
}

function isBlankLine(line: Line): boolean {
  return line.content.trim() === ''
}

function leadingWhitespace(line: Line): number {
  return LEADING_WHITESPACE.exec(line.content)?.[0].length ?? 0
}

export function applyChanges(text: string, changes: TextChange[]): string {
  let result = ''
  let pos = 0
  for (const change of changes) {
    result += text.slice(pos, change.from) + change.insert
    pos = change.to
  }
  return result + text.slice(pos)
}

/**
 * Map an offset through the changes. Text inserted exactly at the offset
 * pushes it forward; an offset inside a removed range lands where the
 * range was.
 */
export function mapOffset(pos: number, changes: TextChange[]): number {
  let delta = 0
  for (const change of changes) {
    if (change.from > pos) break
    if (change.to <= pos) {
      delta += change.insert.length - (change.to - change.from)
    } else {
      return change.from + delta + change.insert.length
    }
  }
  return pos + delta
}

function finish(text: string, selection: TextSelection, changes: TextChange[]): BlockEditResult {
  if (changes.length === 0) {
    return { changed: false, text, selection, changes }
  }
  return {
    changed: true,
    text: applyChanges(text, changes),
    selection: {
      anchor: mapOffset(selection.anchor, changes),
      head: mapOffset(selection.head, changes),
    },
    changes,
  }
}

/** Prefix every non-empty line with two spaces. */
export function indentLines(text: string, selection: TextSelection): BlockEditResult {
  const changes: TextChange[] = []
  for (const line of linesIn(text, getLineSpan(text, selection))) {
    if (isEmptyLine(line)) continue
    changes.push({ from: line.from, to: line.from, insert: INDENT_UNIT })
  }
  return finish(text, selection, changes)
}

/** Remove two leading spaces, else one tab, else one space, from each line. */
export function outdentLines(text: string, selection: TextSelection): BlockEditResult {
  const changes: TextChange[] = []
  for (const line of linesIn(text, getLineSpan(text, selection))) {
    let width = 0
    if (line.content.startsWith(INDENT_UNIT)) {
      width = INDENT_UNIT.length
    } else if (line.content.startsWith('\t') || line.content.startsWith(' ')) {
      width = 1
    }
    if (width > 0) {
      changes.push({ from: line.from, to: line.from + width, insert: '' })
    }
  }
  return finish(text, selection, changes)
}

/**
 * Comment or uncomment the lines as a block. When every non-blank line
 * already starts with `--` after its indentation, one `--` (and a single
 * space after it) comes off each; otherwise `-- ` goes in after each
 * non-blank line's indentation. Blank lines are neither counted nor touched.
 */
export function toggleLineComment(text: string, selection: TextSelection): BlockEditResult {
  const lines = linesIn(text, getLineSpan(text, selection)).filter((line) => !isBlankLine(line))
  if (lines.length === 0) {
    return finish(text, selection, [])
  }

  const allCommented = lines.every((line) =>
    line.content.startsWith(COMMENT_MARKER, leadingWhitespace(line))
  )

  const changes = lines.map((line): TextChange => {
    const indent = leadingWhitespace(line)
    const at = line.from + indent
    if (!allCommented) {
      return { from: at, to: at, insert: `${COMMENT_MARKER} ` }
    }
    const width = line.content.startsWith(`${COMMENT_MARKER} `, indent)
      ? COMMENT_MARKER.length + 1
      : COMMENT_MARKER.length
    return { from: at, to: at + width, insert: '' }
  })

  return finish(text, selection, changes)
}

/** Copy the covered lines below themselves and move the selection onto the copy. */
export function duplicateLines(text: string, selection: TextSelection): BlockEditResult {
  const span = getLineSpan(text, selection)
  const block = text.slice(span.from, span.to)
  const endsWithNewline = block.endsWith('\n')
  const insert = endsWithNewline ? block : `\n${block}`
  const at = endsWithNewline ? span.to : text.length

  return {
    changed: true,
    text: applyChanges(text, [{ from: at, to: at, insert }]),
    selection: {
      anchor: selection.anchor + insert.length,
      head: selection.head + insert.length,
    },
    changes: [{ from: at, to: at, insert }],
  }
}
