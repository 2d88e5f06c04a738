import { clampOffset, normalizeSelection, type TextSelection } from './positions'
import { scan } from './scanner'

export interface StatementRange {
  from: number
  to: number
}

export interface EditorInfo {
  statementRanges: StatementRange[]
}

/** 'all' runs the whole buffer; 'statement' runs the selection or the statement at the cursor. */
export type ExecuteMode = 'all' | 'statement'

const WHITESPACE = /\s/

function trimRange(sql: string, from: number, to: number): StatementRange | null {
  let start = from
  let end = to
  while (start < end && WHITESPACE.test(sql[start])) start++
  while (end > start && WHITESPACE.test(sql[end - 1])) end--
  return start < end ? { from: start, to: end } : null
}

/**
 * Split the buffer into top-level statements at `;` outside strings,
 * quoted identifiers and comments.
 *
 * Each range includes its terminating `;` and is trimmed of surrounding
 * whitespace. Text after the last `;` becomes a final statement when it is
 * not blank. A `;` with only whitespace before it (the second one in `;;`)
 * produces nothing.
 */
export function splitStatements(sql: string): StatementRange[] {
  const ranges: StatementRange[] = []
  let start = 0

  scan(sql, {
    boundary: (offset) => {
      if (trimRange(sql, start, offset)) {
        const range = trimRange(sql, start, offset + 1)
        if (range) ranges.push(range)
      }
      start = offset + 1
    },
  })

  const tail = trimRange(sql, start, sql.length)
  if (tail) ranges.push(tail)

  return ranges
}

/**
 * The statement containing the cursor (both ends inclusive). Falls back to
 * the trimmed whole buffer when no statement contains it, and to null when
 * the buffer is blank.
 */
export function findStatementAt(sql: string, cursor: number): StatementRange | null {
  const pos = clampOffset(sql, cursor)
  const statement = splitStatements(sql).find((r) => pos >= r.from && pos <= r.to)
  return statement ?? trimRange(sql, 0, sql.length)
}

/**
 * Resolve what to send to the database.
 *
 * "Run all" takes the trimmed buffer. "Run statement" takes a non-empty
 * selection verbatim, otherwise the statement at the cursor.
 */
export function getSqlToExecute(
  sql: string,
  selection: TextSelection,
  mode: ExecuteMode = 'statement'
): string | null {
  if (mode === 'all') {
    const whole = trimRange(sql, 0, sql.length)
    return whole ? sql.slice(whole.from, whole.to) : null
  }

  const { from, to } = normalizeSelection(sql, selection)
  if (from < to) {
    return sql.slice(from, to)
  }

  const statement = findStatementAt(sql, selection.head)
  return statement ? sql.slice(statement.from, statement.to) : null
}

export function getEditorInfo(sql: string): EditorInfo {
  if (!sql.trim()) {
    return { statementRanges: [] }
  }
  return { statementRanges: splitStatements(sql) }
}
