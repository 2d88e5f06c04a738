import { classifyName } from './completions'
import { codePointAt, isAsciiDigit, isIdentifierStart, isWordChar } from './chars'
import { nextCharOffset } from './positions'
import { readRegion, type RegionKind } from './scanner'

export type SpanCategory =
  | 'keyword'
  | 'type'
  | 'function'
  | 'string'
  | 'quoted-identifier'
  | 'number'
  | 'comment'
  | 'plain'

export interface HighlightSpan {
  from: number
  to: number
  category: SpanCategory
}

const CHAR_DOT = 46

const REGION_CATEGORY: Record<RegionKind, SpanCategory> = {
  'line-comment': 'comment',
  'block-comment': 'comment',
  'single-quote-string': 'string',
  'double-quote-identifier': 'quoted-identifier',
  'backtick-identifier': 'quoted-identifier',
}

/** CSS class the editor bindings attach to a span of this category. */
export function spanClass(category: SpanCategory): string {
  return `sql-${category}`
}

function readNumber(text: string, from: number): number {
  let end = from
  while (end < text.length) {
    const code = text.charCodeAt(end)
    if (!isAsciiDigit(code) && code !== CHAR_DOT) break
    end++
  }
  return end
}

function readWord(text: string, from: number): number {
  let end = from
  while (end < text.length && isWordChar(codePointAt(text, end))) {
    end = nextCharOffset(text, end)
  }
  return end
}

/**
 * Classify the whole buffer into highlight spans.
 *
 * Spans come out in order, never overlap, and cover `[0, sql.length)`
 * exactly: whitespace and punctuation become one-character `plain` spans.
 */
export function highlight(sql: string): HighlightSpan[] {
  const spans: HighlightSpan[] = []
  let pos = 0

  while (pos < sql.length) {
    const region = readRegion(sql, pos)
    if (region) {
      spans.push({ from: region.from, to: region.to, category: REGION_CATEGORY[region.kind] })
      pos = region.to
      continue
    }

    const code = codePointAt(sql, pos)

    if (isAsciiDigit(code)) {
      const end = readNumber(sql, pos)
      spans.push({ from: pos, to: end, category: 'number' })
      pos = end
      continue
    }

    if (isIdentifierStart(code)) {
      const end = readWord(sql, pos)
      spans.push({ from: pos, to: end, category: classifyName(sql.slice(pos, end)) ?? 'plain' })
      pos = end
      continue
    }

    const end = nextCharOffset(sql, pos)
    spans.push({ from: pos, to: end, category: 'plain' })
    pos = end
  }

  return spans
}
