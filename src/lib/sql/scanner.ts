/**
 * Quote/Comment Scanner
 *
 * The one place that decides what counts as "inside a string, quoted
 * identifier or comment". The highlighter and the statement splitter both
 * walk the buffer through readRegion(), so they always agree.
 *
 * Rules, checked only outside any region, in priority order:
 *   1. `--` or `#`  line comment, up to (not including) `\n`
 *   2. `/*`         block comment, up to and including the next `*\/`
 *   3. `'`          string literal, `''` is an escaped quote
 *   4. `"`          quoted identifier, first `"` closes it
 *   5. `` ` ``      backtick identifier, first `` ` `` closes it
 *   6. `;`          statement boundary
 * Unterminated regions run to the end of the buffer.
 */

import { nextCharOffset } from './positions'

export type ScanState =
  | 'normal'
  | 'single-quote-string'
  | 'double-quote-identifier'
  | 'backtick-identifier'
  | 'line-comment'
  | 'block-comment'

export type RegionKind = Exclude<ScanState, 'normal'>

export interface ScanRegion {
  kind: RegionKind
  from: number
  to: number
  /** False when the region ran into the end of the buffer */
  terminated: boolean
}

const CHAR_HASH = 35
const CHAR_DOUBLE_QUOTE = 34
const CHAR_SINGLE_QUOTE = 39
const CHAR_ASTERISK = 42
const CHAR_DASH = 45
const CHAR_SLASH = 47
const CHAR_SEMICOLON = 59
const CHAR_BACKTICK = 96

function lineComment(text: string, from: number, bodyStart: number): ScanRegion {
  const newline = text.indexOf('\n', bodyStart)
  return newline === -1
    ? { kind: 'line-comment', from, to: text.length, terminated: false }
    : { kind: 'line-comment', from, to: newline, terminated: true }
}

function closedBy(
  kind: RegionKind,
  text: string,
  from: number,
  closer: string,
  searchFrom: number
): ScanRegion {
  const end = text.indexOf(closer, searchFrom)
  return end === -1
    ? { kind, from, to: text.length, terminated: false }
    : { kind, from, to: end + closer.length, terminated: true }
}

function singleQuoted(text: string, from: number): ScanRegion {
  let i = from + 1
  while (i < text.length) {
    if (text.charCodeAt(i) === CHAR_SINGLE_QUOTE) {
      if (text.charCodeAt(i + 1) === CHAR_SINGLE_QUOTE) {
        i += 2
        continue
      }
      return { kind: 'single-quote-string', from, to: i + 1, terminated: true }
    }
    i++
  }
  return { kind: 'single-quote-string', from, to: text.length, terminated: false }
}

/**
 * Read the string, quoted identifier or comment that begins at `offset`.
 * Returns null when `offset` does not open one. Callers must only ask at
 * offsets where the scanner is in its normal state.
 */
export function readRegion(text: string, offset: number): ScanRegion | null {
  const code = text.charCodeAt(offset)
  switch (code) {
    case CHAR_DASH:
      return text.charCodeAt(offset + 1) === CHAR_DASH ? lineComment(text, offset, offset + 2) : null
    case CHAR_HASH:
      return lineComment(text, offset, offset + 1)
    case CHAR_SLASH:
      return text.charCodeAt(offset + 1) === CHAR_ASTERISK
        ? closedBy('block-comment', text, offset, '*/', offset + 2)
        : null
    case CHAR_SINGLE_QUOTE:
      return singleQuoted(text, offset)
    case CHAR_DOUBLE_QUOTE:
      return closedBy('double-quote-identifier', text, offset, '"', offset + 1)
    case CHAR_BACKTICK:
      return closedBy('backtick-identifier', text, offset, '`', offset + 1)
    default:
      return null
  }
}

/** True when the character at `offset` is a `;` (only meaningful in normal state). */
export function isStatementBoundary(text: string, offset: number): boolean {
  return text.charCodeAt(offset) === CHAR_SEMICOLON
}

/**
 * Walk the buffer and report each region and each statement boundary found
 * in normal state, in order. This is the loop both consumers share.
 */
export function scan(
  text: string,
  visit: {
    region?: (region: ScanRegion) => void
    boundary?: (offset: number) => void
  }
): void {
  let pos = 0
  while (pos < text.length) {
    const region = readRegion(text, pos)
    if (region) {
      visit.region?.(region)
      pos = region.to
      continue
    }
    if (isStatementBoundary(text, pos)) {
      visit.boundary?.(pos)
    }
    pos = nextCharOffset(text, pos)
  }
}

/**
 * The scanner state a character typed at `offset` would land in.
 *
 * A cursor right after a closed string or block comment is back in normal
 * state; a cursor at the end of a line comment, or at the end of an
 * unterminated region, is still inside it.
 */
export function scanStateAt(text: string, offset: number): ScanState {
  let pos = 0
  while (pos < offset && pos < text.length) {
    const region = readRegion(text, pos)
    if (region) {
      if (offset < region.to) return region.kind
      if (offset === region.to && (!region.terminated || region.kind === 'line-comment')) {
        return region.kind
      }
      pos = region.to
      continue
    }
    pos = nextCharOffset(text, pos)
  }
  return 'normal'
}

/** True when the cursor sits inside a string, quoted identifier or comment. */
export function isInsideStringOrComment(text: string, offset: number): boolean {
  return scanStateAt(text, offset) !== 'normal'
}
