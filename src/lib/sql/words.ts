import { codePointAt, isWhitespace, isWordChar } from './chars'
import { clampOffset, nextCharOffset, prevCharOffset } from './positions'

export interface TriggerWord {
  from: number
  /** Always the cursor offset */
  to: number
  /** End of the run, at or after the cursor; the range a completion replaces */
  end: number
  /** The part of the run before the cursor */
  text: string
}

const MIN_TRIGGER_LENGTH = 2

// `,` `(` `)` `;`
const DELIMITER_CODES = new Set([44, 40, 41, 59])

function isDelimiter(code: number): boolean {
  return DELIMITER_CODES.has(code) || isWhitespace(code)
}

/**
 * The token being typed: the run of non-delimiter characters around the
 * cursor. Only the part before the cursor is matched on; `end` marks where
 * the run stops so the rest of the word is replaced on acceptance. Dots are
 * part of the run, so `users.na` comes back whole.
 */
export function getTriggerWord(text: string, cursor: number): TriggerWord {
  const to = clampOffset(text, cursor)
  let from = to
  while (from > 0) {
    const prev = prevCharOffset(text, from)
    if (isDelimiter(codePointAt(text, prev))) break
    from = prev
  }
  let end = to
  while (end < text.length && !isDelimiter(codePointAt(text, end))) {
    end = nextCharOffset(text, end)
  }
  return { from, to, end, text: text.slice(from, to) }
}

/** Autocomplete only opens for runs of at least `minLength` characters. */
export function isTriggerEligible(word: TriggerWord, minLength: number = MIN_TRIGGER_LENGTH): boolean {
  return Array.from(word.text).length >= minLength
}

/**
 * Word-wise move right: skip the rest of the current word, then the
 * non-word run after it. Lands on the next word start or the buffer end.
 */
export function wordRight(text: string, offset: number): number {
  let pos = clampOffset(text, offset)
  while (pos < text.length && isWordChar(codePointAt(text, pos))) {
    pos = nextCharOffset(text, pos)
  }
  while (pos < text.length && !isWordChar(codePointAt(text, pos))) {
    pos = nextCharOffset(text, pos)
  }
  return pos
}

/**
 * Word-wise move left: step back one character, skip the non-word run,
 * then the word before it. Lands on that word's start or 0.
 */
export function wordLeft(text: string, offset: number): number {
  let pos = clampOffset(text, offset)
  if (pos === 0) return 0

  pos = prevCharOffset(text, pos)
  while (pos > 0 && !isWordChar(codePointAt(text, pos))) {
    pos = prevCharOffset(text, pos)
  }
  while (pos > 0 && isWordChar(codePointAt(text, prevCharOffset(text, pos)))) {
    pos = prevCharOffset(text, pos)
  }
  return pos
}
