/**
 * Position conversions at the editor boundary.
 *
 * Every range produced by this library is a UTF-16 code-unit offset into the
 * buffer (what `String.prototype.slice` and CodeMirror use). Hosts that address
 * text by character count or by UTF-8 byte offset convert through here, never
 * inline. Offsets returned from this module never split a surrogate pair.
 */

export interface TextRange {
  from: number
  to: number
}

/** Anchor stays put while head moves; they are equal for a plain cursor. */
export interface TextSelection {
  anchor: number
  head: number
}

export interface CursorPosition {
  /** 1-based line number */
  line: number
  /** 1-based column, counted in characters */
  column: number
  offset: number
  length: number
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff
}

/**
 * Clamp an offset into the buffer, moving it back to the start of a
 * surrogate pair when it points between the two halves.
 */
export function clampOffset(text: string, offset: number): number {
  if (!Number.isFinite(offset) || offset <= 0) return 0
  let pos = Math.min(Math.floor(offset), text.length)
  if (
    pos > 0 &&
    pos < text.length &&
    isLowSurrogate(text.charCodeAt(pos)) &&
    isHighSurrogate(text.charCodeAt(pos - 1))
  ) {
    pos--
  }
  return pos
}

/** Offset of the character after the one starting at `offset`. */
export function nextCharOffset(text: string, offset: number): number {
  if (offset >= text.length) return text.length
  const code = text.codePointAt(offset) ?? 0
  return offset + (code > 0xffff ? 2 : 1)
}

/** Offset of the character before `offset`. */
export function prevCharOffset(text: string, offset: number): number {
  if (offset <= 0) return 0
  const pos = offset - 1
  if (pos > 0 && isLowSurrogate(text.charCodeAt(pos)) && isHighSurrogate(text.charCodeAt(pos - 1))) {
    return pos - 1
  }
  return pos
}

/** Convert a character (code point) index to an offset. */
export function charIndexToOffset(text: string, charIndex: number): number {
  if (charIndex <= 0) return 0
  let offset = 0
  let chars = 0
  while (offset < text.length && chars < charIndex) {
    offset = nextCharOffset(text, offset)
    chars++
  }
  return offset
}

/** Convert an offset to a character (code point) index. */
export function offsetToCharIndex(text: string, offset: number): number {
  const end = clampOffset(text, offset)
  let chars = 0
  let pos = 0
  while (pos < end) {
    pos = nextCharOffset(text, pos)
    chars++
  }
  return chars
}

function utf8Length(codePoint: number): number {
  if (codePoint < 0x80) return 1
  if (codePoint < 0x800) return 2
  if (codePoint < 0x10000) return 3
  return 4
}

/** Convert an offset to a UTF-8 byte offset. */
export function offsetToByteOffset(text: string, offset: number): number {
  const end = clampOffset(text, offset)
  let bytes = 0
  let pos = 0
  while (pos < end) {
    bytes += utf8Length(text.codePointAt(pos) ?? 0)
    pos = nextCharOffset(text, pos)
  }
  return bytes
}

/**
 * Convert a UTF-8 byte offset to an offset. A byte offset inside a
 * multi-byte sequence resolves to the start of that character.
 */
export function byteOffsetToOffset(text: string, byteOffset: number): number {
  if (byteOffset <= 0) return 0
  let bytes = 0
  let pos = 0
  while (pos < text.length) {
    const width = utf8Length(text.codePointAt(pos) ?? 0)
    if (bytes + width > byteOffset) return pos
    bytes += width
    pos = nextCharOffset(text, pos)
  }
  return text.length
}

/** Convert an offset range to a UTF-8 byte range. */
export function toByteRange(text: string, range: TextRange): TextRange {
  return {
    from: offsetToByteOffset(text, range.from),
    to: offsetToByteOffset(text, range.to),
  }
}

export function cursorSelection(offset: number): TextSelection {
  return { anchor: offset, head: offset }
}

/** Order a selection as `from <= to`, clamped to character boundaries. */
export function normalizeSelection(text: string, selection: TextSelection): TextRange {
  const anchor = clampOffset(text, selection.anchor)
  const head = clampOffset(text, selection.head)
  return anchor <= head ? { from: anchor, to: head } : { from: head, to: anchor }
}

/** Line/column readout for the status bar. */
export function getCursorPosition(text: string, offset: number): CursorPosition {
  const pos = clampOffset(text, offset)
  const lineStart = pos === 0 ? 0 : text.lastIndexOf('\n', pos - 1) + 1
  let line = 1
  for (let i = 0; i < lineStart; i++) {
    if (text.charCodeAt(i) === 10) line++
  }
  return {
    line,
    column: offsetToCharIndex(text.slice(lineStart), pos - lineStart) + 1,
    offset: pos,
    length: text.length,
  }
}
