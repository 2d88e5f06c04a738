// Character classes shared by the highlighter and word navigation.
// All take a code point, so astral characters classify as one character.

const LETTER = /\p{L}/u
const LETTER_OR_NUMBER = /[\p{L}\p{N}]/u

export function isAsciiDigit(code: number): boolean {
  return code >= 48 && code <= 57
}

/** Letters, digits and `_`. */
export function isWordChar(code: number): boolean {
  if (code < 128) {
    return (
      isAsciiDigit(code) ||
      (code >= 65 && code <= 90) ||
      (code >= 97 && code <= 122) ||
      code === 95
    )
  }
  return LETTER_OR_NUMBER.test(String.fromCodePoint(code))
}

/** Letters and `_`: what an identifier may start with. */
export function isIdentifierStart(code: number): boolean {
  if (code < 128) {
    return (code >= 65 && code <= 90) || (code >= 97 && code <= 122) || code === 95
  }
  return LETTER.test(String.fromCodePoint(code))
}

export function isWhitespace(code: number): boolean {
  return /\s/.test(String.fromCodePoint(code))
}

export function codePointAt(text: string, offset: number): number {
  return text.codePointAt(offset) ?? 0
}
