import dictionary from './sql-dictionary.json'

export type NameCategory = 'keyword' | 'type' | 'function'

// Combined PostgreSQL and MySQL names. The three lists are disjoint; a word
// that could be read two ways lives only in the higher-priority list.
export const SQL_KEYWORDS: readonly string[] = dictionary.keywords
export const SQL_TYPES: readonly string[] = dictionary.types
export const SQL_FUNCTIONS: readonly string[] = dictionary.functions

const KEYWORD_SET = new Set(SQL_KEYWORDS)
const TYPE_SET = new Set(SQL_TYPES)
const FUNCTION_SET = new Set(SQL_FUNCTIONS)

/**
 * Case-insensitive lookup in keywords, then types, then functions.
 * Returns null for anything else (plain identifiers).
 */
export function classifyName(word: string): NameCategory | null {
  const upper = word.toUpperCase()
  if (KEYWORD_SET.has(upper)) return 'keyword'
  if (TYPE_SET.has(upper)) return 'type'
  if (FUNCTION_SET.has(upper)) return 'function'
  return null
}
