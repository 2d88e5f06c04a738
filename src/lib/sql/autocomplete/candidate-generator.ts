import { SQL_FUNCTIONS, SQL_KEYWORDS, SQL_TYPES } from '../completions'
import type { SchemaCatalog, SchemaTable, Suggestion, SuggestionKind, TriggerMode } from './types'

/**
 * Read the typed word. A word with exactly one `.` is `table.column_prefix`;
 * anything else is matched as a plain prefix. Returns null for words that
 * can never match (empty, or a lone `.`).
 */
export function parseTriggerMode(word: string): TriggerMode | null {
  if (!word || word === '.') return null

  const parts = word.split('.')
  if (parts.length === 2) {
    return { mode: 'dot', table: parts[0], prefix: parts[1] }
  }
  return { mode: 'normal', prefix: word }
}

function createSuggestion(displayText: string, insertText: string, kind: SuggestionKind): Suggestion {
  return { displayText, insertText, kind }
}

function generateNameCandidates(
  names: readonly string[],
  prefixUpper: string,
  kind: SuggestionKind
): Suggestion[] {
  return names
    .filter((name) => name.startsWith(prefixUpper))
    .map((name) => {
      const text = kind === 'function' ? `${name}()` : name
      return createSuggestion(text, text, kind)
    })
}

function generateColumnCandidates(table: SchemaTable, prefixLower: string): Suggestion[] {
  return table.columns
    .filter((column) => column.name.toLowerCase().startsWith(prefixLower))
    .map((column) => createSuggestion(`${column.name} (${table.name})`, column.name, 'column'))
}

/**
 * Every candidate whose name starts with the typed prefix, case-insensitively.
 * Unordered; the ranker sorts and caps.
 */
export function generateCandidates(trigger: TriggerMode, catalog: SchemaCatalog): Suggestion[] {
  const prefixLower = trigger.prefix.toLowerCase()

  if (trigger.mode === 'dot') {
    const tableLower = trigger.table.toLowerCase()
    return catalog.tables
      .filter((table) => table.name.toLowerCase() === tableLower)
      .flatMap((table) => generateColumnCandidates(table, prefixLower))
  }

  const prefixUpper = trigger.prefix.toUpperCase()
  return [
    ...generateNameCandidates(SQL_KEYWORDS, prefixUpper, 'keyword'),
    ...generateNameCandidates(SQL_TYPES, prefixUpper, 'type'),
    ...generateNameCandidates(SQL_FUNCTIONS, prefixUpper, 'function'),
    ...catalog.tables
      .filter((table) => table.name.toLowerCase().startsWith(prefixLower))
      .map((table) => createSuggestion(table.name, table.name, 'table')),
    ...catalog.tables.flatMap((table) => generateColumnCandidates(table, prefixLower)),
  ]
}
