export { sqlHighlight, sqlHighlightField, buildHighlightDecorations } from './sql-highlight'
export { sqlAutocomplete, createSqlCompletionSource } from './sql-autocomplete'
export type { SqlAutocompleteOptions } from './sql-autocomplete'
export {
  sqlEditorKeymap,
  executeSqlCommand,
  indentSqlLines,
  outdentSqlLines,
  toggleSqlComment,
  duplicateSqlLines,
  formatSqlCommand,
  cursorSqlWordLeft,
  cursorSqlWordRight,
  selectSqlWordLeft,
  selectSqlWordRight,
} from './sql-commands'
export type { ExecuteHandler, SqlEditorKeymapOptions } from './sql-commands'
