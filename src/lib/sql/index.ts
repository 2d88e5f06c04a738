// Positions
export type { TextRange, TextSelection, CursorPosition } from './positions'
export {
  clampOffset,
  charIndexToOffset,
  offsetToCharIndex,
  offsetToByteOffset,
  byteOffsetToOffset,
  toByteRange,
  cursorSelection,
  normalizeSelection,
  getCursorPosition,
} from './positions'

// Quote/comment scanner
export type { ScanState, RegionKind, ScanRegion } from './scanner'
export { readRegion, scan, scanStateAt, isStatementBoundary, isInsideStringOrComment } from './scanner'

// Highlighting
export type { SpanCategory, HighlightSpan } from './tokenizer'
export { highlight, spanClass } from './tokenizer'

// Statements
export type { StatementRange, EditorInfo, ExecuteMode } from './editor'
export { splitStatements, findStatementAt, getSqlToExecute, getEditorInfo } from './editor'

// Words
export type { TriggerWord } from './words'
export { getTriggerWord, isTriggerEligible, wordLeft, wordRight } from './words'

// Block editing
export type { TextChange, BlockEditResult } from './block-edit'
export {
  indentLines,
  outdentLines,
  toggleLineComment,
  duplicateLines,
  getLineSpan,
  applyChanges,
  mapOffset,
} from './block-edit'

// Formatting
export { formatSql, SQL_TAB_SIZE } from './format'

// Name tables
export type { NameCategory } from './completions'
export {
  SQL_KEYWORDS,
  SQL_TYPES,
  SQL_FUNCTIONS,
  classifyName,
} from './completions'

// Templates
export type { QueryTemplate, TemplateVariable } from './templates'
export { getBuiltinTemplates, applyTemplate, listTemplateVariables } from './templates'
