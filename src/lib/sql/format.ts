import { formatDialect, postgresql } from 'sql-formatter'

export const SQL_TAB_SIZE = 2

const FORMATTER_CONFIG = {
  dialect: postgresql,
  keywordCase: 'upper' as const,
  functionCase: 'upper' as const,
  dataTypeCase: 'upper' as const,
  tabWidth: SQL_TAB_SIZE,
  useTabs: false,
  linesBetweenQueries: 1,
}

/**
 * Re-lay the buffer out: upper-case keywords, one clause per line, one blank
 * line between statements. Input the formatter cannot tokenise (an open
 * string, say) comes back as it was.
 */
export function formatSql(sql: string): string {
  if (!sql.trim()) {
    return ''
  }

  try {
    return formatDialect(sql, FORMATTER_CONFIG)
  } catch {
    return sql
  }
}
