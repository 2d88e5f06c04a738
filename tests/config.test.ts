import { describe, it, expect, vi, afterEach } from 'vitest'
import fs from 'fs'
import os from 'os'
import path from 'path'
import { getTemplates, loadEditorConfig, parseEditorConfig, toAutocompleteOptions } from '@/lib/config'
import { dismissAutocomplete, updateAutocomplete, type SchemaCatalog } from '@/lib/sql/autocomplete'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('parseEditorConfig', () => {
  it('applies defaults to an empty file', () => {
    expect(parseEditorConfig('')).toEqual({
      autocomplete: { max_suggestions: 12, min_trigger_length: 2, suppress_in_strings: true },
      templates: [],
    })
  })

  it('reads autocomplete settings and templates', () => {
    const config = parseEditorConfig(`
[autocomplete]
max_suggestions = 20
min_trigger_length = 1
suppress_in_strings = false

[[templates]]
name = "Recent rows"
description = "Latest rows by a timestamp"
sql = "SELECT * FROM \${table} ORDER BY \${column} DESC LIMIT \${limit};"
variables = [
  { name = "table", placeholder = "table_name" },
  { name = "limit", default_value = "10" },
]
`)
    expect(config.autocomplete).toEqual({
      max_suggestions: 20,
      min_trigger_length: 1,
      suppress_in_strings: false,
    })
    expect(config.templates).toEqual([
      {
        name: 'Recent rows',
        description: 'Latest rows by a timestamp',
        sql: 'SELECT * FROM ${table} ORDER BY ${column} DESC LIMIT ${limit};',
        variables: [
          { name: 'table', placeholder: 'table_name' },
          { name: 'limit', placeholder: 'limit', defaultValue: '10' },
        ],
      },
    ])
  })

  it('rejects a non-integer max_suggestions', () => {
    expect(() => parseEditorConfig('[autocomplete]\nmax_suggestions = "a"')).toThrow(
      'autocomplete.max_suggestions must be a positive integer'
    )
  })

  it('rejects a zero min_trigger_length', () => {
    expect(() => parseEditorConfig('[autocomplete]\nmin_trigger_length = 0')).toThrow(
      'autocomplete.min_trigger_length must be a positive integer'
    )
  })

  it('rejects a non-boolean suppress_in_strings', () => {
    expect(() => parseEditorConfig('[autocomplete]\nsuppress_in_strings = 1')).toThrow(
      'autocomplete.suppress_in_strings must be a boolean'
    )
  })

  it('rejects duplicate template names', () => {
    const toml = `
[[templates]]
name = "Same"
sql = "SELECT 1"

[[templates]]
name = "Same"
sql = "SELECT 2"
`
    expect(() => parseEditorConfig(toml)).toThrow('Duplicate template name: Same')
  })

  it('rejects a template without sql', () => {
    expect(() => parseEditorConfig('[[templates]]\nname = "Empty"')).toThrow(
      'Template Empty missing required field: sql (must be non-empty string)'
    )
  })

  it('warns about unknown keys and ignores them', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const config = parseEditorConfig('[autocomplete]\ncolour = "blue"\n\n[theme]\nname = "dark"')
    expect(warn).toHaveBeenCalledWith('Ignoring unknown config key: theme')
    expect(warn).toHaveBeenCalledWith('Ignoring unknown config key: autocomplete.colour')
    expect(config.autocomplete.max_suggestions).toBe(12)
  })
})

describe('loadEditorConfig', () => {
  it('throws for a missing file', () => {
    const missing = path.join(os.tmpdir(), 'no-such-dir', 'editor.toml')
    expect(() => loadEditorConfig(missing)).toThrow(`Config file not found: ${missing}`)
  })

  it('reads a file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'editor-config-'))
    const file = path.join(dir, 'editor.toml')
    fs.writeFileSync(file, '[autocomplete]\nmax_suggestions = 5\n')
    try {
      expect(loadEditorConfig(file).autocomplete.max_suggestions).toBe(5)
    } finally {
      fs.rmSync(dir, { recursive: true, force: true })
    }
  })
})

describe('getTemplates', () => {
  it('appends configured templates after the built-ins', () => {
    const config = parseEditorConfig('[[templates]]\nname = "Mine"\nsql = "SELECT 1"')
    expect(getTemplates(config).map((t) => t.name)).toEqual([
      'Select All',
      'Insert',
      'Update',
      'Count by Group',
      'Find Duplicates',
      'Mine',
    ])
  })

  it('lets a configured template replace a built-in of the same name', () => {
    const config = parseEditorConfig('[[templates]]\nname = "Insert"\nsql = "INSERT INTO t DEFAULT VALUES"')
    const templates = getTemplates(config)
    expect(templates.map((t) => t.name)).toEqual([
      'Select All',
      'Update',
      'Count by Group',
      'Find Duplicates',
      'Insert',
    ])
    expect(templates[4].sql).toBe('INSERT INTO t DEFAULT VALUES')
  })
})

describe('toAutocompleteOptions', () => {
  const catalog: SchemaCatalog = {
    tables: [{ name: 'users', columns: [{ name: 'id', type: 'integer', isPrimaryKey: true }] }],
  }

  function typed(text: string, content: string) {
    const options = toAutocompleteOptions(parseEditorConfig(content).autocomplete)
    return updateAutocomplete(
      dismissAutocomplete(),
      { text, cursor: text.length, docChanged: true },
      catalog,
      options
    )
  }

  it('maps the section onto engine options', () => {
    expect(toAutocompleteOptions(parseEditorConfig('').autocomplete)).toEqual({
      maxSuggestions: 12,
      minTriggerLength: 2,
      suppressInStrings: true,
    })
  })

  it('opens on a single character once min_trigger_length is 1', () => {
    expect(typed('SELECT u', '').active).toBe(false)
    expect(typed('SELECT u', '[autocomplete]\nmin_trigger_length = 1').active).toBe(true)
  })

  it('caps suggestions at max_suggestions', () => {
    expect(typed('SELECT us', '[autocomplete]\nmax_suggestions = 1').suggestions).toEqual([
      { displayText: 'users', insertText: 'users', kind: 'table' },
    ])
  })

  it('completes inside comments when suppress_in_strings is off', () => {
    expect(typed('-- us', '').active).toBe(false)
    expect(typed('-- us', '[autocomplete]\nsuppress_in_strings = false').active).toBe(true)
  })
})
