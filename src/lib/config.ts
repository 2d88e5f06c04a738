import { parse } from 'smol-toml'
import { readFileSync, existsSync } from 'fs'
import { getBuiltinTemplates } from './sql/templates'
import type { QueryTemplate, TemplateVariable } from './sql/templates'
import type { AutocompleteOptions } from './sql/autocomplete'

export interface AutocompleteConfig {
  max_suggestions: number
  min_trigger_length: number
  suppress_in_strings: boolean
}

export interface EditorConfig {
  autocomplete: AutocompleteConfig
  templates: QueryTemplate[]
}

const DEFAULT_AUTOCOMPLETE: AutocompleteConfig = {
  max_suggestions: 12,
  min_trigger_length: 2,
  suppress_in_strings: true,
}

const KNOWN_SECTIONS = new Set(['autocomplete', 'templates'])
const KNOWN_AUTOCOMPLETE_KEYS = new Set(Object.keys(DEFAULT_AUTOCOMPLETE))
const KNOWN_TEMPLATE_KEYS = new Set(['name', 'description', 'sql', 'variables'])
const KNOWN_VARIABLE_KEYS = new Set(['name', 'placeholder', 'default_value'])

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
}

function warnUnknownKeys(table: Record<string, unknown>, known: Set<string>, prefix: string) {
  for (const key of Object.keys(table)) {
    if (!known.has(key)) {
      console.warn(`Ignoring unknown config key: ${prefix}${key}`)
    }
  }
}

function parsePositiveInteger(value: unknown, key: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer`)
  }
  return value
}

function parseAutocomplete(raw: unknown): AutocompleteConfig {
  const config = { ...DEFAULT_AUTOCOMPLETE }
  if (raw === undefined) return config
  if (!isTable(raw)) {
    throw new Error('autocomplete must be a table')
  }
  warnUnknownKeys(raw, KNOWN_AUTOCOMPLETE_KEYS, 'autocomplete.')

  if (raw.max_suggestions !== undefined) {
    config.max_suggestions = parsePositiveInteger(raw.max_suggestions, 'autocomplete.max_suggestions')
  }
  if (raw.min_trigger_length !== undefined) {
    config.min_trigger_length = parsePositiveInteger(raw.min_trigger_length, 'autocomplete.min_trigger_length')
  }
  if (raw.suppress_in_strings !== undefined) {
    if (typeof raw.suppress_in_strings !== 'boolean') {
      throw new Error('autocomplete.suppress_in_strings must be a boolean')
    }
    config.suppress_in_strings = raw.suppress_in_strings
  }
  return config
}

function parseVariables(raw: unknown, templateName: string): TemplateVariable[] {
  if (raw === undefined) return []
  if (!Array.isArray(raw)) {
    throw new Error(`Template ${templateName} field variables must be an array`)
  }

  const variables: TemplateVariable[] = []
  for (const entry of raw) {
    if (!isTable(entry)) {
      throw new Error(`Template ${templateName} has an invalid variable: must be a table`)
    }
    warnUnknownKeys(entry, KNOWN_VARIABLE_KEYS, `templates.${templateName}.variables.`)

    if (!entry.name || typeof entry.name !== 'string' || !entry.name.trim()) {
      throw new Error(`Template ${templateName} variable missing required field: name (must be non-empty string)`)
    }
    const name = entry.name.trim()

    if (entry.placeholder !== undefined && typeof entry.placeholder !== 'string') {
      throw new Error(`Template ${templateName} variable ${name} field placeholder must be a string`)
    }
    const variable: TemplateVariable = { name, placeholder: entry.placeholder ?? name }

    if (entry.default_value !== undefined) {
      if (typeof entry.default_value !== 'string') {
        throw new Error(`Template ${templateName} variable ${name} field default_value must be a string`)
      }
      variable.defaultValue = entry.default_value
    }
    variables.push(variable)
  }
  return variables
}

function parseTemplates(raw: unknown): QueryTemplate[] {
  if (raw === undefined) return []
  if (!Array.isArray(raw)) {
    throw new Error('templates must be an array of tables ([[templates]])')
  }

  const templates: QueryTemplate[] = []
  const seenNames = new Set<string>()

  for (const entry of raw) {
    if (!isTable(entry)) {
      throw new Error('templates entries must be tables')
    }
    if (!entry.name || typeof entry.name !== 'string' || !entry.name.trim()) {
      throw new Error('Template missing required field: name (must be non-empty string)')
    }
    const name = entry.name.trim()
    warnUnknownKeys(entry, KNOWN_TEMPLATE_KEYS, `templates.${name}.`)

    if (seenNames.has(name)) {
      throw new Error(`Duplicate template name: ${name}`)
    }
    seenNames.add(name)

    if (!entry.sql || typeof entry.sql !== 'string' || !entry.sql.trim()) {
      throw new Error(`Template ${name} missing required field: sql (must be non-empty string)`)
    }
    if (entry.description !== undefined && typeof entry.description !== 'string') {
      throw new Error(`Template ${name} field description must be a string`)
    }

    templates.push({
      name,
      description: entry.description ?? '',
      sql: entry.sql,
      variables: parseVariables(entry.variables, name),
    })
  }
  return templates
}

/** Validate editor settings from TOML text. Absent keys take their defaults. */
export function parseEditorConfig(content: string): EditorConfig {
  const parsed = parse(content)
  warnUnknownKeys(parsed, KNOWN_SECTIONS, '')

  return {
    autocomplete: parseAutocomplete(parsed.autocomplete),
    templates: parseTemplates(parsed.templates),
  }
}

export function loadEditorConfig(configPath: string): EditorConfig {
  if (!existsSync(configPath)) {
    throw new Error(`Config file not found: ${configPath}`)
  }
  return parseEditorConfig(readFileSync(configPath, 'utf-8'))
}

/** The `[autocomplete]` section as options for `updateAutocomplete` and `sqlAutocomplete`. */
export function toAutocompleteOptions(config: AutocompleteConfig): AutocompleteOptions {
  return {
    maxSuggestions: config.max_suggestions,
    minTriggerLength: config.min_trigger_length,
    suppressInStrings: config.suppress_in_strings,
  }
}

/** Built-in templates, then configured ones. A configured template replaces a built-in of the same name. */
export function getTemplates(config: EditorConfig): QueryTemplate[] {
  const configuredNames = new Set(config.templates.map((t) => t.name))
  return [
    ...getBuiltinTemplates().filter((t) => !configuredNames.has(t.name)),
    ...config.templates,
  ]
}
