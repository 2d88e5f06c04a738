import builtinTemplates from './templates.json'

export interface TemplateVariable {
  name: string
  /** Hint shown in the variable's input box */
  placeholder: string
  defaultValue?: string
}

export interface QueryTemplate {
  name: string
  description: string
  sql: string
  variables: TemplateVariable[]
}

const BUILTIN_TEMPLATES: QueryTemplate[] = builtinTemplates

const PLACEHOLDER = /\$\{([^}]+)\}/g

export function getBuiltinTemplates(): QueryTemplate[] {
  return BUILTIN_TEMPLATES.map((template) => ({
    ...template,
    variables: template.variables.map((variable) => ({ ...variable })),
  }))
}

/**
 * Fill in `${name}` placeholders. A supplied value wins, then the
 * variable's default; a placeholder with neither is left as written.
 */
export function applyTemplate(template: QueryTemplate, values: Record<string, string>): string {
  const defaults = new Map<string, string>()
  for (const variable of template.variables) {
    if (variable.defaultValue !== undefined) {
      defaults.set(variable.name, variable.defaultValue)
    }
  }

  return template.sql.replace(PLACEHOLDER, (match, name: string) => {
    if (Object.hasOwn(values, name)) return values[name]
    return defaults.get(name) ?? match
  })
}

/** Placeholder names in the order they first appear. */
export function listTemplateVariables(sql: string): string[] {
  const names: string[] = []
  for (const match of sql.matchAll(PLACEHOLDER)) {
    if (!names.includes(match[1])) names.push(match[1])
  }
  return names
}
