import type { SchemaCatalog, SchemaColumn, SchemaTable } from './sql/autocomplete'
import { EMPTY_CATALOG } from './sql/autocomplete'

export interface SchemaStore {
  /** Swap in a freshly loaded catalog for the given connection */
  setCatalog(connectionId: string, catalog: SchemaCatalog): void
  /** Drop the catalog, e.g. on disconnect */
  clear(): void
  getConnectionId(): string | null
  /** The current snapshot; replaced whole on every set, never mutated */
  getCatalog(): SchemaCatalog
  getTableByName(name: string): SchemaTable | null
  getColumns(table: string): SchemaColumn[] | null
  isLoaded(): boolean
}

// Deep copy frozen down to the arrays. Arrays are frozen in place so they keep the SchemaCatalog types
function freezeCatalog(catalog: SchemaCatalog): SchemaCatalog {
  const tables = catalog.tables.map((table) => {
    const columns = table.columns.map((column) => Object.freeze({ ...column }))
    Object.freeze(columns)
    return Object.freeze({ name: table.name, columns })
  })
  Object.freeze(tables)
  return Object.freeze({ tables })
}

const EMPTY_SNAPSHOT = freezeCatalog(EMPTY_CATALOG)

/**
 * Holds the catalog the suggestion engine reads. Each editor gets its own
 * store; readers always see one complete snapshot.
 */
export function createSchemaStore(): SchemaStore {
  let connectionId: string | null = null
  let catalog: SchemaCatalog = EMPTY_SNAPSHOT
  let loaded = false

  return {
    setCatalog(id, next) {
      connectionId = id
      catalog = freezeCatalog(next)
      loaded = true
    },

    clear() {
      connectionId = null
      catalog = EMPTY_SNAPSHOT
      loaded = false
    },

    getConnectionId() {
      return connectionId
    },

    getCatalog() {
      return catalog
    },

    getTableByName(name) {
      const lower = name.toLowerCase()
      return catalog.tables.find((t) => t.name.toLowerCase() === lower) ?? null
    },

    getColumns(table) {
      return this.getTableByName(table)?.columns ?? null
    },

    isLoaded() {
      return loaded
    },
  }
}
