import type { SchemaCatalog } from '../../../src/lib/sql/autocomplete/types'

export const catalog: SchemaCatalog = {
  tables: [
    {
      name: 'users',
      columns: [
        { name: 'id', type: 'integer', isPrimaryKey: true },
        { name: 'name', type: 'text', isPrimaryKey: false },
        { name: 'email', type: 'text', isPrimaryKey: false },
      ],
    },
    {
      name: 'orders',
      columns: [
        { name: 'id', type: 'integer', isPrimaryKey: true },
        { name: 'user_id', type: 'integer', isPrimaryKey: false },
        { name: 'total', type: 'numeric', isPrimaryKey: false },
      ],
    },
  ],
}
