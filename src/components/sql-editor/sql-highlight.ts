import { Decoration, EditorView, type DecorationSet } from '@codemirror/view'
import { RangeSetBuilder, StateField } from '@codemirror/state'
import { highlight, spanClass } from '@/lib/sql'

// Cache decorations by class name
const decorationCache = new Map<string, Decoration>()
function getDecoration(className: string): Decoration {
  let decoration = decorationCache.get(className)
  if (!decoration) {
    decoration = Decoration.mark({ class: className })
    decorationCache.set(className, decoration)
  }
  return decoration
}

export function buildHighlightDecorations(sql: string): DecorationSet {
  const spans = highlight(sql)
  if (spans.length === 0) {
    return Decoration.none
  }

  const builder = new RangeSetBuilder<Decoration>()
  for (const span of spans) {
    // Plain text needs no mark
    if (span.category !== 'plain' && span.from < span.to) {
      builder.add(span.from, span.to, getDecoration(spanClass(span.category)))
    }
  }
  return builder.finish()
}

// Rebuilt on every edit: highlighting is one linear pass over the buffer
export const sqlHighlightField = StateField.define<DecorationSet>({
  create(state) {
    return buildHighlightDecorations(state.doc.toString())
  },
  update(decorations, tr) {
    return tr.docChanged ? buildHighlightDecorations(tr.state.doc.toString()) : decorations
  },
  provide: (field) => EditorView.decorations.from(field),
})

// Colors for the sql-* classes are defined in global CSS
export function sqlHighlight() {
  return sqlHighlightField
}
