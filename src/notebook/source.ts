/**
 * Conversion between the on-disk document and the in-memory notebook.
 */

import type { Cell, Notebook } from './types.js'
import type { CellDocument, NotebookDocument } from './schema.js'

/**
 * Joins a multiline string stored as a list of lines.
 */
export function joinSource(source: string | string[]): string {
  return Array.isArray(source) ? source.join('') : source
}

/**
 * Splits a source string into the .ipynb line-list form.
 * Every line but the last keeps its trailing newline; an empty source is an empty list.
 *
 * @example
 * ```typescript
 * sourceToLines('a\nb') // ['a\n', 'b']
 * ```
 */
export function sourceToLines(source: string): string[] {
  if (source === '') {
    return []
  }
  const lines = source.split('\n')
  return lines
    .map((line, i) => (i < lines.length - 1 ? `${line}\n` : line))
    .filter((line) => line !== '')
}

export function toNotebook(document: NotebookDocument): Notebook {
  return {
    nbformat: document.nbformat,
    nbformat_minor: document.nbformat_minor,
    metadata: document.metadata,
    cells: document.cells.map(toCell),
  }
}

export function toDocument(notebook: Notebook): NotebookDocument {
  return {
    nbformat: 4,
    nbformat_minor: notebook.nbformat_minor,
    metadata: notebook.metadata,
    cells: notebook.cells.map(toCellDocument),
  }
}

function toCell(cell: CellDocument): Cell {
  return { ...cell, source: joinSource(cell.source) }
}

function toCellDocument(cell: Cell): CellDocument {
  return { ...cell, source: sourceToLines(cell.source) }
}
