/**
 * Single-cell queries and mutations on an in-memory notebook.
 */

import { randomUUID } from 'node:crypto'
import { CellIndexError, NotebookValueError } from '../errors.js'
import { resolveIndex, resolveInsertPosition } from './indexing.js'
import { CELL_IDS_MINOR } from './schema.js'
import { CELL_TYPES, isCellType, type Cell, type CellType, type Notebook } from './types.js'

export function getCell(notebook: Notebook, index: number): Cell {
  const cell = notebook.cells[resolveIndex(index, notebook.cells.length)]
  if (cell === undefined) {
    throw new CellIndexError(index, notebook.cells.length)
  }
  return cell
}

/**
 * Checks a caller-supplied cell type.
 *
 * @throws NotebookValueError When the value is not code, markdown or raw
 */
export function parseCellType(value: string): CellType {
  if (!isCellType(value)) {
    throw new NotebookValueError(`Invalid cell type '${value}'. Must be one of: ${CELL_TYPES.join(', ')}`)
  }
  return value
}

/**
 * Builds a new, empty-metadata cell. Code cells start with no outputs and no execution count.
 * Notebooks at format 4.5 or later require cell ids, so one is generated for them.
 */
export function createCell(notebook: Notebook, cellType: string, source: string): Cell {
  const type = parseCellType(cellType)
  const id = notebook.nbformat_minor >= CELL_IDS_MINOR ? { id: generateCellId() } : {}
  switch (type) {
    case 'code':
      return { cell_type: 'code', ...id, metadata: {}, source, outputs: [], execution_count: null }
    case 'markdown':
      return { cell_type: 'markdown', ...id, metadata: {}, source }
    case 'raw':
      return { cell_type: 'raw', ...id, metadata: {}, source }
  }
}

export function generateCellId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16)
}

/**
 * Overwrites a cell's source. Type, metadata, outputs and execution count are untouched.
 */
export function replaceCellSource(notebook: Notebook, index: number, content: string): void {
  getCell(notebook, index).source = content
}

/**
 * Inserts a new cell so it ends up at `index`; cells at or after that position shift by one.
 *
 * @returns Position of the new cell
 */
export function insertCell(notebook: Notebook, index: number, content: string, cellType: string = 'code'): number {
  const cell = createCell(notebook, cellType, content)
  const position = resolveInsertPosition(index, notebook.cells.length)
  notebook.cells.splice(position, 0, cell)
  return position
}

/**
 * Appends a new cell.
 *
 * @returns Index of the new cell
 */
export function appendCell(notebook: Notebook, content: string, cellType: string = 'code'): number {
  return insertCell(notebook, notebook.cells.length, content, cellType)
}

/**
 * Removes a cell; later cells shift down by one.
 *
 * @returns The removed cell
 */
export function deleteCell(notebook: Notebook, index: number): Cell {
  const cell = getCell(notebook, index)
  notebook.cells.splice(resolveIndex(index, notebook.cells.length), 1)
  return cell
}

/**
 * Replaces the single occurrence of `oldStr` in a cell's source with `newStr`.
 *
 * @throws NotebookValueError When `oldStr` is empty, absent, or occurs more than once
 */
export function strReplaceInCell(notebook: Notebook, index: number, oldStr: string, newStr: string): void {
  const cell = getCell(notebook, index)
  if (oldStr === '') {
    throw new NotebookValueError('old_str must not be empty')
  }

  const count = countOccurrences(cell.source, oldStr)
  if (count === 0) {
    throw new NotebookValueError(`String not found in cell ${index}: ${JSON.stringify(oldStr)}`)
  }
  if (count > 1) {
    throw new NotebookValueError(
      `Multiple matches (${count}) found in cell ${index} for ${JSON.stringify(oldStr)}. ` +
        'Include more surrounding text to make the match unique.'
    )
  }

  const start = cell.source.indexOf(oldStr)
  cell.source = cell.source.slice(0, start) + newStr + cell.source.slice(start + oldStr.length)
}

/**
 * Counts non-overlapping occurrences of a non-empty substring.
 */
export function countOccurrences(text: string, search: string): number {
  let count = 0
  let from = text.indexOf(search)
  while (from !== -1) {
    count++
    from = text.indexOf(search, from + search.length)
  }
  return count
}
