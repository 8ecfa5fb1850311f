/**
 * Multi-cell operations applied within one load/persist cycle.
 *
 * Every batch validates all of its indices and criteria before mutating anything,
 * except insertCellsBatch whose indices depend on the insertions before them.
 */

import { NotebookValueError } from '../errors.js'
import { createCell, parseCellType } from './cells.js'
import { resolveIndex, resolveInsertPosition } from './indexing.js'
import { cellMatcher } from './search.js'
import type { Notebook } from './types.js'

export type CellReplacement = {
  index: number
  content: string
}

export type CellInsertion = {
  index: number
  content: string
  cellType?: string
}

/**
 * Replaces the source of several cells. All indices refer to the original document and
 * are resolved before any replacement, so one bad index leaves the notebook untouched.
 */
export function replaceCellsBatch(notebook: Notebook, replacements: CellReplacement[]): void {
  const length = notebook.cells.length
  const resolved = replacements.map(({ index, content }) => ({ position: resolveIndex(index, length), content }))

  for (const { position, content } of resolved) {
    const cell = notebook.cells[position]
    if (cell !== undefined) {
      cell.source = content
    }
  }
}

/**
 * Deletes several cells given by their indices in the original document.
 * Deletion runs from the highest position down so earlier removals never shift later targets.
 *
 * @returns Number of cells deleted
 * @throws NotebookValueError When two indices address the same cell
 */
export function deleteCellsBatch(notebook: Notebook, indices: number[]): number {
  const length = notebook.cells.length
  const positions = indices.map((index) => resolveIndex(index, length))

  const seen = new Set<number>()
  positions.forEach((position, i) => {
    if (seen.has(position)) {
      throw new NotebookValueError(`Duplicate cell index ${indices[i]} (cell ${position} is already being deleted)`)
    }
    seen.add(position)
  })

  for (const position of [...positions].sort((a, b) => b - a)) {
    notebook.cells.splice(position, 1)
  }
  return positions.length
}

/**
 * Inserts cells one after another, in the order given. Each index is interpreted against
 * the notebook as it stands after the previous insertions of the same batch, so inserting
 * "A" at 0 and then "B" at 0 into [X] gives [B, A, X].
 *
 * Cell types are checked up front. An out-of-range index part-way through throws after
 * the earlier insertions were applied in memory; callers discard the document in that case.
 *
 * @returns Number of cells inserted
 */
export function insertCellsBatch(notebook: Notebook, insertions: CellInsertion[]): number {
  for (const insertion of insertions) {
    parseCellType(insertion.cellType ?? 'code')
  }

  for (const { index, content, cellType } of insertions) {
    const position = resolveInsertPosition(index, notebook.cells.length)
    notebook.cells.splice(position, 0, createCell(notebook, cellType ?? 'code', content))
  }
  return insertions.length
}

/**
 * Rearranges cells so that position k holds the cell previously at `newOrder[k]`.
 *
 * @throws NotebookValueError When `newOrder` is not a permutation of `0..N-1`;
 *         the message names the first problem found
 */
export function reorderCells(notebook: Notebook, newOrder: number[]): void {
  const length = notebook.cells.length
  const seen = new Set<number>()

  for (const index of newOrder) {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new NotebookValueError(`Invalid new order: index ${index} out of range (valid range: 0 to ${length - 1})`)
    }
    if (seen.has(index)) {
      throw new NotebookValueError(`Invalid new order: duplicate index ${index}`)
    }
    seen.add(index)
  }

  for (let index = 0; index < length; index++) {
    if (!seen.has(index)) {
      throw new NotebookValueError(`Invalid new order: missing index ${index}`)
    }
  }

  const original = notebook.cells
  notebook.cells = newOrder.flatMap((index) => original.slice(index, index + 1))
}

/**
 * Keeps only the cells that match every given criterion and deletes the rest.
 * With neither criterion the notebook is left unchanged.
 *
 * @returns Counts of kept and deleted cells
 */
export function filterCells(
  notebook: Notebook,
  cellType?: string,
  pattern?: string
): { kept: number; deleted: number } {
  const matches = cellMatcher(cellType, pattern)
  const before = notebook.cells.length
  notebook.cells = notebook.cells.filter(matches)
  return { kept: notebook.cells.length, deleted: before - notebook.cells.length }
}
