/**
 * Regex search and global replacement across cells.
 */

import { NotebookValueError } from '../errors.js'
import { parseCellType } from './cells.js'
import type { CellType, Notebook } from './types.js'

/**
 * One regex match inside a cell.
 */
export type CellMatch = {
  cellIndex: number
  cellType: CellType
  match: string
  context: string
}

/**
 * Compiles a caller-supplied pattern.
 *
 * @param pattern - Regular expression source
 * @param flags - RegExp flags
 * @throws NotebookValueError When the pattern is not a valid regular expression
 */
export function compilePattern(pattern: string, flags = ''): RegExp {
  try {
    return new RegExp(pattern, flags)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new NotebookValueError(`Invalid regular expression ${JSON.stringify(pattern)}: ${reason}`)
  }
}

/**
 * Finds every match of `pattern` in every cell, in cell order and then match order.
 *
 * @param caseSensitive - Defaults to false
 * @param contextChars - Characters of surrounding source kept on each side of a match
 */
export function searchCells(notebook: Notebook, pattern: string, caseSensitive = false, contextChars = 50): CellMatch[] {
  const regex = compilePattern(pattern, caseSensitive ? 'g' : 'gi')
  const results: CellMatch[] = []

  notebook.cells.forEach((cell, cellIndex) => {
    for (const match of cell.source.matchAll(regex)) {
      const start = match.index ?? 0
      const end = start + match[0].length
      results.push({
        cellIndex,
        cellType: cell.cell_type,
        match: match[0],
        context: cell.source.slice(Math.max(0, start - contextChars), Math.min(cell.source.length, end + contextChars)),
      })
    }
  })

  return results
}

/**
 * Replaces every non-overlapping match of `pattern` in every cell of the given type
 * (all cells when no type is given). The replacement may reference groups with
 * `$1`, `$<name>` and `$&`, or with `\1` and `\g<name>`. Matching is case-sensitive.
 *
 * @returns Total number of substitutions across all cells
 */
export function searchReplaceAll(notebook: Notebook, pattern: string, replacement: string, cellType?: string): number {
  const type = cellType === undefined ? undefined : parseCellType(cellType)
  const regex = compilePattern(pattern, 'g')
  const template = replacementTemplate(replacement)
  let total = 0

  for (const cell of notebook.cells) {
    if (type !== undefined && cell.cell_type !== type) {
      continue
    }
    const count = [...cell.source.matchAll(regex)].length
    if (count > 0) {
      cell.source = cell.source.replace(regex, template)
      total += count
    }
  }

  return total
}

/**
 * Rewrites backslash group references (`\1`, `\g<1>`, `\g<name>`) into the `$` form
 * `String.prototype.replace` understands. `\\` stands for one backslash.
 */
export function replacementTemplate(replacement: string): string {
  return replacement.replace(/\\(?:([1-9]\d?)|g<(\w+)>|\\)/g, (_match, digits?: string, group?: string) => {
    if (digits !== undefined) {
      return `$${digits}`
    }
    if (group !== undefined) {
      return /^\d+$/.test(group) ? `$${group}` : `$<${group}>`
    }
    return '\\'
  })
}

/**
 * Builds the predicate shared by filtering and extraction: a cell passes when it
 * satisfies every criterion given. With no criteria every cell passes.
 *
 * @param pattern - Regular expression searched in the source, case-sensitive
 */
export function cellMatcher(cellType?: string, pattern?: string): (cell: { cell_type: CellType; source: string }) => boolean {
  const type = cellType === undefined ? undefined : parseCellType(cellType)
  const regex = pattern === undefined ? undefined : compilePattern(pattern)
  return (cell) => (type === undefined || cell.cell_type === type) && (regex === undefined || regex.test(cell.source))
}
