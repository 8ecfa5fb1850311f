/**
 * In-memory notebook model.
 *
 * Field names follow the .ipynb format so documents round-trip without renaming.
 * Sources are always single strings in memory; the store converts to and from
 * the line-list form used on disk.
 */

import type { JSONObject } from '../types/json.js'

/**
 * Valid cell types, in the order they are reported.
 */
export const CELL_TYPES = ['code', 'markdown', 'raw'] as const

export type CellType = (typeof CELL_TYPES)[number]

interface BaseCell {
  /**
   * Cell id, required by nbformat 4.5 and later.
   */
  id?: string

  /**
   * Cell-scoped metadata such as tags.
   */
  metadata: JSONObject

  /**
   * Cell content with internal newlines.
   */
  source: string
}

export interface CodeCell extends BaseCell {
  cell_type: 'code'

  /**
   * Execution results, each carrying an `output_type`.
   */
  outputs: JSONObject[]

  /**
   * Position in the last execution run, or null when never run or cleared.
   */
  execution_count: number | null
}

export interface MarkdownCell extends BaseCell {
  cell_type: 'markdown'
  attachments?: JSONObject
}

export interface RawCell extends BaseCell {
  cell_type: 'raw'
  attachments?: JSONObject
}

export type Cell = CodeCell | MarkdownCell | RawCell

/**
 * A notebook document: format version, metadata and ordered cells.
 */
export interface Notebook {
  nbformat: number
  nbformat_minor: number
  metadata: JSONObject
  cells: Cell[]
}

/**
 * Kernel descriptor as stored in `metadata.kernelspec`.
 */
export type KernelSpec = {
  name: string
  display_name: string
  language: string
}

/**
 * Returns true when a value names one of the valid cell types.
 */
export function isCellType(value: string): value is CellType {
  return CELL_TYPES.some((type) => type === value)
}
