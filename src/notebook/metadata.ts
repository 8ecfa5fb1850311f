/**
 * Notebook and cell metadata operations.
 */

import type { JSONObject, JSONValue } from '../types/json.js'
import { getCell } from './cells.js'
import type { CellType, KernelSpec, Notebook } from './types.js'

/**
 * Merges `patch` over `base` one level deep: keys in `patch` win, other keys in `base`
 * are kept, and nested objects from `patch` replace their counterparts whole.
 * Neither argument is modified.
 */
export function shallowMerge(base: JSONObject, patch: JSONObject): JSONObject {
  return { ...base, ...patch }
}

/**
 * Returns the notebook metadata, or the metadata of the cell at `cellIndex`.
 */
export function getMetadata(notebook: Notebook, cellIndex?: number): JSONObject {
  return cellIndex === undefined ? notebook.metadata : getCell(notebook, cellIndex).metadata
}

/**
 * Shallow-merges `metadata` into the notebook metadata, or into the metadata of the
 * cell at `cellIndex`.
 */
export function updateMetadata(notebook: Notebook, metadata: JSONObject, cellIndex?: number): void {
  if (cellIndex === undefined) {
    notebook.metadata = shallowMerge(notebook.metadata, metadata)
    return
  }
  const cell = getCell(notebook, cellIndex)
  cell.metadata = shallowMerge(cell.metadata, metadata)
}

/**
 * Replaces the notebook metadata wholesale, or merges into it when `merge` is set.
 */
export function applyNotebookMetadata(notebook: Notebook, metadata: JSONObject, merge: boolean): void {
  notebook.metadata = merge ? shallowMerge(notebook.metadata, metadata) : structuredClone(metadata)
}

export function setKernelSpec(notebook: Notebook, kernelspec: KernelSpec): void {
  notebook.metadata = shallowMerge(notebook.metadata, { kernelspec: { ...kernelspec } })
}

export type KernelInfo = {
  name: string
  displayName: string
  language: string
}

/**
 * Reads the kernel descriptor from the metadata. The language falls back to
 * `language_info.name` when the kernelspec does not carry one.
 *
 * @returns The kernel, or null when the notebook has no kernelspec
 */
export function getKernelInfo(notebook: Notebook): KernelInfo | null {
  const kernelspec = asObject(notebook.metadata.kernelspec)
  if (kernelspec === undefined) {
    return null
  }
  const languageInfo = asObject(notebook.metadata.language_info)
  return {
    name: asString(kernelspec.name),
    displayName: asString(kernelspec.display_name),
    language: asString(kernelspec.language) || asString(languageInfo?.name),
  }
}

export type NotebookSummary = {
  cellCount: number
  cellTypes: Record<CellType, number>
  kernelInfo: KernelInfo | null
  formatVersion: string
}

export function summarize(notebook: Notebook): NotebookSummary {
  const cellTypes: Record<CellType, number> = { code: 0, markdown: 0, raw: 0 }
  for (const cell of notebook.cells) {
    cellTypes[cell.cell_type]++
  }
  return {
    cellCount: notebook.cells.length,
    cellTypes,
    kernelInfo: getKernelInfo(notebook),
    formatVersion: `${notebook.nbformat}.${notebook.nbformat_minor}`,
  }
}

export type CellListing = {
  index: number
  type: CellType
  preview: string
  executionCount: number | null
}

/**
 * Lists every cell with a truncated preview of its source.
 *
 * @param previewLength - Characters kept before the preview is cut and suffixed with "..."
 */
export function listCells(notebook: Notebook, previewLength = 100): CellListing[] {
  return notebook.cells.map((cell, index) => ({
    index,
    type: cell.cell_type,
    preview: cell.source.length > previewLength ? `${cell.source.slice(0, previewLength)}...` : cell.source,
    executionCount: cell.cell_type === 'code' ? cell.execution_count : null,
  }))
}

/**
 * Empties outputs and execution counts of every code cell.
 *
 * @returns Number of code cells visited
 */
export function clearCellOutputs(notebook: Notebook): number {
  let cleared = 0
  for (const cell of notebook.cells) {
    if (cell.cell_type === 'code') {
      cell.outputs = []
      cell.execution_count = null
      cleared++
    }
  }
  return cleared
}

function asObject(value: JSONValue | undefined): JSONObject | undefined {
  if (value === undefined || value === null || typeof value !== 'object' || Array.isArray(value)) {
    return undefined
  }
  return value
}

function asString(value: JSONValue | undefined): string {
  return typeof value === 'string' ? value : ''
}
