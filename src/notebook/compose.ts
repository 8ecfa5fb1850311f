/**
 * Operations that read or write several notebooks at once.
 *
 * Passes over documents are strictly sequential. Operations that write several documents
 * load all of them first, so a missing or invalid input fails the call before anything is written.
 * applyToNotebooks is the exception: each path succeeds or fails on its own.
 */

import { basename, extname, join } from 'node:path'
import { z } from 'zod'
import { NotebookToolError, NotebookValueError, normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import type { JSONObject } from '../types/json.js'
import { createCell, generateCellId } from './cells.js'
import { applyNotebookMetadata, clearCellOutputs, setKernelSpec, updateMetadata } from './metadata.js'
import { CELL_IDS_MINOR, jsonObjectSchema } from './schema.js'
import { cellMatcher, compilePattern, searchCells, type CellMatch } from './search.js'
import type { NotebookStore } from './store.js'
import type { Cell, Notebook } from './types.js'

export const SPLIT_STRATEGIES = ['markdown_headers', 'cell_count'] as const

export type SplitStrategy = (typeof SPLIT_STRATEGIES)[number]

export const APPLY_OPERATIONS = ['set_kernel', 'clear_outputs', 'update_metadata'] as const

export type ApplyOperation = (typeof APPLY_OPERATIONS)[number]

export type ApplyOutcome = { success: true } | { success: false; error: string }

/**
 * Validation outcome for one path. `errors` is empty when the notebook is valid.
 */
export type NotebookValidity = { valid: boolean; errors: string[] }

/**
 * Search match tagged with the notebook it was found in. `context` is null when not requested.
 */
export type NotebookMatch = Omit<CellMatch, 'context'> & { path: string; context: string | null }

/**
 * Concatenates the cells of several notebooks into a new notebook at `outputPath`.
 * Metadata and format version come from the first input. With separators, a markdown cell
 * naming the source file precedes each input's cells.
 *
 * @returns Number of cells written
 */
export async function mergeNotebooks(
  store: NotebookStore,
  outputPath: string,
  inputPaths: string[],
  addSeparators = true
): Promise<number> {
  const inputs = await loadAll(store, requireInputs(inputPaths))
  const merged = emptyLike(inputs[0]?.notebook)

  for (const { path, notebook } of inputs) {
    if (addSeparators) {
      merged.cells.push(createCell(merged, 'markdown', `# Source: ${basename(path)}`))
    }
    merged.cells.push(...notebook.cells)
  }

  alignCellIds(merged)
  await store.save(outputPath, merged)
  return merged.cells.length
}

/**
 * Splits a notebook into several notebooks written to `outputDir`, each inheriting the
 * source metadata. Files are named `<stem>_section_<k>.ipynb`, numbered from 1.
 *
 * - `markdown_headers`: each markdown cell starting with `#` opens a section; cells before
 *   the first heading form the first section.
 * - `cell_count`: consecutive chunks of `cellsPerNotebook` cells.
 *
 * @returns Paths of the notebooks written, in section order
 * @throws NotebookValueError When the strategy is unknown or the chunk size is not positive
 */
export async function splitNotebook(
  store: NotebookStore,
  inputPath: string,
  outputDir: string,
  strategy: string = 'markdown_headers',
  cellsPerNotebook = 10
): Promise<string[]> {
  const sectionsOf = splitter(strategy, cellsPerNotebook)
  const source = await store.load(inputPath)
  const stem = basename(inputPath, extname(inputPath))

  const written: string[] = []
  for (const [i, cells] of sectionsOf(source.cells).entries()) {
    const section = emptyLike(source)
    section.cells = cells
    written.push(await store.save(join(outputDir, `${stem}_section_${i + 1}.ipynb`), section))
  }
  return written
}

/**
 * Groups cells into sections, each opened by a markdown cell whose source starts with a
 * heading marker. Cells before the first heading form their own section.
 */
export function sectionsByMarkdownHeaders(cells: Cell[]): Cell[][] {
  const sections: Cell[][] = []
  let current: Cell[] = []
  for (const cell of cells) {
    if (isHeading(cell) && current.length > 0) {
      sections.push(current)
      current = []
    }
    current.push(cell)
  }
  if (current.length > 0) {
    sections.push(current)
  }
  return sections
}

export function sectionsByCellCount(cells: Cell[], size: number): Cell[][] {
  const sections: Cell[][] = []
  for (let start = 0; start < cells.length; start += size) {
    sections.push(cells.slice(start, start + size))
  }
  return sections
}

/**
 * Collects the cells matching every given criterion from several notebooks into a new
 * notebook, in input order and then cell order. Metadata comes from the first input.
 *
 * @returns Number of cells extracted
 */
export async function extractCells(
  store: NotebookStore,
  outputPath: string,
  inputPaths: string[],
  pattern?: string,
  cellType?: string
): Promise<number> {
  const matches = cellMatcher(cellType, pattern)
  const inputs = await loadAll(store, requireInputs(inputPaths))
  const extracted = emptyLike(inputs[0]?.notebook)

  for (const { notebook } of inputs) {
    extracted.cells.push(...notebook.cells.filter(matches))
  }

  alignCellIds(extracted)
  await store.save(outputPath, extracted)
  return extracted.cells.length
}

/**
 * Searches several notebooks, reporting each match with the path it was found in.
 *
 * @param returnContext - When false, `context` is null in every result
 */
export async function searchNotebooks(
  store: NotebookStore,
  paths: string[],
  pattern: string,
  returnContext = true,
  contextChars = 50
): Promise<NotebookMatch[]> {
  compilePattern(pattern)
  const results: NotebookMatch[] = []
  for (const path of paths) {
    const notebook = await store.load(path)
    for (const match of searchCells(notebook, pattern, false, contextChars)) {
      results.push({ path, ...match, context: returnContext ? match.context : null })
    }
  }
  return results
}

/**
 * Writes the same metadata to several notebooks: a full replacement, or a shallow merge
 * over each notebook's existing metadata when `merge` is set.
 *
 * @returns Number of notebooks updated
 */
export async function syncMetadata(
  store: NotebookStore,
  paths: string[],
  metadata: JSONObject,
  merge = false
): Promise<number> {
  const inputs = await loadAll(store, paths)
  for (const { path, notebook } of inputs) {
    applyNotebookMetadata(notebook, metadata, merge)
    await store.save(path, notebook)
  }
  return inputs.length
}

/**
 * Empties outputs and execution counts of every code cell in one or more notebooks.
 */
export async function clearOutputs(
  store: NotebookStore,
  paths: string | string[]
): Promise<{ notebooksProcessed: number; cellsCleared: number }> {
  const inputs = await loadAll(store, typeof paths === 'string' ? [paths] : paths)
  let cellsCleared = 0
  for (const { path, notebook } of inputs) {
    cellsCleared += clearCellOutputs(notebook)
    await store.save(path, notebook)
  }
  return { notebooksProcessed: inputs.length, cellsCleared }
}

/**
 * Applies one named operation to each notebook independently. The operation name and its
 * parameters are checked before any file is touched; after that a failing notebook is
 * recorded and the remaining notebooks are still processed.
 *
 * @returns Outcome per path
 * @throws NotebookValueError When the operation is unknown or its parameters are invalid
 */
export async function applyToNotebooks(
  store: NotebookStore,
  paths: string[],
  operation: string,
  params: JSONObject = {}
): Promise<Record<string, ApplyOutcome>> {
  const mutate = buildMutation(operation, params)
  const results: Record<string, ApplyOutcome> = {}

  for (const path of paths) {
    try {
      const notebook = await store.load(path)
      mutate(notebook)
      await store.save(path, notebook)
      results[path] = { success: true }
    } catch (error) {
      const message = describeFailure(error)
      logger.warn(`path=<${path}>, operation=<${operation}> | ${message}`)
      results[path] = { success: false, error: message }
    }
  }
  return results
}

/**
 * Validates each notebook independently. Missing, unreadable and unparsable files are
 * reported as invalid rather than failing the call.
 */
export async function validateNotebooks(
  store: NotebookStore,
  paths: string[]
): Promise<Record<string, NotebookValidity>> {
  const results: Record<string, NotebookValidity> = {}
  for (const path of paths) {
    try {
      const report = await store.validateFile(path)
      results[path] = report.valid ? { valid: true, errors: [] } : { valid: false, errors: [report.message] }
    } catch (error) {
      results[path] = { valid: false, errors: [describeFailure(error)] }
    }
  }
  return results
}

const setKernelParamsSchema = z.object({
  kernel_name: z.string().min(1),
  display_name: z.string().min(1),
  language: z.string().default('python'),
})

const updateMetadataParamsSchema = z.object({
  metadata: jsonObjectSchema,
})

function buildMutation(operation: string, params: JSONObject): (notebook: Notebook) => void {
  switch (operation) {
    case 'set_kernel': {
      const { kernel_name, display_name, language } = parseParams(setKernelParamsSchema, params, operation)
      return (notebook) => setKernelSpec(notebook, { name: kernel_name, display_name, language })
    }
    case 'clear_outputs':
      return (notebook) => {
        clearCellOutputs(notebook)
      }
    case 'update_metadata': {
      const { metadata } = parseParams(updateMetadataParamsSchema, params, operation)
      return (notebook) => updateMetadata(notebook, metadata)
    }
    default:
      throw new NotebookValueError(
        `Unknown operation '${operation}'. Supported operations: ${APPLY_OPERATIONS.join(', ')}`
      )
  }
}

function parseParams<TSchema extends z.ZodType>(schema: TSchema, params: JSONObject, operation: string): z.output<TSchema> {
  const parsed = schema.safeParse(params)
  if (!parsed.success) {
    throw new NotebookValueError(`Invalid parameters for operation '${operation}': ${z.prettifyError(parsed.error)}`)
  }
  return parsed.data
}

function splitter(strategy: string, cellsPerNotebook: number): (cells: Cell[]) => Cell[][] {
  switch (strategy) {
    case 'markdown_headers':
      return sectionsByMarkdownHeaders
    case 'cell_count':
      if (!Number.isInteger(cellsPerNotebook) || cellsPerNotebook < 1) {
        throw new NotebookValueError(`cells_per_notebook must be a positive integer, got ${cellsPerNotebook}`)
      }
      return (cells) => sectionsByCellCount(cells, cellsPerNotebook)
    default:
      throw new NotebookValueError(
        `Unknown split strategy '${strategy}'. Supported strategies: ${SPLIT_STRATEGIES.join(', ')}`
      )
  }
}

function isHeading(cell: Cell): boolean {
  return cell.cell_type === 'markdown' && cell.source.trimStart().startsWith('#')
}

function requireInputs(inputPaths: string[]): string[] {
  if (inputPaths.length === 0) {
    throw new NotebookValueError('At least one input notebook is required')
  }
  return inputPaths
}

async function loadAll(store: NotebookStore, paths: string[]): Promise<{ path: string; notebook: Notebook }[]> {
  const loaded: { path: string; notebook: Notebook }[] = []
  for (const path of paths) {
    loaded.push({ path, notebook: await store.load(path) })
  }
  return loaded
}

/**
 * New empty notebook sharing the format version and a copy of the metadata of `template`.
 */
function emptyLike(template: Notebook | undefined): Notebook {
  return {
    nbformat: 4,
    nbformat_minor: template?.nbformat_minor ?? 5,
    metadata: structuredClone(template?.metadata ?? {}),
    cells: [],
  }
}

/**
 * Brings cell ids in line with the notebook's format version. Below 4.5 ids are dropped.
 * From 4.5 on, missing ids are generated and ids already seen earlier in the notebook are
 * regenerated: cells gathered from several notebooks may lack ids or share them.
 */
function alignCellIds(notebook: Notebook): void {
  if (notebook.nbformat_minor < CELL_IDS_MINOR) {
    notebook.cells = notebook.cells.map((cell) => {
      const copy = { ...cell }
      delete copy.id
      return copy
    })
    return
  }

  const seen = new Set<string>()
  notebook.cells = notebook.cells.map((cell) => {
    const id = cell.id === undefined || seen.has(cell.id) ? generateCellId() : cell.id
    seen.add(id)
    return id === cell.id ? cell : { ...cell, id }
  })
}

function describeFailure(error: unknown): string {
  return error instanceof NotebookToolError ? error.message : normalizeError(error).message
}
