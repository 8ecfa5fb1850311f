/**
 * Notebook operations as exposed to callers: each one loads the documents it needs,
 * applies one query or mutation and persists the result.
 *
 * No method rejects. Expected failures become `{ error }` with the failure's own message;
 * anything else becomes `{ error: 'Failed to <action>: <message>' }`. Both are logged.
 */

import { NotebookToolError, normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import type { JSONObject } from '../types/json.js'
import {
  deleteCellsBatch,
  filterCells,
  insertCellsBatch,
  reorderCells,
  replaceCellsBatch,
  type CellInsertion,
  type CellReplacement,
} from './batch.js'
import { appendCell, deleteCell, getCell, insertCell, replaceCellSource, strReplaceInCell } from './cells.js'
import * as compose from './compose.js'
import { resolveConfig, type NotebookToolsConfig, type ResolvedNotebookToolsConfig } from './config.js'
import { resolveIndex } from './indexing.js'
import { COMMON_KERNELS } from './kernels.js'
import {
  getMetadata,
  listCells,
  setKernelSpec,
  summarize,
  updateMetadata,
  type CellListing,
  type NotebookSummary,
} from './metadata.js'
import { searchCells, searchReplaceAll, type CellMatch } from './search.js'
import { NotebookStore } from './store.js'
import type { CellType, KernelSpec, Notebook } from './types.js'

/**
 * Failure shape shared by every operation.
 */
export type OperationError = { error: string }

/**
 * Success value of an operation: `success: true` plus operation-specific fields.
 */
export type OperationSuccess<T> = { success: true } & T

export type OperationResult<T> = OperationSuccess<T> | OperationError

export type CellContent = {
  index: number
  cellType: CellType
  content: string
  metadata: JSONObject
  executionCount: number | null
  outputCount: number
}

export type CellPosition = {
  index: number
  cellCount: number
}

export type NotebookInfo = NotebookSummary & {
  path: string
  fileSize: number
}

/**
 * Notebook operations bound to one configuration.
 *
 * @example
 * ```typescript
 * const notebooks = new NotebookOperations({ projectRoot: '/work/project' })
 *
 * await notebooks.appendCell('analysis.ipynb', 'print("done")')
 * // { success: true, index: 4, cellCount: 5 }
 *
 * await notebooks.getCell('analysis.ipynb', 10)
 * // { error: 'Cell index 10 out of range (valid range: -5 to 4)' }
 * ```
 */
export class NotebookOperations {
  readonly config: ResolvedNotebookToolsConfig
  private readonly _store: NotebookStore

  constructor(config?: NotebookToolsConfig) {
    this.config = resolveConfig(config)
    this._store = new NotebookStore(config)
  }

  // Reading

  async readNotebook(path: string): Promise<OperationResult<NotebookSummary>> {
    return this._guard('read notebook', async () => summarize(await this._store.load(path)))
  }

  async listCells(path: string): Promise<OperationResult<{ cells: CellListing[] }>> {
    return this._guard('list cells', async () => {
      const notebook = await this._store.load(path)
      return { cells: listCells(notebook, this.config.previewLength) }
    })
  }

  async getCell(path: string, index: number): Promise<OperationResult<CellContent>> {
    return this._guard('get cell', async () => {
      const notebook = await this._store.load(path)
      const cell = getCell(notebook, index)
      return {
        index: resolveIndex(index, notebook.cells.length),
        cellType: cell.cell_type,
        content: cell.source,
        metadata: cell.metadata,
        executionCount: cell.cell_type === 'code' ? cell.execution_count : null,
        outputCount: cell.cell_type === 'code' ? cell.outputs.length : 0,
      }
    })
  }

  async searchCells(
    path: string,
    pattern: string,
    caseSensitive = false
  ): Promise<OperationResult<{ matches: CellMatch[]; totalMatches: number }>> {
    return this._guard('search cells', async () => {
      const notebook = await this._store.load(path)
      const matches = searchCells(notebook, pattern, caseSensitive, this.config.searchContextChars)
      return { matches, totalMatches: matches.length }
    })
  }

  async getNotebookInfo(path: string): Promise<OperationResult<NotebookInfo>> {
    return this._guard('get notebook info', async () => {
      const notebook = await this._store.load(path)
      const fileSize = await this._store.fileSize(path)
      return { ...summarize(notebook), path: this._store.resolvePath(path), fileSize }
    })
  }

  // Single-cell mutations

  async replaceCell(path: string, index: number, content: string): Promise<OperationResult<CellPosition>> {
    return this._guard('replace cell', () =>
      this._mutate(path, (notebook) => {
        replaceCellSource(notebook, index, content)
        return { index: resolveIndex(index, notebook.cells.length), cellCount: notebook.cells.length }
      })
    )
  }

  async insertCell(
    path: string,
    index: number,
    content: string,
    cellType = 'code'
  ): Promise<OperationResult<CellPosition>> {
    return this._guard('insert cell', () =>
      this._mutate(path, (notebook) => ({
        index: insertCell(notebook, index, content, cellType),
        cellCount: notebook.cells.length,
      }))
    )
  }

  async appendCell(path: string, content: string, cellType = 'code'): Promise<OperationResult<CellPosition>> {
    return this._guard('append cell', () =>
      this._mutate(path, (notebook) => ({
        index: appendCell(notebook, content, cellType),
        cellCount: notebook.cells.length,
      }))
    )
  }

  async deleteCell(
    path: string,
    index: number
  ): Promise<OperationResult<{ deletedIndex: number; cellType: CellType; cellCount: number }>> {
    return this._guard('delete cell', () =>
      this._mutate(path, (notebook) => {
        const deletedIndex = resolveIndex(index, notebook.cells.length)
        const removed = deleteCell(notebook, index)
        return { deletedIndex, cellType: removed.cell_type, cellCount: notebook.cells.length }
      })
    )
  }

  async strReplaceInCell(
    path: string,
    index: number,
    oldStr: string,
    newStr: string
  ): Promise<OperationResult<{ index: number }>> {
    return this._guard('replace text in cell', () =>
      this._mutate(path, (notebook) => {
        strReplaceInCell(notebook, index, oldStr, newStr)
        return { index: resolveIndex(index, notebook.cells.length) }
      })
    )
  }

  // Metadata and kernels

  async getMetadata(path: string, cellIndex?: number): Promise<OperationResult<{ metadata: JSONObject }>> {
    return this._guard('get metadata', async () => {
      const notebook = await this._store.load(path)
      return { metadata: getMetadata(notebook, cellIndex) }
    })
  }

  async updateMetadata(
    path: string,
    metadata: JSONObject,
    cellIndex?: number
  ): Promise<OperationResult<{ metadata: JSONObject }>> {
    return this._guard('update metadata', () =>
      this._mutate(path, (notebook) => {
        updateMetadata(notebook, metadata, cellIndex)
        return { metadata: getMetadata(notebook, cellIndex) }
      })
    )
  }

  async setKernel(
    path: string,
    kernelName: string,
    displayName: string,
    language = 'python'
  ): Promise<OperationResult<{ kernelspec: KernelSpec }>> {
    const kernelspec: KernelSpec = { name: kernelName, display_name: displayName, language }
    return this._guard('set kernel', () =>
      this._mutate(path, (notebook) => {
        setKernelSpec(notebook, kernelspec)
        return { kernelspec }
      })
    )
  }

  async listAvailableKernels(): Promise<OperationResult<{ kernels: KernelSpec[] }>> {
    return this._guard('list kernels', async () => ({ kernels: COMMON_KERNELS.map((kernel) => ({ ...kernel })) }))
  }

  // Batch mutations

  async replaceCellsBatch(
    path: string,
    replacements: CellReplacement[]
  ): Promise<OperationResult<{ cellsReplaced: number }>> {
    return this._guard('replace cells', () =>
      this._mutate(path, (notebook) => {
        replaceCellsBatch(notebook, replacements)
        return { cellsReplaced: replacements.length }
      })
    )
  }

  async deleteCellsBatch(
    path: string,
    indices: number[]
  ): Promise<OperationResult<{ cellsDeleted: number; cellCount: number }>> {
    return this._guard('delete cells', () =>
      this._mutate(path, (notebook) => ({
        cellsDeleted: deleteCellsBatch(notebook, indices),
        cellCount: notebook.cells.length,
      }))
    )
  }

  async insertCellsBatch(
    path: string,
    insertions: CellInsertion[]
  ): Promise<OperationResult<{ cellsInserted: number; cellCount: number }>> {
    return this._guard('insert cells', () =>
      this._mutate(path, (notebook) => ({
        cellsInserted: insertCellsBatch(notebook, insertions),
        cellCount: notebook.cells.length,
      }))
    )
  }

  async searchReplaceAll(
    path: string,
    pattern: string,
    replacement: string,
    cellType?: string
  ): Promise<OperationResult<{ replacements: number }>> {
    return this._guard('search and replace', () =>
      this._mutate(path, (notebook) => ({ replacements: searchReplaceAll(notebook, pattern, replacement, cellType) }))
    )
  }

  async reorderCells(path: string, newOrder: number[]): Promise<OperationResult<{ cellCount: number }>> {
    return this._guard('reorder cells', () =>
      this._mutate(path, (notebook) => {
        reorderCells(notebook, newOrder)
        return { cellCount: notebook.cells.length }
      })
    )
  }

  async filterCells(
    path: string,
    cellType?: string,
    pattern?: string
  ): Promise<OperationResult<{ cellsKept: number; cellsDeleted: number }>> {
    return this._guard('filter cells', () =>
      this._mutate(path, (notebook) => {
        const { kept, deleted } = filterCells(notebook, cellType, pattern)
        return { cellsKept: kept, cellsDeleted: deleted }
      })
    )
  }

  // Several notebooks

  async mergeNotebooks(
    outputPath: string,
    inputPaths: string[],
    addSeparators = true
  ): Promise<OperationResult<{ outputPath: string; totalCells: number; notebooksMerged: number }>> {
    return this._guard('merge notebooks', async () => {
      const totalCells = await compose.mergeNotebooks(this._store, outputPath, inputPaths, addSeparators)
      return { outputPath: this._store.resolvePath(outputPath), totalCells, notebooksMerged: inputPaths.length }
    })
  }

  async splitNotebook(
    inputPath: string,
    outputDir: string,
    splitBy = 'markdown_headers',
    cellsPerNotebook = 10
  ): Promise<OperationResult<{ files: string[]; notebooksCreated: number }>> {
    return this._guard('split notebook', async () => {
      const files = await compose.splitNotebook(this._store, inputPath, outputDir, splitBy, cellsPerNotebook)
      return { files, notebooksCreated: files.length }
    })
  }

  async extractCells(
    outputPath: string,
    inputPaths: string[],
    pattern?: string,
    cellType?: string
  ): Promise<OperationResult<{ outputPath: string; cellsExtracted: number }>> {
    return this._guard('extract cells', async () => {
      const cellsExtracted = await compose.extractCells(this._store, outputPath, inputPaths, pattern, cellType)
      return { outputPath: this._store.resolvePath(outputPath), cellsExtracted }
    })
  }

  async searchNotebooks(
    paths: string[],
    pattern: string,
    returnContext = true
  ): Promise<OperationResult<{ results: compose.NotebookMatch[]; totalMatches: number }>> {
    return this._guard('search notebooks', async () => {
      const results = await compose.searchNotebooks(
        this._store,
        paths,
        pattern,
        returnContext,
        this.config.searchContextChars
      )
      return { results, totalMatches: results.length }
    })
  }

  async syncMetadata(
    paths: string[],
    metadata: JSONObject,
    merge = false
  ): Promise<OperationResult<{ notebooksUpdated: number }>> {
    return this._guard('sync metadata', async () => ({
      notebooksUpdated: await compose.syncMetadata(this._store, paths, metadata, merge),
    }))
  }

  async clearOutputs(
    paths: string | string[]
  ): Promise<OperationResult<{ notebooksProcessed: number; cellsCleared: number }>> {
    return this._guard('clear outputs', () => compose.clearOutputs(this._store, paths))
  }

  async applyToNotebooks(
    paths: string[],
    operation: string,
    params: JSONObject = {}
  ): Promise<OperationResult<{ results: Record<string, compose.ApplyOutcome>; successful: number; failed: number }>> {
    return this._guard('apply operation', async () => {
      const results = await compose.applyToNotebooks(this._store, paths, operation, params)
      const successful = Object.values(results).filter((outcome) => outcome.success).length
      return { results, successful, failed: Object.keys(results).length - successful }
    })
  }

  // Validation

  async validateNotebook(path: string): Promise<OperationResult<compose.NotebookValidity>> {
    return this._guard('validate notebook', async () => {
      const report = await this._store.validateFile(path)
      return report.valid ? { valid: true, errors: [] } : { valid: false, errors: [report.message] }
    })
  }

  async validateNotebooksBatch(paths: string[]): Promise<
    OperationResult<{
      results: Record<string, compose.NotebookValidity>
      total: number
      valid: number
      invalid: number
    }>
  > {
    return this._guard('validate notebooks', async () => {
      const results = await compose.validateNotebooks(this._store, paths)
      const total = Object.keys(results).length
      const valid = Object.values(results).filter((result) => result.valid).length
      return { results, total, valid, invalid: total - valid }
    })
  }

  /**
   * Loads a notebook, applies `mutation` and saves it. When the mutation throws, nothing is written.
   */
  private async _mutate<T>(path: string, mutation: (notebook: Notebook) => T): Promise<T> {
    const notebook = await this._store.load(path)
    const result = mutation(notebook)
    await this._store.save(path, notebook)
    return result
  }

  private async _guard<T>(action: string, run: () => Promise<T>): Promise<OperationResult<T>> {
    try {
      return { success: true, ...(await run()) }
    } catch (error) {
      const message =
        error instanceof NotebookToolError ? error.message : `Failed to ${action}: ${normalizeError(error).message}`
      logger.warn(`action=<${action}> | ${message}`)
      return { error: message }
    }
  }
}
