/**
 * Test fixtures for notebook documents on disk.
 */

import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import type { Cell, Notebook } from '../notebook/types.js'
import type { JSONObject } from '../types/json.js'

/**
 * Cell description used to build fixture documents.
 */
export type FixtureCell = {
  type: 'code' | 'markdown' | 'raw'
  source: string
  id?: string
  outputs?: JSONObject[]
  executionCount?: number | null
  metadata?: JSONObject
}

export const PYTHON_KERNEL: JSONObject = {
  kernelspec: { name: 'python3', display_name: 'Python 3', language: 'python' },
  language_info: { name: 'python' },
}

/**
 * Builds an nbformat 4 document as it is stored on disk.
 */
export function notebookDocument(
  cells: FixtureCell[],
  options: { metadata?: JSONObject; nbformatMinor?: number } = {}
): JSONObject {
  return {
    nbformat: 4,
    nbformat_minor: options.nbformatMinor ?? 5,
    metadata: options.metadata ?? PYTHON_KERNEL,
    cells: cells.map((cell, index) => {
      const id = fixtureId(cell, index, options.nbformatMinor)
      const base: JSONObject = {
        cell_type: cell.type,
        ...(id === undefined ? {} : { id }),
        metadata: cell.metadata ?? {},
        source: cell.source,
      }
      if (cell.type === 'code') {
        base.outputs = cell.outputs ?? []
        base.execution_count = cell.executionCount ?? null
      }
      return base
    }),
  }
}

/**
 * Builds an in-memory notebook. From format 4.5 on, cells get ids `cell-<n>` unless given.
 */
export function createNotebook(
  cells: FixtureCell[],
  options: { metadata?: JSONObject; nbformatMinor?: number } = {}
): Notebook {
  return {
    nbformat: 4,
    nbformat_minor: options.nbformatMinor ?? 5,
    metadata: structuredClone(options.metadata ?? PYTHON_KERNEL),
    cells: cells.map((cell, index): Cell => {
      const id = fixtureId(cell, index, options.nbformatMinor)
      const common = {
        ...(id === undefined ? {} : { id }),
        metadata: cell.metadata ?? {},
        source: cell.source,
      }
      switch (cell.type) {
        case 'code':
          return { cell_type: 'code', ...common, outputs: cell.outputs ?? [], execution_count: cell.executionCount ?? null }
        case 'markdown':
          return { cell_type: 'markdown', ...common }
        case 'raw':
          return { cell_type: 'raw', ...common }
      }
    }),
  }
}

/**
 * The fixture's id: the given one, else `cell-<n>` from format 4.5 on, else none.
 */
function fixtureId(cell: FixtureCell, index: number, nbformatMinor = 5): string | undefined {
  return cell.id ?? (nbformatMinor >= 5 ? `cell-${index}` : undefined)
}

/**
 * Shorthand for code cells with the given sources.
 */
export function codeCells(...sources: string[]): FixtureCell[] {
  return sources.map((source) => ({ type: 'code', source }))
}

export function sourcesOf(notebook: Notebook): string[] {
  return notebook.cells.map((cell) => cell.source)
}

/**
 * Shorthand for a code cell with one stream output.
 */
export function executedCell(source: string, executionCount: number): FixtureCell {
  return {
    type: 'code',
    source,
    executionCount,
    outputs: [{ output_type: 'stream', name: 'stdout', text: ['out\n'] }],
  }
}

/**
 * Temporary directory holding notebooks for one test.
 */
export class NotebookWorkspace {
  constructor(readonly dir: string) {}

  static async create(): Promise<NotebookWorkspace> {
    return new NotebookWorkspace(await mkdtemp(join(tmpdir(), 'ipynb-tools-')))
  }

  path(name: string): string {
    return join(this.dir, name)
  }

  /**
   * Writes a notebook built from `cells` and returns its absolute path.
   */
  async write(
    name: string,
    cells: FixtureCell[],
    options?: { metadata?: JSONObject; nbformatMinor?: number }
  ): Promise<string> {
    const path = this.path(name)
    await writeFile(path, JSON.stringify(notebookDocument(cells, options), null, 1), 'utf-8')
    return path
  }

  async writeText(name: string, text: string): Promise<string> {
    const path = this.path(name)
    await writeFile(path, text, 'utf-8')
    return path
  }

  async readText(name: string): Promise<string> {
    return readFile(this.path(name), 'utf-8')
  }

  /**
   * Reads a notebook back and returns its cells with sources joined into single strings.
   */
  async cells(name: string): Promise<{ type: string; source: string }[]> {
    const document: unknown = JSON.parse(await this.readText(name))
    if (!isRecord(document) || !Array.isArray(document.cells)) {
      throw new Error(`${name} is not a notebook`)
    }
    return document.cells.map((cell: unknown) => {
      if (!isRecord(cell)) {
        throw new Error(`${name} has a malformed cell`)
      }
      const source = Array.isArray(cell.source) ? cell.source.join('') : String(cell.source)
      return { type: String(cell.cell_type), source }
    })
  }

  async json(name: string): Promise<Record<string, unknown>> {
    const document: unknown = JSON.parse(await this.readText(name))
    if (!isRecord(document)) {
      throw new Error(`${name} is not a JSON object`)
    }
    return document
  }

  async files(): Promise<string[]> {
    return (await readdir(this.dir)).sort()
  }

  async dispose(): Promise<void> {
    await rm(this.dir, { recursive: true, force: true })
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
