/**
 * Loading and persisting notebook documents.
 */

import { randomUUID } from 'node:crypto'
import { chmod, mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises'
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path'
import { NotebookNotFoundError, NotebookValidationError, PathScopeError } from '../errors.js'
import { logger } from '../logging/logger.js'
import { resolveConfig, type NotebookToolsConfig } from './config.js'
import { validateDocument, type ValidationReport } from './schema.js'
import { toDocument, toNotebook } from './source.js'
import type { Notebook } from './types.js'

/**
 * Result of validating a file on disk.
 */
export type FileValidation = { valid: true } | { valid: false; message: string }

/**
 * Reads and writes notebooks on the local filesystem.
 *
 * Every load parses and validates the document; every save validates the serialized form
 * before writing it to a temporary file beside the target and renaming it into place,
 * so readers never see a partially written notebook.
 */
export class NotebookStore {
  private readonly _projectRoot: string | undefined
  private readonly _indent: number

  constructor(config?: NotebookToolsConfig) {
    const resolved = resolveConfig(config)
    this._projectRoot = resolved.projectRoot
    this._indent = resolved.indent
  }

  /**
   * Resolves a caller-supplied path against the project root, when one is configured.
   *
   * @throws PathScopeError When the path leaves the project root
   */
  resolvePath(path: string): string {
    if (this._projectRoot === undefined) {
      return resolve(path)
    }
    const resolved = resolve(this._projectRoot, path)
    const fromRoot = relative(this._projectRoot, resolved)
    if (fromRoot === '..' || fromRoot.startsWith(`..${sep}`) || isAbsolute(fromRoot)) {
      throw new PathScopeError(path, this._projectRoot)
    }
    return resolved
  }

  /**
   * Loads a notebook into memory.
   *
   * @throws NotebookNotFoundError When the file does not exist
   * @throws NotebookValidationError When the file is not valid JSON or not a valid notebook
   */
  async load(path: string): Promise<Notebook> {
    const resolved = this.resolvePath(path)
    const result = parseDocument(await this._readText(resolved))
    if (!result.valid) {
      throw new NotebookValidationError(`Invalid notebook ${resolved}: ${result.message}`)
    }
    logger.debug(`path=<${resolved}>, cells=<${result.document.cells.length}> | loaded notebook`)
    return toNotebook(result.document)
  }

  /**
   * Validates and atomically writes a notebook, creating the parent directory if needed.
   * An existing file keeps its permission bits.
   *
   * @returns The resolved path written
   * @throws NotebookValidationError When the notebook would not be a valid document
   */
  async save(path: string, notebook: Notebook): Promise<string> {
    const resolved = this.resolvePath(path)
    const document = toDocument(notebook)
    const report = validateDocument(document)
    if (!report.valid) {
      throw new NotebookValidationError(`Refusing to write invalid notebook ${resolved}: ${report.message}`)
    }

    const directory = dirname(resolved)
    await mkdir(directory, { recursive: true })
    const mode = await existingMode(resolved)
    const tempPath = join(directory, `.${basename(resolved)}.${randomUUID().slice(0, 8)}.tmp`)
    try {
      await writeFile(tempPath, `${JSON.stringify(document, null, this._indent)}\n`, 'utf-8')
      if (mode !== undefined) {
        await chmod(tempPath, mode)
      }
      await rename(tempPath, resolved)
    } catch (error) {
      await rm(tempPath, { force: true })
      throw error
    }

    logger.debug(`path=<${resolved}>, cells=<${notebook.cells.length}> | saved notebook`)
    return resolved
  }

  /**
   * Validates a file without loading it into the mutation model.
   *
   * @throws NotebookNotFoundError When the file does not exist
   */
  async validateFile(path: string): Promise<FileValidation> {
    const resolved = this.resolvePath(path)
    const result = parseDocument(await this._readText(resolved))
    return result.valid ? { valid: true } : { valid: false, message: result.message }
  }

  /**
   * Size of a notebook file in bytes.
   *
   * @throws NotebookNotFoundError When the file does not exist
   */
  async fileSize(path: string): Promise<number> {
    const resolved = this.resolvePath(path)
    try {
      return (await stat(resolved)).size
    } catch (error) {
      throw isNotFound(error) ? new NotebookNotFoundError(resolved) : error
    }
  }

  private async _readText(resolved: string): Promise<string> {
    try {
      return await readFile(resolved, 'utf-8')
    } catch (error) {
      throw isNotFound(error) ? new NotebookNotFoundError(resolved) : error
    }
  }
}

function parseDocument(text: string): ValidationReport {
  let value: unknown
  try {
    value = JSON.parse(text)
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    return { valid: false, message: `Failed to parse notebook JSON: ${reason}` }
  }
  return validateDocument(value)
}

/**
 * Permission bits of an existing file, or undefined when there is none.
 */
async function existingMode(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o7777
  } catch (error) {
    if (isNotFound(error)) {
      return undefined
    }
    throw error
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}
