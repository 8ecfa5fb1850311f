/**
 * Error types for notebook operations and tool execution.
 *
 * Every failure the notebook engine raises on purpose is a NotebookToolError subclass,
 * so the operation boundary can tell expected failures from unexpected faults.
 */

/**
 * Base class for expected notebook failures.
 */
export class NotebookToolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'NotebookToolError'
  }
}

/**
 * Error thrown when a notebook path does not exist.
 */
export class NotebookNotFoundError extends NotebookToolError {
  /**
   * The path that could not be found, as resolved by the store.
   */
  public readonly path: string

  constructor(path: string) {
    super(`Notebook not found: ${path}`)
    this.name = 'NotebookNotFoundError'
    this.path = path
  }
}

/**
 * Error thrown when a cell index falls outside the valid range.
 */
export class CellIndexError extends NotebookToolError {
  public readonly index: number
  public readonly cellCount: number

  constructor(index: number, cellCount: number, message?: string) {
    super(message ?? describeIndexError(index, cellCount))
    this.name = 'CellIndexError'
    this.index = index
    this.cellCount = cellCount
  }
}

/**
 * Error thrown for semantically invalid input: bad cell types, malformed patterns,
 * ambiguous replacements, non-permutation orders and unknown operation names.
 */
export class NotebookValueError extends NotebookToolError {
  constructor(message: string) {
    super(message)
    this.name = 'NotebookValueError'
  }
}

/**
 * Error thrown when a document fails structural validation or cannot be parsed.
 */
export class NotebookValidationError extends NotebookToolError {
  constructor(message: string) {
    super(message)
    this.name = 'NotebookValidationError'
  }
}

/**
 * Error thrown when a path resolves outside the configured project root.
 */
export class PathScopeError extends NotebookToolError {
  constructor(path: string, projectRoot: string) {
    super(`Path ${path} is outside the project root ${projectRoot}`)
    this.name = 'PathScopeError'
  }
}

/**
 * Error thrown when tool input does not match the tool's input schema.
 */
export class ToolValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ToolValidationError'
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 *
 * @param error - Anything that was thrown
 * @returns The value itself when it is an Error, otherwise an Error wrapping its string form
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error
  }
  return new Error(String(error))
}

function describeIndexError(index: number, cellCount: number): string {
  if (cellCount === 0) {
    return `Cell index ${index} out of range: notebook has no cells`
  }
  return `Cell index ${index} out of range (valid range: ${-cellCount} to ${cellCount - 1})`
}
