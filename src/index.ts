/**
 * Main entry point for the notebook agent tools.
 *
 * Exposes the notebook operations, the tools wrapping them for tool-calling agents,
 * and the tool framework they are built on.
 */

// Notebook operations
export { NotebookOperations } from './notebook/operations.js'
export type {
  OperationError,
  OperationSuccess,
  OperationResult,
  CellContent,
  CellPosition,
  NotebookInfo,
} from './notebook/operations.js'

// Notebook model
export { CELL_TYPES } from './notebook/types.js'
export type { CellType, Cell, CodeCell, MarkdownCell, RawCell, Notebook, KernelSpec } from './notebook/types.js'
export type { NotebookToolsConfig, ResolvedNotebookToolsConfig } from './notebook/config.js'
export type { CellReplacement, CellInsertion } from './notebook/batch.js'
export type { CellMatch } from './notebook/search.js'
export type { KernelInfo, NotebookSummary, CellListing } from './notebook/metadata.js'
export type { ApplyOutcome, NotebookValidity, NotebookMatch } from './notebook/compose.js'
export { APPLY_OPERATIONS, SPLIT_STRATEGIES } from './notebook/compose.js'
export { COMMON_KERNELS } from './notebook/kernels.js'

// Document store
export { NotebookStore } from './notebook/store.js'
export { validateDocument } from './notebook/schema.js'

// Notebook tools
export { createNotebookTools, createNotebookToolRegistry } from './vended-tools/notebook/index.js'

// Error types
export {
  NotebookToolError,
  NotebookNotFoundError,
  CellIndexError,
  NotebookValueError,
  NotebookValidationError,
  PathScopeError,
  ToolValidationError,
} from './errors.js'

// JSON types
export type { JSONSchema, JSONValue, JSONObject } from './types/json.js'

// Message types
export type { ToolResultContent, ToolResultStatus, ToolResultBlockData } from './types/messages.js'
export { TextBlock, JsonBlock, ToolResultBlock } from './types/messages.js'

// Tool interface and related types
export type {
  Tool,
  InvokableTool,
  ToolSpec,
  ToolUse,
  ToolContext,
  ToolStreamEventData,
  ToolStreamEvent,
  ToolStreamGenerator,
} from './tools/tool.js'

// Tool factory function
export { tool } from './tools/zod-tool.js'
export type { ZodToolConfig } from './tools/zod-tool.js'

// Tool registry
export { ToolRegistry } from './registry/tool-registry.js'

// Logging
export { configureLogging, resetLogging } from './logging/index.js'
export type { Logger } from './logging/index.js'
