/**
 * Tools for reading and editing Jupyter notebooks on the local filesystem.
 */

export { createNotebookTools, createNotebookToolRegistry } from './notebook.js'
export type {
  GetCellInput,
  SearchCellsInput,
  InsertCellInput,
  StrReplaceInput,
  InsertCellsInput,
  MergeInput,
  SplitInput,
  ApplyInput,
} from './types.js'
