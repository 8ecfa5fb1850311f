import { tool } from '../../tools/zod-tool.js'
import type { Tool } from '../../tools/tool.js'
import { ToolRegistry } from '../../registry/tool-registry.js'
import type { NotebookToolsConfig } from '../../notebook/config.js'
import { NotebookOperations } from '../../notebook/operations.js'
import {
  appendCellInputSchema,
  applyInputSchema,
  clearOutputsInputSchema,
  deleteCellsInputSchema,
  emptyInputSchema,
  extractCellsInputSchema,
  filterCellsInputSchema,
  getCellInputSchema,
  getMetadataInputSchema,
  insertCellInputSchema,
  insertCellsInputSchema,
  mergeInputSchema,
  pathInputSchema,
  reorderCellsInputSchema,
  replaceCellInputSchema,
  replaceCellsInputSchema,
  searchCellsInputSchema,
  searchNotebooksInputSchema,
  searchReplaceInputSchema,
  setKernelInputSchema,
  splitInputSchema,
  strReplaceInputSchema,
  syncMetadataInputSchema,
  updateMetadataInputSchema,
  validateBatchInputSchema,
} from './types.js'

/**
 * Creates the notebook editing tools.
 *
 * Every tool returns either its result with `success: true` or `{ error }` describing why the
 * operation failed, so the model can correct itself. That includes unknown cell types and
 * operation names. Only input of the wrong shape, such as a missing path or a fractional index,
 * produces an error result block.
 *
 * @param config - Project root and formatting options shared by all tools
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry(createNotebookTools({ projectRoot: '/work/project' }))
 *
 * const result = await registry.dispatch({
 *   name: 'notebook_get_cell',
 *   toolUseId: 'tool-1',
 *   input: { path: 'analysis.ipynb', index: -1 },
 * })
 * ```
 */
export function createNotebookTools(config?: NotebookToolsConfig): Tool[] {
  const notebooks = new NotebookOperations(config)

  return [
    tool({
      name: 'notebook_read',
      description:
        'Summarizes a Jupyter notebook: number of cells per type, kernel and nbformat version. Start here before editing.',
      inputSchema: pathInputSchema,
      callback: ({ path }) => notebooks.readNotebook(path),
    }),
    tool({
      name: 'notebook_list_cells',
      description: 'Lists every cell with its index, type, execution count and a short preview of its source.',
      inputSchema: pathInputSchema,
      callback: ({ path }) => notebooks.listCells(path),
    }),
    tool({
      name: 'notebook_get_cell',
      description: 'Returns the full source, type and metadata of one cell. Negative indices count from the end.',
      inputSchema: getCellInputSchema,
      callback: ({ path, index }) => notebooks.getCell(path, index),
    }),
    tool({
      name: 'notebook_search_cells',
      description:
        'Searches cell sources for a regular expression. Returns one result per match with the cell index, the match and surrounding text.',
      inputSchema: searchCellsInputSchema,
      callback: ({ path, pattern, case_sensitive }) => notebooks.searchCells(path, pattern, case_sensitive),
    }),
    tool({
      name: 'notebook_get_info',
      description: 'Returns the notebook summary together with its resolved path and file size in bytes.',
      inputSchema: pathInputSchema,
      callback: ({ path }) => notebooks.getNotebookInfo(path),
    }),
    tool({
      name: 'notebook_replace_cell',
      description: "Replaces a cell's source. The cell type, metadata and outputs are kept.",
      inputSchema: replaceCellInputSchema,
      callback: ({ path, index, content }) => notebooks.replaceCell(path, index, content),
    }),
    tool({
      name: 'notebook_insert_cell',
      description:
        'Inserts a new cell so that it ends up at the given index; cells from that index on move down by one.',
      inputSchema: insertCellInputSchema,
      callback: ({ path, index, content, cell_type }) => notebooks.insertCell(path, index, content, cell_type),
    }),
    tool({
      name: 'notebook_append_cell',
      description: 'Adds a new cell at the end of the notebook and returns its index.',
      inputSchema: appendCellInputSchema,
      callback: ({ path, content, cell_type }) => notebooks.appendCell(path, content, cell_type),
    }),
    tool({
      name: 'notebook_delete_cell',
      description: 'Deletes one cell; later cells move up by one.',
      inputSchema: getCellInputSchema,
      callback: ({ path, index }) => notebooks.deleteCell(path, index),
    }),
    tool({
      name: 'notebook_str_replace',
      description:
        'Replaces text inside one cell. old_str must occur exactly once in the cell; include surrounding text when it is not unique.',
      inputSchema: strReplaceInputSchema,
      callback: ({ path, index, old_str, new_str }) => notebooks.strReplaceInCell(path, index, old_str, new_str),
    }),
    tool({
      name: 'notebook_get_metadata',
      description: 'Returns the notebook metadata, or the metadata of one cell when cell_index is given.',
      inputSchema: getMetadataInputSchema,
      callback: ({ path, cell_index }) => notebooks.getMetadata(path, cell_index),
    }),
    tool({
      name: 'notebook_update_metadata',
      description:
        'Merges keys into the notebook metadata, or into one cell when cell_index is given. Given keys replace existing ones whole.',
      inputSchema: updateMetadataInputSchema,
      callback: ({ path, metadata, cell_index }) => notebooks.updateMetadata(path, metadata, cell_index),
    }),
    tool({
      name: 'notebook_set_kernel',
      description: 'Sets the kernelspec of a notebook. See notebook_list_kernels for common kernels.',
      inputSchema: setKernelInputSchema,
      callback: ({ path, kernel_name, display_name, language }) =>
        notebooks.setKernel(path, kernel_name, display_name, language),
    }),
    tool({
      name: 'notebook_list_kernels',
      description: 'Lists kernelspecs of commonly installed Jupyter kernels.',
      inputSchema: emptyInputSchema,
      callback: () => notebooks.listAvailableKernels(),
    }),
    tool({
      name: 'notebook_replace_cells',
      description:
        'Replaces the source of several cells at once. All indices refer to the notebook before the call; one invalid index cancels every replacement.',
      inputSchema: replaceCellsInputSchema,
      callback: ({ path, replacements }) => notebooks.replaceCellsBatch(path, replacements),
    }),
    tool({
      name: 'notebook_delete_cells',
      description:
        'Deletes several cells at once. Indices refer to the notebook before any deletion, so their order does not matter.',
      inputSchema: deleteCellsInputSchema,
      callback: ({ path, indices }) => notebooks.deleteCellsBatch(path, indices),
    }),
    tool({
      name: 'notebook_insert_cells',
      description:
        'Inserts several cells in the order given. Each index refers to the notebook after the previous insertions: inserting A at 0 and then B at 0 puts B before A.',
      inputSchema: insertCellsInputSchema,
      callback: ({ path, insertions }) =>
        notebooks.insertCellsBatch(
          path,
          insertions.map(({ index, content, cell_type }) => ({ index, content, cellType: cell_type }))
        ),
    }),
    tool({
      name: 'notebook_search_replace',
      description:
        'Replaces every match of a regular expression in all cells, or in cells of one type. Returns the number of replacements.',
      inputSchema: searchReplaceInputSchema,
      callback: ({ path, pattern, replacement, cell_type }) =>
        notebooks.searchReplaceAll(path, pattern, replacement, cell_type),
    }),
    tool({
      name: 'notebook_reorder_cells',
      description: 'Reorders cells. new_order must list every current cell index exactly once.',
      inputSchema: reorderCellsInputSchema,
      callback: ({ path, new_order }) => notebooks.reorderCells(path, new_order),
    }),
    tool({
      name: 'notebook_filter_cells',
      description:
        'Keeps only the cells matching every given criterion and deletes the others. With no criterion nothing is deleted.',
      inputSchema: filterCellsInputSchema,
      callback: ({ path, cell_type, pattern }) => notebooks.filterCells(path, cell_type, pattern),
    }),
    tool({
      name: 'notebook_merge',
      description:
        'Creates a notebook from the cells of several notebooks, in order. Metadata is taken from the first input.',
      inputSchema: mergeInputSchema,
      callback: ({ output_path, input_paths, add_separators }) =>
        notebooks.mergeNotebooks(output_path, input_paths, add_separators),
    }),
    tool({
      name: 'notebook_split',
      description:
        'Splits a notebook into several notebooks named <name>_section_<n>.ipynb, at markdown headings or every cells_per_notebook cells.',
      inputSchema: splitInputSchema,
      callback: ({ input_path, output_dir, split_by, cells_per_notebook }) =>
        notebooks.splitNotebook(input_path, output_dir, split_by, cells_per_notebook),
    }),
    tool({
      name: 'notebook_extract_cells',
      description:
        'Copies the cells matching every given criterion from several notebooks into a new notebook, keeping their order.',
      inputSchema: extractCellsInputSchema,
      callback: ({ output_path, input_paths, pattern, cell_type }) =>
        notebooks.extractCells(output_path, input_paths, pattern, cell_type),
    }),
    tool({
      name: 'notebook_search_notebooks',
      description: 'Searches several notebooks for a regular expression. Each result names the notebook it came from.',
      inputSchema: searchNotebooksInputSchema,
      callback: ({ paths, pattern, return_context }) => notebooks.searchNotebooks(paths, pattern, return_context),
    }),
    tool({
      name: 'notebook_sync_metadata',
      description: 'Writes the same metadata to several notebooks, replacing or merging their existing metadata.',
      inputSchema: syncMetadataInputSchema,
      callback: ({ paths, metadata, merge }) => notebooks.syncMetadata(paths, metadata, merge),
    }),
    tool({
      name: 'notebook_clear_outputs',
      description: 'Removes outputs and execution counts from every code cell of one or more notebooks.',
      inputSchema: clearOutputsInputSchema,
      callback: ({ paths }) => notebooks.clearOutputs(paths),
    }),
    tool({
      name: 'notebook_apply',
      description:
        'Applies set_kernel, clear_outputs or update_metadata to several notebooks. A failure on one notebook does not stop the others.',
      inputSchema: applyInputSchema,
      callback: ({ paths, operation, params }) => notebooks.applyToNotebooks(paths, operation, params),
    }),
    tool({
      name: 'notebook_validate',
      description: 'Checks that a notebook is a structurally valid nbformat 4 document.',
      inputSchema: pathInputSchema,
      callback: ({ path }) => notebooks.validateNotebook(path),
    }),
    tool({
      name: 'notebook_validate_batch',
      description: 'Validates several notebooks. Unreadable files are reported as invalid.',
      inputSchema: validateBatchInputSchema,
      callback: ({ paths }) => notebooks.validateNotebooksBatch(paths),
    }),
  ]
}

/**
 * Creates a registry holding every notebook tool.
 */
export function createNotebookToolRegistry(config?: NotebookToolsConfig): ToolRegistry {
  return new ToolRegistry(createNotebookTools(config))
}
