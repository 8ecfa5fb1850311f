import { z } from 'zod'
import { APPLY_OPERATIONS, SPLIT_STRATEGIES } from '../../notebook/compose.js'
import { jsonObjectSchema } from '../../notebook/schema.js'
import { CELL_TYPES } from '../../notebook/types.js'

const path = z.string().min(1).describe('Path to the .ipynb file')
const paths = z.array(z.string().min(1)).describe('Paths to .ipynb files')
const index = z.number().int().describe('Cell index. Negative values count from the end (-1 is the last cell)')
// Plain strings: an unknown value reaches the operation, which answers with `{ error }`.
const cellType = z.string().describe(`Cell type: ${CELL_TYPES.join(', ')}`)
const metadata = jsonObjectSchema.describe('Metadata as a JSON object')

export const pathInputSchema = z.object({ path })

export const emptyInputSchema = z.object({})

export const getCellInputSchema = z.object({ path, index })

export const searchCellsInputSchema = z.object({
  path,
  pattern: z.string().describe('Regular expression to search for'),
  case_sensitive: z.boolean().default(false).describe('Match case (default: false)'),
})

export const replaceCellInputSchema = z.object({
  path,
  index,
  content: z.string().describe('New cell source'),
})

export const insertCellInputSchema = z.object({
  path,
  index: z
    .number()
    .int()
    .describe('Position the new cell will occupy. Equal to the cell count to append; negative values count from the end'),
  content: z.string().describe('Source of the new cell'),
  cell_type: cellType.default('code').describe(`Type of the new cell: ${CELL_TYPES.join(', ')} (default: code)`),
})

export const appendCellInputSchema = z.object({
  path,
  content: z.string().describe('Source of the new cell'),
  cell_type: cellType.default('code').describe(`Type of the new cell: ${CELL_TYPES.join(', ')} (default: code)`),
})

export const strReplaceInputSchema = z.object({
  path,
  index,
  old_str: z.string().describe('Exact text to replace. Must occur exactly once in the cell'),
  new_str: z.string().describe('Replacement text, inserted literally'),
})

export const getMetadataInputSchema = z.object({
  path,
  cell_index: z.number().int().optional().describe('Cell whose metadata to read. Omit for notebook metadata'),
})

export const updateMetadataInputSchema = z.object({
  path,
  metadata,
  cell_index: z.number().int().optional().describe('Cell whose metadata to update. Omit for notebook metadata'),
})

export const setKernelInputSchema = z.object({
  path,
  kernel_name: z.string().min(1).describe('Kernel name, e.g. python3'),
  display_name: z.string().min(1).describe('Name shown in the notebook UI, e.g. Python 3'),
  language: z.string().default('python').describe('Kernel language (default: python)'),
})

export const replaceCellsInputSchema = z.object({
  path,
  replacements: z
    .array(z.object({ index, content: z.string() }))
    .describe('Replacements, with indices referring to the notebook before any change'),
})

export const deleteCellsInputSchema = z.object({
  path,
  indices: z.array(z.number().int()).describe('Indices of the cells to delete, as they are before any deletion'),
})

export const insertCellsInputSchema = z.object({
  path,
  insertions: z
    .array(
      z.object({
        index: z.number().int(),
        content: z.string(),
        cell_type: cellType.default('code'),
      })
    )
    .describe('Insertions applied in order; each index refers to the notebook after the previous insertions'),
})

export const searchReplaceInputSchema = z.object({
  path,
  pattern: z.string().describe('Regular expression to replace, case-sensitive'),
  replacement: z.string().describe('Replacement text. $1 or \\1, $<name> or \\g<name>, and $& refer to the match'),
  cell_type: cellType.optional().describe(`Only replace in cells of this type: ${CELL_TYPES.join(', ')}`),
})

export const reorderCellsInputSchema = z.object({
  path,
  new_order: z
    .array(z.number().int())
    .describe('Permutation of all cell indices; position k receives the cell currently at new_order[k]'),
})

export const filterCellsInputSchema = z.object({
  path,
  cell_type: cellType.optional().describe(`Keep only cells of this type: ${CELL_TYPES.join(', ')}`),
  pattern: z.string().optional().describe('Keep only cells whose source matches this regular expression'),
})

export const mergeInputSchema = z.object({
  output_path: z.string().min(1).describe('Path of the notebook to create'),
  input_paths: paths,
  add_separators: z.boolean().default(true).describe('Insert a markdown cell naming each source file'),
})

export const splitInputSchema = z.object({
  input_path: path,
  output_dir: z.string().min(1).describe('Directory for the resulting notebooks'),
  split_by: z
    .string()
    .default('markdown_headers')
    .describe(`How to split: ${SPLIT_STRATEGIES.join(', ')} (default: markdown_headers)`),
  cells_per_notebook: z
    .number()
    .int()
    .positive()
    .default(10)
    .describe('Cells per notebook when splitting by cell_count (default: 10)'),
})

export const extractCellsInputSchema = z.object({
  output_path: z.string().min(1).describe('Path of the notebook to create'),
  input_paths: paths,
  pattern: z.string().optional().describe('Only extract cells whose source matches this regular expression'),
  cell_type: cellType.optional().describe(`Only extract cells of this type: ${CELL_TYPES.join(', ')}`),
})

export const searchNotebooksInputSchema = z.object({
  paths,
  pattern: z.string().describe('Regular expression to search for, case-insensitive'),
  return_context: z.boolean().default(true).describe('Include the text around each match (default: true)'),
})

export const syncMetadataInputSchema = z.object({
  paths,
  metadata,
  merge: z.boolean().default(false).describe('Merge top-level keys instead of replacing the metadata (default: false)'),
})

export const clearOutputsInputSchema = z.object({
  paths: z.union([z.string().min(1), paths]).describe('One path or a list of paths'),
})

export const applyInputSchema = z.object({
  paths,
  operation: z.string().describe(`Operation to apply to every notebook: ${APPLY_OPERATIONS.join(', ')}`),
  params: jsonObjectSchema
    .default({})
    .describe(
      'Operation parameters. set_kernel: kernel_name, display_name, language. update_metadata: metadata. clear_outputs: none'
    ),
})

export const validateBatchInputSchema = z.object({ paths })

export type GetCellInput = z.input<typeof getCellInputSchema>
export type SearchCellsInput = z.input<typeof searchCellsInputSchema>
export type InsertCellInput = z.input<typeof insertCellInputSchema>
export type StrReplaceInput = z.input<typeof strReplaceInputSchema>
export type InsertCellsInput = z.input<typeof insertCellsInputSchema>
export type MergeInput = z.input<typeof mergeInputSchema>
export type SplitInput = z.input<typeof splitInputSchema>
export type ApplyInput = z.input<typeof applyInputSchema>
