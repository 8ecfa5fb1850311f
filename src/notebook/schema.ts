/**
 * Structural validator for nbformat 4 documents.
 *
 * Covers the parts of the nbformat 4 JSON schema the tools rely on: top-level layout,
 * the three cell shapes, output records, cell ids and the kernelspec descriptor.
 * Cell ids are required from nbformat 4.5 and not allowed before it.
 */

import { z } from 'zod'
import type { JSONValue } from '../types/json.js'

export const jsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ])
)

export const jsonObjectSchema = z.record(z.string(), jsonValueSchema)

/**
 * First minor version of nbformat 4 whose cells carry an `id`.
 */
export const CELL_IDS_MINOR = 5

const OUTPUT_TYPES = ['stream', 'display_data', 'execute_result', 'error']

/**
 * Multiline strings are stored either as one string or as a list of lines.
 */
const sourceSchema = z.union([z.string(), z.array(z.string())])

const cellIdSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-zA-Z0-9_-]+$/, 'Cell id may only contain letters, digits, "-" and "_"')

const outputSchema = jsonObjectSchema.refine(
  (output) => typeof output.output_type === 'string' && OUTPUT_TYPES.includes(output.output_type),
  { message: `Output must have an output_type of ${OUTPUT_TYPES.join(', ')}` }
)

const codeCellSchema = z.strictObject({
  cell_type: z.literal('code'),
  id: cellIdSchema.optional(),
  metadata: jsonObjectSchema,
  source: sourceSchema,
  outputs: z.array(outputSchema),
  execution_count: z.number().int().nullable(),
})

const markdownCellSchema = z.strictObject({
  cell_type: z.literal('markdown'),
  id: cellIdSchema.optional(),
  metadata: jsonObjectSchema,
  source: sourceSchema,
  attachments: jsonObjectSchema.optional(),
})

const rawCellSchema = z.strictObject({
  cell_type: z.literal('raw'),
  id: cellIdSchema.optional(),
  metadata: jsonObjectSchema,
  source: sourceSchema,
  attachments: jsonObjectSchema.optional(),
})

export const cellDocumentSchema = z.discriminatedUnion('cell_type', [codeCellSchema, markdownCellSchema, rawCellSchema])

const notebookMetadataSchema = jsonObjectSchema.refine((metadata) => isValidKernelspec(metadata.kernelspec), {
  message: 'kernelspec must be an object with string name and display_name',
  path: ['kernelspec'],
})

export const notebookDocumentSchema = z
  .strictObject({
    nbformat: z.literal(4),
    nbformat_minor: z.number().int().nonnegative(),
    metadata: notebookMetadataSchema,
    cells: z.array(cellDocumentSchema),
  })
  .refine((notebook) => findDuplicateId(notebook.cells) === undefined, {
    message: 'Cell ids must be unique',
    path: ['cells'],
  })
  .superRefine((notebook, ctx) => {
    const idsRequired = notebook.nbformat_minor >= CELL_IDS_MINOR
    notebook.cells.forEach((cell, index) => {
      if (idsRequired && cell.id === undefined) {
        ctx.addIssue({
          code: 'custom',
          message: `Cell id is required from nbformat 4.${CELL_IDS_MINOR}`,
          path: ['cells', index, 'id'],
        })
      } else if (!idsRequired && cell.id !== undefined) {
        ctx.addIssue({
          code: 'custom',
          message: `Cell ids are not allowed before nbformat 4.${CELL_IDS_MINOR}`,
          path: ['cells', index, 'id'],
        })
      }
    })
  })

/**
 * A notebook exactly as it is stored on disk.
 */
export type NotebookDocument = z.output<typeof notebookDocumentSchema>

export type CellDocument = z.output<typeof cellDocumentSchema>

/**
 * Outcome of validating a document.
 */
export type ValidationReport = { valid: true; document: NotebookDocument } | { valid: false; message: string }

/**
 * Validates a parsed JSON value against the nbformat 4 structure.
 *
 * @param value - Parsed JSON
 * @returns The typed document, or a readable description of every problem found
 */
export function validateDocument(value: unknown): ValidationReport {
  const result = notebookDocumentSchema.safeParse(value)
  if (result.success) {
    return { valid: true, document: result.data }
  }
  return { valid: false, message: z.prettifyError(result.error) }
}

function isValidKernelspec(kernelspec: JSONValue | undefined): boolean {
  if (kernelspec === undefined) {
    return true
  }
  if (kernelspec === null || typeof kernelspec !== 'object' || Array.isArray(kernelspec)) {
    return false
  }
  return typeof kernelspec.name === 'string' && typeof kernelspec.display_name === 'string'
}

function findDuplicateId(cells: { id?: string | undefined }[]): string | undefined {
  const seen = new Set<string>()
  for (const cell of cells) {
    if (cell.id === undefined) {
      continue
    }
    if (seen.has(cell.id)) {
      return cell.id
    }
    seen.add(cell.id)
  }
  return undefined
}
