import { resolve } from 'node:path'
import { z } from 'zod'

/**
 * Configuration for the notebook store and tools.
 */
export type NotebookToolsConfig = {
  /**
   * Directory that confines every file operation. Relative paths resolve against it and
   * paths that escape it are rejected. When unset, absolute paths are used as given and
   * relative paths resolve against the working directory.
   */
  projectRoot?: string

  /**
   * Characters shown in each cell preview of list_cells. Defaults to 100.
   */
  previewLength?: number

  /**
   * Characters of context kept on each side of a search match. Defaults to 50.
   */
  searchContextChars?: number

  /**
   * JSON indentation used when writing notebooks. Defaults to 1, as Jupyter writes them.
   */
  indent?: number
}

export type ResolvedNotebookToolsConfig = {
  projectRoot: string | undefined
  previewLength: number
  searchContextChars: number
  indent: number
}

const configSchema = z.object({
  projectRoot: z.string().min(1).optional(),
  previewLength: z.number().int().positive().default(100),
  searchContextChars: z.number().int().nonnegative().default(50),
  indent: z.number().int().min(0).max(8).default(1),
})

/**
 * Applies defaults and checks value ranges.
 *
 * @throws Error When a configured value is out of range
 */
export function resolveConfig(config?: NotebookToolsConfig): ResolvedNotebookToolsConfig {
  const parsed = configSchema.safeParse(config ?? {})
  if (!parsed.success) {
    throw new Error(`Invalid notebook tools configuration: ${z.prettifyError(parsed.error)}`)
  }
  const { projectRoot, previewLength, searchContextChars, indent } = parsed.data
  return {
    projectRoot: projectRoot === undefined ? undefined : resolve(projectRoot),
    previewLength,
    searchContextChars,
    indent,
  }
}
