import type { JSONValue } from './json.js'

/**
 * Plain text content.
 */
export class TextBlock {
  readonly type = 'textBlock' as const
  readonly text: string

  constructor(text: string) {
    this.text = text
  }
}

/**
 * Structured JSON content.
 */
export class JsonBlock {
  readonly type = 'jsonBlock' as const
  readonly json: JSONValue

  constructor(json: JSONValue) {
    this.json = json
  }
}

/**
 * Content allowed inside a tool result.
 */
export type ToolResultContent = TextBlock | JsonBlock

/**
 * Status of a tool result.
 */
export type ToolResultStatus = 'success' | 'error'

/**
 * Data for constructing a ToolResultBlock.
 */
export interface ToolResultBlockData {
  /**
   * Identifier of the tool use this result answers.
   */
  toolUseId: string

  /**
   * Whether the tool completed or failed.
   */
  status: ToolResultStatus

  /**
   * Result payload.
   */
  content: ToolResultContent[]

  /**
   * The error that caused an error status, when one was thrown.
   */
  error?: Error
}

/**
 * Result of a single tool execution, ready to be returned to the model.
 */
export class ToolResultBlock {
  readonly type = 'toolResultBlock' as const
  readonly toolUseId: string
  readonly status: ToolResultStatus
  readonly content: ToolResultContent[]
  readonly error?: Error

  constructor(data: ToolResultBlockData) {
    this.toolUseId = data.toolUseId
    this.status = data.status
    this.content = data.content
    if (data.error !== undefined) {
      this.error = data.error
    }
  }
}
