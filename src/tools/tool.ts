import type { JSONSchema, JSONValue } from '../types/json.js'
import type { ToolResultBlock } from '../types/messages.js'

/**
 * Description of a tool as presented to a model.
 */
export interface ToolSpec {
  name: string
  description: string
  inputSchema: JSONSchema
}

/**
 * A request from a model to run a tool.
 */
export interface ToolUse {
  /**
   * Name of the tool to run.
   */
  name: string

  /**
   * Identifier used to correlate the result with this request.
   */
  toolUseId: string

  /**
   * Raw tool input, validated by the tool before use.
   */
  input: JSONValue
}

/**
 * Context passed to a tool while it runs.
 */
export interface ToolContext {
  toolUse: ToolUse
}

/**
 * Progress data a tool may report while streaming.
 */
export interface ToolStreamEventData {
  data?: JSONValue
}

/**
 * Event yielded by a streaming tool before it returns its result.
 */
export interface ToolStreamEvent extends ToolStreamEventData {
  type: 'toolStreamEvent'
}

/**
 * Generator type returned by Tool.stream().
 */
export type ToolStreamGenerator = AsyncGenerator<ToolStreamEvent, ToolResultBlock, undefined>

/**
 * A tool that can be executed on behalf of a model.
 */
export interface Tool {
  /**
   * Unique tool name.
   */
  name: string

  /**
   * Human and model facing description.
   */
  description: string

  /**
   * Specification sent to the model.
   */
  toolSpec: ToolSpec

  /**
   * Runs the tool for a tool use, yielding progress events and returning the result block.
   * Never throws: failures become error result blocks.
   */
  stream(context: ToolContext): ToolStreamGenerator
}

/**
 * A tool that can also be called directly with typed input.
 */
export interface InvokableTool<TInput, TReturn extends JSONValue> extends Tool {
  /**
   * Validates the input and runs the tool, resolving to its return value.
   *
   * @throws ToolValidationError When the input does not match the input schema
   */
  invoke(input: TInput, context?: ToolContext): Promise<TReturn>
}
