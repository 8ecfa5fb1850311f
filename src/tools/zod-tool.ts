import { z } from 'zod'
import type { InvokableTool, ToolContext, ToolSpec, ToolStreamGenerator } from './tool.js'
import type { JSONValue } from '../types/json.js'
import { JsonBlock, TextBlock, ToolResultBlock } from '../types/messages.js'
import { normalizeError, ToolValidationError } from '../errors.js'

/**
 * Configuration for a tool whose input is described by a zod schema.
 */
export interface ZodToolConfig<TSchema extends z.ZodType, TReturn extends JSONValue> {
  /**
   * Tool name. Must be unique within a registry.
   */
  name: string

  /**
   * Description shown to the model.
   */
  description: string

  /**
   * Schema the input must satisfy. Also converted to JSON Schema for the tool spec.
   */
  inputSchema: TSchema

  /**
   * Implementation, called with the parsed input.
   */
  callback: (input: z.output<TSchema>, context?: ToolContext) => TReturn | Promise<TReturn>
}

/**
 * Tool backed by a zod schema and a callback.
 */
class ZodTool<TSchema extends z.ZodType, TReturn extends JSONValue>
  implements InvokableTool<z.input<TSchema>, TReturn>
{
  readonly name: string
  readonly description: string
  readonly toolSpec: ToolSpec
  private readonly _inputSchema: TSchema
  private readonly _callback: ZodToolConfig<TSchema, TReturn>['callback']

  constructor(config: ZodToolConfig<TSchema, TReturn>) {
    this.name = config.name
    this.description = config.description
    this._inputSchema = config.inputSchema
    this._callback = config.callback
    this.toolSpec = {
      name: config.name,
      description: config.description,
      inputSchema: z.toJSONSchema(config.inputSchema, { io: 'input' }),
    }
  }

  async invoke(input: z.input<TSchema>, context?: ToolContext): Promise<TReturn> {
    return this._run(input, context)
  }

  // eslint-disable-next-line require-yield
  async *stream(context: ToolContext): ToolStreamGenerator {
    const toolUseId = context.toolUse.toolUseId
    try {
      const result = await this._run(context.toolUse.input, context)
      return new ToolResultBlock({
        toolUseId,
        status: 'success',
        content: [new JsonBlock(result)],
      })
    } catch (error) {
      const toolError = normalizeError(error)
      return new ToolResultBlock({
        toolUseId,
        status: 'error',
        content: [new TextBlock(toolError.message)],
        error: toolError,
      })
    }
  }

  private async _run(input: unknown, context?: ToolContext): Promise<TReturn> {
    const parsed = this._inputSchema.safeParse(input)
    if (!parsed.success) {
      throw new ToolValidationError(`Invalid input for tool '${this.name}': ${z.prettifyError(parsed.error)}`)
    }
    return await this._callback(parsed.data, context)
  }
}

/**
 * Creates a tool from a zod input schema and a callback.
 *
 * The input is validated against the schema before the callback runs, both for direct
 * invocation and when the tool is streamed for a model's tool use.
 *
 * @example
 * ```typescript
 * const greet = tool({
 *   name: 'greet',
 *   description: 'Greets someone by name.',
 *   inputSchema: z.object({ name: z.string() }),
 *   callback: ({ name }) => `Hello, ${name}`,
 * })
 *
 * await greet.invoke({ name: 'Ada' }) // 'Hello, Ada'
 * ```
 */
export function tool<TSchema extends z.ZodType, TReturn extends JSONValue>(
  config: ZodToolConfig<TSchema, TReturn>
): InvokableTool<z.input<TSchema>, TReturn> {
  return new ZodTool(config)
}
