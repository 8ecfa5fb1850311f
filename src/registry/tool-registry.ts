import type { Tool, ToolUse } from '../tools/tool.js'
import { TextBlock, ToolResultBlock } from '../types/messages.js'
import { normalizeError } from '../errors.js'
import { logger } from '../logging/logger.js'

/**
 * Name-keyed collection of tools that dispatches tool uses to them.
 */
export class ToolRegistry {
  private readonly _tools = new Map<string, Tool>()

  /**
   * @param tools - Initial tools to register
   * @throws Error When two tools share a name
   */
  constructor(tools: Tool[] = []) {
    this.addAll(tools)
  }

  /**
   * Registers a tool.
   *
   * @throws Error When a tool with the same name is already registered
   */
  add(tool: Tool): void {
    if (this._tools.has(tool.name)) {
      throw new Error(`Tool with name '${tool.name}' already registered`)
    }
    this._tools.set(tool.name, tool)
  }

  addAll(tools: Tool[]): void {
    for (const tool of tools) {
      this.add(tool)
    }
  }

  get(name: string): Tool | undefined {
    return this._tools.get(name)
  }

  find(predicate: (tool: Tool) => boolean): Tool | undefined {
    return this.values().find(predicate)
  }

  values(): Tool[] {
    return [...this._tools.values()]
  }

  /**
   * Runs the tool named by a tool use and returns its result block.
   *
   * Unknown tools and tools that fail without producing a result yield an error
   * result block instead of throwing, so the caller can hand the failure back to the model.
   *
   * @param toolUse - The model's tool use request
   * @returns The tool result block
   */
  async dispatch(toolUse: ToolUse): Promise<ToolResultBlock> {
    const tool = this.get(toolUse.name)
    if (!tool) {
      logger.warn(`tool_name=<${toolUse.name}> | tool not found in registry`)
      return errorResult(toolUse.toolUseId, `Tool '${toolUse.name}' not found in registry`)
    }

    try {
      const generator = tool.stream({ toolUse })
      let next = await generator.next()
      while (!next.done) {
        next = await generator.next()
      }
      return next.value
    } catch (error) {
      const toolError = normalizeError(error)
      logger.warn(`tool_name=<${toolUse.name}> | tool execution failed`, toolError)
      return errorResult(toolUse.toolUseId, toolError.message, toolError)
    }
  }
}

function errorResult(toolUseId: string, message: string, error?: Error): ToolResultBlock {
  return new ToolResultBlock({
    toolUseId,
    status: 'error',
    content: [new TextBlock(message)],
    ...(error !== undefined ? { error } : {}),
  })
}
