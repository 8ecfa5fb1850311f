/**
 * Test fixtures and helpers for Tool testing.
 */

import type { Tool, ToolContext } from '../tools/tool.js'
import { JsonBlock, TextBlock, ToolResultBlock } from '../types/messages.js'
import type { JSONValue } from '../types/json.js'

/**
 * Helper to create a mock ToolContext for testing.
 *
 * @param toolUse - The tool use request
 * @returns Mock ToolContext object
 */
export function createMockContext(toolUse: { name: string; toolUseId: string; input: JSONValue }): ToolContext {
  return { toolUse }
}

/**
 * Helper to create a mock tool for testing.
 *
 * @param name - The name of the mock tool
 * @param resultFn - Returns the result block, or throws to simulate a failing tool
 * @returns Mock Tool object
 */
export function createMockTool(name: string, resultFn: () => ToolResultBlock): Tool {
  return {
    name,
    description: `Mock tool ${name}`,
    toolSpec: {
      name,
      description: `Mock tool ${name}`,
      inputSchema: { type: 'object', properties: {} },
    },
    // eslint-disable-next-line require-yield
    async *stream(_context): AsyncGenerator<never, ToolResultBlock, undefined> {
      return resultFn()
    },
  }
}

/**
 * Runs a tool for a tool use and returns the final result block.
 */
export async function runTool(tool: Tool, input: JSONValue, toolUseId = 'test-id'): Promise<ToolResultBlock> {
  const generator = tool.stream(createMockContext({ name: tool.name, toolUseId, input }))
  let next = await generator.next()
  while (!next.done) {
    next = await generator.next()
  }
  return next.value
}

/**
 * Returns the JSON payload of a successful result block.
 *
 * @throws Error When the block is not a success or carries no JSON content
 */
export function resultJson(block: ToolResultBlock): JSONValue {
  const content = block.content[0]
  if (block.status !== 'success' || !(content instanceof JsonBlock)) {
    throw new Error(`Expected a JSON success result, got ${block.status}`)
  }
  return content.json
}

/**
 * Returns the message of an error result block.
 *
 * @throws Error When the block is not an error or carries no text content
 */
export function resultText(block: ToolResultBlock): string {
  const content = block.content[0]
  if (block.status !== 'error' || !(content instanceof TextBlock)) {
    throw new Error(`Expected a text error result, got ${block.status}`)
  }
  return content.text
}
