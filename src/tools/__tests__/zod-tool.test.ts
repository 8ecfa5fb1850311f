import { describe, it, expect } from 'vitest'
import { z } from 'zod'
import { tool } from '../zod-tool.js'
import { ToolValidationError } from '../../errors.js'
import { JsonBlock } from '../../types/messages.js'
import { resultJson, resultText, runTool } from '../../__fixtures__/tool-helpers.js'

describe('tool', () => {
  const greet = tool({
    name: 'greet',
    description: 'Greets someone by name.',
    inputSchema: z.object({ name: z.string(), punctuation: z.string().default('!') }),
    callback: ({ name, punctuation }) => ({ greeting: `Hello, ${name}${punctuation}` }),
  })

  it('exposes name, description and a JSON Schema tool spec', () => {
    expect(greet.name).toBe('greet')
    expect(greet.description).toBe('Greets someone by name.')
    expect(greet.toolSpec).toMatchObject({
      name: 'greet',
      description: 'Greets someone by name.',
      inputSchema: {
        type: 'object',
        properties: { name: { type: 'string' } },
        required: ['name'],
      },
    })
  })

  describe('invoke', () => {
    it('passes parsed input with defaults applied to the callback', async () => {
      expect(await greet.invoke({ name: 'Ada' })).toEqual({ greeting: 'Hello, Ada!' })
      expect(await greet.invoke({ name: 'Ada', punctuation: '.' })).toEqual({ greeting: 'Hello, Ada.' })
    })

    it('rejects input that does not match the schema', async () => {
      await expect(greet.invoke(JSON.parse('{"name": 42}'))).rejects.toThrow(ToolValidationError)
      await expect(greet.invoke(JSON.parse('{"name": 42}'))).rejects.toThrow(/^Invalid input for tool 'greet': /)
    })

    it('awaits asynchronous callbacks', async () => {
      const slow = tool({
        name: 'slow',
        description: 'Resolves later.',
        inputSchema: z.object({}),
        callback: async () => 'done',
      })
      expect(await slow.invoke({})).toBe('done')
    })
  })

  describe('stream', () => {
    it('returns a success block with the JSON result', async () => {
      const block = await runTool(greet, { name: 'Grace' }, 'use-1')

      expect(block.toolUseId).toBe('use-1')
      expect(block.status).toBe('success')
      expect(block.content[0]).toBeInstanceOf(JsonBlock)
      expect(resultJson(block)).toEqual({ greeting: 'Hello, Grace!' })
    })

    it('returns an error block for invalid input', async () => {
      const block = await runTool(greet, { name: null })

      expect(block.status).toBe('error')
      expect(block.error).toBeInstanceOf(ToolValidationError)
      expect(resultText(block)).toMatch(/^Invalid input for tool 'greet': /)
    })

    it('returns an error block when the callback throws', async () => {
      const failing = tool({
        name: 'failing',
        description: 'Always fails.',
        inputSchema: z.object({}),
        callback: (): string => {
          throw new Error('boom')
        },
      })

      const block = await runTool(failing, {})

      expect(block.status).toBe('error')
      expect(resultText(block)).toBe('boom')
      expect(block.error?.message).toBe('boom')
    })
  })
})
