import type { JSONSchema as ZodJSONSchema } from 'zod/v4/core'

/**
 * Any value that survives a JSON round trip.
 */
export type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue }

/**
 * A JSON object with arbitrary keys.
 */
export type JSONObject = { [key: string]: JSONValue }

/**
 * JSON Schema document as produced from a zod schema.
 */
export type JSONSchema = ZodJSONSchema.BaseSchema
