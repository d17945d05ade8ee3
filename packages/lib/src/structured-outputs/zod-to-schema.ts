/**
 * Zod to JSON Schema Converter
 *
 * Converts Zod schemas to the `input_schema` shape expected by
 * Anthropic's tool use API.
 *
 * @module @campaign-brain/lib/structured-outputs
 */

import { zodToJsonSchema as zodToJsonSchemaLib } from 'zod-to-json-schema';
import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { ZodTypeAny } from 'zod';

/** JSON Schema accepted as a tool's input_schema */
export type ToolInputSchema = Tool['input_schema'];

/**
 * Convert a Zod object schema to a tool input schema.
 *
 * Refs are inlined and the `$schema` marker is dropped. Claude tool
 * inputs must be objects, so any other root type is rejected.
 *
 * @example
 * ```typescript
 * const DraftSchema = z.object({
 *   subject: z.string().describe('Email subject line'),
 *   body: z.string(),
 * });
 *
 * zodToJsonSchema(DraftSchema);
 * // { type: 'object', properties: { subject: {...}, body: {...} }, required: ['subject', 'body'], ... }
 * ```
 */
export function zodToJsonSchema(schema: ZodTypeAny): ToolInputSchema {
  const json: Record<string, unknown> = {
    ...zodToJsonSchemaLib(schema, {
      $refStrategy: 'none',
      target: 'jsonSchema7',
    }),
  };
  delete json.$schema;

  if (json.type !== 'object') {
    throw new Error(`Tool schema root must be an object, got ${String(json.type)}`);
  }

  return { ...json, type: 'object' };
}

/**
 * Validate that a tool input schema lists every required property.
 *
 * @returns True if valid, throws error if invalid
 */
export function validateToolSchema(schema: ToolInputSchema): boolean {
  const properties = schema.properties;
  if (typeof properties !== 'object' || properties === null) {
    throw new Error('Object schema must declare properties');
  }

  const propertyNames = Object.keys(properties);
  if (propertyNames.length === 0) {
    throw new Error('Object schema must have at least one property');
  }

  const required = schema.required;
  if (Array.isArray(required)) {
    for (const name of required) {
      if (typeof name !== 'string' || !propertyNames.includes(name)) {
        throw new Error(`Required property "${String(name)}" not found in schema properties`);
      }
    }
  }

  return true;
}
