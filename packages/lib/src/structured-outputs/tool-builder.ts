/**
 * Tool Builder Utility
 *
 * Creates forced-choice structured output tools from Zod schemas for
 * Claude API calls, and parses the tool input Claude sends back.
 *
 * @module @campaign-brain/lib/structured-outputs
 */

import type { Tool } from '@anthropic-ai/sdk/resources/messages';
import type { ZodTypeAny, z } from 'zod';
import { zodToJsonSchema, validateToolSchema } from './zod-to-schema';

/**
 * Configuration for building a structured output tool
 */
export interface ToolBuilderConfig<T extends ZodTypeAny> {
  /** Unique name for the tool */
  name: string;
  /** Description of what the tool does (shown to Claude) */
  description: string;
  /** Zod schema defining the expected output structure */
  schema: T;
}

/**
 * A built tool ready for use with Claude API
 */
export interface BuiltTool<T> {
  tool: Tool;
  /** Parse and validate the tool result, throwing a ZodError on mismatch */
  parse: (result: unknown) => T;
  name: string;
}

/**
 * Content block shape shared by every Claude response block
 */
export interface ToolContentBlock {
  type: string;
  name?: string;
  input?: unknown;
}

/**
 * Build a structured output tool from a Zod schema.
 *
 * @example
 * ```typescript
 * const draftTool = buildTool({
 *   name: 'write_campaign_message',
 *   description: 'Write one outreach message',
 *   schema: MessageDraftSchema,
 * });
 *
 * const response = await client.messages.create({
 *   model,
 *   max_tokens: 1024,
 *   tools: [draftTool.tool],
 *   tool_choice: forceToolChoice(draftTool.name),
 *   messages,
 * });
 *
 * const draft = draftTool.parse(extractToolResult(response.content, draftTool.name));
 * ```
 */
export function buildTool<T extends ZodTypeAny>(
  config: ToolBuilderConfig<T>
): BuiltTool<z.infer<T>> {
  const inputSchema = zodToJsonSchema(config.schema);
  validateToolSchema(inputSchema);

  return {
    tool: {
      name: config.name,
      description: config.description,
      input_schema: inputSchema,
    },
    name: config.name,
    parse: (result: unknown): z.infer<T> => config.schema.parse(result),
  };
}

/**
 * Find the first tool_use block for a tool and return its input.
 *
 * @returns The tool input or null if Claude did not call the tool
 */
export function extractToolResult(
  content: readonly ToolContentBlock[],
  toolName: string
): unknown {
  const toolUse = content.find((block) => block.type === 'tool_use' && block.name === toolName);
  return toolUse?.input ?? null;
}

/**
 * tool_choice that forces Claude to answer through one tool
 */
export function forceToolChoice(toolName: string): { type: 'tool'; name: string } {
  return { type: 'tool', name: toolName };
}
