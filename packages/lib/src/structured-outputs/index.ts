/**
 * Structured Outputs Module
 *
 * Zod-backed tool definitions for Claude structured output.
 *
 * @module @campaign-brain/lib/structured-outputs
 */

export {
  buildTool,
  extractToolResult,
  forceToolChoice,
  type ToolBuilderConfig,
  type BuiltTool,
  type ToolContentBlock,
} from './tool-builder';

export { zodToJsonSchema, validateToolSchema, type ToolInputSchema } from './zod-to-schema';
