/**
 * Campaign Brain Library
 *
 * Shared utilities for the campaign generation agents.
 */

// Types
export * from './types';

// Observability (Langfuse integration)
export * from './observability';

// Structured Outputs (Zod to JSON Schema for Claude tools)
export * from './structured-outputs';
