/**
 * Observability Module for Campaign Brain
 *
 * Langfuse integration for tracing and scoring campaign runs.
 *
 * @example
 * ```typescript
 * import {
 *   createCampaignTrace,
 *   endCampaignTrace,
 *   flushLangfuse,
 * } from '@campaign-brain/lib/observability';
 *
 * const trace = createCampaignTrace({ executionId, leadId, leadData });
 * // ... run the pipeline ...
 * if (trace) endCampaignTrace(trace.traceId, { finalStatus: 'APPROVED', ... });
 * await flushLangfuse();
 * ```
 */

// Client management
export {
  initLangfuse,
  getLangfuse,
  isLangfuseEnabled,
  getLangfuseStatus,
  describeLangfuseStatus,
  flushLangfuse,
  shutdownLangfuse,
  resetLangfuse,
  resolveLangfuseConfig,
  type LangfuseStatus,
} from './langfuse-client';

// Tracing utilities
export {
  createAgentTrace,
  getTraceContext,
  endTrace,
  createGeneration,
  endGeneration,
  createCampaignTrace,
  endCampaignTrace,
  withGeneration,
  type TraceContext,
} from './tracing';

// Scoring utilities
export { recordScore, recordCampaignQuality } from './scoring';

// Types
export type {
  AgentName,
  TraceMetadata,
  CreateTraceInput,
  GenerationInput,
  GenerationOutput,
  ScoreDataType,
  CampaignScoreName,
  CreateScoreInput,
  CampaignTraceInput,
  CampaignTraceOutput,
  CampaignQualityResults,
  LangfuseConfig,
} from './types';

export { LANGFUSE_ENV_VARS } from './types';
