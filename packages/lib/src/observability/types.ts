/**
 * Observability Types for Campaign Brain
 *
 * Type definitions for Langfuse integration and tracing.
 */

import type { ExecutionId, LeadId, CampaignStatus, MessageType } from '../types';

// ===========================================
// Agent Names
// ===========================================

/** Agent names for tracing */
export type AgentName = 'campaign_brain';

// ===========================================
// Trace Types
// ===========================================

/** Trace metadata for agent operations */
export interface TraceMetadata {
  agentName: AgentName;
  executionId: ExecutionId;
  sessionId?: string;
  tags?: string[];
  environment?: 'development' | 'staging' | 'production';
}

/** Input for creating an agent trace */
export interface CreateTraceInput {
  name: string;
  metadata: TraceMetadata;
  input?: Record<string, unknown>;
}

// ===========================================
// Generation Types (LLM Calls)
// ===========================================

/** LLM generation input */
export interface GenerationInput {
  name: string;
  model: string;
  input: unknown;
  modelParameters?: {
    temperature?: number;
    maxTokens?: number;
  };
  metadata?: Record<string, unknown>;
}

/** LLM generation output */
export interface GenerationOutput {
  output: unknown;
  usage?: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  latencyMs?: number;
  error?: string;
}

// ===========================================
// Score Types
// ===========================================

/** Score data types supported by Langfuse */
export type ScoreDataType = 'NUMERIC' | 'CATEGORICAL' | 'BOOLEAN';

/** Custom score names recorded against campaign traces */
export type CampaignScoreName =
  | 'campaign_quality'
  | 'message_quality'
  | 'retry_count'
  | 'fallback_used';

/** Input for creating a score */
export interface CreateScoreInput {
  traceId: string;
  observationId?: string;
  name: CampaignScoreName;
  value: number;
  dataType?: ScoreDataType;
  comment?: string;
}

// ===========================================
// Campaign Brain Specific Types
// ===========================================

/** Campaign trace input */
export interface CampaignTraceInput {
  executionId: ExecutionId;
  leadId: LeadId;
  leadData: {
    company: string;
    title: string;
  };
}

/** Campaign trace output */
export interface CampaignTraceOutput {
  finalStatus: CampaignStatus;
  statusReason: string;
  overallQualityScore: number;
  retryCount: number;
  fallbackMode: boolean;
  messagingAngle: string | null;
  processingTimeMs: number;
}

/** Per-run quality results recorded as Langfuse scores */
export interface CampaignQualityResults {
  overallQualityScore: number;
  messageScores: Partial<Record<MessageType, number>>;
  retryCount: number;
  fallbackMode: boolean;
}

// ===========================================
// Configuration Types
// ===========================================

/** Langfuse client configuration */
export interface LangfuseConfig {
  publicKey: string;
  secretKey: string;
  baseUrl?: string;
  enabled?: boolean;
  flushAt?: number;
  flushInterval?: number;
  requestTimeout?: number;
}

/** Environment variable names for Langfuse */
export const LANGFUSE_ENV_VARS = {
  publicKey: 'LANGFUSE_PUBLIC_KEY',
  secretKey: 'LANGFUSE_SECRET_KEY',
  baseUrl: 'LANGFUSE_BASE_URL',
} as const;
