/**
 * Campaign Brain Agent Types
 *
 * Internal types used by the campaign brain pipeline.
 * For input/output contracts, see ./contracts/
 *
 * @module campaign-brain/types
 */

import type {
  CampaignStatus,
  CampaignTone,
  DeliveryMethod,
  ExecutionId,
  LeadId,
  MessageType,
  TerminalStatus,
} from '@campaign-brain/lib';
import type { CompanyRecord, LeadRecord, ScrapedContent } from './contracts/campaign-input';
import type { FaultKind } from './errors';

// ===========================================
// Pipeline Nodes
// ===========================================

export type PipelineNode =
  | 'memory_loader'
  | 'trait_detector'
  | 'campaign_planner'
  | 'message_generator'
  | 'quality_assessor'
  | 'orchestrator';

/** Collaborators that run once the status is final and never change it */
export type PostTerminalStep = 'delivery_handoff' | 'review_notifier' | 'memory_writer';

export interface NodeVisit {
  node: PipelineNode;
  visited_at: string; // ISO 8601
}

export interface PostTerminalRun {
  step: PostTerminalStep;
  outcome: 'completed' | 'failed';
  finished_at: string; // ISO 8601
}

export interface NodeError {
  node: PipelineNode;
  fault: FaultKind;
  message: string;
  context: Record<string, unknown>;
  timestamp: string;
}

// ===========================================
// Traits
// ===========================================

export type TraitCategory =
  | 'business_model'
  | 'technology'
  | 'industry'
  | 'market_position'
  | 'growth_stage'
  | 'communication'
  | 'role'
  | 'seniority'
  | 'focus';

export interface DetectedTrait {
  trait: string;
  category: TraitCategory;
  confidence: number;
  reasoning: string;
}

export interface DataQualityAssessment {
  /** Sum of the three sub-scores, 0..10 */
  score: number;
  factors: string[];
  website_score: number;
  enrichment_score: number;
  social_score: number;
  /** Website content present but dominated by generic marketing language */
  low_signal: boolean;
}

// ===========================================
// Messages
// ===========================================

export interface PersonalizationElements {
  has_lead_name: boolean;
  has_company_name: boolean;
  has_role_reference: boolean;
  has_industry_terms: boolean;
}

export interface CampaignMessage {
  message_type: MessageType;
  subject: string;
  body: string;
  /** 1-based attempt that produced this message */
  generation_attempt: number;
  /** Name of the copywriter strategy that wrote it */
  copywriter: string;
  quality_score: number;
  quality_issues: string[];
  personalization_elements: PersonalizationElements;
  strategic_elements: string[];
  word_count: number;
}

export type FallbackReason =
  | 'missing_description'
  | 'missing_services'
  | 'missing_company_research'
  | 'low_signal_research';

// ===========================================
// Memory
// ===========================================

/**
 * Distilled record of one finished run, appended to the lead's history
 */
export interface LeadMemoryRecord {
  lead_id: string;
  execution_id: string;
  traits: string[];
  primary_trait: string | null;
  messaging_angle: string | null;
  overall_quality_score: number;
  final_status: TerminalStatus;
  recorded_at: string; // ISO 8601
}

/**
 * Summary of a lead's history loaded at the start of a run
 */
export interface MemoryContext {
  lead_id: LeadId;
  previous_runs: number;
  last_status: TerminalStatus | null;
  last_angle: string | null;
  failed_angles: string[];
  successful_angles: string[];
  last_contact_at: string | null;
  average_quality: number | null;
}

// ===========================================
// Campaign State
// ===========================================

/**
 * Working record for one lead's pipeline run.
 *
 * Each component writes only its own fields; `final_status` leaves
 * PROCESSING exactly once.
 */
export interface CampaignState {
  execution_id: ExecutionId;
  created_at: string;
  node_log: NodeVisit[];
  post_terminal_log: PostTerminalRun[];

  lead: LeadRecord;
  company: CompanyRecord;
  scraped_content: ScrapedContent;

  traits: string[];
  trait_confidence: Record<string, number>;
  trait_reasoning: Record<string, string>;
  primary_trait: string | null;
  data_quality: DataQualityAssessment | null;
  is_low_context: boolean;

  campaign_sequence: MessageType[];
  messaging_angle: string | null;
  campaign_tone: CampaignTone | null;
  sequence_reasoning: string;

  messages: CampaignMessage[];
  fallback_mode: boolean;
  fallback_reason: FallbackReason | null;
  generation_attempts: Partial<Record<MessageType, number>>;

  decision_path: string[];
  retry_count: number;
  final_status: CampaignStatus;
  status_reason: string;
  overall_quality_score: number;
  quality_feedback: string[];

  memory_context: MemoryContext | null;
  historical_insights: string[];
  errors: NodeError[];
  warnings: string[];

  delivery_method: DeliveryMethod | null;
  queue_id: string | null;
  delivery_schedule: Partial<Record<MessageType, string>> | null;
  fallback_channel_message: string | null;
}

// ===========================================
// Configuration Types
// ===========================================

export type CopywriterKind = 'template' | 'anthropic';

/**
 * Campaign brain configuration
 */
export interface CampaignBrainConfig {
  /** Minimum overall quality score for APPROVED (default: 80) */
  qualityPassThreshold: number;

  /** Regeneration rounds before MANUAL_REVIEW (default: 2) */
  maxRetries: number;

  /** Upper bound for a single copywriter call (default: 30,000 ms) */
  generationTimeoutMs: number;

  /** Upper bound for memory reads and writes (default: 5,000 ms) */
  memoryTimeoutMs: number;

  /** Traits below this confidence never become primary (default: 40) */
  minTraitConfidence: number;

  /** Traits below this confidence never pick an angle (default: 50) */
  planningConfidenceThreshold: number;

  /** Message body word-count band (default: 50..200) */
  minWords: number;
  maxWords: number;

  /** Primary copywriter strategy (default: template) */
  copywriter: CopywriterKind;

  /** Claude model used by the anthropic copywriter */
  generationModel: string;

  /** Anthropic API key (optional, falls back to ANTHROPIC_API_KEY) */
  anthropicApiKey?: string;

  /** Write each finished state to traceDir as JSON (default: false) */
  traceLogs: boolean;
  traceDir: string;
}

export const DEFAULT_CAMPAIGN_BRAIN_CONFIG: CampaignBrainConfig = {
  qualityPassThreshold: 80,
  maxRetries: 2,
  generationTimeoutMs: 30_000,
  memoryTimeoutMs: 5_000,
  minTraitConfidence: 40,
  planningConfidenceThreshold: 50,
  minWords: 50,
  maxWords: 200,
  copywriter: 'template',
  generationModel: 'claude-sonnet-4-20250514',
  traceLogs: false,
  traceDir: 'trace-logs',
};

// ===========================================
// Batch Types
// ===========================================

export interface BatchRunOptions {
  /** Leads processed at the same time (default: 5) */
  concurrency?: number;
  /** Log one line per finished lead */
  verbose?: boolean;
  /** Called after each lead with completed and total counts */
  onProgress?: (completed: number, total: number) => void;
}

export interface BatchLeadResult {
  lead_id: string;
  status: TerminalStatus | 'REJECTED';
  reason: string;
  overall_quality_score: number | null;
  fallback_mode: boolean;
  execution_id: string | null;
}

export interface BatchRunSummary {
  total: number;
  approved: number;
  manual_review: number;
  stalled: number;
  error: number;
  rejected: number;
  fallback_used: number;
  results: BatchLeadResult[];
  total_time_ms: number;
}

// ===========================================
// Logging Types
// ===========================================

export type LogEventType =
  | 'run_started'
  | 'memory_loaded'
  | 'traits_detected'
  | 'campaign_planned'
  | 'messages_generated'
  | 'generation_fallback'
  | 'quality_assessed'
  | 'retry_scheduled'
  | 'run_completed'
  | 'run_failed'
  | 'memory_warning'
  | 'handoff_completed'
  | 'batch_started'
  | 'batch_completed'
  | 'lead_processed'
  | 'lead_rejected';

export interface LogEvent {
  event: LogEventType;
  level: 'debug' | 'info' | 'warn' | 'error';
  timestamp: string;
  execution_id?: string;
}
