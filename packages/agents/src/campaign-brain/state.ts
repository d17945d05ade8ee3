/**
 * Campaign State Module
 *
 * Creation and guarded mutation of the per-lead CampaignState, plus
 * optional JSON trace logs of finished runs.
 *
 * @module campaign-brain/state
 */

import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ExecutionId, MessageType, TerminalStatus } from '@campaign-brain/lib';
import { isTerminalStatus, toExecutionId } from '@campaign-brain/lib';
import type { CampaignInput } from './contracts/campaign-input';
import { CampaignStateSchema } from './contracts/campaign-state';
import type { CampaignFault } from './errors';
import type {
  CampaignMessage,
  CampaignState,
  PipelineNode,
  PostTerminalRun,
  PostTerminalStep,
} from './types';

// ===========================================
// Creation
// ===========================================

/**
 * Generate a unique execution ID
 */
export function generateExecutionId(): ExecutionId {
  const timestamp = Date.now().toString(36);
  const random = randomUUID().replace(/-/g, '').slice(0, 8);
  return toExecutionId(`campaign_${timestamp}_${random}`);
}

/**
 * Create a fresh PROCESSING state for a validated input
 */
export function createCampaignState(input: CampaignInput): CampaignState {
  return {
    execution_id: generateExecutionId(),
    created_at: new Date().toISOString(),
    node_log: [],
    post_terminal_log: [],

    lead: input.lead,
    company: input.company,
    scraped_content: input.scraped_content,

    traits: [],
    trait_confidence: {},
    trait_reasoning: {},
    primary_trait: null,
    data_quality: null,
    is_low_context: false,

    campaign_sequence: [],
    messaging_angle: null,
    campaign_tone: null,
    sequence_reasoning: '',

    messages: [],
    fallback_mode: false,
    fallback_reason: null,
    generation_attempts: {},

    decision_path: [],
    retry_count: 0,
    final_status: 'PROCESSING',
    status_reason: '',
    overall_quality_score: 0,
    quality_feedback: [],

    memory_context: null,
    historical_insights: [],
    errors: [],
    warnings: [],

    delivery_method: null,
    queue_id: null,
    delivery_schedule: null,
    fallback_channel_message: null,
  };
}

// ===========================================
// Mutation Helpers
// ===========================================

export function logNodeVisit(state: CampaignState, node: PipelineNode): void {
  state.node_log.push({ node, visited_at: new Date().toISOString() });
}

export function logPostTerminalRun(
  state: CampaignState,
  step: PostTerminalStep,
  outcome: PostTerminalRun['outcome']
): void {
  state.post_terminal_log.push({ step, outcome, finished_at: new Date().toISOString() });
}

/**
 * Append a "decision: reasoning" entry to the decision path
 */
export function appendDecision(state: CampaignState, decision: string, reasoning: string): void {
  state.decision_path.push(`${decision}: ${reasoning}`);
}

export function addWarning(state: CampaignState, warning: string): void {
  state.warnings.push(warning);
}

export function addError(state: CampaignState, node: PipelineNode, fault: CampaignFault): void {
  state.errors.push({
    node,
    fault: fault.kind,
    message: fault.message,
    context: fault.context,
    timestamp: new Date().toISOString(),
  });
}

export function isTerminal(state: CampaignState): boolean {
  return isTerminalStatus(state.final_status);
}

/**
 * Move the state to a terminal status.
 *
 * @returns false, leaving the state untouched, when a terminal status was already set
 */
export function finalize(state: CampaignState, status: TerminalStatus, reason: string): boolean {
  if (isTerminal(state)) {
    return false;
  }

  state.final_status = status;
  state.status_reason = reason;
  appendDecision(state, status, reason);
  return true;
}

/**
 * Store a message, replacing any earlier attempt for the same slot
 */
export function upsertMessage(state: CampaignState, message: CampaignMessage): void {
  const index = state.messages.findIndex((m) => m.message_type === message.message_type);
  if (index === -1) {
    state.messages.push(message);
  } else {
    state.messages[index] = message;
  }
}

/**
 * Messages in campaign sequence order
 */
export function orderedMessages(state: CampaignState): CampaignMessage[] {
  const order = new Map<MessageType, number>(state.campaign_sequence.map((type, i) => [type, i]));
  return [...state.messages].sort(
    (a, b) => (order.get(a.message_type) ?? 99) - (order.get(b.message_type) ?? 99)
  );
}

// ===========================================
// Trace Logs
// ===========================================

export interface TraceLogConfig {
  /** Directory for trace files, relative to the working directory */
  traceDir: string;
}

/**
 * Write a finished state to <traceDir>/<execution_id>.json
 *
 * @returns The written file path
 */
export function saveTraceLog(state: CampaignState, config: TraceLogConfig): string {
  const dir = join(process.cwd(), config.traceDir);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const path = join(dir, `${state.execution_id}.json`);
  writeFileSync(path, JSON.stringify(state, null, 2), 'utf-8');
  return path;
}

/**
 * Read a trace log back and validate it.
 *
 * @throws ZodError when the file does not hold a campaign state
 */
export function loadTraceLog(executionId: string, config: TraceLogConfig): CampaignState {
  const path = join(process.cwd(), config.traceDir, `${executionId}.json`);
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return CampaignStateSchema.parse(raw);
}
