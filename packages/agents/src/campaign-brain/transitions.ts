/**
 * Campaign State Machine
 *
 * PROCESSING -> APPROVED | MANUAL_REVIEW | STALLED | ERROR
 *
 * Rules, first match wins:
 * 1. planned, no traits and no sequence  -> STALLED
 * 2. a node raised a fault               -> ERROR
 * 3. score >= threshold                  -> APPROVED
 * 4. retries left                        -> retry (internal, stays PROCESSING)
 * 5. otherwise                           -> MANUAL_REVIEW
 *
 * @module campaign-brain/transitions
 */

import type { MessageType, TerminalStatus } from '@campaign-brain/lib';
import { QualityFault, type CampaignFault } from './errors';
import type { PipelineNode } from './types';

export interface TransitionInput {
  /** Any trait detected, regardless of confidence */
  has_traits: boolean;
  /** Planned sequence; null until the planner has run */
  sequence: readonly MessageType[] | null;
  fault: { node: PipelineNode; error: CampaignFault } | null;
  /** Aggregate score; null until the assessor has run */
  overall_quality_score: number | null;
  retry_count: number;
  threshold: number;
  max_retries: number;
}

export type Transition =
  | { kind: 'terminal'; status: TerminalStatus; reason: string }
  | { kind: 'retry'; reason: string }
  | { kind: 'continue' };

export function resolveTransition(input: TransitionInput): Transition {
  if (input.sequence !== null && input.sequence.length === 0 && !input.has_traits) {
    return {
      kind: 'terminal',
      status: 'STALLED',
      reason: 'No usable traits and no campaign sequence could be resolved from the lead data',
    };
  }

  if (input.fault) {
    return {
      kind: 'terminal',
      status: 'ERROR',
      reason: `${input.fault.error.kind} fault in ${input.fault.node}: ${input.fault.error.message}`,
    };
  }

  const score = input.overall_quality_score;
  if (score === null) {
    return { kind: 'continue' };
  }

  if (score >= input.threshold) {
    return {
      kind: 'terminal',
      status: 'APPROVED',
      reason: `Quality score ${score} meets threshold ${input.threshold}`,
    };
  }

  const below = new QualityFault(score, input.threshold).message;

  if (input.retry_count < input.max_retries) {
    return {
      kind: 'retry',
      reason: `${below}; retry ${input.retry_count + 1} of ${input.max_retries}`,
    };
  }

  return {
    kind: 'terminal',
    status: 'MANUAL_REVIEW',
    reason: `${below} after ${input.retry_count} retries`,
  };
}
