/**
 * Shared Types for Campaign Brain
 *
 * Core type definitions used across all packages.
 */

// ===========================================
// Identifiers
// ===========================================

/** Unique identifier for a lead (stable across runs, used as the memory key) */
export type LeadId = string & { readonly __brand: 'LeadId' };

/** Unique identifier for a single pipeline run */
export type ExecutionId = string & { readonly __brand: 'ExecutionId' };

/** Narrow a raw lead identifier to the branded type */
export function toLeadId(value: string): LeadId {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new Error('Lead id must be a non-empty string');
  }
  return trimmed as LeadId;
}

/** Narrow a stored execution identifier to the branded type */
export function toExecutionId(value: string): ExecutionId {
  if (!value.trim()) {
    throw new Error('Execution id must be a non-empty string');
  }
  return value as ExecutionId;
}

// ===========================================
// Campaign Types
// ===========================================

/** Externally visible campaign status */
export type CampaignStatus =
  | 'PROCESSING'
  | 'APPROVED'
  | 'MANUAL_REVIEW'
  | 'STALLED'
  | 'ERROR';

/** Terminal subset of CampaignStatus */
export type TerminalStatus = Exclude<CampaignStatus, 'PROCESSING'>;

export const TERMINAL_STATUSES: readonly TerminalStatus[] = [
  'APPROVED',
  'MANUAL_REVIEW',
  'STALLED',
  'ERROR',
] as const;

/** Slots of a campaign sequence, in delivery order */
export type MessageType = 'hook' | 'proof' | 'fomo';

export const CANONICAL_SEQUENCE: readonly MessageType[] = ['hook', 'proof', 'fomo'] as const;

/** Communication tone of a campaign */
export type CampaignTone =
  | 'executive'
  | 'technical'
  | 'professional'
  | 'formal'
  | 'dynamic'
  | 'engaging'
  | 'forward_thinking';

/** How an approved campaign reaches the lead */
export type DeliveryMethod = 'email' | 'linkedin_manual' | 'unavailable';

export function isTerminalStatus(status: CampaignStatus): status is TerminalStatus {
  return status !== 'PROCESSING';
}
