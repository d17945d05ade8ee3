/**
 * Message Generator
 *
 * Drafts one message per campaign slot through the configured copywriter.
 * A failing copywriter never ends the run: the slot falls back to the
 * template copywriter, and if that fails too an empty placeholder is stored
 * so the quality gate routes the run to retry or manual review.
 *
 * @module campaign-brain/message-generator
 */

import { CANONICAL_SEQUENCE, type CampaignTone, type MessageType } from '@campaign-brain/lib';
import type { CompanyRecord } from './contracts/campaign-input';
import type { MessageDraft } from './contracts/message-draft';
import type { Copywriter } from './copywriter';
import { SystemFault, classifyFault, faultLabel, withTimeout } from './errors';
import type { CampaignBrainLogger } from './logger';
import { addWarning, appendDecision, upsertMessage } from './state';
import { countWords } from './text';
import type { CampaignMessage, CampaignState, DataQualityAssessment, FallbackReason } from './types';

// ===========================================
// Fallback Mode
// ===========================================

/**
 * Why company research is too thin for content-specific copy, or null
 */
export function resolveFallbackReason(
  company: CompanyRecord,
  dataQuality: DataQualityAssessment | null
): FallbackReason | null {
  const hasDescription = company.description.trim().length > 0;
  const hasServices = company.services.length > 0;

  if (!hasDescription && !hasServices) return 'missing_company_research';
  if (!hasDescription) return 'missing_description';
  if (!hasServices) return 'missing_services';
  if (dataQuality?.low_signal) return 'low_signal_research';
  return null;
}

// ===========================================
// Generation
// ===========================================

export interface GenerationDeps {
  copywriter: Copywriter;
  /** Used when the primary copywriter fails; normally the template copywriter */
  fallbackCopywriter: Copywriter;
  generationTimeoutMs: number;
  logger: CampaignBrainLogger;
  traceId?: string;
}

const PLACEHOLDER_COPYWRITER = 'placeholder';

/**
 * Feedback lines addressed to a slot, plus general guidance lines
 */
export function feedbackForSlot(feedback: readonly string[], slot: MessageType): string[] {
  return feedback.filter((line) => {
    const prefix = line.split(':', 1)[0];
    const addressedToSlot = CANONICAL_SEQUENCE.some((type) => type === prefix);
    return !addressedToSlot || prefix === slot;
  });
}

function toCampaignMessage(
  slot: MessageType,
  attempt: number,
  copywriter: string,
  draft: MessageDraft
): CampaignMessage {
  return {
    message_type: slot,
    subject: draft.subject,
    body: draft.body,
    generation_attempt: attempt,
    copywriter,
    quality_score: 0,
    quality_issues: [],
    personalization_elements: {
      has_lead_name: false,
      has_company_name: false,
      has_role_reference: false,
      has_industry_terms: false,
    },
    strategic_elements: [],
    word_count: countWords(draft.body),
  };
}

interface SlotPlan {
  messaging_angle: string;
  tone: CampaignTone;
}

async function draftSlot(
  state: CampaignState,
  plan: SlotPlan,
  slot: MessageType,
  attempt: number,
  copywriter: Copywriter,
  deps: GenerationDeps
): Promise<MessageDraft> {
  return withTimeout(
    () =>
      copywriter.draft({
        message_type: slot,
        attempt,
        lead: state.lead,
        company: state.company,
        messaging_angle: plan.messaging_angle,
        tone: plan.tone,
        fallback_mode: state.fallback_mode,
        feedback: feedbackForSlot(state.quality_feedback, slot),
        historical_insights: state.historical_insights,
        trace_id: deps.traceId,
      }),
    deps.generationTimeoutMs,
    `${copywriter.name} copywriter (${slot})`
  );
}

function recordGenerationFault(
  state: CampaignState,
  slot: MessageType,
  attempt: number,
  copywriter: Copywriter,
  error: unknown,
  deps: GenerationDeps,
  recovery: string
): void {
  const { kind, message } = classifyFault(error);
  addWarning(
    state,
    `${faultLabel(kind)} on ${slot} attempt ${attempt} (${copywriter.name}): ${message}; ${recovery}`
  );
  appendDecision(state, 'generation_fallback', `${slot} ${recovery} after ${copywriter.name} failed`);
  deps.logger.generationFallback({
    execution_id: state.execution_id,
    message_type: slot,
    copywriter: copywriter.name,
    fault_kind: kind,
    error_message: message,
  });
}

/**
 * Generate (or regenerate) the given slots, in sequence order.
 *
 * The first call also decides fallback mode for the whole run.
 */
export async function generateMessages(
  state: CampaignState,
  slots: readonly MessageType[],
  deps: GenerationDeps
): Promise<void> {
  const { messaging_angle, campaign_tone } = state;
  if (!messaging_angle || !campaign_tone) {
    throw new SystemFault('Message generation requires a planned angle and tone', {
      execution_id: state.execution_id,
    });
  }
  const plan: SlotPlan = { messaging_angle, tone: campaign_tone };

  if (state.retry_count === 0 && state.messages.length === 0) {
    const reason = resolveFallbackReason(state.company, state.data_quality);
    state.fallback_mode = reason !== null;
    state.fallback_reason = reason;
    if (reason) {
      appendDecision(state, 'fallback_mode', `${reason}, using generic personalization`);
    }
  }

  const targets = state.campaign_sequence.filter((type) => slots.includes(type));

  for (const slot of targets) {
    const attempt = (state.generation_attempts[slot] ?? 0) + 1;
    state.generation_attempts[slot] = attempt;

    const chain =
      deps.fallbackCopywriter === deps.copywriter
        ? [deps.copywriter]
        : [deps.copywriter, deps.fallbackCopywriter];

    let drafted: { draft: MessageDraft; author: string } | null = null;
    for (const [index, copywriter] of chain.entries()) {
      try {
        drafted = {
          draft: await draftSlot(state, plan, slot, attempt, copywriter, deps),
          author: copywriter.name,
        };
        break;
      } catch (error) {
        const recovery =
          index === chain.length - 1 ? 'stored an empty placeholder' : 'used template copy';
        recordGenerationFault(state, slot, attempt, copywriter, error, deps, recovery);
      }
    }

    const { draft, author } = drafted ?? {
      draft: { subject: '', body: '' },
      author: PLACEHOLDER_COPYWRITER,
    };
    upsertMessage(state, toCampaignMessage(slot, attempt, author, draft));
  }

  deps.logger.messagesGenerated({
    execution_id: state.execution_id,
    message_types: targets,
    fallback_mode: state.fallback_mode,
    copywriter: deps.copywriter.name,
  });
}
