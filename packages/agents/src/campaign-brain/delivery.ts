/**
 * Delivery Handoff
 *
 * Runs after APPROVED. Email leads are enqueued with a send schedule;
 * leads without email get the campaign flattened into one templated text
 * for manual sending on another channel. Queue failures are warnings and
 * also leave the flattened copy behind.
 *
 * @module campaign-brain/delivery
 */

import { randomUUID } from 'node:crypto';
import type { DeliveryMethod, MessageType } from '@campaign-brain/lib';
import type { LeadRecord } from './contracts/campaign-input';
import { firstNameOf, hasLinkedInProfile, hasValidEmail } from './contracts/campaign-input';
import { getErrorMessage } from './errors';
import type { CampaignBrainLogger } from './logger';
import { addWarning, appendDecision, orderedMessages } from './state';
import { replaceWholeWord } from './text';
import type { CampaignMessage, CampaignState } from './types';

// ===========================================
// Queue
// ===========================================

export interface QueuedMessage {
  message_type: MessageType;
  subject: string;
  body: string;
  send_at: string;
}

export interface CampaignQueuePayload {
  lead_id: string;
  execution_id: string;
  email: string;
  messages: QueuedMessage[];
}

export interface CampaignQueue {
  readonly name: string;
  /** @returns Opaque queue id */
  enqueue(payload: CampaignQueuePayload): Promise<string>;
}

/**
 * In-process queue for local runs and tests
 */
export class LocalCampaignQueue implements CampaignQueue {
  readonly name = 'local';
  readonly items: Array<CampaignQueuePayload & { queue_id: string }> = [];

  async enqueue(payload: CampaignQueuePayload): Promise<string> {
    const queueId = `queue_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
    this.items.push({ ...payload, queue_id: queueId });
    return queueId;
  }
}

// ===========================================
// Channel Selection
// ===========================================

export function classifyDeliveryMethod(lead: LeadRecord): DeliveryMethod {
  if (hasValidEmail(lead)) return 'email';
  if (hasLinkedInProfile(lead)) return 'linkedin_manual';
  return 'unavailable';
}

// ===========================================
// Scheduling
// ===========================================

const SEQUENCE_DAY_OFFSETS = [0, 3, 7];
const FOLLOW_UP_GAP_DAYS = 3;

function dayOffset(position: number): number {
  const known = SEQUENCE_DAY_OFFSETS[position];
  if (known !== undefined) return known;
  const lastKnown = SEQUENCE_DAY_OFFSETS[SEQUENCE_DAY_OFFSETS.length - 1] ?? 0;
  return lastKnown + (position - SEQUENCE_DAY_OFFSETS.length + 1) * FOLLOW_UP_GAP_DAYS;
}

/**
 * Send times on day 0, 3 and 7 (then every 3 days), moved to Monday when
 * they land on a weekend
 */
export function buildDeliverySchedule(
  sequence: readonly MessageType[],
  start: Date = new Date()
): Partial<Record<MessageType, string>> {
  const schedule: Partial<Record<MessageType, string>> = {};

  sequence.forEach((type, position) => {
    const sendAt = new Date(start.getTime());
    sendAt.setUTCDate(sendAt.getUTCDate() + dayOffset(position));

    const weekday = sendAt.getUTCDay();
    if (weekday === 6) sendAt.setUTCDate(sendAt.getUTCDate() + 2);
    if (weekday === 0) sendAt.setUTCDate(sendAt.getUTCDate() + 1);

    schedule[type] = sendAt.toISOString();
  });

  return schedule;
}

// ===========================================
// Fallback Channel
// ===========================================

/**
 * "HOOK: ...  PROOF: ...  FOMO: ..." with name and company as placeholders
 */
export function flattenForFallbackChannel(
  messages: readonly CampaignMessage[],
  lead: LeadRecord
): string {
  const firstName = firstNameOf(lead);

  return messages
    .map((message) => {
      const withCompany = replaceWholeWord(message.body, lead.company, '{{company}}');
      const body = replaceWholeWord(withCompany, firstName, '{{first_name}}', { ignoreCase: false })
        .replace(/\s+/g, ' ')
        .trim();
      return `${message.message_type.toUpperCase()}: ${body}`;
    })
    .join('  ');
}

// ===========================================
// Handoff Step
// ===========================================

export interface HandoffDeps {
  queue: CampaignQueue;
  logger: CampaignBrainLogger;
  now?: Date;
}

export async function handOffCampaign(state: CampaignState, deps: HandoffDeps): Promise<void> {
  const method = classifyDeliveryMethod(state.lead);
  const messages = orderedMessages(state);
  state.delivery_method = method;

  if (method === 'email' && state.lead.email) {
    const schedule = buildDeliverySchedule(state.campaign_sequence, deps.now);

    try {
      state.queue_id = await deps.queue.enqueue({
        lead_id: state.lead.id,
        execution_id: state.execution_id,
        email: state.lead.email,
        messages: messages.map((message) => ({
          message_type: message.message_type,
          subject: message.subject,
          body: message.body,
          send_at: schedule[message.message_type] ?? new Date().toISOString(),
        })),
      });
      state.delivery_schedule = schedule;
      appendDecision(state, 'handoff', `queued on ${deps.queue.name} as ${state.queue_id}`);
    } catch (error) {
      addWarning(state, `Campaign queue failed: ${getErrorMessage(error)}`);
      state.fallback_channel_message = flattenForFallbackChannel(messages, state.lead);
      appendDecision(state, 'handoff', `queue ${deps.queue.name} failed, prepared fallback copy`);
    }
  } else {
    state.fallback_channel_message = flattenForFallbackChannel(messages, state.lead);
    appendDecision(state, 'handoff', `no valid email, prepared ${method} copy`);
  }

  deps.logger.handoffCompleted({
    execution_id: state.execution_id,
    delivery_method: method,
    queue_id: state.queue_id,
  });
}
