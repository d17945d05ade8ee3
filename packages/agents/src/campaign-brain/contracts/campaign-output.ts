/**
 * Campaign Output Contract
 *
 * What callers of the pipeline receive for one lead.
 *
 * @module campaign-brain/contracts/campaign-output
 */

import type { CampaignStatus, DeliveryMethod, MessageType } from '@campaign-brain/lib';
import { orderedMessages } from '../state';
import type { CampaignState, FallbackReason } from '../types';

export interface CampaignOutputMessage {
  type: MessageType;
  subject: string;
  body: string;
  score: number;
}

export interface CampaignOutput {
  execution_id: string;
  lead_id: string;
  final_status: CampaignStatus;
  status_reason: string;
  messages: CampaignOutputMessage[];
  overall_quality_score: number;
  queue_id: string | null;
  delivery_method: DeliveryMethod | null;
  fallback_channel_message: string | null;
  fallback_mode: boolean;
  fallback_reason: FallbackReason | null;
}

export function toCampaignOutput(state: CampaignState): CampaignOutput {
  return {
    execution_id: state.execution_id,
    lead_id: state.lead.id,
    final_status: state.final_status,
    status_reason: state.status_reason,
    messages: orderedMessages(state).map((message) => ({
      type: message.message_type,
      subject: message.subject,
      body: message.body,
      score: message.quality_score,
    })),
    overall_quality_score: state.overall_quality_score,
    queue_id: state.queue_id,
    delivery_method: state.delivery_method,
    fallback_channel_message: state.fallback_channel_message,
    fallback_mode: state.fallback_mode,
    fallback_reason: state.fallback_reason,
  };
}
