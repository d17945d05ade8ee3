/**
 * Campaign State Schema
 *
 * Validates trace logs read back from disk.
 *
 * @module campaign-brain/contracts/campaign-state
 */

import { z } from 'zod';
import { toExecutionId, toLeadId } from '@campaign-brain/lib';
import { CompanyRecordSchema, LeadRecordSchema, ScrapedContentSchema } from './campaign-input';

const MessageTypeSchema = z.enum(['hook', 'proof', 'fomo']);
const TerminalStatusSchema = z.enum(['APPROVED', 'MANUAL_REVIEW', 'STALLED', 'ERROR']);

const PipelineNodeSchema = z.enum([
  'memory_loader',
  'trait_detector',
  'campaign_planner',
  'message_generator',
  'quality_assessor',
  'orchestrator',
]);

const PostTerminalStepSchema = z.enum(['delivery_handoff', 'review_notifier', 'memory_writer']);

const CampaignMessageSchema = z.object({
  message_type: MessageTypeSchema,
  subject: z.string(),
  body: z.string(),
  generation_attempt: z.number().int().min(1),
  copywriter: z.string(),
  quality_score: z.number().min(0).max(100),
  quality_issues: z.array(z.string()),
  personalization_elements: z.object({
    has_lead_name: z.boolean(),
    has_company_name: z.boolean(),
    has_role_reference: z.boolean(),
    has_industry_terms: z.boolean(),
  }),
  strategic_elements: z.array(z.string()),
  word_count: z.number().int().min(0),
});

const MemoryContextSchema = z.object({
  lead_id: z.string().min(1).transform(toLeadId),
  previous_runs: z.number().int().min(0),
  last_status: TerminalStatusSchema.nullable(),
  last_angle: z.string().nullable(),
  failed_angles: z.array(z.string()),
  successful_angles: z.array(z.string()),
  last_contact_at: z.string().nullable(),
  average_quality: z.number().nullable(),
});

export const CampaignStateSchema = z.object({
  execution_id: z.string().min(1).transform(toExecutionId),
  created_at: z.string(),
  node_log: z.array(z.object({ node: PipelineNodeSchema, visited_at: z.string() })),
  post_terminal_log: z.array(
    z.object({
      step: PostTerminalStepSchema,
      outcome: z.enum(['completed', 'failed']),
      finished_at: z.string(),
    })
  ),

  lead: LeadRecordSchema,
  company: CompanyRecordSchema,
  scraped_content: ScrapedContentSchema,

  traits: z.array(z.string()),
  trait_confidence: z.record(z.string(), z.number()),
  trait_reasoning: z.record(z.string(), z.string()),
  primary_trait: z.string().nullable(),
  data_quality: z
    .object({
      score: z.number(),
      factors: z.array(z.string()),
      website_score: z.number(),
      enrichment_score: z.number(),
      social_score: z.number(),
      low_signal: z.boolean(),
    })
    .nullable(),
  is_low_context: z.boolean(),

  campaign_sequence: z.array(MessageTypeSchema),
  messaging_angle: z.string().nullable(),
  campaign_tone: z
    .enum(['executive', 'technical', 'professional', 'formal', 'dynamic', 'engaging', 'forward_thinking'])
    .nullable(),
  sequence_reasoning: z.string(),

  messages: z.array(CampaignMessageSchema),
  fallback_mode: z.boolean(),
  fallback_reason: z
    .enum(['missing_description', 'missing_services', 'missing_company_research', 'low_signal_research'])
    .nullable(),
  generation_attempts: z.record(MessageTypeSchema, z.number().int().min(0)),

  decision_path: z.array(z.string()),
  retry_count: z.number().int().min(0),
  final_status: z.union([z.literal('PROCESSING'), TerminalStatusSchema]),
  status_reason: z.string(),
  overall_quality_score: z.number().min(0).max(100),
  quality_feedback: z.array(z.string()),

  memory_context: MemoryContextSchema.nullable(),
  historical_insights: z.array(z.string()),
  errors: z.array(
    z.object({
      node: PipelineNodeSchema,
      fault: z.enum(['validation', 'generation', 'quality', 'system']),
      message: z.string(),
      context: z.record(z.string(), z.unknown()),
      timestamp: z.string(),
    })
  ),
  warnings: z.array(z.string()),

  delivery_method: z.enum(['email', 'linkedin_manual', 'unavailable']).nullable(),
  queue_id: z.string().nullable(),
  delivery_schedule: z.record(MessageTypeSchema, z.string()).nullable(),
  fallback_channel_message: z.string().nullable(),
});
