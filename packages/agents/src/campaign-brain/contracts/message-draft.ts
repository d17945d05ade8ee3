/**
 * Message Draft Tool
 *
 * Structured output schema the Claude copywriter answers through.
 *
 * @module campaign-brain/contracts/message-draft
 */

import { z } from 'zod';
import { buildTool } from '@campaign-brain/lib';

export const MessageDraftSchema = z.object({
  subject: z
    .string()
    .trim()
    .min(1)
    .max(120)
    .describe('Email subject line, no more than 10 words'),

  body: z
    .string()
    .trim()
    .min(1)
    .describe('Plain-text message body, greeting through closing question'),
});

export type MessageDraft = z.infer<typeof MessageDraftSchema>;

export const MESSAGE_DRAFT_TOOL = buildTool({
  name: 'write_campaign_message',
  description:
    'Write one outreach message of a multi-step campaign. Returns the subject line and the plain-text body.',
  schema: MessageDraftSchema,
});
