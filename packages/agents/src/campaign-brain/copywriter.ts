/**
 * Copywriter Strategies
 *
 * A copywriter turns one campaign slot (angle, tone, lead) into a subject
 * and body. The pipeline does not care how: the template copywriter and the
 * Claude copywriter are interchangeable behind the same interface.
 *
 * @module campaign-brain/copywriter
 */

import { z } from 'zod';
import type { CampaignTone, MessageType } from '@campaign-brain/lib';
import templatesJson from './data/message-templates.json';
import { angleProfile } from './campaign-planner';
import type { CompanyRecord, LeadRecord } from './contracts/campaign-input';
import { firstNameOf } from './contracts/campaign-input';
import type { MessageDraft } from './contracts/message-draft';

// ===========================================
// Interface
// ===========================================

export interface DraftRequest {
  message_type: MessageType;
  /** 1-based attempt for this slot */
  attempt: number;
  lead: LeadRecord;
  company: CompanyRecord;
  messaging_angle: string;
  tone: CampaignTone;
  /** Generic personalization only: first name and company name */
  fallback_mode: boolean;
  /** Rejection reasons from the previous attempt */
  feedback: readonly string[];
  historical_insights: readonly string[];
  /** Parent Langfuse trace, when tracing is enabled */
  trace_id?: string;
}

export interface Copywriter {
  readonly name: string;
  draft(request: DraftRequest): Promise<MessageDraft>;
}

// ===========================================
// Template Catalogue
// ===========================================

const TemplateSchema = z.object({
  subject: z.string().min(1),
  body: z.string().min(1),
});

const SlotTemplatesSchema = z.object({
  hook: z.array(TemplateSchema).min(1),
  proof: z.array(TemplateSchema).min(1),
  fomo: z.array(TemplateSchema).min(1),
});

const TemplateCatalogueSchema = z.object({
  standard: SlotTemplatesSchema,
  fallback: SlotTemplatesSchema,
});

export type MessageTemplate = z.infer<typeof TemplateSchema>;
export type TemplateCatalogue = z.infer<typeof TemplateCatalogueSchema>;

export const MESSAGE_TEMPLATES: TemplateCatalogue = TemplateCatalogueSchema.parse(templatesJson);

const TONE_CLOSINGS: Record<CampaignTone, string> = {
  executive: 'Would a 15-minute conversation next week be worthwhile?',
  technical: 'Happy to walk through the technical details if that would help.',
  professional: 'Would you be open to a brief conversation next week?',
  formal: 'Would you be available for a brief discussion in the coming weeks?',
  dynamic: 'Up for a short call this week to explore it?',
  engaging: 'Would you be up for a short chat to swap ideas?',
  forward_thinking: 'Open to a short conversation about where this is heading?',
};

/**
 * Fill {placeholder} tokens.
 *
 * @throws Error naming the first placeholder without a value
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{(\w+)\}/g, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`Template placeholder {${key}} has no value`);
    }
    return value;
  });
}

// ===========================================
// Template Copywriter
// ===========================================

/**
 * Deterministic copywriter: the attempt number picks the template variant,
 * the angle and tone fill it in.
 */
export class TemplateCopywriter implements Copywriter {
  readonly name = 'template';

  constructor(private readonly templates: TemplateCatalogue = MESSAGE_TEMPLATES) {}

  async draft(request: DraftRequest): Promise<MessageDraft> {
    const pool = (request.fallback_mode ? this.templates.fallback : this.templates.standard)[
      request.message_type
    ];
    const template = pool[(Math.max(request.attempt, 1) - 1) % pool.length];
    if (!template) {
      throw new Error(`No ${request.message_type} template available`);
    }

    const profile = angleProfile(request.messaging_angle);
    const values: Record<string, string> = {
      first_name: firstNameOf(request.lead),
      company: request.lead.company,
      title: request.lead.title,
      closing: TONE_CLOSINGS[request.tone],
      angle_focus: profile.focus,
      theme: profile.theme,
      service: request.company.services[0]?.toLowerCase() ?? 'your core offering',
    };

    return {
      subject: renderTemplate(template.subject, values),
      body: renderTemplate(template.body, values),
    };
  }
}
