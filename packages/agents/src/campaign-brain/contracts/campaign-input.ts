/**
 * Campaign Input Contract
 *
 * Zod schemas for the lead, company research and scraped website content
 * a campaign run starts from.
 *
 * @module campaign-brain/contracts/campaign-input
 */

import { z } from 'zod';
import { ValidationFault } from '../errors';

// ===========================================
// Lead Record
// ===========================================

export const LeadRecordSchema = z.object({
  id: z.string().trim().min(1).describe('Stable lead identifier, used as the memory key'),
  name: z.string().trim().min(1).describe('Lead full name'),
  title: z.string().trim().min(1).describe('Job title'),
  company: z.string().trim().min(1).describe('Company name'),
  email: z.string().trim().optional().describe('Work email; validity is checked at handoff'),
  linkedin_url: z.string().trim().optional().describe('LinkedIn profile URL'),
  industry: z.string().trim().optional(),
  company_size: z.string().trim().optional(),
});

export type LeadRecord = z.infer<typeof LeadRecordSchema>;

// ===========================================
// Company Research
// ===========================================

// Services arrive either as a list or as a comma-separated string
const ServicesSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (typeof value === 'string' ? value.split(',') : value)
      .map((service) => service.trim())
      .filter((service) => service.length > 0)
  );

export const CompanyRecordSchema = z.object({
  description: z.string().default('').describe('Researched company description'),
  services: ServicesSchema.default([]).describe('Products or services the company offers'),
  tone: z.string().trim().optional().describe('Communication style observed on the website'),
  website_insights: z.string().default(''),
  industry: z.string().trim().optional(),
  size: z.string().trim().optional(),
  website: z.string().trim().optional(),
});

export type CompanyRecord = z.infer<typeof CompanyRecordSchema>;

export const ScrapedContentSchema = z.object({
  homepage_text: z.string().default(''),
  about_page: z.string().default(''),
});

export type ScrapedContent = z.infer<typeof ScrapedContentSchema>;

// ===========================================
// Campaign Input
// ===========================================

export const CampaignInputSchema = z.object({
  lead: LeadRecordSchema,
  company: CompanyRecordSchema.default({}),
  scraped_content: ScrapedContentSchema.default({}),
});

/** Parsed input with defaults applied */
export type CampaignInput = z.infer<typeof CampaignInputSchema>;

/** Raw input as callers submit it */
export type CampaignInputPayload = z.input<typeof CampaignInputSchema>;

// ===========================================
// Parsing
// ===========================================

/**
 * Parse and validate raw campaign input.
 *
 * @throws ValidationFault listing every failing field path
 */
export function parseCampaignInput(raw: unknown): CampaignInput {
  const result = CampaignInputSchema.safeParse(raw);

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ValidationFault(`Invalid campaign input: ${issues.join('; ')}`, issues);
  }

  return result.data;
}

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export function hasValidEmail(lead: LeadRecord): boolean {
  return lead.email !== undefined && EMAIL_PATTERN.test(lead.email);
}

export function hasLinkedInProfile(lead: LeadRecord): boolean {
  return lead.linkedin_url !== undefined && lead.linkedin_url.toLowerCase().includes('linkedin.com');
}

/** First token of the lead's display name */
export function firstNameOf(lead: LeadRecord): string {
  return lead.name.split(/\s+/)[0] ?? lead.name;
}
