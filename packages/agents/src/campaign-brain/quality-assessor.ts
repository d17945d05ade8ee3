/**
 * Quality Assessor
 *
 * Scores each campaign message on a 100-point rubric and aggregates the
 * campaign score. Pure: the same messages always produce the same result.
 *
 * | Check                              | Change |
 * |------------------------------------|--------|
 * | Empty body                         | score 0 |
 * | Lead first name absent             | -30 |
 * | Company name absent                | -30 |
 * | Body under minWords                | -15 |
 * | Body over maxWords                 | -10 |
 * | Each boilerplate phrase occurrence | -10 |
 * | Each salesy phrase occurrence      | -15 |
 * | 0 / 1 distinct strategic markers   | -20 / -10 |
 * | 3+ distinct strategic markers      | +5 |
 * | No marker of the planned tone      | -5 |
 *
 * @module campaign-brain/quality-assessor
 */

import { z } from 'zod';
import type { CampaignTone, MessageType } from '@campaign-brain/lib';
import lexiconJson from './data/quality-lexicon.json';
import type { CompanyRecord, LeadRecord } from './contracts/campaign-input';
import { firstNameOf } from './contracts/campaign-input';
import { countOccurrences, countWords, matchKeywords } from './text';
import { TRAIT_CATALOGUE } from './trait-detector';
import type { PersonalizationElements } from './types';

// ===========================================
// Lexicon
// ===========================================

const MarkerListSchema = z.array(z.string().min(1));

const QualityLexiconSchema = z.object({
  boilerplate_phrases: MarkerListSchema,
  salesy_phrases: MarkerListSchema,
  strategic_markers: MarkerListSchema,
  tone_markers: z.object({
    executive: MarkerListSchema,
    technical: MarkerListSchema,
    professional: MarkerListSchema,
    formal: MarkerListSchema,
    dynamic: MarkerListSchema,
    engaging: MarkerListSchema,
    forward_thinking: MarkerListSchema,
  }) satisfies z.ZodType<Record<CampaignTone, string[]>>,
  role_stopwords: z.array(z.string()),
});

export type QualityLexicon = z.infer<typeof QualityLexiconSchema>;

export const QUALITY_LEXICON: QualityLexicon = QualityLexiconSchema.parse(lexiconJson);

const INDUSTRY_TERMS = Object.values(TRAIT_CATALOGUE.categories.industry).flat();

// ===========================================
// Types
// ===========================================

export interface MessageText {
  message_type: MessageType;
  subject: string;
  body: string;
}

export interface QualityOptions {
  minWords: number;
  maxWords: number;
  /** Pass mark for the aggregate and for each slot on retry */
  threshold: number;
}

export interface MessageAssessment {
  message_type: MessageType;
  quality_score: number;
  quality_issues: string[];
  personalization_elements: PersonalizationElements;
  strategic_elements: string[];
  word_count: number;
}

export interface QualityAssessmentInput {
  messages: readonly MessageText[];
  lead: LeadRecord;
  company?: CompanyRecord;
  sequence: readonly MessageType[];
  /** Planned tone; unset skips the tone check */
  tone?: CampaignTone | null;
}

export interface QualityAssessment {
  /** One entry per sequence slot that has a message, in sequence order */
  assessments: MessageAssessment[];
  overall_quality_score: number;
  passed: boolean;
  /** Slots below the threshold or without a message, in sequence order */
  failing_types: MessageType[];
  missing_types: MessageType[];
  /** "slot: issue" lines followed by guidance for the next attempt */
  feedback: string[];
}

export type QualityAssessor = (
  input: QualityAssessmentInput,
  options: QualityOptions
) => QualityAssessment;

// ===========================================
// Per-Message Rubric
// ===========================================

function clampScore(score: number): number {
  return Math.max(0, Math.min(100, score));
}

function detectPersonalization(
  body: string,
  lead: LeadRecord,
  company: CompanyRecord | undefined,
  lexicon: QualityLexicon
): PersonalizationElements {
  const text = body.toLowerCase();
  const stopwords = new Set(lexicon.role_stopwords);

  const titleWords = lead.title
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter((word) => word.length >= 2 && !stopwords.has(word));

  const declaredIndustries = [lead.industry, company?.industry]
    .filter((value): value is string => Boolean(value))
    .map((value) => value.toLowerCase());

  return {
    has_lead_name: matchKeywords(text, [firstNameOf(lead)]).length > 0,
    has_company_name: matchKeywords(text, [lead.company]).length > 0,
    has_role_reference: matchKeywords(text, titleWords).length > 0,
    has_industry_terms: matchKeywords(text, [...declaredIndustries, ...INDUSTRY_TERMS]).length > 0,
  };
}

export function assessMessage(
  message: MessageText,
  lead: LeadRecord,
  options: Pick<QualityOptions, 'minWords' | 'maxWords'>,
  company?: CompanyRecord,
  lexicon: QualityLexicon = QUALITY_LEXICON,
  tone: CampaignTone | null = null
): MessageAssessment {
  const wordCount = countWords(message.body);
  const personalization = detectPersonalization(message.body, lead, company, lexicon);
  const fullText = `${message.subject}\n${message.body}`.toLowerCase();
  const strategic = matchKeywords(message.body.toLowerCase(), lexicon.strategic_markers);

  if (!message.body.trim()) {
    return {
      message_type: message.message_type,
      quality_score: 0,
      quality_issues: ['empty_body'],
      personalization_elements: personalization,
      strategic_elements: [],
      word_count: 0,
    };
  }

  let score = 100;
  const issues: string[] = [];

  if (!personalization.has_lead_name) {
    score -= 30;
    issues.push('missing_lead_name');
  }
  if (!personalization.has_company_name) {
    score -= 30;
    issues.push('missing_company_name');
  }

  if (wordCount < options.minWords) {
    score -= 15;
    issues.push('too_short');
  } else if (wordCount > options.maxWords) {
    score -= 10;
    issues.push('too_long');
  }

  for (const phrase of lexicon.boilerplate_phrases) {
    const occurrences = countOccurrences(fullText, phrase);
    for (let i = 0; i < occurrences; i++) {
      score -= 10;
      issues.push(`boilerplate:${phrase}`);
    }
  }

  for (const phrase of lexicon.salesy_phrases) {
    const occurrences = countOccurrences(fullText, phrase);
    for (let i = 0; i < occurrences; i++) {
      score -= 15;
      issues.push(`salesy:${phrase}`);
    }
  }

  if (strategic.length === 0) {
    score -= 20;
    issues.push('no_strategic_language');
  } else if (strategic.length === 1) {
    score -= 10;
    issues.push('weak_strategic_language');
  } else if (strategic.length >= 3) {
    score += 5;
  }

  if (tone && matchKeywords(fullText, lexicon.tone_markers[tone]).length === 0) {
    score -= 5;
    issues.push(`tone_mismatch:${tone}`);
  }

  return {
    message_type: message.message_type,
    quality_score: clampScore(score),
    quality_issues: issues,
    personalization_elements: personalization,
    strategic_elements: strategic,
    word_count: wordCount,
  };
}

// ===========================================
// Guidance
// ===========================================

function guidanceFor(issue: string, options: QualityOptions): string | null {
  if (issue === 'empty_body') return 'Write a complete message body';
  if (issue === 'missing_lead_name') return 'Address the lead by first name';
  if (issue === 'missing_company_name') return 'Mention the company by name in the body';
  if (issue === 'too_short') return `Expand the body to at least ${options.minWords} words`;
  if (issue === 'too_long') return `Trim the body to at most ${options.maxWords} words`;
  if (issue.startsWith('boilerplate:')) {
    return 'Replace boilerplate openers with a specific observation about the company';
  }
  if (issue.startsWith('salesy:')) return 'Remove pressure and discount language';
  if (issue === 'no_strategic_language' || issue === 'weak_strategic_language') {
    return 'Use concrete business language such as growth, efficiency and outcomes';
  }
  if (issue.startsWith('tone_mismatch:')) {
    return `Match the planned ${issue.slice('tone_mismatch:'.length).replace('_', ' ')} tone`;
  }
  return null;
}

// ===========================================
// Campaign Assessment
// ===========================================

/**
 * Score every message and aggregate.
 *
 * The aggregate is the mean of the sequence slots rounded to one decimal,
 * or 0 when any slot has no message.
 */
export function assessCampaignQuality(
  input: QualityAssessmentInput,
  options: QualityOptions
): QualityAssessment {
  const byType = new Map(input.messages.map((message) => [message.message_type, message]));

  const assessments: MessageAssessment[] = [];
  const missing: MessageType[] = [];

  for (const type of input.sequence) {
    const message = byType.get(type);
    if (message) {
      assessments.push(
        assessMessage(message, input.lead, options, input.company, QUALITY_LEXICON, input.tone)
      );
    } else {
      missing.push(type);
    }
  }

  const overall =
    assessments.length === 0 || missing.length > 0
      ? 0
      : Math.round(
          (assessments.reduce((sum, a) => sum + a.quality_score, 0) / assessments.length) * 10
        ) / 10;

  const failing = input.sequence.filter(
    (type) =>
      missing.includes(type) ||
      assessments.some((a) => a.message_type === type && a.quality_score < options.threshold)
  );

  const feedback: string[] = missing.map((type) => `${type}: missing`);
  const guidance = new Set<string>();

  for (const assessment of assessments) {
    if (assessment.quality_score >= options.threshold) continue;
    for (const issue of assessment.quality_issues) {
      feedback.push(`${assessment.message_type}: ${issue}`);
      const line = guidanceFor(issue, options);
      if (line) guidance.add(line);
    }
  }

  return {
    assessments,
    overall_quality_score: overall,
    passed: overall >= options.threshold,
    failing_types: failing,
    missing_types: missing,
    feedback: [...feedback, ...guidance],
  };
}
