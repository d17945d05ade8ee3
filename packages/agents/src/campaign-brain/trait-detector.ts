/**
 * Trait Detector
 *
 * Rule-based trait detection over company research, scraped website text
 * and the lead's title. Keyword signatures live in data/trait-catalogue.json.
 *
 * Confidence per trait kind:
 * - catalogue category trait: min(95, 25 + 20 × matches)
 * - role_<role> from title:   min(95, 40 + 25 × matches)
 * - senior_decision_maker:    min(90, 40 × matches)
 * - technical/business focus: min(85, 35 × matches)
 *
 * @module campaign-brain/trait-detector
 */

import { z } from 'zod';
import catalogueJson from './data/trait-catalogue.json';
import type { CompanyRecord, LeadRecord, ScrapedContent } from './contracts/campaign-input';
import { matchKeywords } from './text';
import type { DataQualityAssessment, DetectedTrait, TraitCategory } from './types';

// ===========================================
// Catalogue
// ===========================================

const KeywordMapSchema = z.record(z.string(), z.array(z.string().min(1)).min(1));

const TraitCatalogueSchema = z.object({
  categories: z.object({
    business_model: KeywordMapSchema,
    technology: KeywordMapSchema,
    industry: KeywordMapSchema,
    market_position: KeywordMapSchema,
    growth_stage: KeywordMapSchema,
    communication: KeywordMapSchema,
  }),
  roles: KeywordMapSchema,
  seniority: z.array(z.string().min(1)),
  focus: z.object({
    technical_focus: z.array(z.string().min(1)),
    business_focus: z.array(z.string().min(1)),
  }),
  website_quality: z.object({
    concrete_insights: KeywordMapSchema,
    high_signal: z.array(z.string()),
    low_signal: z.array(z.string()),
    generic_phrases: z.array(z.string()),
  }),
});

export type TraitCatalogue = z.infer<typeof TraitCatalogueSchema>;

export const TRAIT_CATALOGUE: TraitCatalogue = TraitCatalogueSchema.parse(catalogueJson);

type CatalogueCategory = keyof TraitCatalogue['categories'];

const CATALOGUE_CATEGORIES: CatalogueCategory[] = [
  'business_model',
  'technology',
  'industry',
  'market_position',
  'growth_stage',
  'communication',
];

const TRAIT_TO_CATEGORY = new Map<string, TraitCategory>(
  CATALOGUE_CATEGORIES.flatMap((category) =>
    Object.keys(TRAIT_CATALOGUE.categories[category]).map(
      (trait): [string, TraitCategory] => [trait, category]
    )
  )
);

// ===========================================
// Priority
// ===========================================

const CATEGORY_PRIORITY: Partial<Record<TraitCategory, number>> = {
  role: 1.0,
  seniority: 0.9,
  business_model: 0.8,
  technology: 0.7,
  industry: 0.6,
};

export function categoryOfTrait(trait: string): TraitCategory | null {
  if (trait.startsWith('role_')) return 'role';
  if (trait === 'senior_decision_maker') return 'seniority';
  if (trait === 'technical_focus' || trait === 'business_focus') return 'focus';
  return TRAIT_TO_CATEGORY.get(trait) ?? null;
}

/**
 * Tie-break weight: role > seniority > business model > technology > industry > other
 */
export function traitPriority(trait: string): number {
  const category = categoryOfTrait(trait);
  return (category && CATEGORY_PRIORITY[category]) ?? 0.5;
}

// ===========================================
// Detection
// ===========================================

export interface TraitDetectionInput {
  lead: LeadRecord;
  company: CompanyRecord;
  scraped_content: ScrapedContent;
}

export interface TraitDetectionResult {
  detected: DetectedTrait[];
  traits: string[];
  trait_confidence: Record<string, number>;
  trait_reasoning: Record<string, string>;
  primary_trait: string | null;
  data_quality: DataQualityAssessment;
  is_low_context: boolean;
}

export interface TraitDetectionOptions {
  /** Traits below this confidence are kept but never primary */
  minConfidence: number;
}

/**
 * Company research and scraped text the detector reads, lower-cased
 */
export function buildAnalysisText(input: TraitDetectionInput): string {
  const { company, scraped_content, lead } = input;
  return [
    company.description,
    company.services.join(', '),
    company.website_insights,
    scraped_content.homepage_text,
    scraped_content.about_page,
    lead.company,
  ]
    .filter((part) => part.trim().length > 0)
    .join(' ')
    .toLowerCase();
}

/**
 * True when there is any company research text beyond the company name
 */
export function hasCompanyResearch(input: TraitDetectionInput): boolean {
  const { company, scraped_content } = input;
  return [
    company.description,
    company.website_insights,
    scraped_content.homepage_text,
    scraped_content.about_page,
    ...company.services,
  ].some((part) => part.trim().length > 0);
}

export function detectCategoryTraits(
  text: string,
  catalogue: TraitCatalogue = TRAIT_CATALOGUE
): DetectedTrait[] {
  const detected: DetectedTrait[] = [];

  for (const category of CATALOGUE_CATEGORIES) {
    for (const [trait, keywords] of Object.entries(catalogue.categories[category])) {
      const matches = matchKeywords(text, keywords);
      if (matches.length === 0) continue;

      detected.push({
        trait,
        category,
        confidence: Math.min(95, 25 + 20 * matches.length),
        reasoning: `Matched keywords: ${matches.slice(0, 3).join(', ')}`,
      });
    }
  }

  return detected;
}

/**
 * Role, seniority and focus traits derived from the job title
 */
export function detectRoleTraits(
  title: string,
  catalogue: TraitCatalogue = TRAIT_CATALOGUE
): DetectedTrait[] {
  const normalized = title.toLowerCase();
  const detected: DetectedTrait[] = [];

  for (const [role, keywords] of Object.entries(catalogue.roles)) {
    const matches = matchKeywords(normalized, keywords);
    if (matches.length === 0) continue;

    detected.push({
      trait: `role_${role}`,
      category: 'role',
      confidence: Math.min(95, 40 + 25 * matches.length),
      reasoning: `Title contains: ${matches.join(', ')}`,
    });
  }

  const seniorMatches = matchKeywords(normalized, catalogue.seniority);
  if (seniorMatches.length > 0) {
    detected.push({
      trait: 'senior_decision_maker',
      category: 'seniority',
      confidence: Math.min(90, 40 * seniorMatches.length),
      reasoning: `Senior indicators: ${seniorMatches.join(', ')}`,
    });
  }

  const techMatches = matchKeywords(normalized, catalogue.focus.technical_focus);
  if (techMatches.length > 0) {
    detected.push({
      trait: 'technical_focus',
      category: 'focus',
      confidence: Math.min(85, 35 * techMatches.length),
      reasoning: `Technical indicators: ${techMatches.join(', ')}`,
    });
  }

  const businessMatches = matchKeywords(normalized, catalogue.focus.business_focus);
  if (businessMatches.length > 0) {
    detected.push({
      trait: 'business_focus',
      category: 'focus',
      confidence: Math.min(85, 35 * businessMatches.length),
      reasoning: `Business indicators: ${businessMatches.join(', ')}`,
    });
  }

  return detected;
}

/**
 * Highest-confidence trait at or above the minimum.
 *
 * Ties go to the higher-priority kind, then to detection order.
 */
export function selectPrimaryTrait(
  detected: readonly DetectedTrait[],
  minConfidence: number
): string | null {
  let best: DetectedTrait | null = null;

  for (const candidate of detected) {
    if (candidate.confidence < minConfidence) continue;
    if (
      !best ||
      candidate.confidence > best.confidence ||
      (candidate.confidence === best.confidence &&
        categoryWeight(candidate) > categoryWeight(best))
    ) {
      best = candidate;
    }
  }

  return best?.trait ?? null;
}

function categoryWeight(trait: DetectedTrait): number {
  return CATEGORY_PRIORITY[trait.category] ?? 0.5;
}

// ===========================================
// Data Quality
// ===========================================

function assessWebsiteQuality(
  input: TraitDetectionInput,
  catalogue: TraitCatalogue
): { score: number; factors: string[]; low_signal: boolean } {
  const { company, scraped_content } = input;
  const content = [
    company.description,
    company.services.join(', '),
    company.website_insights,
    scraped_content.homepage_text,
  ]
    .join(' ')
    .toLowerCase();

  if (!content.trim()) {
    return { score: 0, factors: ['no_website_content'], low_signal: true };
  }

  const quality = catalogue.website_quality;
  const factors = Object.entries(quality.concrete_insights)
    .filter(([, keywords]) => matchKeywords(content, keywords).length > 0)
    .map(([factor]) => factor);

  if (factors.length >= 2) {
    return { score: 4, factors: [...factors, 'sufficient_concrete_insights'], low_signal: false };
  }
  if (factors.length === 1) {
    return { score: 2, factors: [...factors, 'some_concrete_insights'], low_signal: false };
  }

  const highSignal = matchKeywords(content, quality.high_signal).length;
  const lowSignal =
    matchKeywords(content, quality.low_signal).length +
    matchKeywords(content, quality.generic_phrases).length;

  if (highSignal > lowSignal) {
    return { score: 1, factors: ['more_signal_than_noise'], low_signal: false };
  }
  return { score: 0, factors: ['too_generic_or_vague'], low_signal: true };
}

/**
 * Score available research out of 10: website (0..4), enrichment (0..4), social (0..2)
 */
export function assessDataQuality(
  input: TraitDetectionInput,
  catalogue: TraitCatalogue = TRAIT_CATALOGUE
): DataQualityAssessment {
  const { lead, company } = input;
  const website = assessWebsiteQuality(input, catalogue);

  const enrichmentFactors: string[] = [];
  if (lead.industry || company.industry) enrichmentFactors.push('has_industry');
  if (lead.company_size || company.size) enrichmentFactors.push('has_company_size');
  if (lead.title) enrichmentFactors.push('has_title');
  if (lead.linkedin_url) enrichmentFactors.push('has_linkedin');

  const socialFactors: string[] = [];
  if (lead.linkedin_url) socialFactors.push('has_linkedin_profile');
  if (lead.email) socialFactors.push('has_email');

  return {
    score: website.score + enrichmentFactors.length + socialFactors.length,
    factors: [...website.factors, ...enrichmentFactors, ...socialFactors],
    website_score: website.score,
    enrichment_score: enrichmentFactors.length,
    social_score: socialFactors.length,
    low_signal: website.low_signal,
  };
}

/**
 * No website and incomplete enrichment
 */
export function isLowContextLead(input: TraitDetectionInput): boolean {
  const { lead, company, scraped_content } = input;

  const hasWebsite = Boolean(company.website);
  const hasIndustry = Boolean(lead.industry || company.industry);
  const hasSize = Boolean(lead.company_size || company.size);
  const hasDescription = company.description.trim().length > 50;
  const hasHomepage = scraped_content.homepage_text.trim().length > 50;

  return !hasWebsite && !(hasIndustry && hasSize && hasDescription && hasHomepage);
}

// ===========================================
// Main Entry
// ===========================================

export function detectTraits(
  input: TraitDetectionInput,
  options: TraitDetectionOptions,
  catalogue: TraitCatalogue = TRAIT_CATALOGUE
): TraitDetectionResult {
  const detected = [
    ...detectCategoryTraits(buildAnalysisText(input), catalogue),
    ...detectRoleTraits(input.lead.title, catalogue),
  ];

  const trait_confidence: Record<string, number> = {};
  const trait_reasoning: Record<string, string> = {};
  for (const trait of detected) {
    trait_confidence[trait.trait] = trait.confidence;
    trait_reasoning[trait.trait] = trait.reasoning;
  }

  return {
    detected,
    traits: detected.map((t) => t.trait),
    trait_confidence,
    trait_reasoning,
    primary_trait: selectPrimaryTrait(detected, options.minConfidence),
    data_quality: assessDataQuality(input, catalogue),
    is_low_context: isLowContextLead(input),
  };
}
