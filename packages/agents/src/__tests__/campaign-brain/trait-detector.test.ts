/**
 * Trait Detector Tests
 */

import { describe, test, expect } from 'vitest';
import {
  assessDataQuality,
  buildAnalysisText,
  detectCategoryTraits,
  detectRoleTraits,
  detectTraits,
  hasCompanyResearch,
  isLowContextLead,
  selectPrimaryTrait,
  traitPriority,
  type TraitDetectionInput,
} from '../../campaign-brain/trait-detector';
import type { CampaignInputPayload } from '../../campaign-brain/contracts/campaign-input';
import { createTestInput } from './fixtures';

function createDetectionInput(overrides: Partial<CampaignInputPayload> = {}): TraitDetectionInput {
  const { lead, company, scraped_content } = createTestInput(overrides);
  return { lead, company, scraped_content };
}

// ===========================================
// Category Traits
// ===========================================

describe('detectCategoryTraits', () => {
  test('detects catalogue traits with confidence 25 + 20 per keyword', () => {
    const text = buildAnalysisText(createDetectionInput());
    const detected = detectCategoryTraits(text);

    expect(detected.map((t) => [t.trait, t.confidence])).toEqual([
      ['saas', 45],
      ['api_first', 65],
      ['cloud_native', 45],
      ['logistics', 45],
    ]);
  });

  test('records the matched keywords as reasoning', () => {
    const detected = detectCategoryTraits('api integrations for developers');
    const apiFirst = detected.find((t) => t.trait === 'api_first');

    expect(apiFirst?.reasoning).toBe('Matched keywords: api, integrations, developers');
    expect(apiFirst?.category).toBe('technology');
  });

  test('matches whole words only', () => {
    expect(detectCategoryTraits('she said the campaign was final')).toEqual([]);
  });

  test('caps confidence at 95', () => {
    const text = 'financial banking payments fintech trading investment';
    const fintech = detectCategoryTraits(text).find((t) => t.trait === 'fintech');

    expect(fintech?.confidence).toBe(95);
  });
});

// ===========================================
// Role Traits
// ===========================================

describe('detectRoleTraits', () => {
  test('detects CTO role with technical focus', () => {
    const detected = detectRoleTraits('CTO');

    expect(detected.map((t) => [t.trait, t.confidence])).toEqual([
      ['role_cto', 65],
      ['technical_focus', 35],
    ]);
  });

  test('detects seniority from multiple indicators', () => {
    const detected = detectRoleTraits('Chief Executive Officer & Founder');

    expect(detected.map((t) => [t.trait, t.confidence])).toEqual([
      ['role_ceo', 90],
      ['senior_decision_maker', 80],
    ]);
  });

  test('detects VP titles', () => {
    const detected = detectRoleTraits('VP of Engineering');

    expect(detected.map((t) => t.trait)).toEqual([
      'role_vp',
      'senior_decision_maker',
      'technical_focus',
    ]);
  });

  test('returns nothing for an unrecognized title', () => {
    expect(detectRoleTraits('Associate')).toEqual([]);
  });
});

// ===========================================
// Primary Trait
// ===========================================

describe('selectPrimaryTrait', () => {
  test('breaks confidence ties by category priority', () => {
    const primary = selectPrimaryTrait(
      [
        { trait: 'saas', category: 'technology', confidence: 65, reasoning: '' },
        { trait: 'role_cto', category: 'role', confidence: 65, reasoning: '' },
      ],
      40
    );

    expect(primary).toBe('role_cto');
  });

  test('prefers higher confidence over priority', () => {
    const primary = selectPrimaryTrait(
      [
        { trait: 'role_vp', category: 'role', confidence: 65, reasoning: '' },
        { trait: 'fintech', category: 'industry', confidence: 85, reasoning: '' },
      ],
      40
    );

    expect(primary).toBe('fintech');
  });

  test('returns null when nothing reaches the minimum confidence', () => {
    const primary = selectPrimaryTrait(
      [{ trait: 'technical_focus', category: 'focus', confidence: 35, reasoning: '' }],
      40
    );

    expect(primary).toBeNull();
  });
});

describe('traitPriority', () => {
  test('ranks role > seniority > business model > technology > industry > other', () => {
    expect(traitPriority('role_cto')).toBe(1.0);
    expect(traitPriority('senior_decision_maker')).toBe(0.9);
    expect(traitPriority('startup')).toBe(0.8);
    expect(traitPriority('saas')).toBe(0.7);
    expect(traitPriority('fintech')).toBe(0.6);
    expect(traitPriority('style_formal')).toBe(0.5);
    expect(traitPriority('not_a_trait')).toBe(0.5);
  });
});

// ===========================================
// Data Quality
// ===========================================

describe('assessDataQuality', () => {
  test('scores concrete website insights and enrichment', () => {
    const quality = assessDataQuality(createDetectionInput());

    expect(quality.website_score).toBe(4);
    expect(quality.enrichment_score).toBe(1);
    expect(quality.social_score).toBe(1);
    expect(quality.score).toBe(6);
    expect(quality.low_signal).toBe(false);
    expect(quality.factors).toEqual([
      'has_integrations',
      'has_analytics',
      'sufficient_concrete_insights',
      'has_title',
      'has_email',
    ]);
  });

  test('flags generic marketing copy as low signal', () => {
    const quality = assessDataQuality(
      createDetectionInput({
        company: { description: 'Innovative modern solutions for growing businesses.' },
      })
    );

    expect(quality.website_score).toBe(0);
    expect(quality.factors[0]).toBe('too_generic_or_vague');
    expect(quality.low_signal).toBe(true);
  });

  test('flags missing website content', () => {
    const quality = assessDataQuality(createDetectionInput({ company: {} }));

    expect(quality.factors[0]).toBe('no_website_content');
    expect(quality.low_signal).toBe(true);
  });
});

describe('isLowContextLead', () => {
  test('is low context without a website and with partial enrichment', () => {
    expect(isLowContextLead(createDetectionInput())).toBe(true);
  });

  test('is not low context when a website is known', () => {
    const input = createDetectionInput({
      company: {
        description: 'Orbitly builds a cloud platform for logistics teams.',
        services: ['API integrations'],
        website: 'https://orbitly.io',
      },
    });

    expect(isLowContextLead(input)).toBe(false);
  });
});

describe('hasCompanyResearch', () => {
  test('ignores the company name alone', () => {
    expect(hasCompanyResearch(createDetectionInput({ company: {} }))).toBe(false);
  });

  test('counts scraped homepage text', () => {
    const input = createDetectionInput({
      company: {},
      scraped_content: { homepage_text: 'Freight visibility for mid-size shippers' },
    });

    expect(hasCompanyResearch(input)).toBe(true);
  });
});

// ===========================================
// detectTraits
// ===========================================

describe('detectTraits', () => {
  test('combines category and role traits', () => {
    const result = detectTraits(createDetectionInput(), { minConfidence: 40 });

    expect(result.traits).toEqual([
      'saas',
      'api_first',
      'cloud_native',
      'logistics',
      'role_cto',
      'technical_focus',
    ]);
    expect(result.primary_trait).toBe('role_cto');
    expect(result.trait_confidence.role_cto).toBe(65);
    expect(result.trait_reasoning.role_cto).toBe('Title contains: cto');
    expect(result.is_low_context).toBe(true);
  });

  test('returns no traits for a lead with no usable data', () => {
    const result = detectTraits(
      createDetectionInput({
        lead: { id: 'lead_002', name: 'Sam Lee', title: 'Associate', company: 'Acme' },
        company: {},
      }),
      { minConfidence: 40 }
    );

    expect(result.traits).toEqual([]);
    expect(result.primary_trait).toBeNull();
  });

  test('is deterministic', () => {
    const input = createDetectionInput();
    expect(detectTraits(input, { minConfidence: 40 })).toEqual(
      detectTraits(input, { minConfidence: 40 })
    );
  });
});
