/**
 * Shared fixtures for campaign brain tests
 */

import { vi } from 'vitest';
import { toLeadId } from '@campaign-brain/lib';
import {
  CompanyRecordSchema,
  parseCampaignInput,
  type CampaignInput,
  type CampaignInputPayload,
  type CompanyRecord,
} from '../../campaign-brain/contracts/campaign-input';
import type { MessageDraft } from '../../campaign-brain/contracts/message-draft';
import type { Copywriter, DraftRequest } from '../../campaign-brain/copywriter';
import { createLogger } from '../../campaign-brain/logger';
import type { MemoryStore } from '../../campaign-brain/memory-manager';
import { createCampaignState } from '../../campaign-brain/state';
import type { CampaignMessage, CampaignState, LeadMemoryRecord } from '../../campaign-brain/types';

// ===========================================
// Inputs
// ===========================================

export const RICH_PAYLOAD: CampaignInputPayload = {
  lead: {
    id: 'lead_001',
    name: 'Dana Reyes',
    title: 'CTO',
    company: 'Orbitly',
    email: 'dana@orbitly.io',
  },
  company: {
    description: 'Orbitly builds a cloud platform for logistics teams.',
    services: ['API integrations', 'Analytics dashboards'],
  },
};

export function createTestInput(overrides: Partial<CampaignInputPayload> = {}): CampaignInput {
  return parseCampaignInput({ ...RICH_PAYLOAD, ...overrides });
}

export function createCompany(overrides: Record<string, unknown> = {}): CompanyRecord {
  return CompanyRecordSchema.parse(overrides);
}

export function createTestState(overrides: Partial<CampaignInputPayload> = {}): CampaignState {
  return createCampaignState(createTestInput(overrides));
}

/**
 * State that has been through planning with the CTO angle
 */
export function createPlannedState(overrides: Partial<CampaignInputPayload> = {}): CampaignState {
  const state = createTestState(overrides);
  state.campaign_sequence = ['hook', 'proof', 'fomo'];
  state.messaging_angle = 'technical_innovation';
  state.campaign_tone = 'technical';
  return state;
}

export function createTestMessage(overrides: Partial<CampaignMessage> = {}): CampaignMessage {
  return {
    message_type: 'hook',
    subject: 'Subject',
    body: 'Body',
    generation_attempt: 1,
    copywriter: 'template',
    quality_score: 0,
    quality_issues: [],
    personalization_elements: {
      has_lead_name: false,
      has_company_name: false,
      has_role_reference: false,
      has_industry_terms: false,
    },
    strategic_elements: [],
    word_count: 1,
    ...overrides,
  };
}

export function createMemoryRecord(overrides: Partial<LeadMemoryRecord> = {}): LeadMemoryRecord {
  return {
    lead_id: toLeadId('lead_001'),
    execution_id: 'campaign_previous',
    traits: ['role_cto'],
    primary_trait: 'role_cto',
    messaging_angle: 'technical_innovation',
    overall_quality_score: 90,
    final_status: 'APPROVED',
    recorded_at: '2026-03-10T00:00:00.000Z',
    ...overrides,
  };
}

// ===========================================
// Copy
// ===========================================

/**
 * 71 words, first name present, company name absent, one strategic marker.
 * Scores 100 - 30 - 10 = 60 against the default rubric.
 */
export const SIXTY_POINT_BODY =
  'Hi Dana, your engineering team ships quickly and the release notes show real care for developers. ' +
  'We help technical groups like yours shorten build times and keep deployments calm. Our customers usually see faster ' +
  'feedback loops within a few weeks of starting, without changing their existing tools or hiring anyone new. Teams often ' +
  'tell us the biggest win is efficiency in code review. Would a short call next week be useful?';

export class FixedCopywriter implements Copywriter {
  readonly requests: DraftRequest[] = [];

  constructor(
    readonly name: string,
    private readonly draftFor: (request: DraftRequest) => MessageDraft
  ) {}

  async draft(request: DraftRequest): Promise<MessageDraft> {
    this.requests.push(request);
    return this.draftFor(request);
  }
}

export class FailingCopywriter implements Copywriter {
  calls = 0;

  constructor(
    readonly name: string,
    private readonly message: string
  ) {}

  async draft(): Promise<MessageDraft> {
    this.calls++;
    throw new Error(this.message);
  }
}

// ===========================================
// Collaborators
// ===========================================

export function createSilentLogger() {
  return createLogger({ output: vi.fn() });
}

export class FailingMemoryStore implements MemoryStore {
  readonly name = 'failing';

  async load(): Promise<LeadMemoryRecord[]> {
    throw new Error('connection refused');
  }

  async append(): Promise<void> {
    throw new Error('connection refused');
  }
}
