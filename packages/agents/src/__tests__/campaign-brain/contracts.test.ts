/**
 * Input and Output Contract Tests
 */

import { describe, test, expect } from 'vitest';
import {
  firstNameOf,
  hasLinkedInProfile,
  hasValidEmail,
  parseCampaignInput,
} from '../../campaign-brain/contracts/campaign-input';
import { toCampaignOutput } from '../../campaign-brain/contracts/campaign-output';
import { ValidationFault } from '../../campaign-brain/errors';
import { finalize, upsertMessage } from '../../campaign-brain/state';
import { createPlannedState, createTestMessage } from './fixtures';

// ===========================================
// parseCampaignInput
// ===========================================

describe('parseCampaignInput', () => {
  test('applies defaults for missing research', () => {
    const input = parseCampaignInput({
      lead: { id: 'lead_002', name: 'Sam Ortiz', title: 'Head of Ops', company: 'Freightline' },
    });

    expect(input.company).toEqual({ description: '', services: [], website_insights: '' });
    expect(input.scraped_content).toEqual({ homepage_text: '', about_page: '' });
  });

  test('splits a comma-separated services string', () => {
    const input = parseCampaignInput({
      lead: { id: 'lead_002', name: 'Sam Ortiz', title: 'Head of Ops', company: 'Freightline' },
      company: { services: 'Tracking, Routing, , Billing' },
    });

    expect(input.company.services).toEqual(['Tracking', 'Routing', 'Billing']);
  });

  test('lists every failing field', () => {
    try {
      parseCampaignInput({ lead: { id: ' ', name: 'Sam Ortiz', company: 'Freightline' } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationFault);
      const issues = error instanceof ValidationFault ? error.issues : [];
      expect(issues).toEqual([
        'lead.id: String must contain at least 1 character(s)',
        'lead.title: Required',
      ]);
    }
  });

  test('rejects a missing lead', () => {
    expect(() => parseCampaignInput({})).toThrow('Invalid campaign input: lead: Required');
  });
});

describe('lead helpers', () => {
  const lead = parseCampaignInput({
    lead: {
      id: 'lead_002',
      name: 'Sam  Ortiz',
      title: 'Head of Ops',
      company: 'Freightline',
      email: 'sam@freightline',
      linkedin_url: 'https://www.LinkedIn.com/in/sam',
    },
  }).lead;

  test('checks email shape and LinkedIn profile', () => {
    expect(hasValidEmail(lead)).toBe(false);
    expect(hasValidEmail({ ...lead, email: 'sam@freightline.com' })).toBe(true);
    expect(hasLinkedInProfile(lead)).toBe(true);
  });

  test('takes the first name token', () => {
    expect(firstNameOf(lead)).toBe('Sam');
  });
});

// ===========================================
// toCampaignOutput
// ===========================================

describe('toCampaignOutput', () => {
  test('projects the state in sequence order', () => {
    const state = createPlannedState();
    upsertMessage(state, createTestMessage({ message_type: 'proof', subject: 'P', body: 'Proof', quality_score: 84 }));
    upsertMessage(state, createTestMessage({ message_type: 'hook', subject: 'H', body: 'Hook', quality_score: 90 }));
    state.overall_quality_score = 87;
    finalize(state, 'APPROVED', 'Quality score 87 meets threshold 80');

    const output = toCampaignOutput(state);

    expect(output).toEqual({
      execution_id: state.execution_id,
      lead_id: 'lead_001',
      final_status: 'APPROVED',
      status_reason: 'Quality score 87 meets threshold 80',
      messages: [
        { type: 'hook', subject: 'H', body: 'Hook', score: 90 },
        { type: 'proof', subject: 'P', body: 'Proof', score: 84 },
      ],
      overall_quality_score: 87,
      queue_id: null,
      delivery_method: null,
      fallback_channel_message: null,
      fallback_mode: false,
      fallback_reason: null,
    });
  });
});
