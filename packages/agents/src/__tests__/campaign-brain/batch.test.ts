/**
 * Batch Driver Tests
 */

import { describe, test, expect, vi } from 'vitest';
import { z } from 'zod';
import { runCampaignBatch, type CampaignRunner } from '../../campaign-brain/batch';
import type { CampaignInput } from '../../campaign-brain/contracts/campaign-input';
import { createLogger } from '../../campaign-brain/logger';
import { createCampaignState, finalize } from '../../campaign-brain/state';
import type { TerminalStatus } from '@campaign-brain/lib';
import { RICH_PAYLOAD, createSilentLogger } from './fixtures';

// ===========================================
// Test Helpers
// ===========================================

/**
 * Runner that resolves each lead to the status named in its title
 */
class StubRunner implements CampaignRunner {
  readonly seen: string[] = [];

  async run(input: CampaignInput) {
    this.seen.push(input.lead.id);
    const state = createCampaignState(input);
    const status = toStatus(input.lead.title);
    if (status === 'THROW') {
      throw new Error('runner crashed');
    }
    state.overall_quality_score = status === 'APPROVED' ? 90 : 40;
    finalize(state, status, `stub ${status}`);
    return state;
  }
}

const STATUSES = ['APPROVED', 'MANUAL_REVIEW', 'STALLED', 'ERROR', 'THROW'] as const;

function toStatus(title: string): TerminalStatus | 'THROW' {
  return STATUSES.find((status) => status === title) ?? 'APPROVED';
}

function createLeadPayload(id: string, title: string) {
  return { ...RICH_PAYLOAD, lead: { ...RICH_PAYLOAD.lead, id, title } };
}

// ===========================================
// runCampaignBatch
// ===========================================

describe('runCampaignBatch', () => {
  test('returns results in input order and tallies statuses', async () => {
    const inputs = [
      createLeadPayload('lead_a', 'APPROVED'),
      createLeadPayload('lead_b', 'MANUAL_REVIEW'),
      createLeadPayload('lead_c', 'STALLED'),
      createLeadPayload('lead_d', 'APPROVED'),
    ];

    const summary = await runCampaignBatch(new StubRunner(), inputs, { concurrency: 2 }, createSilentLogger());

    expect(summary.results.map((r) => [r.lead_id, r.status])).toEqual([
      ['lead_a', 'APPROVED'],
      ['lead_b', 'MANUAL_REVIEW'],
      ['lead_c', 'STALLED'],
      ['lead_d', 'APPROVED'],
    ]);
    expect(summary.total).toBe(4);
    expect(summary.approved).toBe(2);
    expect(summary.manual_review).toBe(1);
    expect(summary.stalled).toBe(1);
    expect(summary.error).toBe(0);
  });

  test('rejects invalid inputs without running them', async () => {
    const runner = new StubRunner();
    const inputs = [
      { lead: { id: 'lead_bad', name: '', title: 'CTO', company: 'Orbitly' } },
      { lead: { name: 'No Id' } },
      createLeadPayload('lead_ok', 'APPROVED'),
    ];

    const summary = await runCampaignBatch(runner, inputs, {}, createSilentLogger());

    expect(runner.seen).toEqual(['lead_ok']);
    expect(summary.rejected).toBe(2);
    expect(summary.results[0]).toMatchObject({
      lead_id: 'lead_bad',
      status: 'REJECTED',
      reason: 'lead.name: String must contain at least 1 character(s)',
      execution_id: null,
    });
    expect(summary.results[1]?.lead_id).toBe('input_1');
  });

  test('reports a crashing runner as ERROR', async () => {
    const summary = await runCampaignBatch(
      new StubRunner(),
      [createLeadPayload('lead_x', 'THROW')],
      {},
      createSilentLogger()
    );

    expect(summary.results[0]).toMatchObject({
      lead_id: 'lead_x',
      status: 'ERROR',
      reason: 'runner crashed',
    });
    expect(summary.error).toBe(1);
  });

  test('reports progress after every lead', async () => {
    const onProgress = vi.fn();

    await runCampaignBatch(
      new StubRunner(),
      [createLeadPayload('lead_a', 'APPROVED'), createLeadPayload('lead_b', 'APPROVED')],
      { concurrency: 1, onProgress },
      createSilentLogger()
    );

    expect(onProgress.mock.calls).toEqual([
      [1, 2],
      [2, 2],
    ]);
  });

  test('logs each lead when verbose', async () => {
    const output = vi.fn<(message: string) => void>();
    const logger = createLogger({ output });

    await runCampaignBatch(
      new StubRunner(),
      [createLeadPayload('lead_a', 'MANUAL_REVIEW')],
      { verbose: true },
      logger
    );

    const LogLine = z.object({ event: z.string() });
    const events = output.mock.calls.map(([line]) => LogLine.parse(JSON.parse(line)).event);
    expect(events).toEqual(['batch_started', 'lead_processed', 'batch_completed']);
  });

  test('handles an empty batch', async () => {
    const summary = await runCampaignBatch(new StubRunner(), [], {}, createSilentLogger());

    expect(summary.total).toBe(0);
    expect(summary.results).toEqual([]);
  });
});
