/**
 * Lead Memory Tests
 */

import { afterEach, describe, test, expect, vi } from 'vitest';
import { toLeadId } from '@campaign-brain/lib';
import {
  InMemoryMemoryStore,
  UpstashMemoryStore,
  buildMemoryRecord,
  createMemoryStore,
  loadLeadMemory,
  persistLeadMemory,
  summarizeMemory,
  type MemoryStore,
} from '../../campaign-brain/memory-manager';
import { SystemFault } from '../../campaign-brain/errors';
import { finalize } from '../../campaign-brain/state';
import type { LeadMemoryRecord } from '../../campaign-brain/types';
import {
  FailingMemoryStore,
  createMemoryRecord,
  createSilentLogger,
  createTestState,
} from './fixtures';

const LEAD_ID = toLeadId('lead_001');

// ===========================================
// Stores
// ===========================================

describe('InMemoryMemoryStore', () => {
  test('returns records oldest first', async () => {
    const store = new InMemoryMemoryStore();
    await store.append(createMemoryRecord({ execution_id: 'run_1' }));
    await store.append(createMemoryRecord({ execution_id: 'run_2' }));

    const records = await store.load(LEAD_ID);

    expect(records.map((r) => r.execution_id)).toEqual(['run_1', 'run_2']);
  });

  test('keeps only the most recent records', async () => {
    const store = new InMemoryMemoryStore(2);
    for (const id of ['run_1', 'run_2', 'run_3']) {
      await store.append(createMemoryRecord({ execution_id: id }));
    }

    const records = await store.load(LEAD_ID);

    expect(records.map((r) => r.execution_id)).toEqual(['run_2', 'run_3']);
  });

  test('returns an empty history for unknown leads', async () => {
    const store = new InMemoryMemoryStore();
    expect(await store.load(toLeadId('lead_unknown'))).toEqual([]);
  });
});

describe('UpstashMemoryStore', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('requires credentials', () => {
    vi.stubEnv('UPSTASH_REDIS_REST_URL', '');
    vi.stubEnv('UPSTASH_REDIS_REST_TOKEN', '');

    expect(() => new UpstashMemoryStore()).toThrow(SystemFault);
  });

  test('keys history by lead', () => {
    const store = new UpstashMemoryStore({
      url: 'https://example.upstash.io',
      token: 'test-token',
    });

    expect(store.keyFor('lead_001')).toBe('campaign-brain:memory:lead_001');
  });
});

describe('createMemoryStore', () => {
  test('uses the in-process store without credentials', () => {
    expect(createMemoryStore({}).name).toBe('in-memory');
  });

  test('uses Upstash when credentials are set', () => {
    const store = createMemoryStore({
      UPSTASH_REDIS_REST_URL: 'https://example.upstash.io',
      UPSTASH_REDIS_REST_TOKEN: 'test-token',
    });

    expect(store.name).toBe('upstash');
  });
});

// ===========================================
// summarizeMemory
// ===========================================

describe('summarizeMemory', () => {
  const now = new Date('2026-03-15T00:00:00.000Z');

  test('summarizes outcomes, failed angles and recent contact', () => {
    const records: LeadMemoryRecord[] = [
      createMemoryRecord({
        final_status: 'MANUAL_REVIEW',
        messaging_angle: 'technical_innovation',
        overall_quality_score: 60,
        recorded_at: '2026-03-01T00:00:00.000Z',
      }),
      createMemoryRecord({
        final_status: 'APPROVED',
        messaging_angle: 'technical_excellence',
        overall_quality_score: 90,
        recorded_at: '2026-03-10T00:00:00.000Z',
      }),
    ];

    const { context, insights } = summarizeMemory(LEAD_ID, records, now);

    expect(context).toEqual({
      lead_id: LEAD_ID,
      previous_runs: 2,
      last_status: 'APPROVED',
      last_angle: 'technical_excellence',
      failed_angles: ['technical_innovation'],
      successful_angles: ['technical_excellence'],
      last_contact_at: '2026-03-10T00:00:00.000Z',
      average_quality: 75,
    });
    expect(insights).toEqual([
      'Attempt 3 for this lead',
      'Previous success rate: 50% (1 of 2 approved)',
      'Angle technical_innovation previously failed to pass review',
      'Lead was contacted 5 days ago; avoid repeating the technical_excellence angle',
    ]);
  });

  test('drops an angle from the failed list once it succeeds', () => {
    const records = [
      createMemoryRecord({ final_status: 'ERROR', recorded_at: '2026-01-01T00:00:00.000Z' }),
      createMemoryRecord({ final_status: 'APPROVED', recorded_at: '2026-01-02T00:00:00.000Z' }),
    ];

    const { context } = summarizeMemory(LEAD_ID, records, now);

    expect(context.failed_angles).toEqual([]);
    expect(context.successful_angles).toEqual(['technical_innovation']);
  });

  test('ignores stalled runs when collecting angles', () => {
    const records = [createMemoryRecord({ final_status: 'STALLED', messaging_angle: null })];

    const { context, insights } = summarizeMemory(LEAD_ID, records, now);

    expect(context.failed_angles).toEqual([]);
    expect(insights).toEqual(['Attempt 2 for this lead', 'Previous success rate: 0% (0 of 1 approved)']);
  });
});

// ===========================================
// Pipeline Steps
// ===========================================

describe('loadLeadMemory', () => {
  test('fills memory context and insights from history', async () => {
    const store = new InMemoryMemoryStore();
    await store.append(createMemoryRecord({ final_status: 'MANUAL_REVIEW' }));
    const state = createTestState();

    await loadLeadMemory(state, { store, timeoutMs: 100, logger: createSilentLogger() });

    expect(state.memory_context?.previous_runs).toBe(1);
    expect(state.memory_context?.failed_angles).toEqual(['technical_innovation']);
    expect(state.historical_insights[0]).toBe('Attempt 2 for this lead');
  });

  test('leaves memory empty for a first run', async () => {
    const state = createTestState();

    await loadLeadMemory(state, {
      store: new InMemoryMemoryStore(),
      timeoutMs: 100,
      logger: createSilentLogger(),
    });

    expect(state.memory_context).toBeNull();
    expect(state.historical_insights).toEqual([]);
  });

  test('turns store failures into warnings', async () => {
    const state = createTestState();

    await loadLeadMemory(state, {
      store: new FailingMemoryStore(),
      timeoutMs: 100,
      logger: createSilentLogger(),
    });

    expect(state.warnings).toEqual(['Memory load failed: connection refused']);
    expect(state.memory_context).toBeNull();
  });

  test('times out a slow store', async () => {
    const slow: MemoryStore = {
      name: 'slow',
      load: () => new Promise(() => undefined),
      append: async () => undefined,
    };
    const state = createTestState();

    await loadLeadMemory(state, { store: slow, timeoutMs: 10, logger: createSilentLogger() });

    expect(state.warnings).toEqual(['Memory load failed: slow memory load timed out after 10ms']);
  });
});

describe('persistLeadMemory', () => {
  test('appends a record of the finished run', async () => {
    const store = new InMemoryMemoryStore();
    const state = createTestState();
    state.messaging_angle = 'technical_innovation';
    state.overall_quality_score = 92;
    finalize(state, 'APPROVED', 'Quality score 92 meets threshold 80');

    await persistLeadMemory(state, { store, timeoutMs: 100, logger: createSilentLogger() });

    const [record] = await store.load(LEAD_ID);
    expect(record?.execution_id).toBe(state.execution_id);
    expect(record?.final_status).toBe('APPROVED');
    expect(record?.overall_quality_score).toBe(92);
    expect(state.warnings).toEqual([]);
  });

  test('refuses unfinished runs', async () => {
    const state = createTestState();

    expect(() => buildMemoryRecord(state)).toThrow('Only finished runs are written to memory');

    await persistLeadMemory(state, {
      store: new InMemoryMemoryStore(),
      timeoutMs: 100,
      logger: createSilentLogger(),
    });

    expect(state.warnings).toEqual([
      'Memory persist failed: Only finished runs are written to memory',
    ]);
  });

  test('turns store failures into warnings', async () => {
    const state = createTestState();
    finalize(state, 'STALLED', 'No usable traits');

    await persistLeadMemory(state, {
      store: new FailingMemoryStore(),
      timeoutMs: 100,
      logger: createSilentLogger(),
    });

    expect(state.warnings).toEqual(['Memory persist failed: connection refused']);
  });
});
