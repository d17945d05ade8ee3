/**
 * Lead Memory
 *
 * Per-lead history of finished runs. Loaded before trait detection so the
 * planner can avoid angles that already failed, appended after the run
 * reaches a terminal status. Store failures only ever produce warnings.
 *
 * Upstash key format: `campaign-brain:memory:${lead_id}` (list, newest last)
 *
 * @module campaign-brain/memory-manager
 */

import { Redis } from '@upstash/redis';
import { z } from 'zod';
import { isTerminalStatus, toLeadId, type LeadId } from '@campaign-brain/lib';
import { SystemFault, getErrorMessage, withTimeout } from './errors';
import type { CampaignBrainLogger } from './logger';
import { addWarning } from './state';
import type { CampaignState, LeadMemoryRecord, MemoryContext } from './types';

// ===========================================
// Record Schema
// ===========================================

export const LeadMemoryRecordSchema = z.object({
  lead_id: z.string().min(1),
  execution_id: z.string().min(1),
  traits: z.array(z.string()),
  primary_trait: z.string().nullable(),
  messaging_angle: z.string().nullable(),
  overall_quality_score: z.number().min(0).max(100),
  final_status: z.enum(['APPROVED', 'MANUAL_REVIEW', 'STALLED', 'ERROR']),
  recorded_at: z.string().datetime(),
});

// ===========================================
// Stores
// ===========================================

export interface MemoryStore {
  readonly name: string;
  /** Records for one lead, oldest first */
  load(leadId: LeadId): Promise<LeadMemoryRecord[]>;
  /** Append under the record's own lead key */
  append(record: LeadMemoryRecord): Promise<void>;
}

export class InMemoryMemoryStore implements MemoryStore {
  readonly name = 'in-memory';

  private readonly records = new Map<string, LeadMemoryRecord[]>();

  constructor(private readonly maxRecords: number = 10) {}

  async load(leadId: LeadId): Promise<LeadMemoryRecord[]> {
    return [...(this.records.get(leadId) ?? [])];
  }

  async append(record: LeadMemoryRecord): Promise<void> {
    const history = [...(this.records.get(record.lead_id) ?? []), record];
    this.records.set(record.lead_id, history.slice(-this.maxRecords));
  }
}

export interface UpstashMemoryStoreConfig {
  /** Redis URL (defaults to UPSTASH_REDIS_REST_URL env var) */
  url?: string;

  /** Redis token (defaults to UPSTASH_REDIS_REST_TOKEN env var) */
  token?: string;

  /** Records kept per lead (default: 10) */
  maxRecords: number;

  /** Days a lead's history survives without new runs (default: 90) */
  ttlDays: number;

  /** Key prefix (default: 'campaign-brain:memory') */
  keyPrefix: string;
}

export const DEFAULT_UPSTASH_MEMORY_CONFIG: UpstashMemoryStoreConfig = {
  maxRecords: 10,
  ttlDays: 90,
  keyPrefix: 'campaign-brain:memory',
};

export class UpstashMemoryStore implements MemoryStore {
  readonly name = 'upstash';

  private readonly redis: Redis;
  private readonly config: UpstashMemoryStoreConfig;

  constructor(config: Partial<UpstashMemoryStoreConfig> = {}, redis?: Redis) {
    this.config = { ...DEFAULT_UPSTASH_MEMORY_CONFIG, ...config };

    const url = this.config.url || process.env.UPSTASH_REDIS_REST_URL;
    const token = this.config.token || process.env.UPSTASH_REDIS_REST_TOKEN;

    if (redis) {
      this.redis = redis;
    } else if (url && token) {
      this.redis = new Redis({ url, token });
    } else {
      throw new SystemFault(
        'Upstash memory store requires UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN'
      );
    }
  }

  keyFor(leadId: string): string {
    return `${this.config.keyPrefix}:${leadId}`;
  }

  async load(leadId: LeadId): Promise<LeadMemoryRecord[]> {
    const raw = await this.redis.lrange<unknown>(this.keyFor(leadId), 0, -1);
    return z.array(LeadMemoryRecordSchema).parse(raw);
  }

  async append(record: LeadMemoryRecord): Promise<void> {
    const key = this.keyFor(record.lead_id);
    const pipeline = this.redis.pipeline();
    pipeline.rpush(key, record);
    pipeline.ltrim(key, -this.config.maxRecords, -1);
    pipeline.expire(key, this.config.ttlDays * 24 * 60 * 60);
    await pipeline.exec();
  }
}

/**
 * Upstash when credentials are configured, otherwise an in-process store
 */
export function createMemoryStore(env: NodeJS.ProcessEnv = process.env): MemoryStore {
  const url = env.UPSTASH_REDIS_REST_URL;
  const token = env.UPSTASH_REDIS_REST_TOKEN;
  if (url && token) {
    return new UpstashMemoryStore({ url, token });
  }
  return new InMemoryMemoryStore();
}

// ===========================================
// Summaries
// ===========================================

const FAILED_STATUSES = new Set(['MANUAL_REVIEW', 'ERROR']);
const RECENT_CONTACT_DAYS = 14;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface MemorySummary {
  context: MemoryContext;
  insights: string[];
}

/**
 * Condense a lead's history into planner context and readable insights
 */
export function summarizeMemory(
  leadId: LeadId,
  records: readonly LeadMemoryRecord[],
  now: Date = new Date()
): MemorySummary {
  const last = records[records.length - 1];

  const successful = new Set<string>();
  const failed = new Set<string>();
  for (const record of records) {
    if (!record.messaging_angle) continue;
    if (record.final_status === 'APPROVED') {
      successful.add(record.messaging_angle);
    } else if (FAILED_STATUSES.has(record.final_status)) {
      failed.add(record.messaging_angle);
    }
  }
  for (const angle of successful) {
    failed.delete(angle);
  }

  const average =
    records.length > 0
      ? Math.round(
          (records.reduce((sum, r) => sum + r.overall_quality_score, 0) / records.length) * 10
        ) / 10
      : null;

  const context: MemoryContext = {
    lead_id: leadId,
    previous_runs: records.length,
    last_status: last?.final_status ?? null,
    last_angle: last?.messaging_angle ?? null,
    failed_angles: [...failed],
    successful_angles: [...successful],
    last_contact_at: last?.recorded_at ?? null,
    average_quality: average,
  };

  const insights: string[] = [];
  if (records.length > 0) {
    const approved = records.filter((r) => r.final_status === 'APPROVED').length;
    insights.push(`Attempt ${records.length + 1} for this lead`);
    insights.push(
      `Previous success rate: ${Math.round((approved / records.length) * 100)}% (${approved} of ${records.length} approved)`
    );
  }
  for (const angle of failed) {
    insights.push(`Angle ${angle} previously failed to pass review`);
  }

  const lastApproved = [...records].reverse().find((r) => r.final_status === 'APPROVED');
  if (lastApproved) {
    const days = Math.floor((now.getTime() - Date.parse(lastApproved.recorded_at)) / DAY_MS);
    if (days >= 0 && days < RECENT_CONTACT_DAYS) {
      insights.push(
        `Lead was contacted ${days} days ago; avoid repeating the ${lastApproved.messaging_angle ?? 'previous'} angle`
      );
    }
  }

  return { context, insights };
}

/**
 * Distilled record of a finished run
 */
export function buildMemoryRecord(state: CampaignState): LeadMemoryRecord {
  const status = state.final_status;
  if (!isTerminalStatus(status)) {
    throw new SystemFault('Only finished runs are written to memory', {
      execution_id: state.execution_id,
    });
  }

  return {
    lead_id: state.lead.id,
    execution_id: state.execution_id,
    traits: [...state.traits],
    primary_trait: state.primary_trait,
    messaging_angle: state.messaging_angle,
    overall_quality_score: state.overall_quality_score,
    final_status: status,
    recorded_at: new Date().toISOString(),
  };
}

// ===========================================
// Pipeline Steps
// ===========================================

export interface MemoryStepDeps {
  store: MemoryStore;
  timeoutMs: number;
  logger: CampaignBrainLogger;
}

/**
 * Load history into memory_context and historical_insights
 */
export async function loadLeadMemory(state: CampaignState, deps: MemoryStepDeps): Promise<void> {
  const leadId = toLeadId(state.lead.id);

  try {
    const records = await withTimeout(
      () => deps.store.load(leadId),
      deps.timeoutMs,
      `${deps.store.name} memory load`
    );

    if (records.length > 0) {
      const summary = summarizeMemory(leadId, records);
      state.memory_context = summary.context;
      state.historical_insights = summary.insights;
    }

    deps.logger.memoryLoaded({
      execution_id: state.execution_id,
      lead_id: leadId,
      previous_runs: records.length,
    });
  } catch (error) {
    const message = getErrorMessage(error);
    addWarning(state, `Memory load failed: ${message}`);
    deps.logger.memoryWarning({
      execution_id: state.execution_id,
      lead_id: leadId,
      operation: 'load',
      error_message: message,
    });
  }
}

/**
 * Append this run to the lead's history
 */
export async function persistLeadMemory(state: CampaignState, deps: MemoryStepDeps): Promise<void> {
  try {
    const record = buildMemoryRecord(state);
    await withTimeout(
      () => deps.store.append(record),
      deps.timeoutMs,
      `${deps.store.name} memory append`
    );
  } catch (error) {
    const message = getErrorMessage(error);
    addWarning(state, `Memory persist failed: ${message}`);
    deps.logger.memoryWarning({
      execution_id: state.execution_id,
      lead_id: state.lead.id,
      operation: 'persist',
      error_message: message,
    });
  }
}
