/**
 * Batch Driver
 *
 * Validates and runs many leads with bounded concurrency. Each lead owns
 * its own state; results come back in input order.
 *
 * @module campaign-brain/batch
 */

import { z } from 'zod';
import { parseCampaignInput, type CampaignInput } from './contracts/campaign-input';
import { ValidationFault, getErrorMessage } from './errors';
import { logger as defaultLogger, type CampaignBrainLogger } from './logger';
import type { BatchLeadResult, BatchRunOptions, BatchRunSummary, CampaignState } from './types';

export interface CampaignRunner {
  run(input: CampaignInput): Promise<CampaignState>;
}

const DEFAULT_CONCURRENCY = 5;

const LeadIdShape = z.object({ lead: z.object({ id: z.string() }) });

function rawLeadId(raw: unknown, index: number): string {
  const parsed = LeadIdShape.safeParse(raw);
  return parsed.success && parsed.data.lead.id.trim() ? parsed.data.lead.id.trim() : `input_${index}`;
}

async function runOne(
  runner: CampaignRunner,
  raw: unknown,
  index: number,
  logger: CampaignBrainLogger
): Promise<BatchLeadResult> {
  let input: CampaignInput;
  try {
    input = parseCampaignInput(raw);
  } catch (error) {
    const issues = error instanceof ValidationFault ? error.issues : [getErrorMessage(error)];
    const leadId = rawLeadId(raw, index);
    logger.leadRejected({ lead_id: leadId, issues });
    return {
      lead_id: leadId,
      status: 'REJECTED',
      reason: issues.join('; '),
      overall_quality_score: null,
      fallback_mode: false,
      execution_id: null,
    };
  }

  try {
    const state = await runner.run(input);
    return {
      lead_id: input.lead.id,
      status: state.final_status === 'PROCESSING' ? 'ERROR' : state.final_status,
      reason: state.status_reason,
      overall_quality_score: state.overall_quality_score,
      fallback_mode: state.fallback_mode,
      execution_id: state.execution_id,
    };
  } catch (error) {
    return {
      lead_id: input.lead.id,
      status: 'ERROR',
      reason: getErrorMessage(error),
      overall_quality_score: null,
      fallback_mode: false,
      execution_id: null,
    };
  }
}

/**
 * Run every input and tally the outcomes
 */
export async function runCampaignBatch(
  runner: CampaignRunner,
  inputs: readonly unknown[],
  options: BatchRunOptions = {},
  logger: CampaignBrainLogger = defaultLogger
): Promise<BatchRunSummary> {
  const startTime = Date.now();
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const results: BatchLeadResult[] = new Array<BatchLeadResult>(inputs.length);

  logger.batchStarted({ total_leads: inputs.length, concurrency });

  let next = 0;
  let completed = 0;

  const worker = async (): Promise<void> => {
    while (next < inputs.length) {
      const index = next++;
      const result = await runOne(runner, inputs[index], index, logger);
      results[index] = result;
      completed++;

      if (options.verbose) {
        logger.leadProcessed({
          lead_id: result.lead_id,
          execution_id: result.execution_id,
          status: result.status,
          overall_quality_score: result.overall_quality_score,
          fallback_mode: result.fallback_mode,
        });
      }
      options.onProgress?.(completed, inputs.length);
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(concurrency, inputs.length) }, () => worker())
  );

  const count = (status: BatchLeadResult['status']) =>
    results.filter((r) => r.status === status).length;

  const summary: BatchRunSummary = {
    total: inputs.length,
    approved: count('APPROVED'),
    manual_review: count('MANUAL_REVIEW'),
    stalled: count('STALLED'),
    error: count('ERROR'),
    rejected: count('REJECTED'),
    fallback_used: results.filter((r) => r.fallback_mode).length,
    results,
    total_time_ms: Date.now() - startTime,
  };

  logger.batchCompleted({
    total: summary.total,
    approved: summary.approved,
    manual_review: summary.manual_review,
    stalled: summary.stalled,
    error: summary.error,
    rejected: summary.rejected,
    fallback_used: summary.fallback_used,
    total_time_ms: summary.total_time_ms,
  });

  return summary;
}
