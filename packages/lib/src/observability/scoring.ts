/**
 * Custom Scoring Helpers for Campaign Brain
 *
 * Records campaign quality metrics as Langfuse scores.
 */

import type { CreateScoreInput, CampaignQualityResults } from './types';
import { getLangfuse, isLangfuseEnabled } from './langfuse-client';

// ===========================================
// Score Recording
// ===========================================

/**
 * Record a custom score for a trace or observation
 */
export async function recordScore(input: CreateScoreInput): Promise<void> {
  const langfuse = getLangfuse();

  if (!langfuse || !isLangfuseEnabled()) {
    return;
  }

  try {
    await langfuse.score({
      traceId: input.traceId,
      observationId: input.observationId,
      name: input.name,
      value: input.value,
      dataType: input.dataType,
      comment: input.comment,
    });
  } catch (error) {
    console.error('[Langfuse] Failed to record score:', error);
  }
}

// ===========================================
// Campaign Brain Specific Scores
// ===========================================

/**
 * Record the quality outcome of a campaign run.
 *
 * Quality values are normalized to 0..1 for Langfuse dashboards.
 */
export async function recordCampaignQuality(
  traceId: string,
  results: CampaignQualityResults
): Promise<void> {
  const scores: CreateScoreInput[] = [
    {
      traceId,
      name: 'campaign_quality',
      value: Math.max(0, Math.min(1, results.overallQualityScore / 100)),
      dataType: 'NUMERIC',
      comment: `Overall quality ${results.overallQualityScore}/100`,
    },
    {
      traceId,
      name: 'retry_count',
      value: results.retryCount,
      dataType: 'NUMERIC',
    },
    {
      traceId,
      name: 'fallback_used',
      value: results.fallbackMode ? 1 : 0,
      dataType: 'BOOLEAN',
    },
  ];

  for (const [messageType, score] of Object.entries(results.messageScores)) {
    if (score === undefined) continue;
    scores.push({
      traceId,
      name: 'message_quality',
      value: Math.max(0, Math.min(1, score / 100)),
      dataType: 'NUMERIC',
      comment: messageType,
    });
  }

  for (const score of scores) {
    await recordScore(score);
  }
}
