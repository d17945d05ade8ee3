/**
 * Environment Configuration
 *
 * Reads CAMPAIGN_* variables over DEFAULT_CAMPAIGN_BRAIN_CONFIG.
 * Out-of-range values are rejected rather than clamped.
 *
 * @module campaign-brain/config
 */

import { z } from 'zod';
import { ValidationFault } from './errors';
import { DEFAULT_CAMPAIGN_BRAIN_CONFIG, type CampaignBrainConfig } from './types';

const intInRange = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const CampaignEnvSchema = z
  .object({
    CAMPAIGN_QUALITY_THRESHOLD: intInRange(0, 100).optional(),
    CAMPAIGN_MAX_RETRIES: intInRange(0, 5).optional(),
    CAMPAIGN_GENERATION_TIMEOUT_MS: intInRange(1, 600_000).optional(),
    CAMPAIGN_MEMORY_TIMEOUT_MS: intInRange(1, 60_000).optional(),
    CAMPAIGN_MIN_TRAIT_CONFIDENCE: intInRange(0, 100).optional(),
    CAMPAIGN_PLANNING_CONFIDENCE: intInRange(0, 100).optional(),
    CAMPAIGN_MIN_WORDS: intInRange(1, 1000).optional(),
    CAMPAIGN_MAX_WORDS: intInRange(1, 2000).optional(),
    CAMPAIGN_COPYWRITER: z.enum(['template', 'anthropic']).optional(),
    CAMPAIGN_GENERATION_MODEL: z.string().min(1).optional(),
    CAMPAIGN_TRACE_LOGS: booleanFlag.optional(),
    CAMPAIGN_TRACE_DIR: z.string().min(1).optional(),
    ANTHROPIC_API_KEY: z.string().min(1).optional(),
  })
  .refine(
    (env) =>
      (env.CAMPAIGN_MIN_WORDS ?? DEFAULT_CAMPAIGN_BRAIN_CONFIG.minWords) <
      (env.CAMPAIGN_MAX_WORDS ?? DEFAULT_CAMPAIGN_BRAIN_CONFIG.maxWords),
    { message: 'CAMPAIGN_MIN_WORDS must be lower than CAMPAIGN_MAX_WORDS' }
  );

// Empty strings count as unset
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

/**
 * Load campaign brain configuration from environment variables.
 *
 * @throws ValidationFault when a variable is present but invalid
 */
export function loadCampaignBrainConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<CampaignBrainConfig> = {}
): CampaignBrainConfig {
  const result = CampaignEnvSchema.safeParse(withoutBlankValues(env));

  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(env)'}: ${issue.message}`
    );
    throw new ValidationFault(`Invalid campaign configuration: ${issues.join('; ')}`, issues);
  }

  const parsed = result.data;
  const defaults = DEFAULT_CAMPAIGN_BRAIN_CONFIG;

  return {
    ...defaults,
    qualityPassThreshold: parsed.CAMPAIGN_QUALITY_THRESHOLD ?? defaults.qualityPassThreshold,
    maxRetries: parsed.CAMPAIGN_MAX_RETRIES ?? defaults.maxRetries,
    generationTimeoutMs: parsed.CAMPAIGN_GENERATION_TIMEOUT_MS ?? defaults.generationTimeoutMs,
    memoryTimeoutMs: parsed.CAMPAIGN_MEMORY_TIMEOUT_MS ?? defaults.memoryTimeoutMs,
    minTraitConfidence: parsed.CAMPAIGN_MIN_TRAIT_CONFIDENCE ?? defaults.minTraitConfidence,
    planningConfidenceThreshold:
      parsed.CAMPAIGN_PLANNING_CONFIDENCE ?? defaults.planningConfidenceThreshold,
    minWords: parsed.CAMPAIGN_MIN_WORDS ?? defaults.minWords,
    maxWords: parsed.CAMPAIGN_MAX_WORDS ?? defaults.maxWords,
    copywriter: parsed.CAMPAIGN_COPYWRITER ?? defaults.copywriter,
    generationModel: parsed.CAMPAIGN_GENERATION_MODEL ?? defaults.generationModel,
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    traceLogs: parsed.CAMPAIGN_TRACE_LOGS ?? defaults.traceLogs,
    traceDir: parsed.CAMPAIGN_TRACE_DIR ?? defaults.traceDir,
    ...overrides,
  };
}
