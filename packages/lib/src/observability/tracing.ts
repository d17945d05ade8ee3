/**
 * Tracing Helpers for Campaign Brain
 *
 * Wraps Langfuse's trace and generation APIs with campaign-specific helpers.
 * Every helper is a no-op returning null when observability is disabled.
 */

import type { Langfuse } from 'langfuse';
import type {
  TraceMetadata,
  CreateTraceInput,
  GenerationInput,
  GenerationOutput,
  CampaignTraceInput,
  CampaignTraceOutput,
} from './types';
import { getLangfuse, isLangfuseEnabled } from './langfuse-client';

// ===========================================
// Types for Langfuse Objects
// ===========================================

type LangfuseTrace = ReturnType<Langfuse['trace']>;
type LangfuseGeneration = ReturnType<LangfuseTrace['generation']>;

// ===========================================
// Trace Context Management
// ===========================================

export interface TraceContext {
  trace: LangfuseTrace;
  traceId: string;
  metadata: TraceMetadata;
}

// Active trace contexts keyed by trace ID
const activeTraces = new Map<string, TraceContext>();

function resolveEnvironment(): TraceMetadata['environment'] {
  const env = process.env.NODE_ENV;
  if (env === 'production' || env === 'staging') return env;
  return 'development';
}

/**
 * Create a new agent trace
 *
 * @returns Trace context or null if observability is disabled
 */
export function createAgentTrace(input: CreateTraceInput): TraceContext | null {
  const langfuse = getLangfuse();

  if (!langfuse || !isLangfuseEnabled()) {
    return null;
  }

  const trace = langfuse.trace({
    name: input.name,
    sessionId: input.metadata.sessionId,
    tags: [input.metadata.agentName, ...(input.metadata.tags ?? [])],
    metadata: {
      agentName: input.metadata.agentName,
      executionId: input.metadata.executionId,
      environment: input.metadata.environment ?? resolveEnvironment(),
    },
    input: input.input,
  });

  const context: TraceContext = {
    trace,
    traceId: trace.id,
    metadata: input.metadata,
  };
  activeTraces.set(trace.id, context);

  return context;
}

export function getTraceContext(traceId: string): TraceContext | null {
  return activeTraces.get(traceId) ?? null;
}

/**
 * End a trace and drop it from the active contexts
 */
export function endTrace(traceId: string, output?: Record<string, unknown>): void {
  const context = activeTraces.get(traceId);
  if (!context) return;

  context.trace.update({ output });
  activeTraces.delete(traceId);
}

// ===========================================
// Generation (LLM Call) Helpers
// ===========================================

export function createGeneration(
  traceId: string,
  input: GenerationInput
): LangfuseGeneration | null {
  const context = activeTraces.get(traceId);
  if (!context) return null;

  return context.trace.generation({
    name: input.name,
    model: input.model,
    input: input.input,
    modelParameters: input.modelParameters,
    metadata: input.metadata,
  });
}

export function endGeneration(
  generation: LangfuseGeneration | null,
  output: GenerationOutput
): void {
  if (!generation) return;

  generation.end({
    output: output.output,
    usage: output.usage
      ? {
          input: output.usage.inputTokens,
          output: output.usage.outputTokens,
          total: output.usage.totalTokens,
        }
      : undefined,
    metadata: {
      latencyMs: output.latencyMs,
      ...(output.error && { error: output.error }),
    },
  });
}

// ===========================================
// Campaign Brain Specific Helpers
// ===========================================

/**
 * Create a trace covering one campaign pipeline run
 */
export function createCampaignTrace(input: CampaignTraceInput): TraceContext | null {
  return createAgentTrace({
    name: `campaign_${input.leadId}`,
    metadata: {
      agentName: 'campaign_brain',
      executionId: input.executionId,
      sessionId: input.executionId,
    },
    input: {
      leadId: input.leadId,
      leadData: input.leadData,
    },
  });
}

/**
 * End a campaign trace with the terminal outcome
 */
export function endCampaignTrace(traceId: string, output: CampaignTraceOutput): void {
  endTrace(traceId, {
    finalStatus: output.finalStatus,
    statusReason: output.statusReason,
    overallQualityScore: output.overallQualityScore,
    retryCount: output.retryCount,
    fallbackMode: output.fallbackMode,
    messagingAngle: output.messagingAngle,
    processingTimeMs: output.processingTimeMs,
  });
}

// ===========================================
// Utility Functions
// ===========================================

/**
 * Wrap an LLM call with generation tracking.
 *
 * Without a trace ID the call runs untracked.
 */
export async function withGeneration<
  T extends { usage?: { input_tokens: number; output_tokens: number } },
>(traceId: string | undefined, input: GenerationInput, fn: () => Promise<T>): Promise<T> {
  const generation = traceId ? createGeneration(traceId, input) : null;
  const startTime = Date.now();

  try {
    const result = await fn();
    endGeneration(generation, {
      output: result,
      usage: result.usage
        ? {
            inputTokens: result.usage.input_tokens,
            outputTokens: result.usage.output_tokens,
            totalTokens: result.usage.input_tokens + result.usage.output_tokens,
          }
        : undefined,
      latencyMs: Date.now() - startTime,
    });
    return result;
  } catch (error) {
    endGeneration(generation, {
      output: null,
      error: String(error),
      latencyMs: Date.now() - startTime,
    });
    throw error;
  }
}
