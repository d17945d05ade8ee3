/**
 * Fault Taxonomy
 *
 * Typed faults raised inside the campaign pipeline and the classifier
 * that maps arbitrary thrown values onto them.
 *
 * - ValidationFault: malformed input, rejected before a state exists
 * - GenerationFault: copywriter failure or timeout, recovered by fallback
 * - QualityFault: output below threshold, drives the retry path
 * - SystemFault: anything unexpected, ends the run in ERROR
 *
 * @module campaign-brain/errors
 */

// ===========================================
// Types
// ===========================================

export type FaultKind = 'validation' | 'generation' | 'quality' | 'system';

/**
 * Classified fault with kind and retry hint
 */
export interface ClassifiedFault {
  kind: FaultKind;
  message: string;
  /** Whether the failing operation may succeed if attempted again */
  isRetryable: boolean;
}

// ===========================================
// Fault Classes
// ===========================================

export class CampaignFault extends Error {
  readonly kind: FaultKind;
  readonly context: Record<string, unknown>;

  constructor(kind: FaultKind, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = 'CampaignFault';
    this.kind = kind;
    this.context = context;
  }
}

export class ValidationFault extends CampaignFault {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('validation', message, { issues });
    this.name = 'ValidationFault';
    this.issues = issues;
  }
}

export class GenerationFault extends CampaignFault {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super('generation', message, context);
    this.name = 'GenerationFault';
  }
}

export class QualityFault extends CampaignFault {
  readonly score: number;
  readonly threshold: number;

  constructor(score: number, threshold: number) {
    super('quality', `Quality score ${score} is below threshold ${threshold}`, {
      score,
      threshold,
    });
    this.name = 'QualityFault';
    this.score = score;
    this.threshold = threshold;
  }
}

export class SystemFault extends CampaignFault {
  readonly originalError?: unknown;

  constructor(message: string, context: Record<string, unknown> = {}, originalError?: unknown) {
    super('system', message, context);
    this.name = 'SystemFault';
    this.originalError = originalError;
  }
}

export class TimeoutError extends Error {
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}

// ===========================================
// Classification
// ===========================================

/**
 * Classify an unknown thrown value.
 *
 * Timeouts, rate limits and overload responses from the model provider
 * count as generation faults; anything that is not already a CampaignFault
 * is a system fault.
 */
export function classifyFault(error: unknown): ClassifiedFault {
  const message = getErrorMessage(error);

  if (error instanceof CampaignFault) {
    return {
      kind: error.kind,
      message,
      isRetryable: error.kind === 'generation' || error.kind === 'quality',
    };
  }

  if (isTimeoutError(error, message)) {
    return { kind: 'generation', message, isRetryable: true };
  }

  if (isRateLimitError(message)) {
    return { kind: 'generation', message, isRetryable: true };
  }

  return { kind: 'system', message, isRetryable: false };
}

/**
 * Wrap any thrown value as a CampaignFault, preserving existing faults.
 *
 * Provider timeouts and rate limits become GenerationFaults; everything
 * else becomes a SystemFault that keeps the original error.
 */
export function toCampaignFault(
  error: unknown,
  context: Record<string, unknown> = {}
): CampaignFault {
  if (error instanceof CampaignFault) {
    return error;
  }
  const { kind, message } = classifyFault(error);
  if (kind === 'generation') {
    return new GenerationFault(message, context);
  }
  return new SystemFault(message, context, error);
}

/**
 * Warning label for a classified fault, e.g. "GenerationFault"
 */
export function faultLabel(kind: FaultKind): string {
  return `${kind.charAt(0).toUpperCase()}${kind.slice(1)}Fault`;
}

// ===========================================
// Timeouts
// ===========================================

/**
 * Run an async operation with an upper bound on its duration.
 *
 * The timer is always cleared so a settled run leaves nothing pending.
 */
export async function withTimeout<T>(
  operation: () => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([operation(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// ===========================================
// Helpers
// ===========================================

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

function isTimeoutError(error: unknown, message: string): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  const lowerMessage = message.toLowerCase();
  return lowerMessage.includes('timeout') || lowerMessage.includes('timed out');
}

function isRateLimitError(message: string): boolean {
  const lowerMessage = message.toLowerCase();
  return (
    lowerMessage.includes('rate limit') ||
    lowerMessage.includes('429') ||
    lowerMessage.includes('overloaded') ||
    lowerMessage.includes('529')
  );
}
