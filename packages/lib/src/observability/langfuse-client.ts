/**
 * Langfuse Client for Campaign Brain
 *
 * One process-wide client shared by every run of a batch. Tracing is
 * optional: without keys, or with LANGFUSE_ENABLED=false, every accessor
 * returns null and the client status records why.
 */

import { Langfuse } from 'langfuse';
import type { LangfuseConfig } from './types';
import { LANGFUSE_ENV_VARS } from './types';

// ===========================================
// Status
// ===========================================

export type LangfuseStatus =
  | { state: 'uninitialized' }
  | { state: 'enabled'; baseUrl: string }
  | { state: 'disabled'; reason: string };

const DEFAULT_BASE_URL = 'https://cloud.langfuse.com';

/** Each lead in a batch emits a trace and up to six scores; send them in larger groups */
const BATCH_FLUSH_DEFAULTS = {
  flushAt: 25,
  flushInterval: 5_000,
  requestTimeout: 10_000,
} as const;

let client: Langfuse | null = null;
let status: LangfuseStatus = { state: 'uninitialized' };

function disable(reason: string): null {
  client = null;
  status = { state: 'disabled', reason };
  return null;
}

// ===========================================
// Configuration
// ===========================================

/**
 * Resolve Langfuse configuration from an environment map.
 *
 * Returns null when either key is missing.
 */
export function resolveLangfuseConfig(
  env: NodeJS.ProcessEnv = process.env
): LangfuseConfig | null {
  const publicKey = env[LANGFUSE_ENV_VARS.publicKey];
  const secretKey = env[LANGFUSE_ENV_VARS.secretKey];

  if (!publicKey || !secretKey) {
    return null;
  }

  return {
    publicKey,
    secretKey,
    baseUrl: env[LANGFUSE_ENV_VARS.baseUrl] || DEFAULT_BASE_URL,
    enabled: env.LANGFUSE_ENABLED !== 'false',
  };
}

// ===========================================
// Client Lifecycle
// ===========================================

/**
 * Start the shared client once; later calls return the same instance.
 *
 * @param config - Overrides merged over the environment
 */
export function initLangfuse(config?: Partial<LangfuseConfig>): Langfuse | null {
  if (client) {
    return client;
  }

  const merged: Partial<LangfuseConfig> = { ...resolveLangfuseConfig(), ...config };
  const { publicKey, secretKey } = merged;

  if (!publicKey || !secretKey) {
    const missing = [LANGFUSE_ENV_VARS.publicKey, LANGFUSE_ENV_VARS.secretKey].filter(
      (name) => !process.env[name]
    );
    return disable(`missing ${missing.join(', ') || 'Langfuse keys'}`);
  }

  if (merged.enabled === false) {
    return disable('LANGFUSE_ENABLED=false');
  }

  const baseUrl = merged.baseUrl ?? DEFAULT_BASE_URL;
  try {
    client = new Langfuse({
      publicKey,
      secretKey,
      baseUrl,
      flushAt: merged.flushAt ?? BATCH_FLUSH_DEFAULTS.flushAt,
      flushInterval: merged.flushInterval ?? BATCH_FLUSH_DEFAULTS.flushInterval,
      requestTimeout: merged.requestTimeout ?? BATCH_FLUSH_DEFAULTS.requestTimeout,
    });
    status = { state: 'enabled', baseUrl };
    return client;
  } catch (error) {
    console.error('[Langfuse] Failed to initialize client:', error);
    return disable(`client failed to start: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Get the shared client, starting it from the environment on first use
 */
export function getLangfuse(): Langfuse | null {
  if (status.state === 'disabled') {
    return null;
  }
  return client ?? initLangfuse();
}

export function isLangfuseEnabled(): boolean {
  return status.state === 'enabled' && client !== null;
}

export function getLangfuseStatus(): LangfuseStatus {
  return status;
}

/**
 * One-line tracing status for the run banner
 */
export function describeLangfuseStatus(current: LangfuseStatus = status): string {
  switch (current.state) {
    case 'enabled':
      return `on (${current.baseUrl})`;
    case 'disabled':
      return `off (${current.reason})`;
    case 'uninitialized':
      return 'not started';
  }
}

/**
 * Send pending events. Call once a batch finishes so its traces are not lost.
 */
export async function flushLangfuse(): Promise<void> {
  if (!client) return;

  try {
    await client.flushAsync();
  } catch (error) {
    console.error('[Langfuse] Failed to flush events:', error);
  }
}

/**
 * Flush and close the client. Events recorded afterwards are dropped.
 */
export async function shutdownLangfuse(): Promise<void> {
  if (!client) return;

  try {
    await client.shutdownAsync();
    disable('shut down');
  } catch (error) {
    console.error('[Langfuse] Failed to shutdown client:', error);
  }
}

/**
 * Reset the shared client (tests only)
 */
export function resetLangfuse(): void {
  client = null;
  status = { state: 'uninitialized' };
}
