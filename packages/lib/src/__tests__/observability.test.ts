/**
 * Observability Tests
 *
 * Without Langfuse credentials every helper degrades to a no-op.
 *
 * @module __tests__/observability
 */

import { afterEach, describe, test, expect, vi } from 'vitest';
import {
  createCampaignTrace,
  describeLangfuseStatus,
  getLangfuseStatus,
  initLangfuse,
  isLangfuseEnabled,
  resetLangfuse,
  resolveLangfuseConfig,
  withGeneration,
} from '../observability';
import { toExecutionId, toLeadId } from '../types';

describe('resolveLangfuseConfig', () => {
  test('returns null without both keys', () => {
    expect(resolveLangfuseConfig({})).toBeNull();
    expect(resolveLangfuseConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test' })).toBeNull();
  });

  test('reads keys and defaults the base URL', () => {
    expect(
      resolveLangfuseConfig({ LANGFUSE_PUBLIC_KEY: 'pk-test', LANGFUSE_SECRET_KEY: 'test-secret' })
    ).toEqual({
      publicKey: 'pk-test',
      secretKey: 'test-secret',
      baseUrl: 'https://cloud.langfuse.com',
      enabled: true,
    });
  });
});

describe('without credentials', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetLangfuse();
  });

  test('stays disabled and creates no traces', () => {
    vi.stubEnv('LANGFUSE_PUBLIC_KEY', '');
    vi.stubEnv('LANGFUSE_SECRET_KEY', '');

    expect(initLangfuse()).toBeNull();
    expect(isLangfuseEnabled()).toBe(false);
    expect(
      createCampaignTrace({
        executionId: toExecutionId('campaign_test'),
        leadId: toLeadId('lead_001'),
        leadData: { company: 'Orbitly', title: 'CTO' },
      })
    ).toBeNull();
  });

  test('records which keys are missing', () => {
    vi.stubEnv('LANGFUSE_PUBLIC_KEY', 'pk-test');
    vi.stubEnv('LANGFUSE_SECRET_KEY', '');

    expect(describeLangfuseStatus()).toBe('not started');
    initLangfuse();

    expect(getLangfuseStatus()).toEqual({ state: 'disabled', reason: 'missing LANGFUSE_SECRET_KEY' });
    expect(describeLangfuseStatus()).toBe('off (missing LANGFUSE_SECRET_KEY)');
  });

  test('stays off when disabled by flag', () => {
    vi.stubEnv('LANGFUSE_PUBLIC_KEY', 'pk-test');
    vi.stubEnv('LANGFUSE_SECRET_KEY', 'test-secret');
    vi.stubEnv('LANGFUSE_ENABLED', 'false');

    expect(initLangfuse()).toBeNull();
    expect(describeLangfuseStatus()).toBe('off (LANGFUSE_ENABLED=false)');
  });

  test('describes an enabled client by its host', () => {
    expect(describeLangfuseStatus({ state: 'enabled', baseUrl: 'https://langfuse.internal.test' })).toBe(
      'on (https://langfuse.internal.test)'
    );
  });

  test('runs generations untracked', async () => {
    const fn = vi.fn(async () => ({ text: 'ok', usage: { input_tokens: 3, output_tokens: 4 } }));

    const result = await withGeneration(undefined, { name: 'draft', model: 'test-model', input: {} }, fn);

    expect(result.text).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  test('rethrows generation failures', async () => {
    await expect(
      withGeneration(undefined, { name: 'draft', model: 'test-model', input: {} }, async () => {
        throw new Error('overloaded');
      })
    ).rejects.toThrow('overloaded');
  });
});
