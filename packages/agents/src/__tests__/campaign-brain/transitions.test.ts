/**
 * State Machine Transition Tests
 */

import { describe, test, expect } from 'vitest';
import { SystemFault } from '../../campaign-brain/errors';
import { resolveTransition, type TransitionInput } from '../../campaign-brain/transitions';

function createTransitionInput(overrides: Partial<TransitionInput> = {}): TransitionInput {
  return {
    has_traits: true,
    sequence: ['hook', 'proof', 'fomo'],
    fault: null,
    overall_quality_score: null,
    retry_count: 0,
    threshold: 80,
    max_retries: 2,
    ...overrides,
  };
}

describe('resolveTransition', () => {
  test('continues while nothing has been scored', () => {
    expect(resolveTransition(createTransitionInput())).toEqual({ kind: 'continue' });
  });

  test('stalls when planning found no traits and no sequence', () => {
    const transition = resolveTransition(createTransitionInput({ has_traits: false, sequence: [] }));

    expect(transition).toEqual({
      kind: 'terminal',
      status: 'STALLED',
      reason: 'No usable traits and no campaign sequence could be resolved from the lead data',
    });
  });

  test('does not stall before planning has run', () => {
    const transition = resolveTransition(
      createTransitionInput({
        has_traits: false,
        sequence: null,
        fault: { node: 'trait_detector', error: new SystemFault('detector exploded') },
      })
    );

    expect(transition).toEqual({
      kind: 'terminal',
      status: 'ERROR',
      reason: 'system fault in trait_detector: detector exploded',
    });
  });

  test('approves at the threshold', () => {
    const transition = resolveTransition(createTransitionInput({ overall_quality_score: 80 }));

    expect(transition).toEqual({
      kind: 'terminal',
      status: 'APPROVED',
      reason: 'Quality score 80 meets threshold 80',
    });
  });

  test('retries below the threshold while retries remain', () => {
    const transition = resolveTransition(
      createTransitionInput({ overall_quality_score: 60, retry_count: 1 })
    );

    expect(transition).toEqual({
      kind: 'retry',
      reason: 'Quality score 60 is below threshold 80; retry 2 of 2',
    });
  });

  test('escalates to manual review once retries are spent', () => {
    const transition = resolveTransition(
      createTransitionInput({ overall_quality_score: 60, retry_count: 2 })
    );

    expect(transition).toEqual({
      kind: 'terminal',
      status: 'MANUAL_REVIEW',
      reason: 'Quality score 60 is below threshold 80 after 2 retries',
    });
  });

  test('escalates immediately with zero retries allowed', () => {
    const transition = resolveTransition(
      createTransitionInput({ overall_quality_score: 79.9, max_retries: 0 })
    );

    expect(transition.kind).toBe('terminal');
    expect(transition.kind === 'terminal' && transition.status).toBe('MANUAL_REVIEW');
  });
});
