/**
 * Review Notifier Tests
 */

import { describe, test, expect, vi } from 'vitest';
import {
  SlackReviewNotifier,
  buildReviewBlocks,
  type SlackChatClient,
} from '../../campaign-brain/escalation';
import { finalize, upsertMessage } from '../../campaign-brain/state';
import { createPlannedState, createTestMessage } from './fixtures';

function createReviewState() {
  const state = createPlannedState();
  upsertMessage(
    state,
    createTestMessage({ message_type: 'hook', quality_score: 60, quality_issues: ['generic_content'] })
  );
  state.overall_quality_score = 60;
  state.retry_count = 2;
  finalize(state, 'MANUAL_REVIEW', 'Quality score 60 is below threshold 80 after 2 retries');
  return state;
}

function createSlackClient() {
  const postMessage = vi.fn<SlackChatClient['chat']['postMessage']>().mockResolvedValue({ ok: true });
  const client: SlackChatClient = { chat: { postMessage } };
  return { client, postMessage };
}

describe('buildReviewBlocks', () => {
  test('summarizes status, scores and execution', () => {
    const state = createReviewState();

    const blocks = buildReviewBlocks(state);

    expect(blocks.map((b) => b.type)).toEqual(['header', 'section', 'section', 'section', 'context']);
    expect(blocks[0]).toEqual({
      type: 'header',
      text: { type: 'plain_text', text: 'MANUAL_REVIEW: Dana Reyes at Orbitly' },
    });
    expect(blocks[1]).toEqual({
      type: 'section',
      text: {
        type: 'mrkdwn',
        text: ':eyes: Quality score 60 is below threshold 80 after 2 retries',
      },
    });
    expect(blocks[3]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: '• *hook*: 60/100 generic_content' },
    });
  });

  test('omits the score section when nothing was drafted', () => {
    const state = createPlannedState();
    finalize(state, 'ERROR', 'system fault in trait_detector: detector exploded');

    const blocks = buildReviewBlocks(state);

    expect(blocks.map((b) => b.type)).toEqual(['header', 'section', 'section', 'context']);
    expect(blocks[1]).toEqual({
      type: 'section',
      text: { type: 'mrkdwn', text: ':rotating_light: system fault in trait_detector: detector exploded' },
    });
  });
});

describe('SlackReviewNotifier', () => {
  test('posts to the review channel', async () => {
    const { client, postMessage } = createSlackClient();
    const notifier = new SlackReviewNotifier(client, 'C0REVIEW');
    const state = createReviewState();

    await notifier.notify(state);

    expect(postMessage).toHaveBeenCalledTimes(1);
    expect(postMessage.mock.calls[0]?.[0]).toMatchObject({
      channel: 'C0REVIEW',
      text: 'Campaign for Dana Reyes ended in MANUAL_REVIEW',
    });
  });

  test('is not configured without a token and channel', () => {
    expect(SlackReviewNotifier.fromEnv({})).toBeNull();
    expect(SlackReviewNotifier.fromEnv({ SLACK_BOT_TOKEN: 'test-token' })).toBeNull();
  });

  test('is configured from the environment', () => {
    const notifier = SlackReviewNotifier.fromEnv({
      SLACK_BOT_TOKEN: 'test-token',
      SLACK_REVIEW_CHANNEL: 'C0REVIEW',
    });

    expect(notifier).toBeInstanceOf(SlackReviewNotifier);
  });
});
