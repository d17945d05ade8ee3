/**
 * Review Notifier
 *
 * Posts a Block Kit summary to Slack when a run ends in MANUAL_REVIEW or
 * ERROR so a person can pick it up.
 *
 * @module campaign-brain/escalation
 */

import { WebClient, type Block, type KnownBlock } from '@slack/web-api';
import type { CampaignState } from './types';

export interface ReviewNotifier {
  notify(state: CampaignState): Promise<void>;
}

/**
 * The slice of the Slack client the notifier calls
 */
export interface SlackChatClient {
  chat: {
    postMessage(args: {
      channel: string;
      text: string;
      blocks: (Block | KnownBlock)[];
    }): Promise<unknown>;
  };
}

const SECTION_MAX_CHARS = 3000;

function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

export function buildReviewBlocks(state: CampaignState): (Block | KnownBlock)[] {
  const emoji = state.final_status === 'ERROR' ? ':rotating_light:' : ':eyes:';
  const scores = state.messages
    .map((m) => `• *${m.message_type}*: ${m.quality_score}/100 ${m.quality_issues.join(', ')}`)
    .join('\n');

  const blocks: (Block | KnownBlock)[] = [
    {
      type: 'header',
      text: {
        type: 'plain_text',
        text: truncate(`${state.final_status}: ${state.lead.name} at ${state.lead.company}`, 150),
      },
    },
    {
      type: 'section',
      text: { type: 'mrkdwn', text: truncate(`${emoji} ${state.status_reason}`, SECTION_MAX_CHARS) },
    },
    {
      type: 'section',
      fields: [
        { type: 'mrkdwn', text: `*Quality*\n${state.overall_quality_score}/100` },
        { type: 'mrkdwn', text: `*Retries*\n${state.retry_count}` },
        { type: 'mrkdwn', text: `*Angle*\n${state.messaging_angle ?? 'none'}` },
        { type: 'mrkdwn', text: `*Fallback*\n${state.fallback_reason ?? 'no'}` },
      ],
    },
  ];

  if (scores) {
    blocks.push({
      type: 'section',
      text: { type: 'mrkdwn', text: truncate(scores, SECTION_MAX_CHARS) },
    });
  }

  blocks.push({
    type: 'context',
    elements: [{ type: 'mrkdwn', text: `Execution \`${state.execution_id}\`` }],
  });

  return blocks;
}

export class SlackReviewNotifier implements ReviewNotifier {
  constructor(
    private readonly client: SlackChatClient,
    private readonly channel: string
  ) {}

  static fromEnv(env: NodeJS.ProcessEnv = process.env): SlackReviewNotifier | null {
    const token = env.SLACK_BOT_TOKEN;
    const channel = env.SLACK_REVIEW_CHANNEL;
    if (!token || !channel) {
      return null;
    }
    return new SlackReviewNotifier(new WebClient(token), channel);
  }

  async notify(state: CampaignState): Promise<void> {
    await this.client.chat.postMessage({
      channel: this.channel,
      text: `Campaign for ${state.lead.name} ended in ${state.final_status}`,
      blocks: buildReviewBlocks(state),
    });
  }
}
