/**
 * Claude Copywriter
 *
 * Drafts each campaign message with Claude, forced through the
 * write_campaign_message tool so the response is always schema-valid.
 *
 * @module campaign-brain/anthropic-copywriter
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageCreateParamsNonStreaming } from '@anthropic-ai/sdk/resources/messages';
import type { ToolContentBlock } from '@campaign-brain/lib';
import { extractToolResult, forceToolChoice } from '@campaign-brain/lib';
import { withGeneration } from '@campaign-brain/lib/observability';
import { angleProfile } from './campaign-planner';
import { firstNameOf } from './contracts/campaign-input';
import { MESSAGE_DRAFT_TOOL, type MessageDraft } from './contracts/message-draft';
import type { Copywriter, DraftRequest } from './copywriter';
import { GenerationFault } from './errors';

// ===========================================
// Client Seam
// ===========================================

export interface MessagesResponse {
  content: ToolContentBlock[];
  usage?: { input_tokens: number; output_tokens: number };
}

/**
 * The slice of the Anthropic client the copywriter calls
 */
export interface MessagesClient {
  messages: {
    create(params: MessageCreateParamsNonStreaming): Promise<MessagesResponse>;
  };
}

export interface AnthropicCopywriterOptions {
  model: string;
  apiKey?: string;
  /** Injected client, used instead of constructing one from apiKey */
  client?: MessagesClient;
  maxTokens?: number;
  minWords: number;
  maxWords: number;
}

// ===========================================
// Prompt
// ===========================================

const SLOT_GOALS: Record<DraftRequest['message_type'], string> = {
  hook: 'Open the conversation with one sharp observation about their business and a low-friction question.',
  proof: 'Follow up with a concrete, believable result from a similar company.',
  fomo: 'Close the sequence by showing what waiting costs them, without pressure tactics.',
};

export function buildCopyPrompt(
  request: DraftRequest,
  bounds: { minWords: number; maxWords: number }
): string {
  const { lead, company } = request;
  const profile = angleProfile(request.messaging_angle);

  const research = request.fallback_mode
    ? 'Company research is too thin to reference. Personalize with the first name and company name only; do not invent specifics.'
    : [
        `- Description: ${company.description || 'Unknown'}`,
        `- Services: ${company.services.join(', ') || 'Unknown'}`,
        `- Website insights: ${company.website_insights || 'None'}`,
      ].join('\n');

  const feedback = request.feedback.length
    ? `\n## Fix These Issues From The Previous Draft\n${request.feedback.map((f) => `- ${f}`).join('\n')}\n`
    : '';

  const history = request.historical_insights.length
    ? `\n## History With This Lead\n${request.historical_insights.map((h) => `- ${h}`).join('\n')}\n`
    : '';

  return `You are writing message ${request.message_type.toUpperCase()} of a three-step B2B outreach sequence.

## Lead
- First name: ${firstNameOf(lead)}
- Title: ${lead.title}
- Company: ${lead.company}

## Company Research
${research}

## Strategy
- Messaging angle: ${request.messaging_angle} (${profile.focus}, ${profile.theme})
- Tone: ${request.tone}
- Goal: ${SLOT_GOALS[request.message_type]}
${feedback}${history}
## Rules
- Address ${firstNameOf(lead)} by first name and mention ${lead.company} by name in the body.
- Body between ${bounds.minWords} and ${bounds.maxWords} words.
- Use concrete business language (growth, efficiency, outcomes, competitive position).
- No boilerplate openers ("I hope this email finds you well") and no pressure phrases ("act now", "limited time").

Answer with the write_campaign_message tool.`;
}

// ===========================================
// Copywriter
// ===========================================

export class AnthropicCopywriter implements Copywriter {
  readonly name = 'anthropic';

  private readonly client: MessagesClient;

  constructor(private readonly options: AnthropicCopywriterOptions) {
    this.client =
      options.client ?? new Anthropic({ apiKey: options.apiKey ?? process.env.ANTHROPIC_API_KEY });
  }

  async draft(request: DraftRequest): Promise<MessageDraft> {
    const prompt = buildCopyPrompt(request, this.options);
    const maxTokens = this.options.maxTokens ?? 1024;

    const response = await withGeneration(
      request.trace_id,
      {
        name: `draft_${request.message_type}`,
        model: this.options.model,
        input: { prompt },
        modelParameters: { maxTokens },
        metadata: {
          leadId: request.lead.id,
          attempt: request.attempt,
          fallbackMode: request.fallback_mode,
        },
      },
      () =>
        this.client.messages.create({
          model: this.options.model,
          max_tokens: maxTokens,
          tools: [MESSAGE_DRAFT_TOOL.tool],
          tool_choice: forceToolChoice(MESSAGE_DRAFT_TOOL.name),
          messages: [{ role: 'user', content: prompt }],
        })
    );

    const result = extractToolResult(response.content, MESSAGE_DRAFT_TOOL.name);
    if (result === null) {
      throw new GenerationFault('Claude did not call write_campaign_message', {
        message_type: request.message_type,
      });
    }

    try {
      return MESSAGE_DRAFT_TOOL.parse(result);
    } catch (error) {
      throw new GenerationFault('Claude returned an invalid message draft', {
        message_type: request.message_type,
        error: String(error),
      });
    }
  }
}
