/**
 * Campaign Brain Agent
 *
 * Runs one lead through memory -> traits -> plan -> generate -> assess,
 * loops on regeneration of failing slots while retries remain, then hands
 * the finished state to the post-terminal collaborators (delivery,
 * review notifier, memory writer). Those collaborators never change the
 * terminal status.
 *
 * Observability: one Langfuse trace per run when credentials are set.
 *
 * @module campaign-brain/agent
 */

import { toLeadId, type MessageType } from '@campaign-brain/lib';
import {
  createCampaignTrace,
  endCampaignTrace,
  initLangfuse,
  recordCampaignQuality,
} from '@campaign-brain/lib/observability';
import { AnthropicCopywriter } from './anthropic-copywriter';
import {
  planCampaign as defaultPlanCampaign,
  type CampaignPlan,
  type PlanningInput,
  type PlanningOptions,
} from './campaign-planner';
import type { CampaignInput } from './contracts/campaign-input';
import { TemplateCopywriter, type Copywriter } from './copywriter';
import { LocalCampaignQueue, handOffCampaign, type CampaignQueue } from './delivery';
import { getErrorMessage, toCampaignFault } from './errors';
import type { ReviewNotifier } from './escalation';
import { logger as defaultLogger, type CampaignBrainLogger } from './logger';
import {
  InMemoryMemoryStore,
  loadLeadMemory,
  persistLeadMemory,
  type MemoryStore,
} from './memory-manager';
import { generateMessages } from './message-generator';
import { assessCampaignQuality, type QualityAssessor } from './quality-assessor';
import {
  addError,
  addWarning,
  appendDecision,
  createCampaignState,
  finalize,
  isTerminal,
  logNodeVisit,
  logPostTerminalRun,
  saveTraceLog,
} from './state';
import {
  detectTraits as defaultDetectTraits,
  hasCompanyResearch,
  type TraitDetectionInput,
  type TraitDetectionOptions,
  type TraitDetectionResult,
} from './trait-detector';
import { resolveTransition, type Transition } from './transitions';
import type { CampaignBrainConfig, CampaignState, PipelineNode, PostTerminalStep } from './types';
import { DEFAULT_CAMPAIGN_BRAIN_CONFIG } from './types';

// ===========================================
// Agent Configuration
// ===========================================

/**
 * Replaceable pipeline steps
 */
export interface PipelineComponents {
  detectTraits: (input: TraitDetectionInput, options: TraitDetectionOptions) => TraitDetectionResult;
  planCampaign: (input: PlanningInput, options: PlanningOptions) => CampaignPlan;
  assessQuality: QualityAssessor;
}

export interface CampaignBrainAgentConfig {
  /** Optional configuration overrides */
  config?: Partial<CampaignBrainConfig>;

  /** Primary copywriter (default: by config.copywriter) */
  copywriter?: Copywriter;

  /** Lead history store (default: in-memory) */
  memoryStore?: MemoryStore;

  /** Queue for approved email campaigns (default: local) */
  queue?: CampaignQueue;

  /** Notified on MANUAL_REVIEW and ERROR */
  notifier?: ReviewNotifier;

  logger?: CampaignBrainLogger;

  components?: Partial<PipelineComponents>;
}

// ===========================================
// Campaign Brain Agent
// ===========================================

export class CampaignBrainAgent {
  private readonly config: CampaignBrainConfig;
  private readonly logger: CampaignBrainLogger;
  private readonly copywriter: Copywriter;
  private readonly templateCopywriter: Copywriter;
  private readonly memoryStore: MemoryStore;
  private readonly queue: CampaignQueue;
  private readonly notifier?: ReviewNotifier;
  private readonly components: PipelineComponents;

  constructor(agentConfig: CampaignBrainAgentConfig = {}) {
    this.config = { ...DEFAULT_CAMPAIGN_BRAIN_CONFIG, ...agentConfig.config };
    this.logger = agentConfig.logger ?? defaultLogger;
    this.memoryStore = agentConfig.memoryStore ?? new InMemoryMemoryStore();
    this.queue = agentConfig.queue ?? new LocalCampaignQueue();
    this.notifier = agentConfig.notifier;

    this.templateCopywriter = new TemplateCopywriter();
    this.copywriter = agentConfig.copywriter ?? this.createCopywriter();

    this.components = {
      detectTraits: defaultDetectTraits,
      planCampaign: defaultPlanCampaign,
      assessQuality: assessCampaignQuality,
      ...agentConfig.components,
    };

    initLangfuse();
  }

  private createCopywriter(): Copywriter {
    if (this.config.copywriter === 'anthropic') {
      return new AnthropicCopywriter({
        model: this.config.generationModel,
        apiKey: this.config.anthropicApiKey,
        minWords: this.config.minWords,
        maxWords: this.config.maxWords,
      });
    }
    return this.templateCopywriter;
  }

  getConfig(): Readonly<CampaignBrainConfig> {
    return this.config;
  }

  // ===========================================
  // Run
  // ===========================================

  /**
   * Run the pipeline for one validated input.
   *
   * Always resolves with a terminal state; faults end the run in ERROR.
   */
  async run(input: CampaignInput): Promise<CampaignState> {
    const startTime = Date.now();
    const state = createCampaignState(input);
    const trace = createCampaignTrace({
      executionId: state.execution_id,
      leadId: toLeadId(state.lead.id),
      leadData: { company: state.lead.company, title: state.lead.title },
    });

    this.logger.runStarted({
      execution_id: state.execution_id,
      lead_id: state.lead.id,
      company: state.lead.company,
    });

    await this.executePipeline(state, trace?.traceId);
    await this.runPostTerminal(state);

    const processingTimeMs = Date.now() - startTime;
    this.logger.runCompleted({
      execution_id: state.execution_id,
      lead_id: state.lead.id,
      final_status: state.final_status,
      status_reason: state.status_reason,
      overall_quality_score: state.overall_quality_score,
      retry_count: state.retry_count,
      processing_time_ms: processingTimeMs,
    });

    if (trace) {
      endCampaignTrace(trace.traceId, {
        finalStatus: state.final_status,
        statusReason: state.status_reason,
        overallQualityScore: state.overall_quality_score,
        retryCount: state.retry_count,
        fallbackMode: state.fallback_mode,
        messagingAngle: state.messaging_angle,
        processingTimeMs,
      });
      const messageScores: Partial<Record<MessageType, number>> = {};
      for (const message of state.messages) {
        messageScores[message.message_type] = message.quality_score;
      }
      await recordCampaignQuality(trace.traceId, {
        overallQualityScore: state.overall_quality_score,
        messageScores,
        retryCount: state.retry_count,
        fallbackMode: state.fallback_mode,
      });
    }

    if (this.config.traceLogs) {
      try {
        saveTraceLog(state, { traceDir: this.config.traceDir });
      } catch (error) {
        addWarning(state, `Trace log write failed: ${getErrorMessage(error)}`);
      }
    }

    return state;
  }

  // ===========================================
  // Pipeline
  // ===========================================

  private async executePipeline(state: CampaignState, traceId?: string): Promise<void> {
    const loaded = await this.runNode(state, 'memory_loader', () =>
      loadLeadMemory(state, {
        store: this.memoryStore,
        timeoutMs: this.config.memoryTimeoutMs,
        logger: this.logger,
      })
    );
    if (!loaded) return;

    if (!(await this.runNode(state, 'trait_detector', async () => this.detectTraits(state)))) {
      return;
    }

    if (!(await this.runNode(state, 'campaign_planner', async () => this.planCampaign(state)))) {
      return;
    }

    const afterPlanning = this.transition(state, null);
    if (afterPlanning.kind === 'terminal') {
      finalize(state, afterPlanning.status, afterPlanning.reason);
      return;
    }

    let slots: MessageType[] = [...state.campaign_sequence];

    while (!isTerminal(state)) {
      const generated = await this.runNode(state, 'message_generator', () =>
        generateMessages(state, slots, {
          copywriter: this.copywriter,
          fallbackCopywriter: this.templateCopywriter,
          generationTimeoutMs: this.config.generationTimeoutMs,
          logger: this.logger,
          traceId,
        })
      );
      if (!generated) return;

      let failing: MessageType[] = [];
      const assessed = await this.runNode(state, 'quality_assessor', async () => {
        failing = this.assessQuality(state);
      });
      if (!assessed) return;

      logNodeVisit(state, 'orchestrator');
      const decision = this.transition(state, state.overall_quality_score);

      if (decision.kind === 'terminal') {
        finalize(state, decision.status, decision.reason);
      } else if (decision.kind === 'retry') {
        state.retry_count += 1;
        slots = failing.length > 0 ? failing : [...state.campaign_sequence];
        appendDecision(state, 'retry', `${decision.reason}; regenerating ${slots.join(', ')}`);
        this.logger.retryScheduled({
          execution_id: state.execution_id,
          retry_count: state.retry_count,
          max_retries: this.config.maxRetries,
          failing_types: slots,
        });
      }
    }
  }

  /**
   * Run one node; a thrown fault is recorded once and ends the run in ERROR
   *
   * @returns false when the node failed
   */
  private async runNode(
    state: CampaignState,
    node: PipelineNode,
    step: () => Promise<void>
  ): Promise<boolean> {
    logNodeVisit(state, node);

    try {
      await step();
      return true;
    } catch (error) {
      const fault = toCampaignFault(error, { node });
      addError(state, node, fault);

      const transition = resolveTransition({
        has_traits: state.traits.length > 0,
        sequence: null,
        fault: { node, error: fault },
        overall_quality_score: null,
        retry_count: state.retry_count,
        threshold: this.config.qualityPassThreshold,
        max_retries: this.config.maxRetries,
      });
      if (transition.kind === 'terminal') {
        finalize(state, transition.status, transition.reason);
      }

      this.logger.runFailed({
        execution_id: state.execution_id,
        lead_id: state.lead.id,
        node,
        error_message: fault.message,
      });
      return false;
    }
  }

  private transition(state: CampaignState, score: number | null): Transition {
    return resolveTransition({
      has_traits: state.traits.length > 0,
      sequence: state.campaign_sequence,
      fault: null,
      overall_quality_score: score,
      retry_count: state.retry_count,
      threshold: this.config.qualityPassThreshold,
      max_retries: this.config.maxRetries,
    });
  }

  // ===========================================
  // Nodes
  // ===========================================

  private detectTraits(state: CampaignState): void {
    const result = this.components.detectTraits(
      { lead: state.lead, company: state.company, scraped_content: state.scraped_content },
      { minConfidence: this.config.minTraitConfidence }
    );

    state.traits = result.traits;
    state.trait_confidence = result.trait_confidence;
    state.trait_reasoning = result.trait_reasoning;
    state.primary_trait = result.primary_trait;
    state.data_quality = result.data_quality;
    state.is_low_context = result.is_low_context;

    if (result.traits.length === 0) {
      addWarning(state, 'No traits detected from lead and company data');
    }

    this.logger.traitsDetected({
      execution_id: state.execution_id,
      traits: result.traits,
      primary_trait: result.primary_trait,
      data_quality_score: result.data_quality.score,
    });
  }

  private planCampaign(state: CampaignState): void {
    const plan = this.components.planCampaign(
      {
        traits: state.traits,
        trait_confidence: state.trait_confidence,
        primary_trait: state.primary_trait,
        company: state.company,
        has_research: hasCompanyResearch(state),
        memory: state.memory_context,
      },
      { confidenceThreshold: this.config.planningConfidenceThreshold }
    );

    state.campaign_sequence = plan.sequence;
    state.messaging_angle = plan.messaging_angle;
    state.campaign_tone = plan.tone;
    state.sequence_reasoning = plan.reasoning;
    state.decision_path.push(...plan.decisions);

    this.logger.campaignPlanned({
      execution_id: state.execution_id,
      messaging_angle: plan.messaging_angle,
      campaign_tone: plan.tone,
      sequence: plan.sequence,
    });
  }

  /**
   * Score the messages in place
   *
   * @returns Slots to regenerate if the run is retried
   */
  private assessQuality(state: CampaignState): MessageType[] {
    const assessment = this.components.assessQuality(
      {
        messages: state.messages,
        lead: state.lead,
        company: state.company,
        sequence: state.campaign_sequence,
        tone: state.campaign_tone,
      },
      {
        minWords: this.config.minWords,
        maxWords: this.config.maxWords,
        threshold: this.config.qualityPassThreshold,
      }
    );

    for (const result of assessment.assessments) {
      const message = state.messages.find((m) => m.message_type === result.message_type);
      if (!message) continue;
      message.quality_score = result.quality_score;
      message.quality_issues = result.quality_issues;
      message.personalization_elements = result.personalization_elements;
      message.strategic_elements = result.strategic_elements;
      message.word_count = result.word_count;
    }

    state.overall_quality_score = assessment.overall_quality_score;
    state.quality_feedback = assessment.feedback;

    this.logger.qualityAssessed({
      execution_id: state.execution_id,
      overall_quality_score: assessment.overall_quality_score,
      threshold: this.config.qualityPassThreshold,
      retry_count: state.retry_count,
    });

    return assessment.failing_types;
  }

  // ===========================================
  // Post-Terminal Collaborators
  // ===========================================

  private async runPostTerminal(state: CampaignState): Promise<void> {
    if (state.final_status === 'APPROVED') {
      await this.runCollaborator(state, 'delivery_handoff', () =>
        handOffCampaign(state, { queue: this.queue, logger: this.logger })
      );
    }

    const needsReview = state.final_status === 'MANUAL_REVIEW' || state.final_status === 'ERROR';
    const notifier = this.notifier;
    if (needsReview && notifier) {
      await this.runCollaborator(state, 'review_notifier', () => notifier.notify(state));
    }

    if (state.final_status !== 'ERROR') {
      await this.runCollaborator(state, 'memory_writer', () =>
        persistLeadMemory(state, {
          store: this.memoryStore,
          timeoutMs: this.config.memoryTimeoutMs,
          logger: this.logger,
        })
      );
    }
  }

  private async runCollaborator(
    state: CampaignState,
    step: PostTerminalStep,
    run: () => Promise<void>
  ): Promise<void> {
    try {
      await run();
      logPostTerminalRun(state, step, 'completed');
    } catch (error) {
      addWarning(state, `${step} failed: ${getErrorMessage(error)}`);
      logPostTerminalRun(state, step, 'failed');
    }
  }
}

/**
 * Create a campaign brain agent with defaults for anything not supplied
 */
export function createCampaignBrainAgent(
  agentConfig: CampaignBrainAgentConfig = {}
): CampaignBrainAgent {
  return new CampaignBrainAgent(agentConfig);
}
