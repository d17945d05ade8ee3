/**
 * Structured JSON Logger for Campaign Brain
 *
 * One JSON line per pipeline event. Runs in a batch interleave, so every
 * run-scoped event carries its own execution_id instead of logger state.
 *
 * @module campaign-brain/logger
 */

import type { CampaignStatus, MessageType } from '@campaign-brain/lib';
import type { FaultKind } from './errors';
import type { LogEventType, LogEvent, PipelineNode } from './types';

// ===========================================
// Logger Configuration
// ===========================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  /** Minimum log level to output */
  level: LogLevel;

  /** Pretty print JSON (development only) */
  prettyPrint: boolean;

  /** Custom output function (defaults to console.log) */
  output?: (message: string) => void;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  prettyPrint: false,
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// ===========================================
// Logger Class
// ===========================================

export class CampaignBrainLogger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.config.level];
  }

  private log(level: LogLevel, event: LogEventType, data: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEvent & Record<string, unknown> = {
      event,
      level,
      timestamp: new Date().toISOString(),
      ...data,
    };

    for (const key in entry) {
      if (entry[key] === undefined) {
        delete entry[key];
      }
    }

    const output = this.config.output ?? console.log;
    output(this.config.prettyPrint ? JSON.stringify(entry, null, 2) : JSON.stringify(entry));
  }

  // ===========================================
  // Run Events
  // ===========================================

  runStarted(data: { execution_id: string; lead_id: string; company: string }): void {
    this.log('info', 'run_started', data);
  }

  memoryLoaded(data: { execution_id: string; lead_id: string; previous_runs: number }): void {
    this.log('debug', 'memory_loaded', data);
  }

  traitsDetected(data: {
    execution_id: string;
    traits: string[];
    primary_trait: string | null;
    data_quality_score: number;
  }): void {
    this.log('debug', 'traits_detected', data);
  }

  campaignPlanned(data: {
    execution_id: string;
    messaging_angle: string | null;
    campaign_tone: string | null;
    sequence: MessageType[];
  }): void {
    this.log('debug', 'campaign_planned', data);
  }

  messagesGenerated(data: {
    execution_id: string;
    message_types: MessageType[];
    fallback_mode: boolean;
    copywriter: string;
  }): void {
    this.log('debug', 'messages_generated', data);
  }

  generationFallback(data: {
    execution_id: string;
    message_type: MessageType;
    copywriter: string;
    fault_kind: FaultKind;
    error_message: string;
  }): void {
    this.log('warn', 'generation_fallback', data);
  }

  qualityAssessed(data: {
    execution_id: string;
    overall_quality_score: number;
    threshold: number;
    retry_count: number;
  }): void {
    this.log('info', 'quality_assessed', data);
  }

  retryScheduled(data: {
    execution_id: string;
    retry_count: number;
    max_retries: number;
    failing_types: MessageType[];
  }): void {
    this.log('info', 'retry_scheduled', data);
  }

  runCompleted(data: {
    execution_id: string;
    lead_id: string;
    final_status: CampaignStatus;
    status_reason: string;
    overall_quality_score: number;
    retry_count: number;
    processing_time_ms: number;
  }): void {
    const level = data.final_status === 'APPROVED' ? 'info' : 'warn';
    this.log(level, 'run_completed', data);
  }

  runFailed(data: {
    execution_id: string;
    lead_id: string;
    node: PipelineNode;
    error_message: string;
  }): void {
    this.log('error', 'run_failed', data);
  }

  memoryWarning(data: {
    execution_id: string;
    lead_id: string;
    operation: 'load' | 'persist';
    error_message: string;
  }): void {
    this.log('warn', 'memory_warning', data);
  }

  handoffCompleted(data: {
    execution_id: string;
    delivery_method: string;
    queue_id: string | null;
  }): void {
    this.log('info', 'handoff_completed', data);
  }

  // ===========================================
  // Batch Events
  // ===========================================

  batchStarted(data: { total_leads: number; concurrency: number }): void {
    this.log('info', 'batch_started', data);
  }

  batchCompleted(data: {
    total: number;
    approved: number;
    manual_review: number;
    stalled: number;
    error: number;
    rejected: number;
    fallback_used: number;
    total_time_ms: number;
  }): void {
    this.log('info', 'batch_completed', data);
  }

  leadProcessed(data: {
    lead_id: string;
    execution_id: string | null;
    status: string;
    overall_quality_score: number | null;
    fallback_mode: boolean;
  }): void {
    this.log('info', 'lead_processed', data);
  }

  leadRejected(data: { lead_id?: string; issues: string[] }): void {
    this.log('warn', 'lead_rejected', data);
  }
}

// ===========================================
// Default Logger Instance
// ===========================================

const envLevel = process.env.LOG_LEVEL;

export const logger = new CampaignBrainLogger({
  level: isLogLevel(envLevel) ? envLevel : 'info',
});

export function createLogger(config?: Partial<LoggerConfig>): CampaignBrainLogger {
  return new CampaignBrainLogger(config);
}
