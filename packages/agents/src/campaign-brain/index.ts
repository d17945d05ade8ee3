/**
 * Campaign Brain
 *
 * Detects lead traits, plans a three-message sequence, drafts and scores
 * the copy, and retries weak messages before approving or escalating.
 *
 * @module campaign-brain
 */

// === Contracts (API boundaries) ===
export * from './contracts';

// === Types (internal) ===
export * from './types';
export * from './errors';
export * from './config';

// === Core Modules ===
export * from './text';
export * from './trait-detector';
export * from './campaign-planner';
export * from './copywriter';
export * from './anthropic-copywriter';
export * from './message-generator';
export * from './quality-assessor';
export * from './transitions';
export * from './memory-manager';
export * from './delivery';
export * from './escalation';
export * from './logger';
export * from './state';

// === Agent ===
export { CampaignBrainAgent, createCampaignBrainAgent } from './agent';
export type { CampaignBrainAgentConfig, PipelineComponents } from './agent';
export { runCampaignBatch, type CampaignRunner } from './batch';
