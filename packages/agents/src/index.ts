/**
 * Campaign Brain Agents
 *
 * @module @campaign-brain/agents
 */

// Campaign Brain - also available as a subpath import
// import { CampaignBrainAgent } from '@campaign-brain/agents/campaign-brain';
export * from './campaign-brain';
