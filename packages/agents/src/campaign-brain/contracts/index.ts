/**
 * Campaign Brain Contracts
 *
 * @module campaign-brain/contracts
 */

export * from './campaign-input';
export * from './campaign-output';
export * from './campaign-state';
export * from './message-draft';
