/*
 * Main entry point for the stochastic-mcts package
 * Re-exports all public APIs
 */

export * from './errors.js';
export * from './random.js';
export { OutcomeSampler } from './outcome-sampler.js';
export type { AliasSlot, WeightedOutcome } from './outcome-sampler.js';
export * from './model/index.js';
export { SearchNode } from './search-node.js';
export type { ActionChooser, ActionStats, RolloutResult } from './search-node.js';
export * from './modular/index.js';
export * from './strategies/index.js';
export { runEpisode } from './utils/episode-runner.js';
export type { EpisodeOptions, EpisodeResult, EpisodeStep } from './utils/episode-runner.js';
export { printTree, getNodePath, toGraphviz, formatRootScores } from './utils/tree-debug.js';
export { describeAction, describeCondition, describeEffect, describeProblem } from './utils/describe.js';
export { calculateAvgReward, getUCB1Score, UCB1_EXPLORATION } from './utils/search-node-utils.js';
