import type { Action } from './model/action.js';
import type { SearchNode } from './search-node.js';

/**
 * Decides after each completed iteration whether the search continues.
 * Receives the number of iterations completed so far; returns false to stop.
 */
export type Budget = (iterations: number) => boolean;

/**
 * What the search learned about one root action.
 */
export interface ActionInfo {
    action: Action;
    /** Cumulative discounted reward backpropagated through the action */
    reward: number;
    visits: number;
}

/**
 * The four pluggable heuristics of the search, one per phase.
 *
 * Callers may override any subset; the rest fall back to {@link DefaultPolicies}.
 */
export interface MCTSPolicies {
    /** Step 1: choose among the node's tried actions to descend the tree. */
    selectAction(node: SearchNode): Action;

    /** Step 2: choose among the node's untried actions to expand. */
    expandAction(node: SearchNode): Action;

    /** Step 3: choose among the node's applicable actions during a rollout. */
    rolloutAction(node: SearchNode): Action;

    /** After the budget is spent: choose the action to report from the root statistics. */
    selectBest(actions: readonly ActionInfo[]): Action;
}

/**
 * Outcome of a search.
 */
export interface MCTSResult {
    /** The chosen root action, or null when no action was ever tried from the root */
    action: Action | null;
    /** Root statistics, in the order the actions were first expanded */
    actions: ActionInfo[];
    root: SearchNode;
    iterations: number;
}
