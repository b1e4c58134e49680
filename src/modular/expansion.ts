import type { ActionChooser, SearchNode } from '../search-node.js';
import type { PhaseResult } from './selection.js';

/**
 * MCTS Expansion Phase Implementation
 *
 * Takes the node where selection stopped and grows the tracked tree by one
 * action: the expansion policy picks an untried action, and
 * {@link SearchNode.performAction} moves it to the tried actions and returns
 * the child reached by one sampled outcome.
 *
 * Nothing is expanded from goal nodes, from nodes past the horizon, or from
 * nodes without untried actions.
 */
export class MCTSExpansion {
    /**
     * @param node - node returned by the selection phase
     * @param depth - depth of that node
     * @param horizon - maximum depth of the iteration
     * @param expandAction - picks one of the node's untried actions
     * @returns the new child one level deeper, or null if the node cannot be expanded
     */
    expand(node: SearchNode, depth: number, horizon: number, expandAction: ActionChooser): PhaseResult | null {
        if (node.isGoal || depth > horizon || node.untriedActions.length === 0) {
            return null;
        }

        const child = node.performAction(expandAction(node));
        return { node: child, depth: depth + 1 };
    }
}
