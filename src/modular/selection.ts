import type { ActionChooser, SearchNode } from '../search-node.js';

/**
 * Where a phase left the current iteration: the node reached and its depth.
 */
export interface PhaseResult {
    node: SearchNode;
    depth: number;
}

/**
 * MCTS Selection Phase Implementation
 *
 * Descends the tree from the root while the current node is fully expanded:
 * it has no untried actions, has children, and the horizon is not yet reached.
 * At each level the selection policy picks one of the tried actions and
 * {@link SearchNode.simulateAction} samples which of its outcomes happens,
 * so repeated descents follow the action's effect distribution.
 *
 * POSTCONDITION:
 * - The returned node has untried actions, has no children, or sits past the horizon
 * - The tree's statistics are unchanged (only new outcome children may appear)
 */
export class MCTSSelection {
    /**
     * @param root - the root of the search tree, at depth 1
     * @param horizon - maximum depth of the iteration
     * @param selectAction - picks a tried action at each level
     */
    select(root: SearchNode, horizon: number, selectAction: ActionChooser): PhaseResult {
        let node = root;
        let depth = 1;

        while (node.untriedActions.length === 0 && node.childCount > 0 && depth <= horizon) {
            node = node.simulateAction(selectAction(node));
            depth++;
        }

        return { node, depth };
    }
}
