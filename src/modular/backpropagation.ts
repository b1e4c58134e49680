import type { SearchNode } from '../search-node.js';

/**
 * MCTS Backpropagation Phase Implementation
 *
 * Walks from the node where the rollout stopped back to the root, discounting
 * the collected reward by one factor per level.
 *
 * STATISTICS UPDATED (only for the root and for nodes reached by a tried action):
 * - parent.triedActions[action]: reward and visits of the action that led here
 * - node.utility and node.visits
 *
 * REWARD COLLECTED PER LEVEL:
 * - the problem's goal reward, once, at the goal node the rollout ended in
 * - the reward of the effect that produced the node
 */
export class MCTSBackpropagation {
    /**
     * @param node - the node the rollout ended in
     * @param discounting - per-level discount factor in (0, 1]
     */
    backpropagate(node: SearchNode, discounting: number): void {
        node.update(discounting);
    }
}
