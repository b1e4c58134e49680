import type { ActionStats } from '../search-node.js';

/** Exploration constant of the UCB1 rule used by the default selection policy. */
export const UCB1_EXPLORATION = 1 / Math.SQRT2;

export function calculateAvgReward(stats: ActionStats): number {
    return stats.visits > 0 ? stats.reward / stats.visits : 0;
}

/**
 * Calculates the UCB1 (Upper Confidence Bound) score of an action tried from a node.
 * UCB1 = exploration + exploitation = c * sqrt(ln(node_visits) / action_visits) + (reward / action_visits)
 * Unvisited actions return Infinity to ensure they are selected first.
 *
 * @param stats - accumulated reward and visits of the action
 * @param nodeVisits - total visits of the node the action is tried from
 * @param exploration - weight of the exploration term
 * @returns The UCB1 score, or Infinity for unvisited actions
 */
export function getUCB1Score(stats: ActionStats, nodeVisits: number, exploration: number = UCB1_EXPLORATION): number {
    if (stats.visits === 0) {
        return Infinity;
    }

    const exploitation = calculateAvgReward(stats);
    const explorationTerm = exploration * Math.sqrt(Math.log(nodeVisits) / stats.visits);

    return explorationTerm + exploitation;
}
