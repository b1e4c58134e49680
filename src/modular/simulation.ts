import type { ActionChooser, RolloutResult, SearchNode } from '../search-node.js';

/**
 * MCTS Simulation Phase Implementation
 *
 * Estimates the value of a node by a cheap rollout: the rollout policy picks
 * actions and each one resolves to its most probable outcome, until a goal,
 * a state without applicable actions, or the horizon.
 *
 * Rollouts never move actions between untried and tried, so the nodes they
 * pass through do not collect statistics during backpropagation.
 */
export class MCTSSimulation {
    simulate(node: SearchNode, depth: number, horizon: number, rolloutAction: ActionChooser): RolloutResult {
        return node.rolloutActions(rolloutAction, depth, horizon);
    }
}
