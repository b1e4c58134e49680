import { NoApplicableActionError } from '../errors.js';
import type { ActionInfo, MCTSPolicies } from '../mcts-types.js';
import type { Action } from '../model/action.js';
import { pickRandom } from '../random.js';
import type { RandomSource } from '../random.js';
import type { SearchNode } from '../search-node.js';
import { calculateAvgReward, getUCB1Score } from '../utils/search-node-utils.js';

/**
 * Default heuristics:
 * - selection maximises UCB1 over the tried actions
 * - expansion and rollout pick uniformly at random
 * - the final choice maximises the average reward
 *
 * Ties go to the action encountered first.
 */
export class DefaultPolicies implements MCTSPolicies {
    constructor(private random: RandomSource = Math.random) {}

    selectAction(node: SearchNode): Action {
        let best: Action | undefined;
        let bestScore = -Infinity;

        for (const [ action, stats ] of node.triedActions) {
            const score = getUCB1Score(stats, node.visits);
            if (best === undefined || score > bestScore) {
                best = action;
                bestScore = score;
            }
        }

        if (best === undefined) {
            throw new NoApplicableActionError('selection');
        }
        return best;
    }

    expandAction(node: SearchNode): Action {
        const action = pickRandom(node.untriedActions, this.random);
        if (action === undefined) {
            throw new NoApplicableActionError('expansion');
        }
        return action;
    }

    rolloutAction(node: SearchNode): Action {
        const action = pickRandom(node.applicableActions, this.random);
        if (action === undefined) {
            throw new NoApplicableActionError('rollout');
        }
        return action;
    }

    selectBest(actions: readonly ActionInfo[]): Action {
        let best: ActionInfo | undefined;
        let bestAverage = -Infinity;

        for (const info of actions) {
            const average = calculateAvgReward(info);
            if (best === undefined || average > bestAverage) {
                best = info;
                bestAverage = average;
            }
        }

        if (best === undefined) {
            throw new NoApplicableActionError('final selection');
        }
        return best.action;
    }
}

/**
 * Fill in the policies the caller did not override with the defaults.
 */
export function resolvePolicies(overrides: Partial<MCTSPolicies>, random: RandomSource = Math.random): MCTSPolicies {
    const defaults = new DefaultPolicies(random);
    return {
        selectAction: overrides.selectAction?.bind(overrides) ?? (node => defaults.selectAction(node)),
        expandAction: overrides.expandAction?.bind(overrides) ?? (node => defaults.expandAction(node)),
        rolloutAction: overrides.rolloutAction?.bind(overrides) ?? (node => defaults.rolloutAction(node)),
        selectBest: overrides.selectBest?.bind(overrides) ?? (actions => defaults.selectBest(actions)),
    };
}
