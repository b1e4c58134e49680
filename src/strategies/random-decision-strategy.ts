import type { Action } from '../model/action.js';
import type { Problem } from '../model/problem.js';
import type { State } from '../model/state.js';
import { pickRandom } from '../random.js';
import type { RandomSource } from '../random.js';
import type { DecisionStrategy } from './decision-strategy.js';

/**
 * Random Decision Strategy
 *
 * Chooses uniformly among the actions applicable in the state.
 *
 * Used for:
 * - Baseline comparison (MCTS vs Random)
 * - Fallback behavior when the search tried nothing from the root
 */
export class RandomDecisionStrategy implements DecisionStrategy {
    constructor(
        private problem: Problem,
        private random: RandomSource = Math.random,
    ) {}

    getAction(state: State): Action | null {
        return pickRandom(this.problem.applicableActions(state), this.random) ?? null;
    }
}
