import type { Action } from '../model/action.js';
import type { Problem } from '../model/problem.js';
import type { State } from '../model/state.js';
import { MCTS } from '../modular/mcts.js';
import { DEFAULT_MCTS_CONFIG } from '../modular/mcts-config.js';
import type { MCTSConfig } from '../modular/mcts-config.js';
import type { MCTSPolicies } from '../mcts-types.js';
import type { DecisionStrategy } from './decision-strategy.js';
import { RandomDecisionStrategy } from './random-decision-strategy.js';

/**
 * MCTS Decision Strategy
 *
 * Runs a fresh search for every decision. When the search tried nothing from the
 * root (for example a budget that allows no iteration) but actions are applicable,
 * it falls back to {@link RandomDecisionStrategy}.
 */
export class MCTSDecisionStrategy implements DecisionStrategy {
    private mcts: MCTS;

    private randomStrategy: RandomDecisionStrategy;

    constructor(
        problem: Problem,
        private mctsConfig: MCTSConfig = DEFAULT_MCTS_CONFIG,
        policies: Partial<MCTSPolicies> = {},
    ) {
        this.mcts = new MCTS(problem, policies);
        this.randomStrategy = new RandomDecisionStrategy(problem, mctsConfig.random);
    }

    getAction(state: State): Action | null {
        const result = this.mcts.getBestAction(state, this.mctsConfig);

        if (!result) {
            return this.randomStrategy.getAction(state);
        }

        return result;
    }
}
