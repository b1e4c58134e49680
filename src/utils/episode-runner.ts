import type { Action } from '../model/action.js';
import type { Effect } from '../model/effect.js';
import type { Problem } from '../model/problem.js';
import type { State } from '../model/state.js';
import { formatState } from '../model/state.js';
import type { RandomSource } from '../random.js';
import type { DecisionStrategy } from '../strategies/decision-strategy.js';
import { MCTSDecisionStrategy } from '../strategies/mcts-decision-strategy.js';

/**
 * One executed step of an episode.
 */
export interface EpisodeStep {
    state: State;
    action: Action;
    effect: Effect;
}

export interface EpisodeOptions {
    /** Decides each step; a fresh {@link MCTSDecisionStrategy} when omitted */
    strategy?: DecisionStrategy;
    /** Steps allowed before giving up */
    maxSteps?: number;
    /** Source used to sample the real outcome of each chosen action */
    random?: RandomSource;
    /** Log every executed step */
    verbose?: boolean;
}

export interface EpisodeResult {
    reachedGoal: boolean;
    /** Effect rewards of every step, plus the goal reward when the goal was reached */
    reward: number;
    steps: number;
    finalState: State;
    trace: EpisodeStep[];
}

/**
 * Play a problem from its initial state: ask the strategy for an action, sample
 * its real outcome, apply it, and repeat until a goal is reached, no action is
 * available, or `maxSteps` steps have been taken.
 */
export function runEpisode(problem: Problem, options: EpisodeOptions = {}): EpisodeResult {
    const {
        strategy = new MCTSDecisionStrategy(problem),
        maxSteps = 100,
        random = Math.random,
        verbose = false,
    } = options;

    let state = problem.init;
    let reward = 0;
    const trace: EpisodeStep[] = [];

    while (!problem.isGoal(state) && trace.length < maxSteps) {
        const action = strategy.getAction(state);
        if (action === null) {
            break;
        }
        if (!action.isApplicable(state)) {
            throw new Error(`Strategy chose "${action.name}", which is not applicable in ${formatState(state)}`);
        }

        const effect = action.outcome(random);
        trace.push({ state, action, effect });
        reward += effect.reward;

        if (verbose) {
            console.log(`[EPISODE] ${formatState(state)} ${action.name}`);
        }
        state = effect.apply(state);
    }

    const reachedGoal = problem.isGoal(state);
    if (reachedGoal) {
        reward += problem.goalReward;
    }

    return { reachedGoal, reward, steps: trace.length, finalState: state, trace };
}
