import type { Action } from '../model/action.js';
import type { State } from '../model/state.js';

/**
 * Generic Decision Strategy Interface
 *
 * Any planner (MCTS, Random, ...) implements this interface. A strategy is bound
 * to one problem and answers, for a given state, which action to take next.
 */
export interface DecisionStrategy {
    /**
     * Decide which action to take in the given state.
     *
     * @returns one of the problem's actions applicable in the state, or null if none is
     */
    getAction(state: State): Action | null;
}
