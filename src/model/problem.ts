import type { Action } from './action.js';
import { satisfiesAny } from './state.js';
import type { Condition, State } from './state.js';

/**
 * A planning problem: where to start, what counts as done, and what can be done.
 * Shared read-only by every node of a search tree.
 */
export class Problem {
    readonly goals: readonly Condition[];

    readonly actions: readonly Action[];

    constructor(
        readonly name: string,
        readonly init: State,
        goals: readonly Condition[],
        readonly goalReward: number,
        actions: readonly Action[],
    ) {
        this.goals = [ ...goals ];
        this.actions = [ ...actions ];
    }

    /** True when the state satisfies at least one goal condition. */
    isGoal(state: State): boolean {
        return satisfiesAny(state, this.goals);
    }

    /** Actions whose preconditions hold in the state, in problem order. */
    applicableActions(state: State): Action[] {
        return this.actions.filter(action => action.isApplicable(state));
    }
}
