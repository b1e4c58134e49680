import { IllegalActionError } from './errors.js';
import type { Action } from './model/action.js';
import type { Effect } from './model/effect.js';
import type { Problem } from './model/problem.js';
import type { State } from './model/state.js';
import type { RandomSource } from './random.js';

/**
 * Accumulated statistics of an action tried from a node.
 */
export interface ActionStats {
    /** Sum of discounted rewards backpropagated through this action */
    reward: number;
    /** Number of backpropagations through this action */
    visits: number;
}

/**
 * Chooses an action for a node; used by rollouts and by the driver's policies.
 */
export type ActionChooser = (node: SearchNode) => Action;

/**
 * Result of {@link SearchNode.rolloutActions}: where the rollout stopped and how deep it got.
 */
export interface RolloutResult {
    node: SearchNode;
    depth: number;
}

/**
 * Represents a state node in the search tree.
 *
 * The tree alternates between state layers and action layers (PROST style).
 * A node's children are keyed first by action and then by the sampled effect,
 * so an action with several outcomes fans out into one child per outcome seen.
 * Two different effects never share a child, even if they lead to equal states.
 *
 * Each node is in one of three situations:
 * - unexpanded: some applicable actions are still untried
 * - expanded: every applicable action has been tried at least once
 * - terminal: the state is a goal, or no action is applicable
 *
 * Only actions in {@link SearchNode.triedActions} carry statistics. Nodes that rollouts pass
 * through are kept in the child map, but rollouts never move actions from
 * untried to tried, so their statistics stay clean.
 */
export class SearchNode {
    /** Whether this node's state satisfies one of the problem's goals. */
    readonly isGoal: boolean;

    /** Actions whose preconditions hold in this node's state, in problem order. */
    readonly applicableActions: readonly Action[];

    /** Number of backpropagations that counted this node */
    visits = 0;

    /** Cumulative discounted reward from all backpropagations that counted this node */
    utility = 0;

    protected readonly untried: Action[];

    protected readonly tried = new Map<Action, ActionStats>();

    private readonly children = new Map<Action, Map<Effect, SearchNode>>();

    constructor(
        readonly problem: Problem,
        readonly parent: SearchNode | null,
        readonly action: Action | null,
        readonly effect: Effect | null,
        readonly state: State,
        readonly random: RandomSource = parent?.random ?? Math.random,
    ) {
        this.isGoal = problem.isGoal(state);
        this.applicableActions = problem.applicableActions(state);
        this.untried = [ ...this.applicableActions ];
    }

    /**
     * Create the root of a new search tree.
     */
    static root(problem: Problem, state: State, random: RandomSource = Math.random): SearchNode {
        return new SearchNode(problem, null, null, null, state, random);
    }

    /** Applicable actions not yet expanded from this node. */
    get untriedActions(): readonly Action[] {
        return this.untried;
    }

    /** Actions expanded from this node, with their accumulated reward and visits. */
    get triedActions(): ReadonlyMap<Action, Readonly<ActionStats>> {
        return this.tried;
    }

    /** True for goal states and states where no action applies. */
    get isTerminal(): boolean {
        return this.isGoal || this.applicableActions.length === 0;
    }

    /** Number of distinct `(action, effect)` children. */
    get childCount(): number {
        let count = 0;
        for (const byEffect of this.children.values()) {
            count += byEffect.size;
        }
        return count;
    }

    childFor(action: Action, effect: Effect): SearchNode | undefined {
        return this.children.get(action)?.get(effect);
    }

    /** All children, grouped by action in the order they were first reached. */
    * childEntries(): IterableIterator<{ action: Action, effect: Effect, child: SearchNode }> {
        for (const [ action, byEffect ] of this.children) {
            for (const [ effect, child ] of byEffect) {
                yield { action, effect, child };
            }
        }
    }

    /**
     * Resolve one outcome of an action and return the corresponding child,
     * creating it the first time that `(action, effect)` pair is seen.
     * Does not touch the untried/tried bookkeeping.
     *
     * @param mostProbable - take the most probable effect instead of sampling
     */
    simulateAction(action: Action, mostProbable: boolean = false): SearchNode {
        const effect = mostProbable ? action.mostProbableOutcome() : action.outcome(this.random);

        let byEffect = this.children.get(action);
        if (!byEffect) {
            byEffect = new Map();
            this.children.set(action, byEffect);
        }

        let child = byEffect.get(effect);
        if (!child) {
            child = new SearchNode(this.problem, this, action, effect, effect.apply(this.state));
            byEffect.set(effect, child);
        }
        return child;
    }

    /**
     * Expand an untried action: move it to the tried actions with empty statistics
     * and return the child reached by one sampled outcome.
     *
     * @throws IllegalActionError if the action is not untried at this node
     */
    performAction(action: Action): SearchNode {
        const index = this.untried.indexOf(action);
        if (index < 0) {
            throw new IllegalActionError(action.name);
        }
        this.untried.splice(index, 1);
        this.tried.set(action, { reward: 0, visits: 0 });
        return this.simulateAction(action);
    }

    /**
     * Simulate from this node along most probable outcomes until a goal, a state
     * without applicable actions, or the horizon.
     *
     * @param chooseAction - picks the action to simulate at each step
     * @param depth - depth of this node in the current iteration
     * @param horizon - depth at which the rollout stops
     */
    rolloutActions(chooseAction: ActionChooser, depth: number, horizon: number): RolloutResult {
        let node: SearchNode = this;
        let currentDepth = depth;

        while (!node.isTerminal && currentDepth < horizon) {
            node = node.simulateAction(chooseAction(node), true);
            currentDepth++;
        }

        return { node, depth: currentDepth };
    }

    /**
     * Backpropagate from this node to the root.
     *
     * Walking up, the reward gathered so far is discounted once per level, then the
     * node adds the goal reward (only for the first goal met) and the reward of the
     * effect that produced it. Statistics are only updated on real transitions: the
     * root, or a node whose action was tried by its parent.
     */
    update(discounting: number): void {
        let node: SearchNode | null = this;
        let reward = 0;
        let goalCounted = false;

        while (node !== null) {
            reward *= discounting;
            if (node.isGoal && !goalCounted) {
                reward += this.problem.goalReward;
                goalCounted = true;
            }
            if (node.effect) {
                reward += node.effect.reward;
            }

            const parent: SearchNode | null = node.parent;
            const stats = parent && node.action ? parent.tried.get(node.action) : undefined;
            if (parent === null || stats !== undefined) {
                if (stats) {
                    stats.reward += reward;
                    stats.visits++;
                }
                node.utility += reward;
                node.visits++;
            }

            node = parent;
        }
    }
}
