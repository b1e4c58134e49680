import type { ActionInfo, MCTSPolicies, MCTSResult } from '../mcts-types.js';
import type { Action } from '../model/action.js';
import type { Problem } from '../model/problem.js';
import { formatState } from '../model/state.js';
import type { State } from '../model/state.js';
import { SearchNode } from '../search-node.js';
import { formatRootScores, printTree } from '../utils/tree-debug.js';
import { MCTSBackpropagation } from './backpropagation.js';
import { MCTSExpansion } from './expansion.js';
import { DEFAULT_MCTS_CONFIG, validateConfig } from './mcts-config.js';
import type { MCTSConfig } from './mcts-config.js';
import { resolvePolicies } from './policies.js';
import { MCTSSelection } from './selection.js';
import { MCTSSimulation } from './simulation.js';

/**
 * Monte-Carlo Tree Search over a probabilistic planning problem.
 *
 * Each iteration runs four phases:
 * 1. Selection: descend through fully expanded nodes using the selection policy
 * 2. Expansion: try one untried action of the selected node
 * 3. Simulation: roll out along most probable outcomes to a goal or the horizon
 * 4. Backpropagation: push the discounted reward back to the root
 *
 * The budget is asked after every completed iteration; an iteration is never interrupted.
 */
export class MCTS {
    private selection = new MCTSSelection();

    private expansion = new MCTSExpansion();

    private simulation = new MCTSSimulation();

    private backpropagation = new MCTSBackpropagation();

    constructor(
        public readonly problem: Problem,
        private policies: Partial<MCTSPolicies> = {},
    ) {}

    /**
     * Search from the given state and return the best root action.
     *
     * @returns the chosen action, or null when nothing could be tried from the state
     */
    getBestAction(state: State, config: MCTSConfig = DEFAULT_MCTS_CONFIG): Action | null {
        return this.search(state, config).action;
    }

    /**
     * Build a search tree from the given state until the budget runs out.
     *
     * @throws InvalidSearchConfigError before any iteration when the config is malformed
     */
    search(state: State, config: MCTSConfig = DEFAULT_MCTS_CONFIG): MCTSResult {
        validateConfig(config);

        const random = config.random ?? Math.random;
        const policies = resolvePolicies(this.policies, random);
        const root = SearchNode.root(this.problem, state, random);

        let iterations = 0;
        while (config.budget(iterations)) {
            this.runSingleIteration(root, config, policies);
            iterations++;
        }

        if (config.verbose) {
            console.log(`[MCTS] search completed after ${iterations} iterations`);
        }

        const actions = this.getAllActionsWithStats(root);
        const action = actions.length > 0 ? policies.selectBest(actions) : null;

        if (process.env.LOG_MCTS_SCORES === 'true') {
            console.log(`[MCTS] ${actions.length} actions evaluated:`);
            formatRootScores(root).slice(0, 5).forEach(line => console.log(line));
        }

        return { action, actions, root, iterations };
    }

    private runSingleIteration(root: SearchNode, config: MCTSConfig, policies: MCTSPolicies): void {
        const { horizon, verbose } = config;

        if (verbose) {
            console.log(`[MCTS] iteration starting from ${formatState(root.state)}`);
        }

        // SELECTION: descend while the node is fully expanded
        const selected = this.selection.select(root, horizon, node => policies.selectAction(node));
        if (verbose) {
            console.log(`[MCTS]   (1) selected ${formatState(selected.node.state)} at depth ${selected.depth}`);
        }

        // EXPANSION: one untried action, unless the node is a goal or past the horizon
        const expanded = this.expansion.expand(selected.node, selected.depth, horizon, node => policies.expandAction(node)) ?? selected;
        if (verbose && expanded !== selected) {
            console.log(`[MCTS]   (2) expanded ${expanded.node.action?.name} into ${formatState(expanded.node.state)}`);
        }

        // SIMULATION: cheap rollout along most probable outcomes
        const rollout = this.simulation.simulate(expanded.node, expanded.depth, horizon, node => policies.rolloutAction(node));
        if (verbose) {
            console.log(`[MCTS]   (3) rollout ended in ${formatState(rollout.node.state)} at depth ${rollout.depth}`);
        }

        // BACKPROPAGATION
        this.backpropagation.backpropagate(rollout.node, config.discounting);
        if (verbose) {
            console.log(`[MCTS]   (4) backpropagated ${rollout.node.isGoal ? 'success' : 'no success'}`);
        }
    }

    private getAllActionsWithStats(root: SearchNode): ActionInfo[] {
        if (process.env.DEBUG_TREE === 'true') {
            console.log('\n[TREE-STRUCTURE] Final MCTS tree:');
            printTree(root);
        }

        return [ ...root.triedActions ].map(([ action, stats ]) => ({
            action,
            reward: stats.reward,
            visits: stats.visits,
        }));
    }
}
