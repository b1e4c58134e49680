import { InvalidSearchConfigError } from '../errors.js';
import type { Budget } from '../mcts-types.js';
import type { RandomSource } from '../random.js';
import { iterationBudget } from './budget.js';

export interface MCTSConfig {
    /** Consulted after every completed iteration */
    budget: Budget;
    /** Maximum depth explored per iteration, counting the root as depth 1 */
    horizon: number;
    /** Per-level decay of rewards during backpropagation, in (0, 1] */
    discounting: number;
    /** Source of all random draws in the search; Math.random when omitted */
    random?: RandomSource;
    /** Log every phase of every iteration */
    verbose?: boolean;
}

export const DEFAULT_MCTS_CONFIG: MCTSConfig = {
    budget: iterationBudget(1000),
    horizon: 50,
    discounting: 0.9,
};

/**
 * @throws InvalidSearchConfigError for a negative or fractional horizon, or a discounting outside (0, 1]
 */
export function validateConfig(config: MCTSConfig): void {
    if (!Number.isInteger(config.horizon) || config.horizon < 0) {
        throw new InvalidSearchConfigError(`horizon must be a non-negative integer, got ${config.horizon}`);
    }
    if (!(config.discounting > 0 && config.discounting <= 1)) {
        throw new InvalidSearchConfigError(`discounting must be in (0, 1], got ${config.discounting}`);
    }
}
