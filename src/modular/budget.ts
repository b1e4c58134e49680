import type { Budget } from '../mcts-types.js';

/**
 * Continue until the given number of iterations has completed.
 */
export function iterationBudget(allowedIterations: number): Budget {
    return (iterations) => iterations < allowedIterations;
}

/**
 * Continue until the given wall-clock time has elapsed since the first call.
 *
 * Once expired the clock is cleared, so the same budget can serve the next search.
 *
 * @param allowedMs - time allowed per search, in milliseconds
 * @param now - clock in milliseconds
 */
export function timedBudget(allowedMs: number, now: () => number = () => performance.now()): Budget {
    let startTime: number | null = null;

    return () => {
        const currentTime = now();
        if (startTime === null) {
            startTime = currentTime;
        }
        if (currentTime - startTime > allowedMs) {
            startTime = null;
            return false;
        }
        return true;
    };
}
