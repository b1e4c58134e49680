/**
 * Thrown by {@link OutcomeSampler} when the weighted list cannot describe a distribution:
 * the list is empty, a weight is negative (or not a finite number), or all weights are zero.
 *
 * @example
 * ```typescript
 * try {
 *     new OutcomeSampler([]);
 * } catch (err) {
 *     if (err instanceof InvalidDistributionError) {
 *         console.error(err.message);
 *     }
 * }
 * ```
 */
export class InvalidDistributionError extends Error {
    constructor(reason: string) {
        super(`Invalid distribution: ${reason}`);
        this.name = 'InvalidDistributionError';
    }
}

/**
 * Thrown when an action's effects cannot form a probability distribution,
 * either because one probability lies outside (0, 1] or because they sum to more than 1.
 */
export class InvalidEffectProbabilitiesError extends Error {
    readonly actionName: string | undefined;

    constructor(reason: string, actionName?: string) {
        super(actionName === undefined
            ? `Invalid effect probabilities: ${reason}`
            : `Invalid effect probabilities for action "${actionName}": ${reason}`);
        this.name = 'InvalidEffectProbabilitiesError';
        this.actionName = actionName;
    }
}

/**
 * Thrown by {@link SearchNode.performAction} when the action is not among the
 * node's untried actions (already tried, or never applicable in this state).
 */
export class IllegalActionError extends Error {
    /** Name of the action that could not be performed. */
    readonly actionName: string;

    constructor(actionName: string) {
        super(`Action "${actionName}" is not an untried action of this node`);
        this.name = 'IllegalActionError';
        this.actionName = actionName;
    }
}

/**
 * Thrown by a policy that is asked to pick from an empty list of candidates.
 * The driver treats nodes without applicable actions as leaves, so it never asks.
 */
export class NoApplicableActionError extends Error {
    constructor(phase: string) {
        super(`No applicable action to choose from during ${phase}`);
        this.name = 'NoApplicableActionError';
    }
}

export class InvalidSearchConfigError extends Error {
    constructor(reason: string) {
        super(`Invalid search configuration: ${reason}`);
        this.name = 'InvalidSearchConfigError';
    }
}

/**
 * Thrown by {@link createProblem} when a plain-data problem definition is malformed
 * (an unreadable probability, or two actions sharing a name).
 */
export class InvalidProblemError extends Error {
    constructor(reason: string) {
        super(`Invalid problem definition: ${reason}`);
        this.name = 'InvalidProblemError';
    }
}
