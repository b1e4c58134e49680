import { InvalidEffectProbabilitiesError } from '../errors.js';
import { applyDeltas } from './state.js';
import type { Atom, State } from './state.js';

/**
 * One possible outcome of an action.
 *
 * Effects are compared by identity: the search tree keys children by the
 * `(action, effect)` pair, so two effects with equal contents stay distinct.
 */
export class Effect {
    readonly delete: ReadonlySet<Atom>;

    readonly add: ReadonlySet<Atom>;

    /** Chance of this outcome, in (0, 1]. */
    readonly probability: number;

    /** Reward collected when this outcome occurs; may be negative. */
    readonly reward: number;

    constructor(remove: Iterable<Atom>, add: Iterable<Atom>, probability: number, reward: number = 0) {
        if (!Number.isFinite(probability) || probability <= 0 || probability > 1) {
            throw new InvalidEffectProbabilitiesError(`effect probability ${probability} is not in (0, 1]`);
        }
        this.delete = new Set(remove);
        this.add = new Set(add);
        this.probability = probability;
        this.reward = reward;
        Object.freeze(this);
    }

    /** The outcome where nothing changes and nothing is earned. */
    static noOp(probability: number): Effect {
        return new Effect([], [], probability, 0);
    }

    /** `(state \ delete) ∪ add` */
    apply(state: State): State {
        return applyDeltas(state, this.delete, this.add);
    }
}
