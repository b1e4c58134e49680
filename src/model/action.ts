import { InvalidEffectProbabilitiesError } from '../errors.js';
import { OutcomeSampler } from '../outcome-sampler.js';
import type { RandomSource } from '../random.js';
import { Effect } from './effect.js';
import { ALWAYS, satisfiesAny } from './state.js';
import type { Condition, State } from './state.js';

/** Slack allowed when checking that effect probabilities sum to 1. */
export const PROBABILITY_TOLERANCE = 1e-9;

/**
 * An action with a disjunction of preconditions and a distribution over effects.
 *
 * On construction the effects are completed to a full distribution: when they sum
 * to less than 1, a no-op effect takes the remaining probability. They are then
 * ordered most probable first (ties keep their declared order), so
 * {@link mostProbableOutcome} is just the head of the list.
 */
export class Action {
    readonly preconditions: readonly Condition[];

    readonly effects: readonly Effect[];

    private readonly sampler: OutcomeSampler<Effect>;

    constructor(
        readonly name: string,
        preconditions: readonly Condition[] = [],
        effects: readonly Effect[] = [],
    ) {
        this.preconditions = preconditions.length > 0 ? [ ...preconditions ] : [ ALWAYS ];

        const total = effects.reduce((sum, effect) => sum + effect.probability, 0);
        if (total > 1 + PROBABILITY_TOLERANCE) {
            throw new InvalidEffectProbabilitiesError(`effects sum to ${total}, which exceeds 1`, name);
        }

        const completed = [ ...effects ];
        if (total < 1 - PROBABILITY_TOLERANCE) {
            completed.push(Effect.noOp(1 - total));
        }

        this.effects = completed.sort((a, b) => b.probability - a.probability);
        this.sampler = new OutcomeSampler(this.effects.map(effect => [ effect.probability, effect ] as const));
    }

    isApplicable(state: State): boolean {
        return satisfiesAny(state, this.preconditions);
    }

    /** Sample one effect according to the effect distribution. */
    outcome(random: RandomSource = Math.random): Effect {
        return this.sampler.random(random);
    }

    mostProbableOutcome(): Effect {
        return this.effects[0];
    }

    toString(): string {
        return this.name;
    }
}
