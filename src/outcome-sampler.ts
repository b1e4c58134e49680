import { InvalidDistributionError } from './errors.js';
import type { RandomSource } from './random.js';

/**
 * A weighted outcome as handed to the sampler: `[weight, outcome]`.
 * Weights need not be normalised.
 */
export type WeightedOutcome<T> = readonly [weight: number, outcome: T];

/**
 * One column of the alias table.
 * `primary` is returned when the second draw falls under `probability`, `alias` otherwise.
 */
export interface AliasSlot<T> {
    readonly probability: number;
    readonly primary: T;
    readonly alias: T;
}

/**
 * Outcome Sampler
 *
 * Draws outcomes proportionally to their weights using Vose's alias method.
 * The table is built once in O(n); every draw afterwards costs exactly two
 * uniform random numbers, no matter how many outcomes there are.
 *
 * CONSTRUCTION:
 * 1. Scale every weight by n / total so the average weight is 1
 * 2. Split the scaled items into "small" (< 1) and "large" (>= 1)
 * 3. Pair a small item with a large item into one slot; the small item's
 *    scaled weight is the slot's cutoff
 * 4. The large item keeps `large - (1 - small)` and goes back to the matching bucket
 * 5. Whatever is left occupies a whole slot on its own (cutoff 1)
 *
 * DRAWING:
 * The first draw picks a slot uniformly, the second compares against the
 * slot's cutoff to choose between its primary and alias outcome.
 */
export class OutcomeSampler<T> {
    private readonly table: AliasSlot<T>[] = [];

    constructor(elements: readonly WeightedOutcome<T>[]) {
        if (elements.length === 0) {
            throw new InvalidDistributionError('the list of outcomes is empty');
        }
        if (elements.some(([ weight ]) => !Number.isFinite(weight) || weight < 0)) {
            throw new InvalidDistributionError('every weight must be a finite number greater than or equal to 0');
        }
        const total = elements.reduce((sum, [ weight ]) => sum + weight, 0);
        if (!(total > 0)) {
            throw new InvalidDistributionError('the weights must sum to a value greater than 0');
        }

        const n = elements.length;
        const scaled = elements.map(([ weight, outcome ]) => ({ weight: weight * n / total, outcome }));
        const small = scaled.filter(item => item.weight < 1);
        const large = scaled.filter(item => item.weight >= 1);

        while (small.length > 0 && large.length > 0) {
            const lesser = small.pop();
            const greater = large.pop();
            if (lesser === undefined || greater === undefined) {
                break;
            }
            this.table.push({ probability: lesser.weight, primary: lesser.outcome, alias: greater.outcome });

            const remaining = { weight: (greater.weight + lesser.weight) - 1, outcome: greater.outcome };
            if (remaining.weight < 1) {
                small.push(remaining);
            } else {
                large.push(remaining);
            }
        }

        // numerical drift can leave items in either bucket; they fill whole slots
        for (const item of [ ...large.reverse(), ...small.reverse() ]) {
            this.table.push({ probability: 1, primary: item.outcome, alias: item.outcome });
        }
    }

    /** Number of slots in the alias table, equal to the number of outcomes. */
    get size(): number {
        return this.table.length;
    }

    get slots(): readonly AliasSlot<T>[] {
        return this.table;
    }

    /**
     * Draw one outcome according to the weights.
     *
     * @param source - uniform random source, `Math.random` unless given
     */
    random(source: RandomSource = Math.random): T {
        const index = Math.min(Math.floor(source() * this.table.length), this.table.length - 1);
        const slot = this.table[index];
        return slot.probability >= source() ? slot.primary : slot.alias;
    }
}
