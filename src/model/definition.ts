import { InvalidProblemError } from '../errors.js';
import { Action } from './action.js';
import { Effect } from './effect.js';
import { Problem } from './problem.js';
import { createCondition, createState } from './state.js';
import type { Atom, Condition } from './state.js';

/**
 * A probability as a number, or as a fraction string such as `"9/10"`.
 */
export type ProbabilityValue = number | string;

export interface ConditionDefinition {
    positive?: readonly Atom[];
    negative?: readonly Atom[];
}

export interface EffectDefinition {
    probability: ProbabilityValue;
    add?: readonly Atom[];
    delete?: readonly Atom[];
    reward?: number;
}

export interface ActionDefinition {
    name: string;
    /** Disjunction of conditions; omitted or empty means always applicable. */
    preconditions?: readonly ConditionDefinition[];
    effects?: readonly EffectDefinition[];
}

/**
 * Plain-data form of a {@link Problem}, the shape a domain parser or a JSON file produces.
 */
export interface ProblemDefinition {
    name: string;
    init: readonly Atom[];
    goals: readonly ConditionDefinition[];
    goalReward?: number;
    actions: readonly ActionDefinition[];
}

const FRACTION = /^\s*(-?\d+)\s*\/\s*(\d+)\s*$/;

/**
 * Read a probability given as a number, a decimal string, or a `"numerator/denominator"` string.
 */
export function parseProbability(value: ProbabilityValue): number {
    if (typeof value === 'number') {
        return value;
    }
    const fraction = FRACTION.exec(value);
    if (fraction) {
        const denominator = Number(fraction[2]);
        if (denominator === 0) {
            throw new InvalidProblemError(`probability "${value}" divides by zero`);
        }
        return Number(fraction[1]) / denominator;
    }
    const parsed = Number(value);
    if (value.trim() === '' || Number.isNaN(parsed)) {
        throw new InvalidProblemError(`cannot read "${value}" as a probability`);
    }
    return parsed;
}

function toCondition(definition: ConditionDefinition): Condition {
    return createCondition(definition.positive ?? [], definition.negative ?? []);
}

function toEffect(definition: EffectDefinition): Effect {
    return new Effect(
        definition.delete ?? [],
        definition.add ?? [],
        parseProbability(definition.probability),
        definition.reward ?? 0,
    );
}

/**
 * Build a {@link Problem} from plain data. Every action is validated here, so a
 * malformed definition is rejected before any search can start.
 */
export function createProblem(definition: ProblemDefinition): Problem {
    const seen = new Set<string>();
    const actions = definition.actions.map(action => {
        if (seen.has(action.name)) {
            throw new InvalidProblemError(`action "${action.name}" is defined more than once`);
        }
        seen.add(action.name);
        return new Action(
            action.name,
            (action.preconditions ?? []).map(toCondition),
            (action.effects ?? []).map(toEffect),
        );
    });

    return new Problem(
        definition.name,
        createState(definition.init),
        definition.goals.map(toCondition),
        definition.goalReward ?? 0,
        actions,
    );
}
