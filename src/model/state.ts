/**
 * An opaque proposition identifier.
 */
export type Atom = string;

/**
 * The set of atoms that are true. Everything absent is false (closed world).
 * States are values: deriving a successor never touches the original.
 */
export type State = ReadonlySet<Atom>;

/**
 * A conjunctive condition: all `positive` atoms hold and no `negative` atom does.
 * Used for both action preconditions and goals.
 */
export interface Condition {
    readonly negative: ReadonlySet<Atom>;
    readonly positive: ReadonlySet<Atom>;
}

/** The condition that holds in every state. */
export const ALWAYS: Condition = { negative: new Set(), positive: new Set() };

export function createState(atoms: Iterable<Atom> = []): State {
    return new Set(atoms);
}

export function createCondition(positive: Iterable<Atom> = [], negative: Iterable<Atom> = []): Condition {
    return { negative: new Set(negative), positive: new Set(positive) };
}

export function satisfies(state: State, condition: Condition): boolean {
    for (const atom of condition.positive) {
        if (!state.has(atom)) {
            return false;
        }
    }
    for (const atom of condition.negative) {
        if (state.has(atom)) {
            return false;
        }
    }
    return true;
}

/**
 * Disjunction of conditions. An empty list never holds; callers that mean
 * "always" pass {@link ALWAYS}.
 */
export function satisfiesAny(state: State, conditions: readonly Condition[]): boolean {
    return conditions.some(condition => satisfies(state, condition));
}

/**
 * Computes `(state \ remove) ∪ add`; an atom in both sets ends up true.
 */
export function applyDeltas(state: State, remove: ReadonlySet<Atom>, add: ReadonlySet<Atom>): State {
    const next = new Set<Atom>();
    for (const atom of state) {
        if (!remove.has(atom)) {
            next.add(atom);
        }
    }
    for (const atom of add) {
        next.add(atom);
    }
    return next;
}

export function statesEqual(a: State, b: State): boolean {
    if (a.size !== b.size) {
        return false;
    }
    for (const atom of a) {
        if (!b.has(atom)) {
            return false;
        }
    }
    return true;
}

/** Sorted atom list, for stable printing and comparison in logs. */
export function formatState(state: State): string {
    return `{${[ ...state ].sort().join(', ')}}`;
}
