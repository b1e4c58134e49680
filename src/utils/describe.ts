import type { Action } from '../model/action.js';
import type { Effect } from '../model/effect.js';
import type { Problem } from '../model/problem.js';
import type { Condition } from '../model/state.js';

/**
 * Positive atoms, then negative atoms prefixed with `-`, comma separated.
 */
export function describeCondition(condition: Condition): string {
    return [ ...condition.positive, ...[ ...condition.negative ].map(atom => `-${atom}`) ].join(', ');
}

/**
 * One line: probability, changed atoms, signed reward.
 *
 * @example
 * describeEffect(new Effect(['riches'], ['house'], 0.9)) // "0.90  house, -riches  (+0.00)"
 */
export function describeEffect(effect: Effect): string {
    const atoms = [ ...effect.add, ...[ ...effect.delete ].map(atom => `-${atom}`) ];
    const sign = effect.reward >= 0 ? '+' : '';
    const changes = atoms.length > 0 ? `${atoms.join(', ')}  ` : '';
    return `${effect.probability.toFixed(2)}  ${changes}(${sign}${effect.reward.toFixed(2)})`;
}

export function describeAction(action: Action): string {
    const lines = [ `name: ${action.name}`, '  preconditions:' ];
    for (const precondition of action.preconditions) {
        const atoms = describeCondition(precondition);
        lines.push(atoms ? `    -> ${atoms}` : '    -> (none)');
    }
    lines.push('  effects:');
    for (const effect of action.effects) {
        lines.push(`    ${describeEffect(effect)}`);
    }
    return lines.join('\n');
}

/**
 * Multi-line listing of a problem: initial state, goals, reward and every action.
 */
export function describeProblem(problem: Problem): string {
    const lines = [
        `Problem description of ${problem.name}:`,
        ' init conditions:',
        `  ${[ ...problem.init ].join(', ')}`,
        ' goal conditions:',
        ...problem.goals.map(goal => `  -> ${describeCondition(goal)}`),
        ` goal reward: ${problem.goalReward}`,
        ` ${problem.actions.length} actions:`,
        ...problem.actions.map(action => describeAction(action).replace(/^/gm, '  ')),
    ];
    return lines.join('\n');
}
