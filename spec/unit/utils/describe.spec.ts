import { expect } from 'chai';
import { describeAction, describeCondition, describeEffect, describeProblem } from '../../../src/utils/describe.js';
import { Effect } from '../../../src/model/effect.js';
import { createCondition } from '../../../src/model/state.js';
import { actionNamed, createSmugglerProblem, createTrafficProblem } from '../../helpers/problem-factory.js';

describe('describe', () => {
    it('should list positive then negated atoms of a condition', () => {
        expect(describeCondition(createCondition([ 'house', 'yacht' ], [ 'guns' ]))).to.equal('house, yacht, -guns');
        expect(describeCondition(createCondition())).to.equal('');
    });

    it('should describe an effect on one line', () => {
        expect(describeEffect(new Effect([ 'riches' ], [ 'house' ], 0.9))).to.equal('0.90  house, -riches  (+0.00)');
        expect(describeEffect(new Effect([], [], 0.2, -0.6))).to.equal('0.20  (-0.60)');
    });

    it('should describe an action with its completed effects', () => {
        const problem = createSmugglerProblem();

        expect(describeAction(actionNamed(problem, 'plead'))).to.equal([
            'name: plead',
            '  preconditions:',
            '    -> -riches',
            '  effects:',
            '    0.80  yacht  (+0.00)',
            '    0.20  (-0.60)',
        ].join('\n'));
    });

    it('should mark an unconditional action', () => {
        const problem = createSmugglerProblem();

        expect(describeAction(actionNamed(problem, 'beg')).split('\n').slice(0, 4)).to.deep.equal([
            'name: beg',
            '  preconditions:',
            '    -> (none)',
            '  effects:',
        ]);
    });

    it('should describe a whole problem', () => {
        expect(describeProblem(createTrafficProblem())).to.equal([
            'Problem description of traffic:',
            ' init conditions:',
            '  riches',
            ' goal conditions:',
            '  -> house',
            ' goal reward: 1',
            ' 1 actions:',
            '  name: traffic',
            '    preconditions:',
            '      -> riches',
            '    effects:',
            '      0.90  house, -riches  (+0.00)',
            '      0.10  -riches  (+0.00)',
        ].join('\n'));
    });
});
