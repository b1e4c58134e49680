import { expect } from 'chai';
import { MCTSBackpropagation } from '../../../src/modular/backpropagation.js';
import { createState } from '../../../src/model/state.js';
import { actionNamed, createChainProblem, createSmugglerProblem } from '../../helpers/problem-factory.js';
import { createRootNode } from '../../helpers/node-factory.js';
import { sequenceRandom } from '../../helpers/test-utils.js';

describe('MCTSBackpropagation', () => {
    let backpropagation: MCTSBackpropagation;

    beforeEach(() => {
        backpropagation = new MCTSBackpropagation();
    });

    it('should discount the goal reward once per level', () => {
        const problem = createChainProblem();
        const step1 = actionNamed(problem, 'step1');
        const step2 = actionNamed(problem, 'step2');
        const root = createRootNode(problem);
        const middle = root.performAction(step1);
        const goal = middle.performAction(step2);

        backpropagation.backpropagate(goal, 0.9);

        expect(middle.triedActions.get(step2)).to.deep.equal({ reward: 10, visits: 1 });
        expect(root.triedActions.get(step1)?.reward).to.be.closeTo(9.5, 1e-9);
        expect(root.utility).to.be.closeTo(8.55, 1e-9);
    });

    it('should not decay anything with a discounting of 1', () => {
        const problem = createChainProblem();
        const step1 = actionNamed(problem, 'step1');
        const root = createRootNode(problem);
        const goal = root.performAction(step1).performAction(actionNamed(problem, 'step2'));

        backpropagation.backpropagate(goal, 1);

        expect(root.triedActions.get(step1)).to.deep.equal({ reward: 10.5, visits: 1 });
        expect(root.utility).to.equal(10.5);
    });

    it('should carry negative effect rewards', () => {
        const problem = createSmugglerProblem();
        const plead = actionNamed(problem, 'plead');
        // the first slot of plead's table, below its cutoff: the penalised outcome
        const root = createRootNode(problem, createState([ 'guns' ]), sequenceRandom([ 0.1, 0.1 ]));
        const penalised = root.performAction(plead);

        backpropagation.backpropagate(penalised, 1);

        expect(penalised.effect).to.equal(plead.effects[1]);
        expect(root.triedActions.get(plead)).to.deep.equal({ reward: -0.6, visits: 1 });
        expect(root.utility).to.equal(-0.6);
    });

    it('should accumulate over repeated backpropagations', () => {
        const problem = createChainProblem();
        const step1 = actionNamed(problem, 'step1');
        const root = createRootNode(problem);
        const middle = root.performAction(step1);

        backpropagation.backpropagate(middle, 1);
        backpropagation.backpropagate(middle, 1);
        backpropagation.backpropagate(middle, 1);

        expect(root.triedActions.get(step1)).to.deep.equal({ reward: 1.5, visits: 3 });
        expect(middle.visits).to.equal(3);
        expect(root.visits).to.equal(3);
    });
});
