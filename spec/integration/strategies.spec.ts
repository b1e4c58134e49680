import { expect } from 'chai';
import { MCTSDecisionStrategy } from '../../src/strategies/mcts-decision-strategy.js';
import { RandomDecisionStrategy } from '../../src/strategies/random-decision-strategy.js';
import { iterationBudget } from '../../src/modular/budget.js';
import { createState } from '../../src/model/state.js';
import { createSeededRng } from '../../src/random.js';
import { createChainProblem, createSmugglerProblem } from '../helpers/problem-factory.js';
import { sequenceRandom } from '../helpers/test-utils.js';

describe('decision strategies', () => {
    describe('MCTSDecisionStrategy', () => {
        it('should follow the chain to the goal', () => {
            const problem = createChainProblem();
            const strategy = new MCTSDecisionStrategy(problem, {
                budget: iterationBudget(20),
                horizon: 5,
                discounting: 0.9,
                random: createSeededRng(1),
            });

            expect(strategy.getAction(createState([ 'a' ]))?.name).to.equal('step1');
            expect(strategy.getAction(createState([ 'b' ]))?.name).to.equal('step2');
        });

        it('should fall back to a random applicable action when the search tried nothing', () => {
            const problem = createChainProblem();
            const strategy = new MCTSDecisionStrategy(problem, {
                budget: iterationBudget(0),
                horizon: 5,
                discounting: 0.9,
            });

            expect(strategy.getAction(createState([ 'b' ]))?.name).to.equal('step2');
        });

        it('should return null when nothing is applicable', () => {
            const problem = createChainProblem();
            const strategy = new MCTSDecisionStrategy(problem, {
                budget: iterationBudget(5),
                horizon: 5,
                discounting: 0.9,
            });

            expect(strategy.getAction(createState([ 'nothing' ]))).to.be.null;
        });
    });

    describe('RandomDecisionStrategy', () => {
        it('should pick among the applicable actions', () => {
            const problem = createSmugglerProblem();
            const strategy = new RandomDecisionStrategy(problem, sequenceRandom([ 0, 0.5, 0.9 ]));

            expect([ 1, 2, 3 ].map(() => strategy.getAction(problem.init)?.name)).to.deep.equal([ 'traffic', 'raid', 'beg' ]);
        });

        it('should return null when nothing is applicable', () => {
            const strategy = new RandomDecisionStrategy(createChainProblem());

            expect(strategy.getAction(createState())).to.be.null;
        });
    });
});
