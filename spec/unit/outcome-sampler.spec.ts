import { expect } from 'chai';
import { OutcomeSampler } from '../../src/outcome-sampler.js';
import { InvalidDistributionError } from '../../src/errors.js';
import { createSeededRng } from '../../src/random.js';
import { sequenceRandom } from '../helpers/test-utils.js';

describe('OutcomeSampler', () => {
    describe('construction', () => {
        it('should reject an empty list', () => {
            expect(() => new OutcomeSampler([])).to.throw(InvalidDistributionError);
        });

        it('should reject a negative weight', () => {
            expect(() => new OutcomeSampler([[ 0.5, 'a' ], [ -0.1, 'b' ]])).to.throw(InvalidDistributionError);
        });

        it('should reject weights summing to zero', () => {
            expect(() => new OutcomeSampler([[ 0, 'a' ], [ 0, 'b' ]])).to.throw(InvalidDistributionError);
        });

        it('should reject a weight that is not a number', () => {
            expect(() => new OutcomeSampler([[ Number.NaN, 'a' ]])).to.throw(InvalidDistributionError);
        });

        it('should build one slot per outcome for [0.5, 0.3, 0.2]', () => {
            const sampler = new OutcomeSampler([[ 0.5, 'A' ], [ 0.3, 'B' ], [ 0.2, 'C' ]]);

            expect(sampler.size).to.equal(3);
            const [ first, second, third ] = sampler.slots;
            expect(first.primary).to.equal('C');
            expect(first.alias).to.equal('A');
            expect(first.probability).to.be.closeTo(0.6, 1e-9);
            expect(second.primary).to.equal('B');
            expect(second.alias).to.equal('A');
            expect(second.probability).to.be.closeTo(0.9, 1e-9);
            expect(third).to.deep.equal({ probability: 1, primary: 'A', alias: 'A' });
        });

        it('should accept unnormalised weights', () => {
            const sampler = new OutcomeSampler([[ 5, 'A' ], [ 3, 'B' ], [ 2, 'C' ]]);

            expect(sampler.slots[0].probability).to.be.closeTo(0.6, 1e-9);
            expect(sampler.slots[1].probability).to.be.closeTo(0.9, 1e-9);
        });
    });

    describe('random', () => {
        const sampler = new OutcomeSampler([[ 0.5, 'A' ], [ 0.3, 'B' ], [ 0.2, 'C' ]]);

        it('should return the primary outcome when the second draw is under the cutoff', () => {
            expect(sampler.random(sequenceRandom([ 0.1, 0.5 ]))).to.equal('C');
            expect(sampler.random(sequenceRandom([ 0.5, 0.2 ]))).to.equal('B');
        });

        it('should return the alias outcome when the second draw is over the cutoff', () => {
            expect(sampler.random(sequenceRandom([ 0.1, 0.7 ]))).to.equal('A');
            expect(sampler.random(sequenceRandom([ 0.5, 0.95 ]))).to.equal('A');
        });

        it('should always return the outcome of a full slot', () => {
            expect(sampler.random(sequenceRandom([ 0.99, 0.99 ]))).to.equal('A');
        });

        it('should use exactly two draws per sample', () => {
            let draws = 0;
            const counting = () => {
                draws++;
                return 0.42;
            };

            for (let i = 0; i < 10; i++) {
                sampler.random(counting);
            }

            expect(draws).to.equal(20);
        });

        it('should only ever return the given outcomes', () => {
            const random = createSeededRng(7);
            for (let i = 0; i < 1000; i++) {
                expect([ 'A', 'B', 'C' ]).to.include(sampler.random(random));
            }
        });

        it('should converge to frequencies proportional to the weights', () => {
            const weights: Array<[ number, string ]> = [[ 4, 'w' ], [ 3, 'x' ], [ 2, 'y' ], [ 1, 'z' ]];
            const weighted = new OutcomeSampler(weights);
            const random = createSeededRng(12345);
            const counts = new Map<string, number>();
            const draws = 100000;

            for (let i = 0; i < draws; i++) {
                const outcome = weighted.random(random);
                counts.set(outcome, (counts.get(outcome) ?? 0) + 1);
            }

            for (const [ weight, outcome ] of weights) {
                expect((counts.get(outcome) ?? 0) / draws).to.be.closeTo(weight / 10, 0.01);
            }
        });

        it('should never return an outcome of weight zero', () => {
            const weighted = new OutcomeSampler([[ 0, 'never' ], [ 1, 'always' ]]);
            const random = createSeededRng(3);

            for (let i = 0; i < 500; i++) {
                expect(weighted.random(random)).to.equal('always');
            }
        });

        it('should handle a single outcome', () => {
            const single = new OutcomeSampler([[ 0.3, 'only' ]]);

            expect(single.size).to.equal(1);
            expect(single.random(sequenceRandom([ 0.999, 0.999 ]))).to.equal('only');
        });
    });
});
