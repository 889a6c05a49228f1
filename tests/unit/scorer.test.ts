import { describe, expect, it } from 'vitest';
import { ProductScorer, formatPercent, toPercent } from '../../src/modules/scorer';
import { OracleError } from '../../src/utils/errors';
import { FakeOracle, SCORER_OPTIONS, product } from '../helpers';

describe('toPercent', () => {
    it('truncates instead of rounding', () => {
        expect(toPercent(0.87)).toBe(87);
        expect(toPercent(0.999)).toBe(99);
        expect(toPercent(0.915)).toBe(91);
    });

    it('clamps to 0..100', () => {
        expect(toPercent(1)).toBe(100);
        expect(toPercent(1.2)).toBe(100);
        expect(toPercent(-0.1)).toBe(0);
    });

    it('formats with a percent sign', () => {
        expect(formatPercent(87)).toBe('87%');
    });
});

describe('ProductScorer', () => {
    it('never sends strings shorter than two characters to the oracle', async () => {
        const oracle = new FakeOracle({ ab: [product(0.5)] });
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        const outcomes = await scorer.score(['a', ' b ', '', 'ab']);

        expect(oracle.calls).toEqual(['ab']);
        expect(outcomes.map(o => o.kind)).toEqual(['skipped', 'skipped', 'skipped', 'scored']);
    });

    it('calls the oracle once per candidate with the full text, in order', async () => {
        const oracle = new FakeOracle();
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        await scorer.score(['Oak Chair', 'Free delivery on all orders']);

        expect(oracle.calls).toEqual(['Oak Chair', 'Free delivery on all orders']);
    });

    it('takes the first qualifying finding even when a later one is stronger', async () => {
        const oracle = new FakeOracle({
            'Oak Chair': [
                { group_label: 'BRAND', confidence: 0.99 },
                product(0.42),
                product(0.95),
            ],
        });
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        const outcome = await scorer.scoreOne('Oak Chair');

        expect(outcome).toEqual({ kind: 'scored', result: { text: 'Oak Chair', confidence_percent: 42 } });
    });

    it('accepts the target label in either label field', async () => {
        const oracle = new FakeOracle({
            'Grouped Sofa': [{ group_label: 'PRODUCT', confidence: 0.7 }],
            'Tagged Sofa': [{ label: 'PRODUCT', confidence: 0.6 }],
            'Other Sofa': [{ label: 'B-PRODUCT', confidence: 0.9 }],
        });
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        const outcomes = await scorer.score(['Grouped Sofa', 'Tagged Sofa', 'Other Sofa']);

        expect(ProductScorer.results(outcomes)).toEqual([
            { text: 'Grouped Sofa', confidence_percent: 70 },
            { text: 'Tagged Sofa', confidence_percent: 60 },
        ]);
        expect(outcomes[2]).toEqual({ kind: 'skipped', text: 'Other Sofa', reason: 'not_target' });
    });

    it('skips a failing candidate and keeps going', async () => {
        const failure = new OracleError('model crashed');
        const oracle = new FakeOracle({
            'Broken Lamp': failure,
            'Floor Lamp': [product(0.8)],
        });
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        const outcomes = await scorer.score(['Broken Lamp', 'Floor Lamp']);

        expect(outcomes[0]).toEqual({ kind: 'skipped', text: 'Broken Lamp', reason: 'oracle_error', error: failure });
        expect(outcomes[1]).toEqual({ kind: 'scored', result: { text: 'Floor Lamp', confidence_percent: 80 } });
    });

    it('emits at most one result per candidate', async () => {
        const oracle = new FakeOracle({ 'Oak Chair': [product(0.5), product(0.6)] });
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        const results = ProductScorer.results(await scorer.score(['Oak Chair']));

        expect(results).toHaveLength(1);
    });

    it('does nothing when the oracle is not loaded', async () => {
        const oracle = new FakeOracle({ 'Oak Chair': [product(0.9)] }, false);
        const scorer = new ProductScorer(oracle, SCORER_OPTIONS);

        expect(await scorer.score(['Oak Chair'])).toEqual([]);
        expect(oracle.calls).toEqual([]);
    });

    it('caps the number of scored candidates', async () => {
        const oracle = new FakeOracle();
        const scorer = new ProductScorer(oracle, { ...SCORER_OPTIONS, max_candidates: 2 });

        await scorer.score(['one', 'two', 'three']);

        expect(oracle.calls).toEqual(['one', 'two']);
    });
});
