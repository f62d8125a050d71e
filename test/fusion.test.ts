import { describe, it, expect } from 'vitest';
import { relativeScoreFusion, type RankedItem } from '../src/rag/fusion.js';

function ranked(entries: Array<[string, number]>): RankedItem<string>[] {
	return entries.map(([id, score]) => ({ id, score, item: id.toUpperCase() }));
}

describe('relativeScoreFusion', () => {
	const vector = ranked([['a', 0.9], ['b', 0.5], ['c', 0.1]]);
	const lexical = ranked([['c', 10], ['d', 5]]);

	it('blends normalised scores with alpha', () => {
		const fused = relativeScoreFusion(vector, lexical, 0.5);
		expect(fused.map(f => f.id)).toEqual(['a', 'c', 'b', 'd']);
		expect(fused[0]?.score).toBeCloseTo(0.5);
		expect(fused[1]?.score).toBeCloseTo(0.5);
		expect(fused[2]?.score).toBeCloseTo(0.25);
		expect(fused[3]?.score).toBeCloseTo(0);
	});

	it('keeps the payload item', () => {
		const fused = relativeScoreFusion(vector, lexical, 0.5);
		expect(fused.map(f => f.item)).toEqual(['A', 'C', 'B', 'D']);
	});

	it('alpha 1 ranks by vector score only', () => {
		expect(relativeScoreFusion(vector, lexical, 1).map(f => f.id)).toEqual(['a', 'b', 'c', 'd']);
	});

	it('alpha 0 ranks by lexical score only', () => {
		expect(relativeScoreFusion(vector, lexical, 0).map(f => f.id)).toEqual(['c', 'a', 'b', 'd']);
	});

	it('scores a single-element list as 1', () => {
		const fused = relativeScoreFusion(ranked([['x', 0.3]]), [], 1);
		expect(fused).toEqual([{ id: 'x', score: 1, item: 'X' }]);
	});

	it('returns nothing for empty inputs', () => {
		expect(relativeScoreFusion([], [], 0.5)).toEqual([]);
	});
});
