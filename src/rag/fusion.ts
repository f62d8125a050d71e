/**
 * Relative score fusion
 *
 * Each result list is min-max normalised to [0, 1], then blended:
 *   fused = alpha * vector + (1 - alpha) * lexical
 * A document missing from one list contributes 0 for that side.
 */

export interface RankedItem<T> {
	id: string;
	score: number;
	item: T;
}

function normalize<T>(items: RankedItem<T>[]): Map<string, number> {
	const result = new Map<string, number>();
	if (items.length === 0) return result;

	let min = Infinity;
	let max = -Infinity;
	for (const { score } of items) {
		if (score < min) min = score;
		if (score > max) max = score;
	}

	const range = max - min;
	for (const { id, score } of items) {
		// 单一分值时全部视为最相关
		result.set(id, range === 0 ? 1 : (score - min) / range);
	}
	return result;
}

/**
 * Fuse vector and lexical result lists; ties keep first-seen order (vector list first)
 */
export function relativeScoreFusion<T>(
	vector: RankedItem<T>[],
	lexical: RankedItem<T>[],
	alpha: number,
): RankedItem<T>[] {
	const vectorScores = normalize(vector);
	const lexicalScores = normalize(lexical);

	const items = new Map<string, T>();
	for (const entry of [...vector, ...lexical]) {
		if (!items.has(entry.id)) items.set(entry.id, entry.item);
	}

	const fused: RankedItem<T>[] = [];
	for (const [id, item] of items) {
		const score = alpha * (vectorScores.get(id) ?? 0) + (1 - alpha) * (lexicalScores.get(id) ?? 0);
		fused.push({ id, score, item });
	}

	return fused.sort((a, b) => b.score - a.score);
}
