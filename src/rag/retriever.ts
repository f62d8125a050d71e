/**
 * Hybrid retriever
 *
 * Hybrid (BM25 + dense, alpha-weighted) when the store supports it, nearest-vector
 * otherwise. Returns chunk contents only.
 */

import type { Embedder } from './embedder.js';
import type { DocumentStore, MetadataFilter, StoreHit } from './store.js';
import { SearchError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

export interface RetrieveOptions {
	/** 返回数量上限 */
	k: number;
	/** 0 = pure BM25, 1 = pure vector */
	alpha?: number;
	filter?: MetadataFilter;
}

export interface Retriever {
	retrieve(question: string, options: RetrieveOptions): Promise<string[]>;
}

export interface HybridRetrieverConfig {
	store: DocumentStore;
	embedder: Embedder;
	logger?: Logger;
}

export const DEFAULT_ALPHA = 0.5;

/** Stable ascending sort by distance, only when every hit carries one */
export function sortByDistance(hits: StoreHit[]): StoreHit[] {
	const distances: number[] = [];
	for (const hit of hits) {
		if (hit.distance === undefined) return hits;
		distances.push(hit.distance);
	}
	return hits
		.map((hit, index) => ({ hit, distance: distances[index] ?? 0 }))
		.sort((a, b) => a.distance - b.distance)
		.map(entry => entry.hit);
}

export class HybridRetriever implements Retriever {
	private readonly store: DocumentStore;
	private readonly embedder: Embedder;
	private readonly logger: Logger;

	constructor(config: HybridRetrieverConfig) {
		this.store = config.store;
		this.embedder = config.embedder;
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * @throws SearchError k 或 alpha 非法
	 */
	async retrieve(question: string, options: RetrieveOptions): Promise<string[]> {
		const { k, filter } = options;
		const alpha = options.alpha ?? DEFAULT_ALPHA;

		if (!Number.isInteger(k) || k < 1) {
			throw new SearchError(`k must be a positive integer, got ${k}`);
		}
		if (!Number.isFinite(alpha) || alpha < 0 || alpha > 1) {
			throw new SearchError(`alpha must be within [0, 1], got ${alpha}`);
		}

		const vector = await this.embedder.embed(question, 'query');
		const support = await this.store.hybridSupport();

		let hits: StoreHit[];
		if (support.kind === 'supported') {
			hits = await this.store.hybrid({ text: question, vector, alpha, limit: k, filter });
		} else {
			this.logger.debug(`Hybrid query unavailable (${support.reason}), using nearest-vector search`);
			hits = await this.store.nearest({ vector, limit: k, filter });
		}

		this.logger.debug(`Retrieved ${hits.length} chunks`, { k, alpha, mode: support.kind });

		return sortByDistance(hits)
			.slice(0, k)
			.map(hit => hit.properties.content);
	}
}

/** 工厂函数 */
export function createRetriever(config: HybridRetrieverConfig): HybridRetriever {
	return new HybridRetriever(config);
}
