/**
 * Qdrant document store
 *
 * 基于 @qdrant/js-client-rest 官方 SDK
 * Named dense vector + native BM25 (server-side text inference), hybrid queries fused
 * client-side with relative score fusion so that alpha can weight both sides.
 */

import { QdrantClient as QdrantSdk, type Schemas } from '@qdrant/js-client-rest';
import { chunkPropertiesSchema, type ChunkProperties } from '../document/types.js';
import { ObjectExistsError, StoreError, errorMessage, toError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { relativeScoreFusion, type RankedItem } from './fusion.js';
import {
	filterClauses,
	type DocumentStore,
	type HybridQuery,
	type HybridSupport,
	type MetadataFilter,
	type StoreHit,
	type StoreRecord,
	type VectorQuery,
} from './store.js';

/** Qdrant 内置 BM25 推理模型 */
export const BM25_MODEL = 'Qdrant/bm25';
export const DENSE_VECTOR = 'dense';
export const SPARSE_VECTOR = 'bm25';

/** Payload fields with a keyword index (filterable) */
const INDEXED_FIELDS = ['source', 'language', 'source_file'];

type QdrantFilter = Schemas['Filter'];
type QueryRequest = Schemas['QueryRequest'];

interface ScoredPointLike {
	id: string | number;
	score: number;
	payload?: Record<string, unknown> | null;
}

/**
 * MetadataFilter → Qdrant filter (nested ANDs flattened into `must`)
 */
export function toQdrantFilter(filter: MetadataFilter): QdrantFilter {
	return {
		must: filterClauses(filter).map(clause => ({
			key: clause.field,
			match: { value: clause.value },
		})),
	};
}

export interface QdrantStoreConfig {
	url: string;
	apiKey?: string;
	collection: string;
	/** Request timeout (ms) */
	timeoutMs?: number;
	logger?: Logger;
}

export class QdrantStore implements DocumentStore {
	private readonly sdk: QdrantSdk;
	private readonly collection: string;
	private readonly logger: Logger;

	constructor(config: QdrantStoreConfig) {
		this.sdk = new QdrantSdk({
			url: config.url,
			apiKey: config.apiKey,
			timeout: config.timeoutMs ?? 10_000,
		});
		this.collection = config.collection;
		this.logger = config.logger ?? new Logger();
	}

	// ── Collection 管理 ────────────────────────────────────

	/**
	 * 确保 collection 存在 (named dense + BM25 sparse with IDF)
	 * @returns true 如果新建了 collection
	 */
	async ensureCollection(denseVectorSize: number, forceRecreate = false): Promise<boolean> {
		const { exists } = await this.sdk.collectionExists(this.collection);

		if (exists && forceRecreate) {
			this.logger.warn(`Recreating collection: ${this.collection}`);
			await this.sdk.deleteCollection(this.collection);
		} else if (exists) {
			return false;
		}

		await this.sdk.createCollection(this.collection, {
			vectors: {
				[DENSE_VECTOR]: {
					size: denseVectorSize,
					distance: 'Cosine',
					hnsw_config: { m: 16, ef_construct: 100 },
				},
			},
			sparse_vectors: {
				[SPARSE_VECTOR]: { modifier: 'idf' },
			},
		});

		for (const field of INDEXED_FIELDS) {
			await this.sdk.createPayloadIndex(this.collection, {
				field_name: field,
				field_schema: 'keyword',
				wait: true,
			});
		}

		this.logger.info(`Created collection: ${this.collection}`, { dim: denseVectorSize });
		return true;
	}

	async countPoints(): Promise<number> {
		const { count } = await this.sdk.count(this.collection, { exact: true });
		return count;
	}

	// ── 数据操作 ────────────────────────────────────────────

	async insert(id: string, properties: ChunkProperties, vector: number[]): Promise<void> {
		const existing = await this.call('retrieve', () =>
			this.sdk.retrieve(this.collection, { ids: [id], with_payload: false, with_vector: false }),
		);
		if (existing.length > 0) {
			throw new ObjectExistsError(id);
		}
		await this.upsert(id, properties, vector);
	}

	async get(id: string): Promise<StoreRecord | null> {
		const points = await this.call('retrieve', () =>
			this.sdk.retrieve(this.collection, { ids: [id], with_payload: true, with_vector: false }),
		);
		const point = points[0];
		if (!point) return null;

		const parsed = chunkPropertiesSchema.safeParse(point.payload);
		if (!parsed.success) {
			throw new StoreError(`Invalid payload for ${id}: ${parsed.error.message}`);
		}
		return { id, properties: parsed.data };
	}

	async replace(id: string, properties: ChunkProperties, vector: number[]): Promise<void> {
		await this.upsert(id, properties, vector);
	}

	// ── 搜索 ────────────────────────────────────────────────

	async hybridSupport(): Promise<HybridSupport> {
		const info = await this.call('getCollection', () => this.sdk.getCollection(this.collection));
		const sparse = info.config.params.sparse_vectors ?? {};
		if (SPARSE_VECTOR in sparse) {
			return { kind: 'supported' };
		}
		return { kind: 'unsupported', reason: `collection ${this.collection} has no ${SPARSE_VECTOR} sparse vector` };
	}

	/**
	 * 混合搜索: dense + BM25 in one batch → relative score fusion (alpha-weighted)
	 */
	async hybrid(query: HybridQuery): Promise<StoreHit[]> {
		const filter = query.filter ? toQdrantFilter(query.filter) : undefined;
		const searches: QueryRequest[] = [];
		const withDense = query.alpha > 0;
		const withLexical = query.alpha < 1;

		if (withDense) {
			searches.push({ query: query.vector, using: DENSE_VECTOR, limit: query.limit, filter, with_payload: true });
		}
		if (withLexical) {
			searches.push({
				query: { text: query.text, model: BM25_MODEL } as unknown as number[],
				using: SPARSE_VECTOR,
				limit: query.limit,
				filter,
				with_payload: true,
			});
		}

		const responses = await this.call('queryBatch', () => this.sdk.queryBatch(this.collection, { searches }));
		const denseRanked = withDense ? this.toRanked(responses[0]?.points ?? []) : [];
		const lexicalRanked = withLexical ? this.toRanked(responses[withDense ? 1 : 0]?.points ?? []) : [];

		return relativeScoreFusion(denseRanked, lexicalRanked, query.alpha)
			.slice(0, query.limit)
			.map(({ id, score, item }) => ({ id, score, properties: item }));
	}

	/**
	 * Dense-only 搜索，distance = 1 - cosine similarity
	 */
	async nearest(query: VectorQuery): Promise<StoreHit[]> {
		const resp = await this.call('query', () =>
			this.sdk.query(this.collection, {
				query: query.vector,
				using: DENSE_VECTOR,
				limit: query.limit,
				filter: query.filter ? toQdrantFilter(query.filter) : undefined,
				with_payload: true,
			}),
		);
		return this.toRanked(resp.points).map(({ id, score, item }) => ({
			id,
			score,
			distance: 1 - score,
			properties: item,
		}));
	}

	// ── 内部 ────────────────────────────────────────────────

	private async upsert(id: string, properties: ChunkProperties, vector: number[]): Promise<void> {
		await this.call('upsert', () =>
			this.sdk.upsert(this.collection, {
				wait: true,
				points: [{
					id,
					vector: {
						[DENSE_VECTOR]: vector,
						[SPARSE_VECTOR]: { text: properties.content, model: BM25_MODEL },
					} as unknown as Record<string, number[]>,
					payload: properties,
				}],
			}),
		);
	}

	private toRanked(points: ScoredPointLike[]): RankedItem<ChunkProperties>[] {
		const ranked: RankedItem<ChunkProperties>[] = [];
		for (const point of points) {
			const parsed = chunkPropertiesSchema.safeParse(point.payload);
			if (!parsed.success) {
				this.logger.warn('Skipping point with invalid payload', { id: String(point.id) });
				continue;
			}
			ranked.push({ id: String(point.id), score: point.score, item: parsed.data });
		}
		return ranked;
	}

	private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (err) {
			throw new StoreError(`Qdrant ${operation} failed: ${errorMessage(err)}`, toError(err));
		}
	}
}

/** 工厂函数 */
export function createQdrantStore(config: QdrantStoreConfig): QdrantStore {
	return new QdrantStore(config);
}
