/**
 * Cross-encoder relevance model (Voyage rerank)
 *
 * The loader validates credentials and model name, then probes the model once so that
 * an unusable model is detected before the first real question.
 */

import { VoyageAIClient } from 'voyageai';
import { estimateTokens } from './embedder.js';
import { ApiError, errorMessage, toError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { RateLimiter } from '../shared/rate-limiter.js';

/**
 * Scores (question, passage) pairs; result[i] belongs to passages[i], higher = more relevant
 */
export interface CrossEncoder {
	score(question: string, passages: string[]): Promise<number[]>;
}

export type CrossEncoderLoader = () => Promise<CrossEncoder>;

export const RERANK_MODELS: readonly string[] = [
	'rerank-2.5',
	'rerank-2.5-lite',
	'rerank-2',
	'rerank-2-lite',
	'rerank-1',
	'rerank-lite-1',
];

export interface VoyageCrossEncoderConfig {
	apiKey: string;
	model: string;
	/** 单次请求超时（秒） */
	timeoutSeconds?: number;
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

export class VoyageCrossEncoder implements CrossEncoder {
	private readonly client: VoyageAIClient;
	private readonly model: string;
	private readonly timeoutSeconds: number;
	private readonly rateLimiter: RateLimiter | undefined;
	private readonly logger: Logger;

	constructor(config: VoyageCrossEncoderConfig) {
		this.client = new VoyageAIClient({ apiKey: config.apiKey });
		this.model = config.model;
		this.timeoutSeconds = config.timeoutSeconds ?? 10;
		this.rateLimiter = config.rateLimiter;
		this.logger = config.logger ?? new Logger();
	}

	async score(question: string, passages: string[]): Promise<number[]> {
		if (passages.length === 0) return [];

		const queryTokens = estimateTokens(question);
		const tokens = passages.reduce((sum, p) => sum + queryTokens + estimateTokens(p), 0);
		this.rateLimiter?.checkAndRecord(tokens);

		this.logger.debug(`Reranking ${passages.length} passages, ~${tokens} tokens`);

		let data: Array<{ index?: number; relevanceScore?: number }>;
		try {
			const response = await this.client.rerank(
				{ query: question, documents: passages, model: this.model },
				{ timeoutInSeconds: this.timeoutSeconds, maxRetries: 0 },
			);
			data = response.data ?? [];
		} catch (error) {
			throw new ApiError(`Voyage rerank failed: ${errorMessage(error)}`, undefined, toError(error));
		}

		const scores = passages.map((): number | undefined => undefined);
		for (const item of data) {
			if (item.index !== undefined && item.relevanceScore !== undefined && item.index < passages.length) {
				scores[item.index] = item.relevanceScore;
			}
		}

		const result: number[] = [];
		for (const [index, score] of scores.entries()) {
			if (score === undefined) {
				throw new ApiError(`Invalid rerank response: missing score for passage ${index}`);
			}
			result.push(score);
		}
		return result;
	}
}

export interface VoyageCrossEncoderLoaderOptions {
	apiKey?: string;
	model: string;
	timeoutSeconds?: number;
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

/** 工厂函数 */
export function createVoyageCrossEncoderLoader(options: VoyageCrossEncoderLoaderOptions): CrossEncoderLoader {
	return async () => {
		const { apiKey, model } = options;
		if (!apiKey) {
			throw new ApiError('VOYAGE_API_KEY is required for re-ranking');
		}
		if (!RERANK_MODELS.includes(model)) {
			throw new ApiError(`Unknown Voyage rerank model: ${model}`);
		}

		const encoder = new VoyageCrossEncoder({ ...options, apiKey });
		await encoder.score('relevance probe', ['probe passage']);
		return encoder;
	};
}
