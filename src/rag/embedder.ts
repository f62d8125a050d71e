/**
 * Voyage AI Embedding Wrapper
 *
 * 封装 voyageai SDK，支持：
 * - 按 token 数动态分批
 * - 速率限制
 * 失败直接抛出，不重试
 */

import { VoyageAIClient } from 'voyageai';
import { RateLimiter } from '../shared/rate-limiter.js';
import { ApiError, errorMessage, toError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

export type EmbedInputType = 'query' | 'document';

export interface EmbedResult {
	/** 文本内容 */
	text: string;
	/** Embedding 向量 */
	embedding: number[];
	/** 使用的 token 数（估算） */
	tokens: number;
}

/**
 * Dense embedding backend
 */
export interface Embedder {
	embed(text: string, inputType?: EmbedInputType): Promise<number[]>;
	embedBatch(texts: string[], inputType?: EmbedInputType): Promise<EmbedResult[]>;
	getEmbeddingDim(): number;
}

export interface EmbedderConfig {
	apiKey: string;
	model: string;
	/** Embedding 向量维度 */
	embeddingDim: number;
	/** 批量大小 */
	batchSize: number;
	/** 单次请求超时（秒） */
	timeoutSeconds?: number;
	/** 速率限制器 */
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

/** Voyage API 单次 batch 的 token 上限（实际限制 120k，留 50% 余量应对估算偏差） */
const MAX_BATCH_TOKENS = 60_000;

/**
 * 估算文本 token 数
 * 保守估算：英文 2.5 字符/token，中文 1.5 字符/token
 */
export function estimateTokens(text: string): number {
	const chineseChars = (text.match(/[\u4e00-\u9fa5]/g) ?? []).length;
	const otherChars = text.length - chineseChars;
	return Math.ceil(chineseChars / 1.5 + otherChars / 2.5);
}

/**
 * Voyage Embedder
 */
export class VoyageEmbedder implements Embedder {
	private readonly client: VoyageAIClient;
	private readonly model: string;
	private readonly embeddingDim: number;
	private readonly batchSize: number;
	private readonly timeoutSeconds: number;
	private readonly rateLimiter: RateLimiter | undefined;
	private readonly logger: Logger;

	constructor(config: EmbedderConfig) {
		this.client = new VoyageAIClient({ apiKey: config.apiKey });
		this.model = config.model;
		this.embeddingDim = config.embeddingDim;
		this.batchSize = config.batchSize;
		this.timeoutSeconds = config.timeoutSeconds ?? 30;
		this.rateLimiter = config.rateLimiter;
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * 嵌入单段文本（默认作为查询）
	 */
	async embed(text: string, inputType: EmbedInputType = 'query'): Promise<number[]> {
		const [result] = await this.embedBatch([text], inputType);
		if (!result) {
			throw new ApiError('Voyage returned no embedding');
		}
		return result.embedding;
	}

	/**
	 * 批量嵌入（按 token 数动态分批，避免超出 Voyage API 的 batch token 限制）
	 */
	async embedBatch(texts: string[], inputType: EmbedInputType = 'document'): Promise<EmbedResult[]> {
		if (texts.length === 0) {
			return [];
		}

		const allResults: EmbedResult[] = [];

		let batch: string[] = [];
		let batchTokens = 0;

		for (const text of texts) {
			const tokens = estimateTokens(text);

			if (batch.length > 0 && (batchTokens + tokens > MAX_BATCH_TOKENS || batch.length >= this.batchSize)) {
				allResults.push(...await this.requestBatch(batch, inputType));
				batch = [];
				batchTokens = 0;
			}

			batch.push(text);
			batchTokens += tokens;
		}

		if (batch.length > 0) {
			allResults.push(...await this.requestBatch(batch, inputType));
		}

		return allResults;
	}

	private async requestBatch(texts: string[], inputType: EmbedInputType): Promise<EmbedResult[]> {
		const totalTokens = texts.reduce((sum, text) => sum + estimateTokens(text), 0);

		// 超限直接抛出 RateLimitError
		this.rateLimiter?.checkAndRecord(totalTokens);

		this.logger.debug(`Embedding ${texts.length} texts, ~${totalTokens} tokens`);

		let embeddings: Array<{ embedding?: number[] }>;
		try {
			const response = await this.client.embed(
				{ input: texts, model: this.model, inputType },
				{ timeoutInSeconds: this.timeoutSeconds, maxRetries: 0 },
			);
			embeddings = response.data ?? [];
		} catch (error) {
			throw new ApiError(`Failed to embed texts: ${errorMessage(error)}`, undefined, toError(error));
		}

		const results: EmbedResult[] = texts.map((text, idx) => ({
			text,
			embedding: embeddings[idx]?.embedding ?? [],
			tokens: estimateTokens(text),
		}));

		// 验证向量维度
		for (const result of results) {
			if (result.embedding.length !== this.embeddingDim) {
				throw new ApiError(
					`Embedding dimension mismatch: expected ${this.embeddingDim}, got ${result.embedding.length}`,
				);
			}
		}

		return results;
	}

	/**
	 * 获取嵌入维度
	 */
	getEmbeddingDim(): number {
		return this.embeddingDim;
	}
}

/** Voyage 模型 → 向量维度 */
const MODEL_DIMENSIONS: Record<string, number> = {
	'voyage-3': 1024,
	'voyage-3-lite': 512,
	'voyage-3.5': 1024,
	'voyage-3.5-lite': 1024,
	'voyage-multilingual-2': 1024,
	'voyage-large-2': 1536,
	'voyage-2': 1024,
};

export interface CreateVoyageEmbedderOptions {
	apiKey?: string;
	model?: string;
	embeddingDim?: number;
	batchSize?: number;
	rateLimiter?: RateLimiter;
	logger?: Logger;
}

/** 工厂函数 */
export function createVoyageEmbedder(options: CreateVoyageEmbedderOptions = {}): VoyageEmbedder {
	const apiKey = options.apiKey;
	if (!apiKey) {
		throw new ApiError('VOYAGE_API_KEY is required');
	}

	const model = options.model ?? 'voyage-3-lite';
	const dim = options.embeddingDim ?? MODEL_DIMENSIONS[model];
	if (dim === undefined) {
		throw new ApiError(`Unknown Voyage model: ${model}`);
	}

	return new VoyageEmbedder({
		apiKey,
		model,
		embeddingDim: dim,
		batchSize: options.batchSize ?? 128,
		rateLimiter: options.rateLimiter,
		logger: options.logger,
	});
}
