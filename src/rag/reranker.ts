/**
 * Relevance re-ranker
 *
 * 交叉编码器首次使用时加载（每个实例一次，失败也缓存）。
 * 模型不可用或推理失败时所有 chunk 得分 0.0，保持原顺序。
 */

import type { CrossEncoder, CrossEncoderLoader } from './cross-encoder.js';
import { errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

export interface ScoredChunk {
	text: string;
	score: number;
}

export type DebugCallback = (line: string) => void;

export interface RerankerConfig {
	loader: CrossEncoderLoader;
	logger?: Logger;
}

type LoadState =
	| { kind: 'ready'; model: CrossEncoder }
	| { kind: 'unavailable'; reason: string };

export class Reranker {
	private readonly loader: CrossEncoderLoader;
	private readonly logger: Logger;
	private loading: Promise<LoadState> | null = null;

	constructor(config: RerankerConfig) {
		this.loader = config.loader;
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * Score every chunk against the question and keep the best kKeep
	 */
	async rerank(question: string, chunks: readonly string[], kKeep: number, debug?: DebugCallback): Promise<ScoredChunk[]> {
		if (chunks.length === 0 || kKeep <= 0) return [];

		const scores = await this.scoreAll(question, chunks, debug);

		return chunks
			.map((text, index) => ({ text, index, score: scores[index] ?? 0 }))
			.sort((a, b) => b.score - a.score || a.index - b.index)
			.slice(0, kKeep)
			.map(({ text, score }) => ({ text, score }));
	}

	private async scoreAll(question: string, chunks: readonly string[], debug?: DebugCallback): Promise<number[]> {
		const neutral = (notice: string): number[] => {
			this.logger.warn(notice);
			debug?.(notice);
			return chunks.map(() => 0);
		};

		const state = await this.load();
		if (state.kind === 'unavailable') {
			return neutral(`Cross-encoder unavailable (${state.reason}); all scores set to 0.0`);
		}

		try {
			const scores = await state.model.score(question, [...chunks]);
			if (scores.length !== chunks.length) {
				return neutral(`Cross-encoder returned ${scores.length} scores for ${chunks.length} chunks; all scores set to 0.0`);
			}
			return scores;
		} catch (err) {
			return neutral(`Cross-encoder inference failed (${errorMessage(err)}); all scores set to 0.0`);
		}
	}

	private load(): Promise<LoadState> {
		if (!this.loading) {
			this.loading = this.loader().then(
				(model): LoadState => {
					this.logger.debug('Cross-encoder loaded');
					return { kind: 'ready', model };
				},
				(err: unknown): LoadState => ({ kind: 'unavailable', reason: errorMessage(err) }),
			);
		}
		return this.loading;
	}
}

/** 工厂函数 */
export function createReranker(config: RerankerConfig): Reranker {
	return new Reranker(config);
}
