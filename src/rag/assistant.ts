/**
 * Answer orchestrator
 *
 * RETRIEVE → RERANK → PROMPT_BUILD → GENERATE → DONE (CANCELLED only from GENERATE)
 * Over-fetches a wide candidate pool, re-ranks it down to k, then streams a grounded answer.
 * Errors are returned as text, never thrown.
 */

import { randomUUID } from 'node:crypto';
import type { GenerationConfig, RetrievalConfig } from '../config/types.js';
import type { TextGenerator } from '../llm/ollama-client.js';
import { resolveSink, type AnswerSink } from '../llm/sink.js';
import { SearchError, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import { buildPrompt } from './prompt.js';
import type { Reranker, ScoredChunk } from './reranker.js';
import type { Retriever } from './retriever.js';
import type { MetadataFilter } from './store.js';

export type AnswerStage = 'RETRIEVE' | 'RERANK' | 'PROMPT_BUILD' | 'GENERATE' | 'DONE' | 'CANCELLED';

const PREVIEW_LENGTH = 120;

/**
 * Conversation state carried between turns (opaque backend context)
 */
export class ConversationSession {
	private state: number[] | undefined;

	constructor(readonly id: string = randomUUID()) {}

	get context(): number[] | undefined {
		return this.state;
	}

	update(context: number[] | undefined): void {
		this.state = context;
	}
}

export interface AnswerOptions {
	/** Chunks kept after re-ranking */
	k?: number;
	filter?: MetadataFilter;
	alpha?: number;
	sink?: Partial<AnswerSink>;
	signal?: AbortSignal;
	contextWindowTokens?: number;
	session?: ConversationSession;
	/** Emit the re-ranked chunk list to the debug sink */
	debug?: boolean;
	onStage?: (stage: AnswerStage) => void;
}

export interface RagAssistantConfig {
	retriever: Retriever;
	reranker: Reranker;
	generator: TextGenerator;
	retrieval: RetrievalConfig;
	generation: GenerationConfig;
	logger?: Logger;
}

/** Candidate pool size for k kept chunks */
export function overfetchSize(k: number, factor: number, minimum: number): number {
	return Math.max(k * factor, minimum);
}

/** ` 01. score=0.9312 | first 120 chars…` */
export function formatChunkLine(rank: number, chunk: ScoredChunk): string {
	const preview = chunk.text.replace(/\n/g, ' ').slice(0, PREVIEW_LENGTH);
	return ` ${String(rank).padStart(2, '0')}. score=${chunk.score.toFixed(4)} | ${preview}…`;
}

export class RagAssistant {
	private readonly retriever: Retriever;
	private readonly reranker: Reranker;
	private readonly generator: TextGenerator;
	private readonly retrieval: RetrievalConfig;
	private readonly generation: GenerationConfig;
	private readonly logger: Logger;
	readonly defaultSession = new ConversationSession('default');

	constructor(config: RagAssistantConfig) {
		this.retriever = config.retriever;
		this.reranker = config.reranker;
		this.generator = config.generator;
		this.retrieval = config.retrieval;
		this.generation = config.generation;
		this.logger = config.logger ?? new Logger();
	}

	async answer(question: string, options: AnswerOptions = {}): Promise<string> {
		const k = options.k ?? this.retrieval.top_k;
		const alpha = options.alpha ?? this.retrieval.alpha;
		const session = options.session ?? this.defaultSession;
		const sink = resolveSink(options.sink);
		const enter = (stage: AnswerStage): void => {
			this.logger.debug(`Stage ${stage}`, { session: session.id });
			options.onStage?.(stage);
		};

		// 1) Retrieve
		enter('RETRIEVE');
		let candidates: string[];
		try {
			if (!Number.isInteger(k) || k < 1) {
				throw new SearchError(`k must be a positive integer, got ${k}`);
			}
			const limit = overfetchSize(k, this.retrieval.overfetch_factor, this.retrieval.min_candidates);
			candidates = await this.retriever.retrieve(question, { k: limit, alpha, filter: options.filter });
		} catch (err) {
			this.logger.error('Retrieval failed', { error: errorMessage(err) });
			enter('DONE');
			return `[Error retrieving context: ${errorMessage(err)}]`;
		}

		if (candidates.length === 0) {
			enter('DONE');
			return this.generation.no_context_answer;
		}

		// 2) Re-rank
		enter('RERANK');
		const debugLine = options.debug ? (line: string) => sink.debug(line) : undefined;
		const ranked = await this.reranker.rerank(question, candidates, k, debugLine);

		if (options.debug) {
			sink.debug('[Debug] Reranked context chunks:');
			ranked.forEach((chunk, i) => sink.debug(formatChunkLine(i + 1, chunk)));
		}

		// 3) Prompt
		enter('PROMPT_BUILD');
		const prompt = buildPrompt(this.generation.prompt_template, ranked.map(c => c.text), question);

		// 4) Generate
		enter('GENERATE');
		const result = await this.generator.generate(prompt, {
			context: session.context,
			contextWindowTokens: options.contextWindowTokens ?? this.generation.context_window_tokens,
			signal: options.signal,
			sink,
		});

		if (result.outcome === 'completed') {
			session.update(result.context);
		}
		enter(result.outcome === 'cancelled' ? 'CANCELLED' : 'DONE');
		return result.text;
	}
}

/** 工厂函数 */
export function createAssistant(config: RagAssistantConfig): RagAssistant {
	return new RagAssistant(config);
}
