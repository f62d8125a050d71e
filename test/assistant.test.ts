import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_RAG_CONFIG } from '../src/config/loader.js';
import type { GenerationConfig } from '../src/config/types.js';
import type { GenerateOptions, GenerationResult, TextGenerator } from '../src/llm/ollama-client.js';
import { CollectingSink } from '../src/llm/sink.js';
import {
	ConversationSession,
	RagAssistant,
	formatChunkLine,
	overfetchSize,
	type AnswerStage,
} from '../src/rag/assistant.js';
import { buildPrompt } from '../src/rag/prompt.js';
import { Reranker } from '../src/rag/reranker.js';
import type { RetrieveOptions, Retriever } from '../src/rag/retriever.js';
import { buildMetadataFilter } from '../src/rag/store.js';
import { SearchError } from '../src/shared/errors.js';
import { createSilentLogger } from '../src/shared/logger.js';

const PASSAGES = [
	'Shipping takes five days.',
	'Refunds are issued within 30 days.',
	'Office hours are 9 to 5.',
];

const SCORES = new Map([
	['Shipping takes five days.', 0.2],
	['Refunds are issued within 30 days.', 0.9],
	['Office hours are 9 to 5.', 0.1],
]);

class StubRetriever implements Retriever {
	readonly calls: Array<{ question: string; options: RetrieveOptions }> = [];
	result: string[] | Error = PASSAGES;

	async retrieve(question: string, options: RetrieveOptions): Promise<string[]> {
		this.calls.push({ question, options });
		if (this.result instanceof Error) throw this.result;
		return this.result;
	}
}

class StubGenerator implements TextGenerator {
	readonly calls: Array<{ prompt: string; options: GenerateOptions }> = [];
	result: GenerationResult = { text: 'Within 30 days.', context: [1, 2, 3], outcome: 'completed' };

	async generate(prompt: string, options: GenerateOptions): Promise<GenerationResult> {
		this.calls.push({ prompt, options });
		options.sink?.token?.(this.result.text);
		return this.result;
	}
}

const generation: GenerationConfig = {
	...DEFAULT_RAG_CONFIG.generation,
	prompt_template: 'C:{context}|Q:{question}',
};

describe('overfetchSize', () => {
	it('never drops below the minimum pool', () => {
		expect(overfetchSize(3, 20, 100)).toBe(100);
		expect(overfetchSize(10, 20, 100)).toBe(200);
	});
});

describe('formatChunkLine', () => {
	it('pads the rank and flattens newlines in the preview', () => {
		expect(formatChunkLine(1, { text: 'line one\nline two', score: 0.5 })).toBe(' 01. score=0.5000 | line one line two…');
	});

	it('cuts the preview at 120 characters', () => {
		const line = formatChunkLine(12, { text: 'x'.repeat(200), score: 2 });
		expect(line).toBe(` 12. score=2.0000 | ${'x'.repeat(120)}…`);
	});
});

describe('buildPrompt', () => {
	it('joins chunks with a blank line', () => {
		expect(buildPrompt('{context}\n--\n{question}', ['a', 'b'], 'q?')).toBe('a\n\nb\n--\nq?');
	});

	it('does not substitute placeholders that appear in inserted text', () => {
		expect(buildPrompt('[{context}] {question}', ['literal {question}'], 'real')).toBe('[literal {question}] real');
	});
});

describe('RagAssistant', () => {
	let retriever: StubRetriever;
	let generator: StubGenerator;
	let assistant: RagAssistant;
	let sink: CollectingSink;
	let stages: AnswerStage[];

	beforeEach(() => {
		retriever = new StubRetriever();
		generator = new StubGenerator();
		sink = new CollectingSink();
		stages = [];
		assistant = new RagAssistant({
			retriever,
			reranker: new Reranker({
				loader: async () => ({
					score: async (_question: string, passages: string[]) => passages.map(p => SCORES.get(p) ?? 0),
				}),
				logger: createSilentLogger(),
			}),
			generator,
			retrieval: DEFAULT_RAG_CONFIG.retrieval,
			generation,
			logger: createSilentLogger(),
		});
	});

	it('over-fetches candidates and keeps the k best for the prompt', async () => {
		const filter = buildMetadataFilter({ source: 'pdf' });

		const text = await assistant.answer('How long do refunds take?', {
			k: 2,
			alpha: 0.25,
			filter,
			sink,
			onStage: s => stages.push(s),
		});

		expect(text).toBe('Within 30 days.');
		expect(sink.text).toBe('Within 30 days.');
		expect(retriever.calls).toEqual([
			{ question: 'How long do refunds take?', options: { k: 100, alpha: 0.25, filter } },
		]);
		expect(generator.calls[0]?.prompt).toBe(
			'C:Refunds are issued within 30 days.\n\nShipping takes five days.|Q:How long do refunds take?',
		);
		expect(generator.calls[0]?.options.contextWindowTokens).toBe(8192);
		expect(stages).toEqual(['RETRIEVE', 'RERANK', 'PROMPT_BUILD', 'GENERATE', 'DONE']);
	});

	it('uses the configured defaults for k and alpha', async () => {
		await assistant.answer('q', { sink });

		expect(retriever.calls[0]?.options).toEqual({ k: 100, alpha: 0.5, filter: undefined });
		expect(generator.calls[0]?.prompt).toBe(`C:${[PASSAGES[1], PASSAGES[0], PASSAGES[2]].join('\n\n')}|Q:q`);
	});

	it('writes the re-ranked chunks to the debug sink', async () => {
		await assistant.answer('q', { k: 2, sink, debug: true });

		expect(sink.debugLines).toEqual([
			'[Debug] Reranked context chunks:',
			' 01. score=0.9000 | Refunds are issued within 30 days.…',
			' 02. score=0.2000 | Shipping takes five days.…',
		]);
	});

	it('answers with the fallback text when nothing is retrieved', async () => {
		retriever.result = [];

		const text = await assistant.answer('q', { sink, onStage: s => stages.push(s) });

		expect(text).toBe(DEFAULT_RAG_CONFIG.generation.no_context_answer);
		expect(generator.calls).toHaveLength(0);
		expect(stages).toEqual(['RETRIEVE', 'DONE']);
	});

	it('returns retrieval errors as text', async () => {
		retriever.result = new SearchError('store offline');

		const text = await assistant.answer('q', { sink, onStage: s => stages.push(s) });

		expect(text).toBe('[Error retrieving context: store offline]');
		expect(stages).toEqual(['RETRIEVE', 'DONE']);
	});

	it('rejects a non-positive k before retrieving', async () => {
		const text = await assistant.answer('q', { k: 0, sink });

		expect(text).toBe('[Error retrieving context: k must be a positive integer, got 0]');
		expect(retriever.calls).toHaveLength(0);
	});

	it('carries conversation state between completed turns', async () => {
		const session = new ConversationSession('s1');

		await assistant.answer('first', { session, sink });
		expect(session.context).toEqual([1, 2, 3]);

		generator.result = { text: 'Second.', context: [4, 5], outcome: 'completed' };
		await assistant.answer('second', { session, sink });

		expect(generator.calls[0]?.options.context).toBeUndefined();
		expect(generator.calls[1]?.options.context).toEqual([1, 2, 3]);
		expect(session.context).toEqual([4, 5]);
	});

	it('keeps the previous state when generation is cancelled', async () => {
		const session = new ConversationSession('s1');
		session.update([7]);
		generator.result = { text: 'Partial', context: [7], outcome: 'cancelled' };
		const controller = new AbortController();

		await assistant.answer('q', { session, sink, signal: controller.signal, onStage: s => stages.push(s) });

		expect(generator.calls[0]?.options.signal).toBe(controller.signal);
		expect(session.context).toEqual([7]);
		expect(stages.at(-1)).toBe('CANCELLED');
	});

	it('keeps the previous state when generation fails', async () => {
		const session = new ConversationSession('s1');
		session.update([7]);
		generator.result = { text: '[Error generating response: HTTP 500: boom]', context: undefined, outcome: 'failed' };

		const text = await assistant.answer('q', { session, sink });

		expect(text).toBe('[Error generating response: HTTP 500: boom]');
		expect(session.context).toEqual([7]);
	});

	it('falls back to the default session', async () => {
		await assistant.answer('q', { sink });

		expect(assistant.defaultSession.id).toBe('default');
		expect(assistant.defaultSession.context).toEqual([1, 2, 3]);
	});
});
