/**
 * 测试辅助：内存 store、假 embedder、流式 Response 构造
 */

import type { ChunkProperties } from '../src/document/types.js';
import type { EmbedInputType, EmbedResult, Embedder } from '../src/rag/embedder.js';
import {
	matchesFilter,
	type DocumentStore,
	type HybridQuery,
	type HybridSupport,
	type StoreHit,
	type StoreRecord,
	type VectorQuery,
} from '../src/rag/store.js';
import { ObjectExistsError } from '../src/shared/errors.js';
import { Logger, LogLevel, type LogStream } from '../src/shared/logger.js';

interface StoredEntry {
	properties: ChunkProperties;
	vector: number[];
}

function cosine(a: number[], b: number[]): number {
	let dot = 0;
	let na = 0;
	let nb = 0;
	for (let i = 0; i < Math.min(a.length, b.length); i++) {
		const x = a[i] ?? 0;
		const y = b[i] ?? 0;
		dot += x * y;
		na += x * x;
		nb += y * y;
	}
	return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb);
}

/**
 * In-process DocumentStore; hybrid and nearest both rank by cosine similarity
 */
export class InMemoryStore implements DocumentStore {
	readonly records = new Map<string, StoredEntry>();
	readonly calls: string[] = [];

	constructor(private readonly support: HybridSupport = { kind: 'supported' }) {}

	async insert(id: string, properties: ChunkProperties, vector: number[]): Promise<void> {
		this.calls.push(`insert:${id}`);
		if (this.records.has(id)) {
			throw new ObjectExistsError(id);
		}
		this.records.set(id, { properties, vector });
	}

	async get(id: string): Promise<StoreRecord | null> {
		this.calls.push(`get:${id}`);
		const entry = this.records.get(id);
		return entry ? { id, properties: entry.properties } : null;
	}

	async replace(id: string, properties: ChunkProperties, vector: number[]): Promise<void> {
		this.calls.push(`replace:${id}`);
		this.records.set(id, { properties, vector });
	}

	async hybridSupport(): Promise<HybridSupport> {
		return this.support;
	}

	async hybrid(query: HybridQuery): Promise<StoreHit[]> {
		this.calls.push('hybrid');
		return this.rank(query.vector, query.limit, query.filter).map(({ id, properties, score }) => ({ id, properties, score }));
	}

	async nearest(query: VectorQuery): Promise<StoreHit[]> {
		this.calls.push('nearest');
		return this.rank(query.vector, query.limit, query.filter).map(hit => ({ ...hit, distance: 1 - hit.score }));
	}

	contents(): string[] {
		return [...this.records.values()].map(e => e.properties.content);
	}

	private rank(vector: number[], limit: number, filter: HybridQuery['filter']): Array<StoreHit & { score: number }> {
		return [...this.records.entries()]
			.filter(([, e]) => !filter || matchesFilter(filter, e.properties))
			.map(([id, e]) => ({ id, properties: e.properties, score: cosine(vector, e.vector) }))
			.sort((a, b) => b.score - a.score)
			.slice(0, limit);
	}
}

/**
 * Deterministic 3-dim embedding: [length, vowel count, 1]
 */
export class FakeEmbedder implements Embedder {
	readonly batches: string[][] = [];

	static vectorFor(text: string): number[] {
		return [text.length, (text.match(/[aeiou]/gi) ?? []).length, 1];
	}

	async embed(text: string): Promise<number[]> {
		return FakeEmbedder.vectorFor(text);
	}

	async embedBatch(texts: string[], _inputType?: EmbedInputType): Promise<EmbedResult[]> {
		this.batches.push(texts);
		return texts.map(text => ({ text, embedding: FakeEmbedder.vectorFor(text), tokens: 1 }));
	}

	getEmbeddingDim(): number {
		return 3;
	}
}

export function makeProperties(overrides: Partial<ChunkProperties> = {}): ChunkProperties {
	return {
		content: 'placeholder',
		source_file: 'doc.pdf',
		position: 0,
		source: 'pdf',
		section: 'body',
		created_at: '2024-01-01T00:00:00.000Z',
		language: 'en',
		chunk_id: 'id-0',
		...overrides,
	};
}

/**
 * Response whose body emits the given string pieces in order
 */
export function streamResponse(pieces: string[], init: ResponseInit = {}): Response {
	const encoder = new TextEncoder();
	const body = new ReadableStream<Uint8Array>({
		start(controller) {
			for (const piece of pieces) {
				controller.enqueue(encoder.encode(piece));
			}
			controller.close();
		},
	});
	return new Response(body, { status: 200, ...init });
}

/** One JSON record per line */
export function ndjson(records: unknown[]): string {
	return records.map(r => JSON.stringify(r)).join('\n') + '\n';
}

export interface RecordedRequest {
	url: string;
	method: string;
	body: unknown;
}

/**
 * fetch stand-in routing by path; records every request
 */
export function fakeFetch(
	handler: (url: string, body: unknown) => Response | Promise<Response>,
): { fetchFn: typeof fetch; requests: RecordedRequest[] } {
	const requests: RecordedRequest[] = [];
	const fetchFn: typeof fetch = async (input, init) => {
		const url = input instanceof Request ? input.url : input.toString();
		const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
		requests.push({ url, method: init?.method ?? 'GET', body });
		return handler(url, body);
	};
	return { fetchFn, requests };
}

/** Logger that keeps its output in memory */
export function memoryLogger(): { logger: Logger; lines: string[] } {
	const lines: string[] = [];
	const stream: LogStream = { write: (chunk: string) => lines.push(chunk) };
	return { logger: new Logger({ level: LogLevel.DEBUG, out: stream, err: stream }), lines };
}

export function jsonResponse(data: unknown, status = 200): Response {
	return new Response(JSON.stringify(data), { status, headers: { 'Content-Type': 'application/json' } });
}
