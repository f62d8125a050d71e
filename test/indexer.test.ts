import { mkdir, mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DEFAULT_RAG_CONFIG } from '../src/config/loader.js';
import { TextChunker } from '../src/document/chunker.js';
import { chunkIdentity, slotKey } from '../src/document/identity.js';
import type { TextExtractor } from '../src/document/types.js';
import { DocumentIngestor } from '../src/rag/indexer.js';
import { ConfigError, ExtractionError, ObjectExistsError, StoreError } from '../src/shared/errors.js';
import { createSilentLogger } from '../src/shared/logger.js';
import { FakeEmbedder, InMemoryStore } from './helpers.js';

const MTIME = new Date('2024-05-01T12:00:00.000Z');

class MapExtractor implements TextExtractor {
	constructor(readonly texts: Map<string, string>) {}

	async extract(filePath: string): Promise<string> {
		const text = this.texts.get(basename(filePath));
		if (text === undefined) {
			throw new ExtractionError('not a PDF', filePath);
		}
		return text;
	}
}

describe('DocumentIngestor', () => {
	let dir: string;
	let store: InMemoryStore;
	let embedder: FakeEmbedder;
	let extractor: MapExtractor;

	function ingestor(
		chunker = new TextChunker(DEFAULT_RAG_CONFIG.chunking),
		target: InMemoryStore = store,
		detectLanguage: (text: string) => string = () => 'en',
	): DocumentIngestor {
		return new DocumentIngestor({
			store: target,
			embedder,
			extractor,
			chunker,
			ingestion: DEFAULT_RAG_CONFIG.ingestion,
			detectLanguage,
			logger: createSilentLogger(),
		});
	}

	async function addFile(name: string): Promise<void> {
		const path = join(dir, name);
		await writeFile(path, 'placeholder');
		await utimes(path, MTIME, MTIME);
	}

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'ingest-test-'));
		store = new InMemoryStore();
		embedder = new FakeEmbedder();
		extractor = new MapExtractor(new Map([
			['a.PDF', 'Alpha document text.'],
			['b.pdf', 'Beta document text.'],
		]));
		await addFile('b.pdf');
		await addFile('a.PDF');
		await addFile('broken.pdf');
		await addFile('notes.txt');
		await mkdir(join(dir, 'nested'));
		await addFile(join('nested', 'c.pdf'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('lists matching files non-recursively in name order', async () => {
		expect(await ingestor().listSourceFiles(dir)).toEqual(['a.PDF', 'b.pdf', 'broken.pdf']);
	});

	it('inserts new chunks, counts extraction failures and continues', async () => {
		const stats = await ingestor().ingest(dir);

		expect(stats).toMatchObject({ processed: 3, chunks: 2, inserts: 2, updates: 0, skipped: 0, failed: 1 });
		expect(embedder.batches).toEqual([['Alpha document text.'], ['Beta document text.']]);
		expect(store.records.get(slotKey('a.PDF', 0))?.properties).toEqual({
			content: 'Alpha document text.',
			source_file: 'a.PDF',
			position: 0,
			source: 'pdf',
			section: 'body',
			created_at: '2024-05-01T12:00:00.000Z',
			language: 'en',
			chunk_id: chunkIdentity('a.PDF', 0, 'Alpha document text.'),
		});
	});

	it('is idempotent on an unchanged corpus', async () => {
		await ingestor().ingest(dir);
		const second = await ingestor().ingest(dir);

		expect(second).toMatchObject({ processed: 3, chunks: 2, inserts: 0, updates: 0, skipped: 2, failed: 1 });
		expect(store.records.size).toBe(2);
	});

	it('replaces a chunk whose content changed at the same position', async () => {
		await ingestor().ingest(dir);
		extractor.texts.set('b.pdf', 'Beta document text, revised.');

		const stats = await ingestor().ingest(dir);

		expect(stats).toMatchObject({ inserts: 0, updates: 1, skipped: 1 });
		const record = store.records.get(slotKey('b.pdf', 0));
		expect(record?.properties.content).toBe('Beta document text, revised.');
		expect(record?.properties.chunk_id).toBe(chunkIdentity('b.pdf', 0, 'Beta document text, revised.'));
		expect(store.records.size).toBe(2);
	});

	it('addresses each chunk by file and position', async () => {
		extractor.texts.set('a.PDF', 'aaaa bbbb cccc dddd eeee ffff gggg');
		const chunker = new TextChunker({ chunk_size: 20, chunk_overlap: 5, min_chunk_size: 1 });

		const stats = await ingestor(chunker).ingest(dir);

		expect(stats.chunks).toBe(3);
		expect(store.records.get(slotKey('a.PDF', 0))?.properties.content).toBe('aaaa bbbb cccc dddd');
		expect(store.records.get(slotKey('a.PDF', 1))?.properties).toMatchObject({ content: 'dddd eeee ffff gggg', position: 1 });
	});

	it('detects the language of each chunk separately', async () => {
		extractor.texts.set('a.PDF', 'aaaa bbbb cccc dddd eeee ffff gggg');
		const chunker = new TextChunker({ chunk_size: 20, chunk_overlap: 5, min_chunk_size: 1 });
		const samples: string[] = [];
		const detect = (text: string): string => {
			samples.push(text);
			return text.startsWith('aaaa') ? 'en' : 'et';
		};

		await ingestor(chunker, store, detect).ingest(dir);

		expect(samples).toEqual(['aaaa bbbb cccc dddd', 'dddd eeee ffff gggg', 'Beta document text.']);
		expect(store.records.get(slotKey('a.PDF', 0))?.properties.language).toBe('en');
		expect(store.records.get(slotKey('a.PDF', 1))?.properties.language).toBe('et');
	});

	it('returns zero stats for a directory without matching files', async () => {
		const empty = await mkdtemp(join(tmpdir(), 'ingest-empty-'));
		try {
			expect(await ingestor().ingest(empty)).toEqual({
				processed: 0, chunks: 0, inserts: 0, updates: 0, skipped: 0, failed: 0, durationMs: 0,
			});
		} finally {
			await rm(empty, { recursive: true, force: true });
		}
	});

	it('rejects a missing directory', async () => {
		await expect(ingestor().ingest(join(dir, 'missing'))).rejects.toBeInstanceOf(ConfigError);
	});

	it('skips a conflicting chunk that can no longer be read', async () => {
		class VanishingStore extends InMemoryStore {
			override async insert(id: string): Promise<void> {
				throw new ObjectExistsError(id);
			}
		}
		const vanishing = new VanishingStore();

		const stats = await ingestor(undefined, vanishing).ingest(dir);

		expect(stats).toMatchObject({ inserts: 0, updates: 0, skipped: 2 });
		expect(vanishing.calls).toEqual([`get:${slotKey('a.PDF', 0)}`, `get:${slotKey('b.pdf', 0)}`]);
	});

	it('propagates other store errors', async () => {
		class FailingStore extends InMemoryStore {
			override async insert(): Promise<void> {
				throw new StoreError('disk full');
			}
		}

		await expect(ingestor(undefined, new FailingStore()).ingest(dir)).rejects.toThrow('disk full');
	});
});
