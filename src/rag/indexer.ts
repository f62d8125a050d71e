/**
 * 文档导入
 *
 * PDF → text → overlapping chunks → Voyage embedding → document store
 * 每个 chunk 按 (source_file, position) 寻址：
 * 新位置插入，内容变化时替换，内容相同时跳过，重复导入是幂等的。
 */

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { IngestionConfig } from '../config/types.js';
import type { TextChunker } from '../document/chunker.js';
import { chunkIdentity, slotKey } from '../document/identity.js';
import { detectLanguage } from '../document/language-detect.js';
import type { ChunkProperties, LanguageDetector, TextExtractor } from '../document/types.js';
import { ApiError, ConfigError, ObjectExistsError, errorMessage, toError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';
import type { Embedder } from './embedder.js';
import type { DocumentStore } from './store.js';

export interface IngestStats {
	/** Files attempted */
	processed: number;
	chunks: number;
	inserts: number;
	updates: number;
	skipped: number;
	/** Files whose text could not be extracted */
	failed: number;
	durationMs: number;
}

export type ChunkOutcome = 'insert' | 'update' | 'skip';

export interface DocumentIngestorConfig {
	store: DocumentStore;
	embedder: Embedder;
	extractor: TextExtractor;
	chunker: TextChunker;
	ingestion: IngestionConfig;
	detectLanguage?: LanguageDetector;
	logger?: Logger;
}

export function emptyStats(): IngestStats {
	return { processed: 0, chunks: 0, inserts: 0, updates: 0, skipped: 0, failed: 0, durationMs: 0 };
}

export class DocumentIngestor {
	private readonly store: DocumentStore;
	private readonly embedder: Embedder;
	private readonly extractor: TextExtractor;
	private readonly chunker: TextChunker;
	private readonly ingestion: IngestionConfig;
	private readonly detectLanguage: LanguageDetector;
	private readonly logger: Logger;

	constructor(config: DocumentIngestorConfig) {
		this.store = config.store;
		this.embedder = config.embedder;
		this.extractor = config.extractor;
		this.chunker = config.chunker;
		this.ingestion = config.ingestion;
		this.detectLanguage = config.detectLanguage ?? detectLanguage;
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * Ingest every matching file directly inside `directory`, in name order
	 */
	async ingest(directory: string): Promise<IngestStats> {
		const startTime = Date.now();
		const stats = emptyStats();

		const files = await this.listSourceFiles(directory);
		if (files.length === 0) {
			this.logger.warn(`No ${this.ingestion.extensions.join('/')} files found in ${directory}`);
			return stats;
		}

		this.logger.info(`Found ${files.length} file(s) in ${directory}`);

		for (const [i, file] of files.entries()) {
			stats.processed++;
			await this.ingestFile(join(directory, file), stats);
			this.logger.info(`[${i + 1}/${files.length}] ${file}`);
		}

		stats.durationMs = Date.now() - startTime;
		this.logger.info('Ingestion complete', { ...stats });
		return stats;
	}

	/**
	 * Matching regular files (non-recursive), sorted by name
	 */
	async listSourceFiles(directory: string): Promise<string[]> {
		const extensions = new Set(this.ingestion.extensions.map(e => e.toLowerCase()));
		let entries: Dirent[];
		try {
			entries = await readdir(directory, { withFileTypes: true });
		} catch (err) {
			throw new ConfigError(`Cannot read data directory ${directory}: ${errorMessage(err)}`, toError(err));
		}
		return entries
			.filter(e => e.isFile() && extensions.has(extname(e.name).toLowerCase()))
			.map(e => e.name)
			.sort();
	}

	private async ingestFile(filePath: string, stats: IngestStats): Promise<void> {
		const name = basename(filePath);

		let text: string;
		try {
			text = await this.extractor.extract(filePath);
		} catch (err) {
			this.logger.error(`Failed to extract ${name}`, { error: errorMessage(err) });
			stats.failed++;
			return;
		}

		const chunks = this.chunker.split(text);
		if (chunks.length === 0) {
			this.logger.warn(`No text extracted from ${name}`);
			return;
		}

		const { mtime } = await stat(filePath);
		const createdAt = mtime.toISOString();
		const embeddings = await this.embedder.embedBatch(chunks.map(c => c.content), 'document');

		const counts = { insert: 0, update: 0, skip: 0 };
		for (const chunk of chunks) {
			const vector = embeddings[chunk.index]?.embedding;
			if (!vector) {
				throw new ApiError(`Missing embedding for chunk ${chunk.index} of ${name}`);
			}

			const properties: ChunkProperties = {
				content: chunk.content,
				source_file: name,
				position: chunk.index,
				source: this.ingestion.source,
				section: this.ingestion.section,
				created_at: createdAt,
				language: this.detectLanguage(chunk.content.slice(0, this.ingestion.language_sample)),
				chunk_id: chunkIdentity(name, chunk.index, chunk.content),
			};

			const outcome = await this.storeChunk(slotKey(name, chunk.index), properties, vector);
			counts[outcome]++;
		}

		stats.chunks += chunks.length;
		stats.inserts += counts.insert;
		stats.updates += counts.update;
		stats.skipped += counts.skip;
		this.logger.debug(`Stored ${name}`, { chunks: chunks.length, ...counts });
	}

	/**
	 * Insert; on conflict compare stored content and replace or skip
	 */
	private async storeChunk(id: string, properties: ChunkProperties, vector: number[]): Promise<ChunkOutcome> {
		try {
			await this.store.insert(id, properties, vector);
			return 'insert';
		} catch (err) {
			if (!(err instanceof ObjectExistsError)) throw err;
		}

		const existing = await this.store.get(id);
		if (!existing) {
			this.logger.warn(`Chunk ${id} reported as existing but could not be read back, skipping`, {
				source_file: properties.source_file,
				position: properties.position,
			});
			return 'skip';
		}

		if (existing.properties.content === properties.content) {
			return 'skip';
		}

		await this.store.replace(id, properties, vector);
		return 'update';
	}
}

/** 工厂函数 */
export function createIngestor(config: DocumentIngestorConfig): DocumentIngestor {
	return new DocumentIngestor(config);
}
