/**
 * Document types
 */

import { z } from 'zod';

/**
 * Properties stored with every chunk (store payload, snake_case like the wire format)
 */
export const chunkPropertiesSchema = z.object({
	content: z.string(),
	source_file: z.string(),
	position: z.number().int().nonnegative(),
	source: z.string(),
	section: z.string(),
	created_at: z.string(),
	language: z.string(),
	/** Content identity (source_file, position, content) */
	chunk_id: z.string(),
});

export type ChunkProperties = z.infer<typeof chunkPropertiesSchema>;

/** A chunk produced by the chunker, before identity/metadata enrichment */
export interface TextChunk {
	index: number;
	content: string;
}

export interface ChunkerOptions {
	chunk_size: number;
	chunk_overlap: number;
	min_chunk_size: number;
}

/**
 * Text extraction backend (PDF parser etc.)
 */
export interface TextExtractor {
	extract(filePath: string): Promise<string>;
}

export type LanguageDetector = (text: string) => string;
