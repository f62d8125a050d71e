/**
 * Configuration type definitions for the RAG pipeline
 */

import { z } from 'zod';

/**
 * Retrieval configuration
 */
export interface RetrievalConfig {
	/** Hybrid blend factor: 0 = pure BM25, 1 = pure vector */
	alpha: number;
	/** Chunks kept after re-ranking */
	top_k: number;
	/** Candidates fetched per kept chunk */
	overfetch_factor: number;
	/** Lower bound on the candidate pool */
	min_candidates: number;
}

/**
 * Chunking configuration
 */
export interface ChunkingConfig {
	chunk_size: number;
	chunk_overlap: number;
	min_chunk_size: number;
}

/**
 * Ingestion configuration
 */
export interface IngestionConfig {
	/** File extensions picked up from the data directory */
	extensions: string[];
	/** Origin tag stored on every chunk */
	source: string;
	/** Coarse section label stored on every chunk */
	section: string;
	/** Characters sampled for language detection */
	language_sample: number;
}

/**
 * Generation configuration
 */
export interface GenerationConfig {
	context_window_tokens: number;
	/** Instruction template, `{context}` and `{question}` placeholders */
	prompt_template: string;
	/** Answer returned when retrieval finds nothing */
	no_context_answer: string;
}

/**
 * Resolved pipeline configuration
 */
export interface RagConfig {
	retrieval: RetrievalConfig;
	chunking: ChunkingConfig;
	ingestion: IngestionConfig;
	generation: GenerationConfig;
}

/** rag.yaml 运行时校验（所有字段可选，缺省值由 loader 合并） */
export const ragYamlSchema = z.object({
	retrieval: z.object({
		alpha: z.number().min(0).max(1),
		top_k: z.number().int().positive(),
		overfetch_factor: z.number().int().positive(),
		min_candidates: z.number().int().positive(),
	}).partial().optional(),
	chunking: z.object({
		chunk_size: z.number().int().positive(),
		chunk_overlap: z.number().int().nonnegative(),
		min_chunk_size: z.number().int().positive(),
	}).partial().optional(),
	ingestion: z.object({
		extensions: z.array(z.string().startsWith('.')),
		source: z.string().min(1),
		section: z.string().min(1),
		language_sample: z.number().int().positive(),
	}).partial().optional(),
	generation: z.object({
		context_window_tokens: z.number().int().positive(),
		prompt_template: z.string().min(1),
		no_context_answer: z.string().min(1),
	}).partial().optional(),
});

export type RagYaml = z.infer<typeof ragYamlSchema>;
