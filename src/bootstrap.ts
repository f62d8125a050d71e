/**
 * Pipeline wiring: environment + rag.yaml → store, embedder, ingestor, assistant
 */

import { getEnv, type Env } from './config/env.js';
import { getRagConfig, loadRagConfig } from './config/loader.js';
import type { RagConfig } from './config/types.js';
import { createChunker } from './document/chunker.js';
import { createPdfExtractor } from './document/extractor.js';
import { createOllamaClient, type OllamaClient } from './llm/ollama-client.js';
import { createAssistant, type RagAssistant } from './rag/assistant.js';
import { createVoyageCrossEncoderLoader } from './rag/cross-encoder.js';
import { createVoyageEmbedder, type VoyageEmbedder } from './rag/embedder.js';
import { createIngestor, type DocumentIngestor } from './rag/indexer.js';
import { createQdrantStore, type QdrantStore } from './rag/qdrant-client.js';
import { createReranker } from './rag/reranker.js';
import { createRetriever } from './rag/retriever.js';
import { createDefaultLogger } from './shared/logger.js';
import { createVoyageRateLimiter } from './shared/rate-limiter.js';

export interface Pipeline {
	env: Env;
	config: RagConfig;
	store: QdrantStore;
	embedder: VoyageEmbedder;
	ingestor: DocumentIngestor;
	generator: OllamaClient;
	assistant: RagAssistant;
}

export interface PipelineOptions {
	/** rag.yaml path (defaults to RAG_CONFIG / config/rag.yaml) */
	configPath?: string;
}

export async function createPipeline(options: PipelineOptions = {}): Promise<Pipeline> {
	const env = getEnv();
	const config = options.configPath ? await loadRagConfig(options.configPath) : await getRagConfig();

	// embedding 与 rerank 共用 Voyage 配额
	const rateLimiter = createVoyageRateLimiter(
		env.VOYAGE_RPM_LIMIT,
		env.VOYAGE_TPM_LIMIT,
		createDefaultLogger('voyage'),
	);

	const store = createQdrantStore({
		url: env.QDRANT_URL,
		apiKey: env.QDRANT_API_KEY,
		collection: env.COLLECTION_NAME,
		logger: createDefaultLogger('qdrant'),
	});

	const embedder = createVoyageEmbedder({
		apiKey: env.VOYAGE_API_KEY,
		model: env.VOYAGE_EMBED_MODEL,
		rateLimiter,
		logger: createDefaultLogger('embed'),
	});

	const ingestor = createIngestor({
		store,
		embedder,
		extractor: createPdfExtractor(createDefaultLogger('pdf')),
		chunker: createChunker(config.chunking),
		ingestion: config.ingestion,
		logger: createDefaultLogger('ingest'),
	});

	const generator = createOllamaClient({
		baseUrl: env.OLLAMA_URL,
		model: env.OLLAMA_MODEL,
		logger: createDefaultLogger('ollama'),
	});

	const reranker = createReranker({
		loader: createVoyageCrossEncoderLoader({
			apiKey: env.VOYAGE_API_KEY,
			model: env.VOYAGE_RERANK_MODEL,
			rateLimiter,
			logger: createDefaultLogger('rerank'),
		}),
		logger: createDefaultLogger('rerank'),
	});

	const assistant = createAssistant({
		retriever: createRetriever({ store, embedder, logger: createDefaultLogger('retrieve') }),
		reranker,
		generator,
		retrieval: config.retrieval,
		generation: {
			...config.generation,
			context_window_tokens: env.OLLAMA_CONTEXT_TOKENS ?? config.generation.context_window_tokens,
		},
		logger: createDefaultLogger('answer'),
	});

	return { env, config, store, embedder, ingestor, generator, assistant };
}
