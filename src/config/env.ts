/**
 * Environment variable schema and validation using zod
 */

import { z } from 'zod';

/**
 * Environment variable schema
 */
export const envSchema = z.object({
	// === Server ===
	PORT: z.coerce.number().int().positive().default(8900),
	HOST: z.string().default('0.0.0.0'),

	// === Qdrant ===
	QDRANT_URL: z.string().url('QDRANT_URL must be a valid URL').default('http://localhost:6333'),
	QDRANT_API_KEY: z.string().optional(),
	COLLECTION_NAME: z.string().min(1).default('documents'),

	// === Voyage AI (embedding + rerank) ===
	VOYAGE_API_KEY: z.string().optional(),
	VOYAGE_EMBED_MODEL: z.string().default('voyage-3-lite'),
	VOYAGE_RERANK_MODEL: z.string().default('rerank-2.5-lite'),
	VOYAGE_RPM_LIMIT: z.coerce.number().int().positive().default(2000),
	VOYAGE_TPM_LIMIT: z.coerce.number().int().positive().default(3000000),

	// === Ollama ===
	OLLAMA_URL: z.string().url('OLLAMA_URL must be a valid URL').default('http://localhost:11434'),
	OLLAMA_MODEL: z.string().min(1).default('cas/mistral-7b-instruct-v0.3'),
	OLLAMA_CONTEXT_TOKENS: z.coerce.number().int().positive().optional(),

	// === Ingestion ===
	DATA_DIR: z.string().default('./data'),

	/** Path to the YAML pipeline config (defaults to config/rag.yaml) */
	RAG_CONFIG: z.string().optional(),

	// === Logging ===
	LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

/**
 * Parsed environment variables
 */
export type Env = z.infer<typeof envSchema>;

/**
 * Cached parsed environment
 */
let cachedEnv: Env | null = null;

/**
 * Parse and validate environment variables
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): Env {
	if (cachedEnv) {
		return cachedEnv;
	}

	const result = envSchema.safeParse(env);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `  ${e.path.join('.')}: ${e.message}`)
			.join('\n');
		throw new Error(`Environment validation failed:\n${errors}`);
	}

	cachedEnv = result.data;
	return cachedEnv;
}

/**
 * Get current environment (uses process.env)
 */
export function getEnv(): Env {
	return parseEnv();
}

/**
 * Clear cached environment (for testing)
 */
export function clearEnvCache(): void {
	cachedEnv = null;
}
