/**
 * Configuration loader
 * Loads the pipeline YAML file and merges it over the built-in defaults
 */

import { readFile } from 'node:fs/promises';
import { resolve, join, isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { getEnv } from './env.js';
import type { RagConfig } from './types.js';
import { ragYamlSchema } from './types.js';
import { ConfigError, errorMessage, toError } from '../shared/errors.js';

const __dirname = fileURLToPath(new URL('.', import.meta.url));
const PROJECT_ROOT = resolve(__dirname, '../..');
const DEFAULT_CONFIG_PATH = join(PROJECT_ROOT, 'config', 'rag.yaml');

export const DEFAULT_PROMPT_TEMPLATE =
	'You are a helpful assistant who answers strictly from the provided context.\n\n' +
	'Context:\n"""\n{context}\n"""\n\n' +
	'Question: {question}\nAnswer:';

export const DEFAULT_NO_CONTEXT_ANSWER = 'I found no relevant context to answer that question.';

export const DEFAULT_RAG_CONFIG: RagConfig = {
	retrieval: {
		alpha: 0.5,
		top_k: 3,
		overfetch_factor: 20,
		min_candidates: 100,
	},
	chunking: {
		chunk_size: 800,
		chunk_overlap: 100,
		min_chunk_size: 1,
	},
	ingestion: {
		extensions: ['.pdf'],
		source: 'pdf',
		section: 'body',
		language_sample: 400,
	},
	generation: {
		context_window_tokens: 8192,
		prompt_template: DEFAULT_PROMPT_TEMPLATE,
		no_context_answer: DEFAULT_NO_CONTEXT_ANSWER,
	},
};

/**
 * Load a YAML file and validate against a zod schema
 */
async function loadAndValidateYaml<T>(filePath: string, schema: z.ZodType<T>): Promise<T> {
	let raw: unknown;
	try {
		const content = await readFile(filePath, 'utf-8');
		raw = parseYaml(content);
	} catch (err) {
		throw new ConfigError(`Cannot read config ${filePath}: ${errorMessage(err)}`, toError(err));
	}
	const result = schema.safeParse(raw ?? {});
	if (!result.success) {
		throw new ConfigError(`Invalid config ${filePath}: ${result.error.message}`);
	}
	return result.data;
}

/**
 * Merge a parsed YAML document over the defaults and check cross-field constraints
 */
export function resolveRagConfig(raw: z.infer<typeof ragYamlSchema>): RagConfig {
	const config: RagConfig = {
		retrieval: { ...DEFAULT_RAG_CONFIG.retrieval, ...raw.retrieval },
		chunking: { ...DEFAULT_RAG_CONFIG.chunking, ...raw.chunking },
		ingestion: { ...DEFAULT_RAG_CONFIG.ingestion, ...raw.ingestion },
		generation: { ...DEFAULT_RAG_CONFIG.generation, ...raw.generation },
	};

	// 断点至少落在 chunk 后半段，overlap 必须小于一半才能保证前进
	if (config.chunking.chunk_overlap * 2 >= config.chunking.chunk_size) {
		throw new ConfigError(
			`chunk_overlap (${config.chunking.chunk_overlap}) must be less than half of chunk_size (${config.chunking.chunk_size})`,
		);
	}

	return config;
}

/**
 * Config cache (keyed by absolute path)
 */
const configCache = new Map<string, RagConfig>();

/**
 * Load the pipeline configuration from a YAML file
 */
export async function loadRagConfig(filePath: string = DEFAULT_CONFIG_PATH): Promise<RagConfig> {
	const absPath = isAbsolute(filePath) ? filePath : resolve(filePath);
	const cached = configCache.get(absPath);
	if (cached) {
		return cached;
	}

	const raw = await loadAndValidateYaml(absPath, ragYamlSchema);
	const config = resolveRagConfig(raw);
	configCache.set(absPath, config);
	return config;
}

/**
 * Load the configuration file named by RAG_CONFIG (or the default one)
 */
export async function getRagConfig(): Promise<RagConfig> {
	const env = getEnv();
	return loadRagConfig(env.RAG_CONFIG ?? DEFAULT_CONFIG_PATH);
}

/**
 * Clear cached configuration (for testing)
 */
export function clearCache(): void {
	configCache.clear();
}

export function getDefaultConfigPath(): string {
	return DEFAULT_CONFIG_PATH;
}

/**
 * Get project root path
 */
export function getProjectRoot(): string {
	return PROJECT_ROOT;
}

/**
 * Read version from package.json (single source of truth, cached)
 */
let cachedVersion: string | null = null;

const packageJsonSchema = z.object({ version: z.string().min(1) });

export async function getVersion(): Promise<string> {
	if (cachedVersion) return cachedVersion;

	const pkgPath = join(PROJECT_ROOT, 'package.json');
	const pkgContent = await readFile(pkgPath, 'utf-8');
	const pkg = packageJsonSchema.safeParse(JSON.parse(pkgContent));
	if (!pkg.success) {
		throw new ConfigError('Missing "version" field in package.json');
	}
	cachedVersion = pkg.data.version;
	return cachedVersion;
}
