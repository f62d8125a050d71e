/**
 * Ollama streaming generation client
 *
 * generate() streams tokens to the sink as they arrive and returns the full text plus the
 * backend's conversation context. Cancellation is cooperative: the signal is checked before
 * every stream record, the in-flight read is not interrupted.
 */

import { z } from 'zod';
import { parseStreamLine, readLines } from './stream-parser.js';
import { resolveSink, type AnswerSink } from './sink.js';
import { GenerationError, errorMessage } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

export const NO_RESPONSE = '(no response)';

/** 字符数 / 4 ≈ token 数（仅用于告警） */
const CHARS_PER_TOKEN = 4;
const CONTEXT_WARNING_RATIO = 0.9;

export type GenerationOutcome = 'completed' | 'cancelled' | 'failed';

export interface GenerationResult {
	text: string;
	/** Conversation state to carry into the next turn */
	context: number[] | undefined;
	outcome: GenerationOutcome;
}

export interface GenerateOptions {
	model?: string;
	/** Prior conversation state */
	context?: number[];
	contextWindowTokens: number;
	signal?: AbortSignal;
	sink?: Partial<AnswerSink>;
}

export interface TextGenerator {
	generate(prompt: string, options: GenerateOptions): Promise<GenerationResult>;
}

export type ConnectionStatus =
	| { ok: true; model: string }
	| { ok: false; reason: string };

export interface OllamaClientConfig {
	baseUrl: string;
	model: string;
	/** /api/tags 超时（毫秒） */
	listTimeoutMs?: number;
	fetchFn?: typeof fetch;
	logger?: Logger;
}

const tagsSchema = z.object({
	models: z.array(z.object({ name: z.string() })).default([]),
});

const pullStatusSchema = z.object({
	status: z.string().optional(),
	error: z.string().optional(),
	completed: z.number().optional(),
	total: z.number().optional(),
});

export type PullStatus = z.infer<typeof pullStatusSchema>;

export function estimatePromptTokens(prompt: string): number {
	return Math.ceil(prompt.length / CHARS_PER_TOKEN);
}

export class OllamaClient implements TextGenerator {
	private readonly baseUrl: string;
	private readonly model: string;
	private readonly listTimeoutMs: number;
	private readonly fetchFn: typeof fetch;
	private readonly logger: Logger;

	constructor(config: OllamaClientConfig) {
		this.baseUrl = config.baseUrl.replace(/\/+$/, '');
		this.model = config.model;
		this.listTimeoutMs = config.listTimeoutMs ?? 2000;
		this.fetchFn = config.fetchFn ?? fetch;
		this.logger = config.logger ?? new Logger();
	}

	getModel(): string {
		return this.model;
	}

	/**
	 * Stream a completion. Never throws: failures come back as an error text with outcome 'failed'.
	 */
	async generate(prompt: string, options: GenerateOptions): Promise<GenerationResult> {
		const sink = resolveSink(options.sink);
		const model = options.model ?? this.model;
		this.warnOnPromptSize(prompt, options.contextWindowTokens, sink);

		const parts: string[] = [];
		let outcome: GenerationOutcome = 'completed';
		let nextContext: number[] | undefined;

		try {
			const response = await this.post('/api/generate', {
				model,
				prompt,
				stream: true,
				options: { max_context_tokens: options.contextWindowTokens },
				...(options.context ? { context: options.context } : {}),
			});
			if (!response.body) {
				throw new GenerationError('Empty response body');
			}

			for await (const line of readLines(response.body)) {
				if (options.signal?.aborted) {
					outcome = 'cancelled';
					break;
				}

				const record = parseStreamLine(line);
				if (record.kind === 'blank') continue;
				if (record.kind === 'end') break;
				if (record.kind === 'malformed') {
					this.logger.debug('Skipping malformed stream record', { raw: record.raw.slice(0, 200) });
					continue;
				}
				if (record.kind === 'error') {
					throw new GenerationError(record.message);
				}

				if (record.token) {
					parts.push(record.token);
					sink.token(record.token);
				}
				if (record.done) {
					nextContext = record.context;
					break;
				}
			}
		} catch (err) {
			const message = errorMessage(err);
			this.logger.error('Generation failed', { model, error: message });
			return { text: `[Error generating response: ${message}]`, context: options.context, outcome: 'failed' };
		}

		if (outcome === 'cancelled') {
			this.logger.info('Generation cancelled', { tokens: parts.length });
		}

		const text = parts.join('');
		return {
			text: text.length > 0 ? text : NO_RESPONSE,
			context: outcome === 'completed' ? nextContext ?? options.context : options.context,
			outcome,
		};
	}

	/**
	 * 已安装的模型名（GET /api/tags）
	 */
	async listModels(): Promise<string[]> {
		let response: Response;
		try {
			response = await this.fetchFn(`${this.baseUrl}/api/tags`, {
				signal: AbortSignal.timeout(this.listTimeoutMs),
			});
		} catch (err) {
			throw new GenerationError(`Cannot reach Ollama at ${this.baseUrl}: ${errorMessage(err)}`);
		}
		if (!response.ok) {
			throw new GenerationError(`Ollama /api/tags failed: HTTP ${response.status}`, response.status);
		}
		const parsed = tagsSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new GenerationError(`Invalid /api/tags response: ${parsed.error.message}`);
		}
		return parsed.data.models.map(m => m.name);
	}

	/** Exact name or any tag of it (`name:tag`) */
	async hasModel(name: string = this.model): Promise<boolean> {
		const models = await this.listModels();
		return models.some(m => m === name || m.startsWith(`${name}:`));
	}

	/**
	 * 拉取模型（POST /api/pull），逐条回调进度
	 */
	async pullModel(name: string = this.model, onStatus?: (status: PullStatus) => void): Promise<void> {
		this.logger.info(`Pulling model ${name}`);
		const response = await this.post('/api/pull', { model: name, stream: true });
		if (!response.body) {
			throw new GenerationError('Empty response body');
		}

		for await (const line of readLines(response.body)) {
			if (!line.trim()) continue;
			let json: unknown;
			try {
				json = JSON.parse(line);
			} catch {
				this.logger.debug('Skipping malformed pull record', { raw: line.slice(0, 200) });
				continue;
			}
			const status = pullStatusSchema.safeParse(json);
			if (!status.success) continue;
			if (status.data.error) {
				throw new GenerationError(`Pull of ${name} failed: ${status.data.error}`);
			}
			onStatus?.(status.data);
		}
	}

	/** Pull the model when it is not installed */
	async ensureModel(name: string = this.model, onStatus?: (status: PullStatus) => void): Promise<void> {
		if (await this.hasModel(name)) return;
		await this.pullModel(name, onStatus);
	}

	/**
	 * Reachability + model presence (pulled when missing) + a short non-streaming dry run
	 */
	async testConnection(onStatus?: (status: PullStatus) => void): Promise<ConnectionStatus> {
		try {
			await this.ensureModel(this.model, onStatus);
			await this.post('/api/generate', {
				model: this.model,
				prompt: 'Hello',
				stream: false,
				options: { num_predict: 5 },
			});
			return { ok: true, model: this.model };
		} catch (err) {
			return { ok: false, reason: errorMessage(err) };
		}
	}

	private async post(path: string, body: Record<string, unknown>): Promise<Response> {
		const response = await this.fetchFn(`${this.baseUrl}${path}`, {
			method: 'POST',
			headers: { 'Content-Type': 'application/json' },
			body: JSON.stringify(body),
		});
		if (!response.ok) {
			const detail = await response.text();
			throw new GenerationError(
				`HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`,
				response.status,
			);
		}
		return response;
	}

	private warnOnPromptSize(prompt: string, windowTokens: number, sink: AnswerSink): void {
		const estimated = estimatePromptTokens(prompt);
		if (estimated > windowTokens) {
			sink.debug(`Warning: prompt (~${estimated} tokens) exceeds the context window (${windowTokens} tokens)`);
		} else if (estimated > windowTokens * CONTEXT_WARNING_RATIO) {
			sink.debug(`Warning: prompt (~${estimated} tokens) uses over 90% of the context window (${windowTokens} tokens)`);
		}
	}
}

/** 工厂函数 */
export function createOllamaClient(config: OllamaClientConfig): OllamaClient {
	return new OllamaClient(config);
}
