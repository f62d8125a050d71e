/**
 * HTTP Server
 *
 * POST /api/ask streams one JSON event per line (application/x-ndjson):
 *   session → stage* → debug* / token* → answer
 * Each session keeps its own conversation state; a session answers one question at a time.
 */

import { randomUUID } from 'node:crypto';
import type { Server as HttpServer } from 'node:http';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { z } from 'zod';
import { ConversationSession, type AnswerStage, type RagAssistant } from './rag/assistant.js';
import { buildMetadataFilter } from './rag/store.js';
import { errorMessage } from './shared/errors.js';
import { createDefaultLogger, type Logger } from './shared/logger.js';

/** Session 超时时间：30 分钟 */
const SESSION_TTL_MS = 30 * 60 * 1000;
/** Session 清理扫描间隔：5 分钟 */
const SESSION_CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export type AskEvent =
	| { type: 'session'; session_id: string }
	| { type: 'stage'; stage: AnswerStage }
	| { type: 'debug'; line: string }
	| { type: 'token'; text: string }
	| { type: 'answer'; text: string }
	| { type: 'error'; message: string };

export const askBodySchema = z.object({
	question: z.string().trim().min(1, 'question must not be empty'),
	session_id: z.string().min(1).optional(),
	k: z.number().int().positive().optional(),
	alpha: z.number().min(0).max(1).optional(),
	source: z.string().min(1).optional(),
	language: z.string().min(1).optional(),
	debug: z.boolean().optional(),
});

export interface ServerDeps {
	assistant: RagAssistant;
	version: string;
	sessionTtlMs?: number;
	logger?: Logger;
}

export interface AppHandle {
	app: Express;
	/** Stop the session cleanup timer */
	dispose: () => void;
}

export interface ServerHandle {
	server: HttpServer;
	close: () => Promise<void>;
}

interface SessionEntry {
	session: ConversationSession;
	lastActivity: number;
	/** Set while an answer is streaming */
	controller: AbortController | null;
}

function statusOf(err: unknown): number {
	if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
		return err.status;
	}
	return 500;
}

export function createApp(deps: ServerDeps): AppHandle {
	const { assistant, version } = deps;
	const logger = deps.logger ?? createDefaultLogger('http');
	const ttl = deps.sessionTtlMs ?? SESSION_TTL_MS;
	const sessions = new Map<string, SessionEntry>();

	// 定期清理超时 session（进行中的不清理）
	const cleanupTimer = setInterval(() => {
		const now = Date.now();
		for (const [sid, entry] of sessions) {
			if (!entry.controller && now - entry.lastActivity > ttl) {
				sessions.delete(sid);
				logger.info('Session expired', { sessionId: sid });
			}
		}
	}, SESSION_CLEANUP_INTERVAL_MS);
	cleanupTimer.unref();

	const app = express();
	app.use(express.json());

	// CORS
	app.use((req, res, next) => {
		res.setHeader('Access-Control-Allow-Origin', '*');
		res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
		res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
		if (req.method === 'OPTIONS') {
			res.status(204).end();
			return;
		}
		next();
	});

	app.use((req, _res, next) => {
		logger.debug(`${req.method} ${req.path}`);
		next();
	});

	app.get('/health', (_req: Request, res: Response): void => {
		res.json({
			status: 'ok',
			version,
			sessions: sessions.size,
			timestamp: new Date().toISOString(),
		});
	});

	app.post('/api/ask', async (req: Request, res: Response): Promise<void> => {
		const body = askBodySchema.safeParse(req.body);
		if (!body.success) {
			res.status(400).json({ error: body.error.errors.map(e => e.message).join('; ') });
			return;
		}
		const { question, session_id, k, alpha, source, language, debug } = body.data;

		const sid = session_id ?? randomUUID();
		let entry = sessions.get(sid);
		if (!entry) {
			entry = { session: new ConversationSession(sid), lastActivity: Date.now(), controller: null };
			sessions.set(sid, entry);
			logger.info('Session created', { sessionId: sid });
		}
		if (entry.controller) {
			res.status(409).json({ error: 'Session is already answering a question' });
			return;
		}

		const controller = new AbortController();
		entry.controller = controller;
		entry.lastActivity = Date.now();

		// 客户端断开 → 取消生成
		res.on('close', () => {
			if (!res.writableFinished) {
				controller.abort();
			}
		});

		const send = (event: AskEvent): void => {
			if (!res.writableEnded && !res.destroyed) {
				res.write(`${JSON.stringify(event)}\n`);
			}
		};

		res.status(200);
		res.setHeader('Content-Type', 'application/x-ndjson; charset=utf-8');
		res.setHeader('Cache-Control', 'no-cache');
		send({ type: 'session', session_id: sid });

		try {
			const text = await assistant.answer(question, {
				k,
				alpha,
				filter: buildMetadataFilter({ source, language }),
				session: entry.session,
				signal: controller.signal,
				debug,
				sink: {
					token: chunk => send({ type: 'token', text: chunk }),
					debug: line => send({ type: 'debug', line }),
				},
				onStage: stage => send({ type: 'stage', stage }),
			});
			send({ type: 'answer', text });
		} catch (err) {
			logger.error('Answer failed', { sessionId: sid, error: errorMessage(err) });
			send({ type: 'error', message: errorMessage(err) });
		} finally {
			entry.controller = null;
			entry.lastActivity = Date.now();
			res.end();
		}
	});

	app.post('/api/sessions/:id/stop', (req: Request, res: Response): void => {
		const entry = sessions.get(req.params.id ?? '');
		if (!entry) {
			res.status(404).json({ error: 'Session not found' });
			return;
		}
		const running = entry.controller !== null;
		entry.controller?.abort();
		entry.lastActivity = Date.now();
		res.json({ stopped: running });
	});

	// 404
	app.use((_req, res) => {
		res.status(404).json({ error: 'Not found' });
	});

	// 请求体解析错误等
	app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
		const status = statusOf(err);
		if (status >= 500) {
			logger.error('Request error', { error: errorMessage(err) });
		}
		res.status(status).json({ error: status >= 500 ? 'Internal server error' : errorMessage(err) });
	});

	return { app, dispose: () => clearInterval(cleanupTimer) };
}

/**
 * 创建并启动 HTTP 服务，返回 { server, close } handle
 */
export async function startServer(deps: ServerDeps, port: number, host: string): Promise<ServerHandle> {
	const logger = deps.logger ?? createDefaultLogger('http');
	const { app, dispose } = createApp({ ...deps, logger });

	const server = await new Promise<HttpServer>((resolve, reject) => {
		const s = app.listen(port, host, () => {
			logger.info('Server listening', { url: `http://${host}:${port}` });
			resolve(s);
		});
		s.on('error', reject);
	});

	const close = async (): Promise<void> => {
		dispose();
		await new Promise<void>((resolve, reject) => {
			server.close((err) => {
				if (err) reject(err);
				else {
					logger.info('Server stopped');
					resolve();
				}
			});
		});
	};

	return { server, close };
}
