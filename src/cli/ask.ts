#!/usr/bin/env node
/**
 * Interactive question console
 *
 * 用法:
 *   npm run ask -- --source pdf --language en --k 3 --debug
 *
 * Ctrl-C while an answer streams cancels it; Ctrl-C at the prompt (or Ctrl-D) exits.
 */

import { createInterface } from 'node:readline';
import { parseArgs } from 'node:util';
import { z } from 'zod';
import { createPipeline } from '../bootstrap.js';
import { buildMetadataFilter } from '../rag/store.js';
import { ConsoleSink } from '../llm/sink.js';
import { ConfigError, errorMessage } from '../shared/errors.js';
import { createDefaultLogger } from '../shared/logger.js';
import { formatPullStatus } from './format.js';

const logger = createDefaultLogger('ASK');

const { values: args } = parseArgs({
	options: {
		source: { type: 'string' },
		language: { type: 'string' },
		k: { type: 'string' },
		alpha: { type: 'string' },
		debug: { type: 'boolean', default: false },
	},
});

const numericArgsSchema = z.object({
	k: z.coerce.number().int().positive().optional(),
	alpha: z.coerce.number().min(0).max(1).optional(),
});

async function main(): Promise<void> {
	const numeric = numericArgsSchema.safeParse({ k: args.k, alpha: args.alpha });
	if (!numeric.success) {
		throw new ConfigError(`Invalid arguments: ${numeric.error.errors.map(e => `--${e.path.join('.')} ${e.message}`).join('; ')}`);
	}

	const { assistant, generator } = await createPipeline();
	const filter = buildMetadataFilter({ source: args.source, language: args.language });
	const sink = new ConsoleSink();

	console.log('RAG console – type a question, Ctrl-D/Ctrl-C to quit');

	const status = await generator.testConnection(s => logger.info(formatPullStatus(s)));
	if (!status.ok) {
		console.error(`Failed to establish Ollama connection (${status.reason}). Please check your setup.`);
		process.exit(1);
	}
	console.log(`\nReady for questions! (model: ${status.model})`);

	const rl = createInterface({ input: process.stdin, output: process.stdout });
	let current: AbortController | null = null;

	rl.on('SIGINT', () => {
		if (current) {
			current.abort();
			return;
		}
		rl.close();
	});

	rl.setPrompt('\n? ');
	rl.prompt();

	for await (const line of rl) {
		const question = line.trim();
		if (!question) {
			rl.prompt();
			continue;
		}

		process.stdout.write('→ ');
		const controller = new AbortController();
		current = controller;
		let streamed = 0;

		const text = await assistant.answer(question, {
			k: numeric.data.k,
			alpha: numeric.data.alpha,
			filter,
			signal: controller.signal,
			debug: args.debug,
			sink: {
				token: chunk => {
					streamed++;
					sink.token(chunk);
				},
				debug: debugLine => sink.debug(debugLine),
			},
		});
		current = null;

		// 未流式输出的结果（无上下文、错误、空回复）直接打印
		if (streamed === 0) {
			process.stdout.write(text);
		}
		if (controller.signal.aborted) {
			process.stdout.write(' [stopped]');
		}
		process.stdout.write('\n');
		rl.prompt();
	}
}

main().catch(err => {
	logger.error('Console failed', { error: errorMessage(err) });
	process.exit(1);
});
