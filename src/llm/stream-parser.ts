/**
 * Streaming completion protocol
 *
 * One JSON record per line, optionally prefixed with `data:`; `[DONE]` terminates.
 * Token text is taken from the first non-empty of `response`, `token`, `choices[0].text`.
 */

import { z } from 'zod';

export const DONE_SENTINEL = '[DONE]';

const recordSchema = z.object({
	response: z.unknown().optional(),
	token: z.unknown().optional(),
	choices: z.unknown().optional(),
	done: z.unknown().optional(),
	context: z.unknown().optional(),
	error: z.unknown().optional(),
});

const choicesSchema = z.array(z.object({ text: z.unknown().optional() }).passthrough());
const contextSchema = z.array(z.number());

export type StreamLine =
	| { kind: 'blank' }
	| { kind: 'end' }
	| { kind: 'malformed'; raw: string }
	| { kind: 'error'; message: string }
	| { kind: 'data'; token: string; done: boolean; context?: number[] };

function nonEmptyString(value: unknown): string | undefined {
	return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function firstChoiceText(choices: unknown): string | undefined {
	const parsed = choicesSchema.safeParse(choices);
	if (!parsed.success) return undefined;
	return nonEmptyString(parsed.data[0]?.text);
}

/**
 * Parse one line of the completion stream
 */
export function parseStreamLine(line: string): StreamLine {
	let payload = line.trim();
	if (payload.startsWith('data:')) {
		payload = payload.slice('data:'.length).trim();
	}
	if (!payload) return { kind: 'blank' };
	if (payload === DONE_SENTINEL) return { kind: 'end' };

	let json: unknown;
	try {
		json = JSON.parse(payload);
	} catch {
		return { kind: 'malformed', raw: payload };
	}

	const record = recordSchema.safeParse(json);
	if (!record.success) return { kind: 'malformed', raw: payload };

	const { response, token, choices, done, context, error } = record.data;
	const errorText = nonEmptyString(error);
	if (errorText) return { kind: 'error', message: errorText };

	const parsedContext = contextSchema.safeParse(context);
	return {
		kind: 'data',
		token: nonEmptyString(response) ?? nonEmptyString(token) ?? firstChoiceText(choices) ?? '',
		done: done === true,
		context: parsedContext.success ? parsedContext.data : undefined,
	};
}

/**
 * Split a byte stream into text lines (\n or \r\n); the reader is released when iteration stops
 */
export async function* readLines(body: ReadableStream<Uint8Array>): AsyncGenerator<string> {
	const reader = body.getReader();
	const decoder = new TextDecoder();
	let buffer = '';
	let finished = false;

	try {
		while (true) {
			const { done, value } = await reader.read();
			if (done) break;

			buffer += decoder.decode(value, { stream: true });
			let newline = buffer.indexOf('\n');
			while (newline !== -1) {
				const line = buffer.slice(0, newline).replace(/\r$/, '');
				buffer = buffer.slice(newline + 1);
				yield line;
				newline = buffer.indexOf('\n');
			}
		}

		buffer += decoder.decode();
		if (buffer.length > 0) {
			yield buffer.replace(/\r$/, '');
		}
		finished = true;
	} finally {
		if (finished) {
			reader.releaseLock();
		} else {
			// 提前退出：丢弃剩余数据
			await reader.cancel();
		}
	}
}
