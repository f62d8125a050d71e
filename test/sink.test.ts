import { describe, it, expect } from 'vitest';
import { CollectingSink, ConsoleSink, resolveSink } from '../src/llm/sink.js';

class BufferStream {
	readonly chunks: string[] = [];

	write(chunk: string): boolean {
		this.chunks.push(chunk);
		return true;
	}
}

describe('resolveSink', () => {
	it('keeps a class-based sink bound to its instance', () => {
		const collecting = new CollectingSink();
		const sink = resolveSink(collecting);

		sink.token('Hel');
		sink.token('lo');
		sink.debug('note');

		expect(collecting.text).toBe('Hello');
		expect(collecting.debugLines).toEqual(['note']);
	});

	it('writes tokens raw and debug lines with a newline', () => {
		const out = new BufferStream();
		const sink = resolveSink(new ConsoleSink(out));

		sink.token('a');
		sink.debug('b');

		expect(out.chunks).toEqual(['a', 'b\n']);
	});

	it('routes a partial sink to the given method', () => {
		const tokens: string[] = [];
		const sink = resolveSink({ token: t => tokens.push(t) });

		sink.token('x');

		expect(tokens).toEqual(['x']);
	});
});
