/**
 * Answer output sinks
 *
 * token(): streamed answer fragments, written as-is
 * debug(): diagnostic lines (retrieval dump, context-window warnings)
 */

export interface AnswerSink {
	token(text: string): void;
	debug(line: string): void;
}

export interface WritableLike {
	write(chunk: string): unknown;
}

/** Writes tokens and debug lines to a stream (stdout by default) */
export class ConsoleSink implements AnswerSink {
	constructor(private readonly out: WritableLike = process.stdout) {}

	token(text: string): void {
		this.out.write(text);
	}

	debug(line: string): void {
		this.out.write(`${line}\n`);
	}
}

/** Buffers everything it receives */
export class CollectingSink implements AnswerSink {
	readonly tokens: string[] = [];
	readonly debugLines: string[] = [];

	token(text: string): void {
		this.tokens.push(text);
	}

	debug(line: string): void {
		this.debugLines.push(line);
	}

	get text(): string {
		return this.tokens.join('');
	}
}

/**
 * Fill in missing sink methods with the console sink
 */
export function resolveSink(sink?: Partial<AnswerSink>): AnswerSink {
	const fallback = new ConsoleSink();
	return {
		token: text => (sink?.token ? sink.token(text) : fallback.token(text)),
		debug: line => (sink?.debug ? sink.debug(line) : fallback.debug(line)),
	};
}
