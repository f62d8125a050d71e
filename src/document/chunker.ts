/**
 * Fixed-size overlapping text chunker
 *
 * Cuts at the best natural boundary inside each window
 * (paragraph > line > CJK full stop > sentence end > word), then starts the next
 * window `chunk_overlap` characters before the cut, aligned to a word start.
 */

import type { ChunkerOptions, TextChunk } from './types.js';
import { ConfigError } from '../shared/errors.js';

const SIMPLE_SEPARATORS = ['\n\n', '\n', '。'];

export class TextChunker {
	protected readonly chunkSize: number;
	protected readonly chunkOverlap: number;
	protected readonly minChunkSize: number;

	constructor(options: ChunkerOptions) {
		if (options.chunk_overlap * 2 >= options.chunk_size) {
			throw new ConfigError(
				`chunk_overlap (${options.chunk_overlap}) must be less than half of chunk_size (${options.chunk_size})`,
			);
		}
		this.chunkSize = options.chunk_size;
		this.chunkOverlap = options.chunk_overlap;
		this.minChunkSize = options.min_chunk_size;
	}

	/**
	 * Split text into ordered chunks; index is the chunk's position within the source
	 */
	split(text: string): TextChunk[] {
		const source = text.trim();
		if (!source) return [];

		if (source.length <= this.chunkSize) {
			return source.length >= this.minChunkSize ? [{ index: 0, content: source }] : [];
		}

		const chunks: TextChunk[] = [];
		let start = 0;

		while (start < source.length) {
			let end = Math.min(start + this.chunkSize, source.length);
			if (end < source.length) {
				const window = source.slice(start, start + this.chunkSize + 1);
				end = start + this.findBreakPoint(window, this.chunkSize);
			}

			const content = source.slice(start, end).trim();
			if (content.length >= this.minChunkSize) {
				chunks.push({ index: chunks.length, content });
			}

			if (end >= source.length) break;
			start = Math.max(this.overlapStart(source, end), start + 1);
		}

		return chunks;
	}

	/**
	 * Find best break point in text, never beyond maxPos (URL-safe for '.')
	 */
	protected findBreakPoint(text: string, maxPos: number): number {
		const halfPos = maxPos / 2;

		for (const sep of SIMPLE_SEPARATORS) {
			const pos = text.lastIndexOf(sep, maxPos - sep.length);
			if (pos > halfPos) {
				return pos + sep.length;
			}
		}

		// 句末的 '.' 后跟空白/EOF，URL 内的 '.' 后跟字母数字
		let searchPos = maxPos - 1;
		while (searchPos > halfPos) {
			const pos = text.lastIndexOf('.', searchPos);
			if (pos <= halfPos) break;
			const next = text[pos + 1];
			if (!next || /\s/.test(next)) {
				return pos + 1;
			}
			searchPos = pos - 1;
		}

		const space = text.lastIndexOf(' ', maxPos - 1);
		if (space > halfPos) {
			return space + 1;
		}

		return maxPos;
	}

	/**
	 * Start of the next window: `chunkOverlap` before the cut, moved forward to a word start
	 */
	protected overlapStart(text: string, end: number): number {
		const pos = end - this.chunkOverlap;
		if (pos <= 0 || /\s/.test(text[pos - 1] ?? '')) {
			return pos;
		}
		for (let i = pos; i < end; i++) {
			if (/\s/.test(text[i] ?? '')) {
				return i + 1;
			}
		}
		return pos;
	}
}

/** 工厂函数 */
export function createChunker(options: ChunkerOptions): TextChunker {
	return new TextChunker(options);
}
