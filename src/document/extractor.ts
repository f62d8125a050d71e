/**
 * PDF text extraction
 */

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { extractText, getDocumentProxy } from 'unpdf';
import type { TextExtractor } from './types.js';
import { ExtractionError, errorMessage, toError } from '../shared/errors.js';
import { Logger } from '../shared/logger.js';

/**
 * Normalise whitespace of extracted text
 * Keeps paragraph breaks, drops layout padding
 */
export function normalizeExtractedText(content: string): string {
	let cleaned = content.replace(/\r\n?/g, '\n');
	cleaned = cleaned.replace(/\u00a0/g, ' ');
	cleaned = cleaned.replace(/[ \t\f\v]+/g, ' ');
	cleaned = cleaned.replace(/ *\n */g, '\n');
	cleaned = cleaned.replace(/\n{3,}/g, '\n\n');
	return cleaned.trim();
}

export interface PdfTextExtractorConfig {
	logger?: Logger;
}

export class PdfTextExtractor implements TextExtractor {
	private readonly logger: Logger;

	constructor(config: PdfTextExtractorConfig = {}) {
		this.logger = config.logger ?? new Logger();
	}

	/**
	 * @throws ExtractionError 文件不可读或不是有效的 PDF
	 */
	async extract(filePath: string): Promise<string> {
		try {
			const buffer = await readFile(filePath);
			const pdf = await getDocumentProxy(new Uint8Array(buffer));
			const { totalPages, text } = await extractText(pdf, { mergePages: true });
			this.logger.debug(`Extracted ${basename(filePath)}`, { pages: totalPages, chars: text.length });
			return normalizeExtractedText(text);
		} catch (err) {
			throw new ExtractionError(`Failed to extract ${basename(filePath)}: ${errorMessage(err)}`, filePath, toError(err));
		}
	}
}

/** 工厂函数 */
export function createPdfExtractor(logger?: Logger): PdfTextExtractor {
	return new PdfTextExtractor({ logger });
}
