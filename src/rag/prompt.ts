/**
 * Prompt assembly
 */

export const CONTEXT_SEPARATOR = '\n\n';

const PLACEHOLDER = /\{(context|question)\}/g;

/**
 * Fill `{context}` and `{question}` in one pass, so braces inside the inserted
 * text are never substituted again
 */
export function buildPrompt(template: string, chunks: readonly string[], question: string): string {
	const values = {
		context: chunks.join(CONTEXT_SEPARATOR),
		question,
	};
	return template.replace(PLACEHOLDER, (_match, name: 'context' | 'question') => values[name]);
}
