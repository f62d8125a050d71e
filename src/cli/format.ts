/**
 * Console output helpers shared by the CLIs
 */

import type { IngestStats } from '../rag/indexer.js';
import type { PullStatus } from '../llm/ollama-client.js';

export function formatIngestSummary(stats: IngestStats): string[] {
	const lines = [
		'',
		'── Summary ─────────────────────────────',
		`✓ ${stats.processed} PDF(s) processed`,
		`✓ ${stats.chunks} chunks  (${stats.inserts} inserts, ${stats.updates} updates, ${stats.skipped} skipped)`,
	];
	if (stats.failed > 0) {
		lines.push(`✗ ${stats.failed} file(s) could not be read`);
	}
	lines.push(`Elapsed: ${(stats.durationMs / 1000).toFixed(1)} s`);
	return lines;
}

/** `pulling manifest`, `downloading 42%` */
export function formatPullStatus(status: PullStatus): string {
	const label = status.status ?? 'pulling';
	if (status.total && status.completed !== undefined) {
		return `${label} ${Math.floor((status.completed / status.total) * 100)}%`;
	}
	return label;
}
