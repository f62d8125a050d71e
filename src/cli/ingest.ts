#!/usr/bin/env node
/**
 * Ingestion script — PDF 目录 → 分块 → 向量化 → Qdrant
 *
 * 用法:
 *   npm run ingest                          # 导入 DATA_DIR 中的所有 PDF
 *   npm run ingest -- --data-dir ./manuals  # 指定目录
 *   npm run ingest -- --force               # 强制重建 collection（删除旧数据）
 */

import { parseArgs } from 'node:util';
import { createPipeline } from '../bootstrap.js';
import { errorMessage } from '../shared/errors.js';
import { createDefaultLogger } from '../shared/logger.js';
import { formatIngestSummary } from './format.js';

const logger = createDefaultLogger('INGEST');

const { values: args } = parseArgs({
	options: {
		'data-dir': { type: 'string', short: 'd' },
		force: { type: 'boolean', short: 'f', default: false },
	},
});

async function main(): Promise<void> {
	const { env, store, embedder, ingestor } = await createPipeline();
	const dataDir = args['data-dir'] ?? env.DATA_DIR;
	const force = args.force ?? false;

	logger.info(`Data dir: ${dataDir}, collection: ${env.COLLECTION_NAME}, force: ${force}`);

	await store.ensureCollection(embedder.getEmbeddingDim(), force);

	const stats = await ingestor.ingest(dataDir);
	for (const line of formatIngestSummary(stats)) {
		console.log(line);
	}

	logger.info(`Collection ${env.COLLECTION_NAME}: ${await store.countPoints()} points total`);
}

main().catch(err => {
	logger.error('Ingestion failed', { error: errorMessage(err) });
	process.exit(1);
});
