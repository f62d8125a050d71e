/**
 * HTTP entry point
 */

import { createPipeline } from './bootstrap.js';
import { getVersion } from './config/loader.js';
import { startServer, type ServerHandle } from './server.js';
import { ConfigError, errorMessage } from './shared/errors.js';
import { createDefaultLogger } from './shared/logger.js';

const logger = createDefaultLogger('MAIN');

async function main(): Promise<void> {
	let handle: ServerHandle;
	try {
		const { env, assistant, generator } = await createPipeline();

		const status = await generator.testConnection();
		if (!status.ok) {
			logger.warn(`Ollama not ready: ${status.reason}`);
		}

		const version = await getVersion();
		handle = await startServer({ assistant, version }, env.PORT, env.HOST);
		logger.info(`Server ready at http://${env.HOST}:${env.PORT}`);
	} catch (err) {
		logger.error(`Startup failed: ${errorMessage(err)}`);
		if (err instanceof ConfigError) {
			logger.error('Configuration error - check environment variables and config/rag.yaml');
		}
		process.exit(1);
	}

	const shutdown = async (signal: string): Promise<void> => {
		logger.info(`Received ${signal}, shutting down...`);
		try {
			await handle.close();
			logger.info('Shutdown complete');
			process.exit(0);
		} catch (err) {
			logger.error('Shutdown error', { error: errorMessage(err) });
			process.exit(1);
		}
	};

	process.on('SIGTERM', () => void shutdown('SIGTERM'));
	process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err) => {
	logger.error('Fatal error', { error: errorMessage(err) });
	process.exit(1);
});
