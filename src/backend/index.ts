/**
 * Backend module entry point
 *
 * The backend is organized into:
 * - server/: Express app configuration, request schemas and route handlers
 * - services/: Business logic (chat, structured output, RAG, ingestion, vector store)
 * - security/: Input sanitizer and content filter
 * - clients/: External service clients (OllamaClient)
 * - config/, utils/, errors/: environment, logging and error types
 *
 * When run directly, this file loads the vector index, starts the server
 * and saves the index again on SIGINT/SIGTERM.
 * When imported, it exports the server factory functions.
 */

import { createOllamaClient } from './clients';
import { AppConfig, loadConfig } from './config/env';
import { toError } from './errors';
import { createApp, startServer, stopServer } from './server';
import {
    createPromptTemplateStore,
    createTokenTextSplitter,
    createVectorStore,
    createVectorStoreLifecycle,
} from './services';
import { getLogger } from './utils/logger';

// Re-export server components
export { createApp, startServer, stopServer, DEFAULT_SERVER_CONFIG } from './server';

export type { ServerConfig } from './server';

// Re-export services
export * from './services';

// Re-export clients
export * from './clients';

export * from './errors';

const log = getLogger('Main');

/**
 * Wires the application from configuration and starts it.
 *
 * @returns a function that stops the server and saves the index
 */
export async function bootstrap(config: AppConfig = loadConfig()): Promise<() => Promise<void>> {
    const ollamaClient = createOllamaClient(config.ollama);
    const vectorStore = createVectorStore(ollamaClient);
    const lifecycle = createVectorStoreLifecycle(
        vectorStore,
        createPromptTemplateStore(config.resourcesDir),
        createTokenTextSplitter(),
        config.vectorStorePath
    );

    const outcome = await lifecycle.initialize();
    log.info({ outcome, chunks: vectorStore.size() }, 'Vector store ready');

    const app = createApp({
        port: config.port,
        corsOrigin: config.corsOrigin,
        resourcesDir: config.resourcesDir,
        ollamaClient,
        vectorStore,
    });
    const server = await startServer(app, config.port);

    return async () => {
        await stopServer(server);
        await lifecycle.shutdown();
    };
}

// Main entry point - start server when run directly
if (require.main === module) {
    bootstrap()
        .then((shutdown) => {
            let stopping = false;
            const onSignal = (signal: NodeJS.Signals): void => {
                if (stopping) {
                    return;
                }
                stopping = true;
                log.info({ signal }, 'Shutting down');
                shutdown()
                    .then(() => process.exit(0))
                    .catch((error: unknown) => {
                        log.error({ err: toError(error) }, 'Shutdown failed');
                        process.exit(1);
                    });
            };
            process.on('SIGINT', onSignal);
            process.on('SIGTERM', onSignal);
        })
        .catch((error: unknown) => {
            log.fatal({ err: toError(error) }, 'Failed to start server');
            process.exit(1);
        });
}
