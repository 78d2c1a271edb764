/**
 * Express Server Configuration and Routes
 *
 * HTTP layer of Prompt Lab. It exposes REST endpoints for:
 * - Health checks (Ollama connectivity, index size)
 * - Chat completion and prompt engineering demos
 * - Structured output (list, map, typed object)
 * - Retrieval-augmented generation over the knowledge base
 * - Document management (ingest, list, delete, statistics)
 *
 * Every response body is the `{ success, message, data }` envelope.
 * Routes validate their input and delegate to services; errors flow to
 * the error middleware, which picks the status code from the error type.
 */

import * as http from 'http';
import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { ApiResponse, HealthResponse } from '../../shared/types';
import { createOllamaClient, IOllamaClient } from '../clients/ollamaClient';
import { DEFAULT_RESOURCES_DIR } from '../config/env';
import { AppError } from '../errors';
import { createContentFilter, createInputSanitizer } from '../security';
import {
    createChatService,
    createDocumentIngestionService,
    createOutputService,
    createPromptTemplateStore,
    createRagService,
    createTokenTextSplitter,
    createVectorStore,
    createVectorStoreRepository,
    failure,
    INGESTION_SPLITTER_CONFIG,
    IVectorStore,
    MAX_FILE_SIZE,
    TokenTextSplitter,
} from '../services';
import { getLogger } from '../utils/logger';
import {
    artistQuerySchema,
    authorParamSchema,
    authorQuerySchema,
    contextInjectionRequestSchema,
    deleteQuerySchema,
    genreQuerySchema,
    messageQuerySchema,
    parseRequest,
    promptRequestSchema,
    queryRequestSchema,
    textIngestionRequestSchema,
    uploadFieldsSchema,
} from './requests';

const log = getLogger('Server');

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on (0 picks a free port) */
    port: number;
    /** CORS origin (default: allow all) */
    corsOrigin: string;
    /** Directory holding prompt templates and bundled documents */
    resourcesDir: string;
    /** Ollama client instance (for dependency injection) */
    ollamaClient?: IOllamaClient;
    /** Vector store instance (for dependency injection) */
    vectorStore?: IVectorStore;
    /** Splitter used for ingested documents (for dependency injection) */
    splitter?: TokenTextSplitter;
}

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG: ServerConfig = {
    port: 8080,
    corsOrigin: '*',
    resourcesDir: DEFAULT_RESOURCES_DIR,
};

type RouteHandler = (req: Request, res: Response) => Promise<void> | void;

/**
 * Forwards sync throws and async rejections to the error middleware.
 */
function handle(handler: RouteHandler) {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
        try {
            await handler(req, res);
        } catch (error) {
            next(error);
        }
    };
}

/** Largest JSON body express.json() accepts */
export const JSON_BODY_LIMIT = '1mb';

/**
 * Shape of the errors express.json() raises: an HTTP status plus a
 * `type` such as `entity.parse.failed` or `entity.too.large`.
 */
interface BodyParserError extends Error {
    status: number;
    type: string;
}

function isBodyParserError(error: unknown): error is BodyParserError {
    return (
        error instanceof Error &&
        'status' in error &&
        typeof error.status === 'number' &&
        'type' in error &&
        typeof error.type === 'string'
    );
}

function describeBodyError(error: BodyParserError): string {
    switch (error.type) {
        case 'entity.parse.failed':
            return 'Malformed JSON request body';
        case 'entity.too.large':
            return `Request body exceeds the ${JSON_BODY_LIMIT} limit`;
        default:
            return error.message;
    }
}

/**
 * Creates and configures the Express application.
 *
 * Services are built here from the injected client and store, so tests
 * can swap Ollama for an in-process fake.
 */
export function createApp(config: Partial<ServerConfig> = {}): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const ollamaClient = mergedConfig.ollamaClient ?? createOllamaClient();
    const vectorStore = mergedConfig.vectorStore ?? createVectorStore(ollamaClient);
    const splitter = mergedConfig.splitter ?? createTokenTextSplitter(INGESTION_SPLITTER_CONFIG);
    const templates = createPromptTemplateStore(mergedConfig.resourcesDir);
    const repository = createVectorStoreRepository(vectorStore);

    const chatService = createChatService(
        ollamaClient,
        templates,
        createInputSanitizer(),
        createContentFilter()
    );
    const outputService = createOutputService(ollamaClient);
    const ragService = createRagService(ollamaClient, repository, templates);
    const documentIngestion = createDocumentIngestionService(repository, splitter);

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.use(
        cors({
            origin: mergedConfig.corsOrigin,
            methods: ['GET', 'POST', 'DELETE'],
            allowedHeaders: ['Content-Type', 'Authorization'],
        })
    );

    app.use(express.json({ limit: JSON_BODY_LIMIT }));

    // Uploads stay in memory; the ingestion service decodes them directly
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: {
            fileSize: MAX_FILE_SIZE,
        },
    });

    app.use((req: Request, res: Response, next: NextFunction) => {
        const startTime = Date.now();
        res.on('finish', () => {
            log.info(
                { method: req.method, path: req.path, status: res.statusCode, durationMs: Date.now() - startTime },
                'Request completed'
            );
        });
        next();
    });

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 503 when Ollama is unreachable.
     */
    app.get('/api/health', handle(async (_req, res) => {
        const ollamaAvailable = await ollamaClient.isAvailable().catch((error: unknown) => {
            log.error({ err: error }, 'Health check error');
            return false;
        });

        const health: HealthResponse = {
            status: ollamaAvailable ? 'ok' : 'error',
            ollama: ollamaAvailable,
            indexedChunks: vectorStore.size(),
        };
        const body: ApiResponse<HealthResponse> = {
            success: ollamaAvailable,
            message: ollamaAvailable ? 'Service is healthy' : 'Ollama is not available',
            data: health,
        };

        res.status(ollamaAvailable ? 200 : 503).json(body);
    }));

    // =========================================================================
    // Chat Endpoints
    // =========================================================================

    app.post('/api/v1/chat/generate', handle(async (req, res) => {
        const { prompt } = parseRequest(promptRequestSchema, req.body);
        res.json(await chatService.generateResponse(prompt));
    }));

    app.get('/api/v1/chat/basic', handle(async (req, res) => {
        const { message } = parseRequest(messageQuerySchema, req.query);
        res.json(await chatService.generateResponse(message));
    }));

    app.get('/api/v1/chat/dad-jokes', handle(async (req, res) => {
        const { message } = parseRequest(messageQuerySchema, req.query);
        res.json(await chatService.generateDirect(message));
    }));

    // =========================================================================
    // Prompt Engineering Endpoints
    // =========================================================================

    app.get('/api/v1/prompts/simple', handle(async (_req, res) => {
        res.json(await chatService.generateSimplePrompt());
    }));

    app.get('/api/v1/prompts/youtube', handle(async (req, res) => {
        const { genre } = parseRequest(genreQuerySchema, req.query);
        res.json(await chatService.generatePromptTemplate(genre));
    }));

    app.get('/api/v1/prompts/youtube-extended', handle(async (req, res) => {
        const { genre } = parseRequest(genreQuerySchema, req.query);
        res.json(await chatService.generateExternalPromptTemplate(genre));
    }));

    app.get('/api/v1/prompts/jokes', handle(async (_req, res) => {
        res.json(await chatService.generateWithSystemMessage());
    }));

    app.post('/api/v1/prompts/olympics', handle(async (req, res) => {
        const { prompt, stuffit } = parseRequest(contextInjectionRequestSchema, req.body);
        res.json(await chatService.stuffThePrompt(prompt, stuffit));
    }));

    // =========================================================================
    // Structured Output Endpoints
    // =========================================================================

    app.get('/api/v1/output/songs', handle(async (req, res) => {
        const { artist } = parseRequest(artistQuerySchema, req.query);
        res.json(await outputService.generateSongsList(artist));
    }));

    app.get('/api/v1/output/books', handle(async (req, res) => {
        const { author } = parseRequest(authorQuerySchema, req.query);
        res.json(await outputService.generateAuthorBooks(author));
    }));

    app.get('/api/v1/output/:author', handle(async (req, res) => {
        const { author } = parseRequest(authorParamSchema, req.params);
        res.json(await outputService.generateAuthorLinks(author));
    }));

    // =========================================================================
    // RAG Endpoints
    // =========================================================================

    app.post('/api/v1/rag/query', handle(async (req, res) => {
        const { query } = parseRequest(queryRequestSchema, req.body);
        res.json(await ragService.generateRagResponse(query));
    }));

    app.post('/api/v1/rag/search', handle(async (req, res) => {
        const { query, topK } = parseRequest(queryRequestSchema, req.body);
        res.json(await ragService.searchDocuments(query, topK));
    }));

    app.get('/api/v1/rag/faq', handle(async (req, res) => {
        const { message } = parseRequest(messageQuerySchema, req.query);
        res.json(await ragService.generateRagResponse(message));
    }));

    // =========================================================================
    // Document Management Endpoints
    // =========================================================================

    /**
     * POST /api/documents/upload
     *
     * multipart/form-data with a `file` part and optional `metadata` field.
     */
    app.post('/api/documents/upload', upload.single('file'), handle(async (req, res) => {
        const file = req.file;
        if (!file) {
            res.status(400).json(failure('No file uploaded. Please select a file to upload.', 'Input Validation Error'));
            return;
        }

        const { metadata } = parseRequest(uploadFieldsSchema, req.body);
        const result = await documentIngestion.ingestDocument(
            { originalName: file.originalname, size: file.size, buffer: file.buffer },
            metadata
        );
        res.json(result);
    }));

    app.post('/api/documents/ingest-text', handle(async (req, res) => {
        const { content, title, metadata } = parseRequest(textIngestionRequestSchema, req.body);
        res.json(await documentIngestion.ingestTextContent(content, title, metadata));
    }));

    app.get('/api/documents/list', handle((_req, res) => {
        res.json(documentIngestion.listDocuments());
    }));

    app.delete('/api/documents/delete', handle((req, res) => {
        const { ids } = parseRequest(deleteQuerySchema, req.query);
        res.json(documentIngestion.deleteDocuments(ids));
    }));

    app.get('/api/documents/stats', handle((_req, res) => {
        res.json(documentIngestion.getDocumentStatistics());
    }));

    // =========================================================================
    // Fallbacks
    // =========================================================================

    app.use((req: Request, res: Response) => {
        res.status(404).json(failure(`No route for ${req.method} ${req.path}`, 'Not Found'));
    });

    /**
     * Global error handler.
     *
     * AppErrors carry their own status and title. Rejected uploads and
     * request bodies are 4xx validation failures; anything else is a
     * masked 500.
     */
    app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof AppError) {
            const level = err.statusCode >= 500 ? 'error' : 'warn';
            log[level]({ err, status: err.statusCode }, err.title);
            res.status(err.statusCode).json(failure(err.publicDetail, err.title));
            return;
        }

        if (err instanceof multer.MulterError) {
            log.warn({ code: err.code }, 'Upload rejected');
            res.status(400).json(failure(err.message, 'Validation Error'));
            return;
        }

        if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
            log.warn({ type: err.type, status: err.status }, 'Request body rejected');
            res.status(err.status).json(failure(describeBodyError(err), 'Validation Error'));
            return;
        }

        log.error({ err }, 'Unexpected error occurred');
        res.status(500).json(failure('An unexpected error occurred', 'Internal Server Error'));
    });

    return app;
}

/**
 * Starts listening.
 *
 * @returns the listening server, once it is accepting connections
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port);
        server.once('listening', () => {
            log.info({ port }, 'Prompt Lab server running');
            resolve(server);
        });
        server.once('error', reject);
    });
}

/**
 * Closes the server, resolving once open connections are done.
 */
export function stopServer(server: http.Server): Promise<void> {
    return new Promise((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
    });
}
