/**
 * Ollama Client
 *
 * Wrapper for communicating with an Ollama instance, which serves both
 * the chat model and the embedding model.
 *
 * Ollama API endpoints used:
 * - GET /api/tags - List available models (used for health check)
 * - POST /api/chat - Chat completion over a list of messages
 * - POST /api/embeddings - Generate vector embeddings
 */

import { ChatMessage, GenerationOptions } from '../../shared/types';

export interface OllamaClientConfig {
    /** Base URL for Ollama API (default: http://localhost:11434) */
    baseUrl: string;
    /** Default model for chat completion */
    chatModel: string;
    /** Model used for embeddings */
    embeddingModel: string;
    /** Request timeout in milliseconds */
    timeoutMs: number;
}

export const DEFAULT_OLLAMA_CONFIG: OllamaClientConfig = {
    baseUrl: 'http://localhost:11434',
    chatModel: 'llama3.2',
    embeddingModel: 'nomic-embed-text',
    timeoutMs: 60000,
};

/**
 * Error codes for different failure scenarios.
 */
export enum OllamaErrorCode {
    /** Ollama service is not running or unreachable */
    CONNECTION_REFUSED = 'CONNECTION_REFUSED',
    /** Request took too long */
    TIMEOUT = 'TIMEOUT',
    /** Requested model is not available */
    MODEL_NOT_FOUND = 'MODEL_NOT_FOUND',
    /** Ollama returned an error response */
    API_ERROR = 'API_ERROR',
    /** Unexpected error during communication */
    UNKNOWN = 'UNKNOWN',
}

export class OllamaError extends Error {
    constructor(
        message: string,
        public readonly code: OllamaErrorCode,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'OllamaError';
    }
}

interface OllamaChatResponse {
    message?: {
        role: string;
        content: string;
    };
    done: boolean;
}

interface OllamaEmbeddingResponse {
    embedding?: number[];
}

/**
 * Embedding half of the client. The vector store only needs this.
 */
export interface EmbeddingClient {
    generateEmbedding(text: string): Promise<number[]>;
}

/**
 * Contract the services depend on; tests substitute an in-process fake.
 */
export interface IOllamaClient extends EmbeddingClient {
    isAvailable(): Promise<boolean>;
    chat(messages: ChatMessage[], options?: GenerationOptions): Promise<string>;
}

export class OllamaClient implements IOllamaClient {
    private readonly config: OllamaClientConfig;

    constructor(config: Partial<OllamaClientConfig> = {}) {
        this.config = { ...DEFAULT_OLLAMA_CONFIG, ...config };
    }

    /**
     * Check if Ollama is available and responding.
     * /api/tags is lightweight and confirms the server can answer.
     */
    async isAvailable(): Promise<boolean> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/tags`,
                { method: 'GET' },
                5000
            );
            return response.ok;
        } catch {
            return false;
        }
    }

    /**
     * Send a conversation to the chat model and return the reply text.
     *
     * @throws OllamaError if the request fails or the reply has no message
     */
    async chat(messages: ChatMessage[], options: GenerationOptions = {}): Promise<string> {
        const model = options.model ?? this.config.chatModel;

        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/chat`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model,
                        messages,
                        stream: false,
                        options: {
                            temperature: options.temperature ?? 0.7,
                            num_predict: options.maxTokens ?? 2048,
                        },
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, model);
            }

            const data = (await response.json()) as OllamaChatResponse;
            if (!data.message || typeof data.message.content !== 'string') {
                throw new OllamaError(
                    'Ollama returned a chat response without a message',
                    OllamaErrorCode.API_ERROR
                );
            }
            return data.message.content;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate chat completion');
        }
    }

    /**
     * Generate an embedding vector for the given text.
     *
     * @throws OllamaError if embedding generation fails
     */
    async generateEmbedding(text: string): Promise<number[]> {
        try {
            const response = await this.fetchWithTimeout(
                `${this.config.baseUrl}/api/embeddings`,
                {
                    method: 'POST',
                    headers: {
                        'Content-Type': 'application/json',
                    },
                    body: JSON.stringify({
                        model: this.config.embeddingModel,
                        prompt: text,
                    }),
                },
                this.config.timeoutMs
            );

            if (!response.ok) {
                await this.handleErrorResponse(response, this.config.embeddingModel);
            }

            const data = (await response.json()) as OllamaEmbeddingResponse;
            if (!Array.isArray(data.embedding) || data.embedding.length === 0) {
                throw new OllamaError(
                    `Model "${this.config.embeddingModel}" returned an empty embedding`,
                    OllamaErrorCode.API_ERROR
                );
            }
            return data.embedding;
        } catch (error) {
            throw this.wrapError(error, 'Failed to generate embedding');
        }
    }

    /**
     * fetch() has no timeout of its own, so requests are aborted
     * through an AbortController.
     */
    private async fetchWithTimeout(
        url: string,
        options: RequestInit,
        timeoutMs: number
    ): Promise<Response> {
        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

        try {
            return await fetch(url, {
                ...options,
                signal: controller.signal,
            });
        } catch (error) {
            if (error instanceof Error && error.name === 'AbortError') {
                throw new OllamaError(
                    `Request timed out after ${timeoutMs}ms`,
                    OllamaErrorCode.TIMEOUT
                );
            }
            throw error;
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * - 404: Model not found (user needs to pull it)
     * - Others: Various API errors
     */
    private async handleErrorResponse(response: Response, model: string): Promise<never> {
        let errorMessage: string;

        try {
            const errorBody = (await response.json()) as { error?: unknown };
            errorMessage =
                typeof errorBody.error === 'string' ? errorBody.error : `HTTP ${response.status}`;
        } catch {
            errorMessage = `HTTP ${response.status}: ${response.statusText}`;
        }

        if (response.status === 404 || errorMessage.includes('not found')) {
            throw new OllamaError(
                `Model "${model}" not found. Please run: ollama pull ${model}`,
                OllamaErrorCode.MODEL_NOT_FOUND
            );
        }

        throw new OllamaError(`Ollama API error: ${errorMessage}`, OllamaErrorCode.API_ERROR);
    }

    private wrapError(error: unknown, context: string): OllamaError {
        if (error instanceof OllamaError) {
            return error;
        }

        // Node's fetch raises TypeError("fetch failed") when nothing listens
        if (error instanceof TypeError && error.message.includes('fetch')) {
            return new OllamaError(
                `Cannot connect to Ollama at ${this.config.baseUrl}. Please ensure Ollama is running (ollama serve)`,
                OllamaErrorCode.CONNECTION_REFUSED,
                error
            );
        }

        const message = error instanceof Error ? error.message : String(error);
        return new OllamaError(
            `${context}: ${message}`,
            OllamaErrorCode.UNKNOWN,
            error instanceof Error ? error : undefined
        );
    }
}

export function createOllamaClient(config?: Partial<OllamaClientConfig>): OllamaClient {
    return new OllamaClient(config);
}
