/**
 * External service clients
 *
 * - OllamaClient: chat completion and embeddings from a local Ollama instance
 */

export {
    OllamaClient,
    createOllamaClient,
    OllamaError,
    OllamaErrorCode,
    DEFAULT_OLLAMA_CONFIG,
    type EmbeddingClient,
    type IOllamaClient,
    type OllamaClientConfig,
} from './ollamaClient';
