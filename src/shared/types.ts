/**
 * Shared type definitions for Prompt Lab
 *
 * These types define the contract between the HTTP layer, the services
 * and API clients. They're organized by domain:
 * - API: Response envelope and health report
 * - Chat: Messages sent to the model
 * - Output: Structured output shapes
 * - Documents: Knowledge base chunks and ingestion results
 */

// ============================================================================
// API Types
// ============================================================================

/**
 * Uniform response envelope returned by every endpoint.
 * On failure `data` carries the error detail string.
 */
export interface ApiResponse<T> {
    success: boolean;
    message: string;
    data?: T;
}

export interface HealthResponse {
    status: 'ok' | 'error';
    ollama: boolean;
    indexedChunks: number;
}

// ============================================================================
// Chat Types
// ============================================================================

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * A single message in a model conversation.
 */
export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/**
 * Options for text generation.
 */
export interface GenerationOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
}

// ============================================================================
// Output Types
// ============================================================================

export interface Author {
    author: string;
    books: string[];
}

// ============================================================================
// Document Types
// ============================================================================

/**
 * Metadata attached to stored chunks. `filename` groups chunks back
 * into their source document.
 */
export type ChunkMetadata = Record<string, unknown>;

/**
 * A chunk returned from similarity search.
 */
export interface SearchHit {
    id: string;
    content: string;
    metadata: ChunkMetadata;
    score: number;
}

/**
 * An uploaded file as handed over by the HTTP layer.
 */
export interface UploadedFile {
    originalName: string;
    size: number;
    buffer: Buffer;
}

export interface IngestionResult {
    filename: string;
    originalLength: number;
    chunkCount: number;
    processingTimeMs: number;
    metadata: ChunkMetadata;
    timestamp: string;
}

export interface DocumentSummary {
    filename: string;
    chunkCount: number;
    metadata: ChunkMetadata;
    totalCharacters: number;
}

export interface DeletionResult {
    deletedIds: string[];
    count: number;
    timestamp: string;
}

export interface DocumentStatistics {
    totalDocuments: number;
    totalCharacters: number;
    uniqueFiles: number;
    averageChunkSize: number;
    fileTypes: Record<string, number>;
    timestamp: string;
    hasDocuments: boolean;
}
