/**
 * Vector Store Repository
 *
 * Data-access layer over the vector store. Every failure surfaces as a
 * VectorStoreError so callers only deal with one error type.
 */

import { Document } from '@langchain/core/documents';
import { ChunkMetadata } from '../../shared/types';
import { VectorStoreError, toError } from '../errors';
import { getLogger } from '../utils/logger';
import { IVectorStore, SearchRequest, SearchResult } from './vectorStore';

const log = getLogger('VectorStoreRepository');

export interface IVectorStoreRepository {
    storeDocuments(documents: Document<ChunkMetadata>[]): Promise<string[]>;
    findSimilarDocuments(request: SearchRequest): Promise<SearchResult[]>;
    deleteDocuments(ids: string[]): number;
    findAllDocuments(): Document<ChunkMetadata>[];
    hasDocuments(): boolean;
}

export class VectorStoreRepository implements IVectorStoreRepository {
    constructor(private readonly vectorStore: IVectorStore) {}

    async storeDocuments(documents: Document<ChunkMetadata>[]): Promise<string[]> {
        try {
            log.info({ count: documents.length }, 'Storing documents in vector store');
            const ids = await this.vectorStore.add(documents);
            log.info({ count: ids.length }, 'Stored documents');
            return ids;
        } catch (error) {
            throw this.failure('Failed to store documents', error);
        }
    }

    async findSimilarDocuments(request: SearchRequest): Promise<SearchResult[]> {
        try {
            log.debug({ topK: request.topK }, 'Performing similarity search');
            const results = await this.vectorStore.similaritySearch(request);
            log.debug({ count: results.length }, 'Similarity search complete');
            return results;
        } catch (error) {
            throw this.failure('Failed to search vector store', error);
        }
    }

    deleteDocuments(ids: string[]): number {
        try {
            const deleted = this.vectorStore.delete(ids);
            log.info({ requested: ids.length, deleted }, 'Deleted documents');
            return deleted;
        } catch (error) {
            throw this.failure('Failed to delete documents', error);
        }
    }

    findAllDocuments(): Document<ChunkMetadata>[] {
        try {
            return this.vectorStore.listAll();
        } catch (error) {
            throw this.failure('Failed to retrieve documents', error);
        }
    }

    /**
     * Never throws; an unreadable store counts as empty.
     */
    hasDocuments(): boolean {
        try {
            return this.vectorStore.size() > 0;
        } catch (error) {
            log.warn({ err: error }, 'Failed to check if vector store has documents');
            return false;
        }
    }

    private failure(context: string, error: unknown): VectorStoreError {
        if (error instanceof VectorStoreError) {
            return error;
        }
        const cause = toError(error);
        log.error({ err: cause }, context);
        return new VectorStoreError(`${context}: ${cause.message}`, cause);
    }
}

export function createVectorStoreRepository(vectorStore: IVectorStore): VectorStoreRepository {
    return new VectorStoreRepository(vectorStore);
}
