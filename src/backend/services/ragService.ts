/**
 * RAG Service
 *
 * Retrieval-Augmented Generation over the knowledge base:
 * 1. RETRIEVE: find the chunks most similar to the question
 * 2. AUGMENT: place them into the RAG prompt template as {documents}
 * 3. GENERATE: ask the chat model
 */

import { ApiResponse, SearchHit } from '../../shared/types';
import { IOllamaClient } from '../clients/ollamaClient';
import { AIServiceError, VectorStoreError, toError } from '../errors';
import { getLogger } from '../utils/logger';
import { success } from './apiResponse';
import { IPromptTemplateStore, renderTemplate } from './promptTemplates';
import { IVectorStoreRepository } from './vectorStoreRepository';

const log = getLogger('RagService');

/** Chunks placed into the prompt */
export const DEFAULT_TOP_K = 2;
/** Hits returned by a plain search */
export const DEFAULT_SEARCH_TOP_K = 4;

export const RAG_TEMPLATE_NAME = 'rag-prompt-template';

export interface IRagService {
    generateRagResponse(query: string): Promise<ApiResponse<string>>;
    searchDocuments(query: string, topK?: number): Promise<ApiResponse<SearchHit[]>>;
}

export class RagService implements IRagService {
    constructor(
        private readonly ollamaClient: IOllamaClient,
        private readonly repository: IVectorStoreRepository,
        private readonly templates: IPromptTemplateStore
    ) {}

    /**
     * @throws VectorStoreError when retrieval fails
     * @throws AIServiceError when prompting or generation fails
     */
    async generateRagResponse(query: string): Promise<ApiResponse<string>> {
        const hits = await this.repository.findSimilarDocuments({ query, topK: DEFAULT_TOP_K });
        log.debug({ hits: hits.length }, 'Retrieved context chunks');

        try {
            const template = await this.templates.loadTemplate(RAG_TEMPLATE_NAME);
            const documents = hits.map((hit) => hit.document.pageContent).join('\n');
            const prompt = await renderTemplate(template, { input: query, documents });
            const reply = await this.ollamaClient.chat([{ role: 'user', content: prompt }]);
            return success(reply, 'RAG response generated successfully');
        } catch (error) {
            const cause = toError(error);
            log.error({ err: cause }, 'Failed to generate RAG response');
            throw new AIServiceError(`Failed to generate RAG response: ${cause.message}`, cause);
        }
    }

    async searchDocuments(
        query: string,
        topK: number = DEFAULT_SEARCH_TOP_K
    ): Promise<ApiResponse<SearchHit[]>> {
        const results = await this.repository.findSimilarDocuments({ query, topK });
        const hits: SearchHit[] = results.map(({ document, score }) => {
            if (document.id === undefined) {
                throw new VectorStoreError('Stored document has no id');
            }
            return {
                id: document.id,
                content: document.pageContent,
                metadata: document.metadata,
                score,
            };
        });
        return success(hits, 'Documents retrieved successfully');
    }
}

export function createRagService(
    ollamaClient: IOllamaClient,
    repository: IVectorStoreRepository,
    templates: IPromptTemplateStore
): RagService {
    return new RagService(ollamaClient, repository, templates);
}
