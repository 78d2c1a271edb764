/**
 * Vector Store Lifecycle
 *
 * Startup: load the saved index, or build it from the bundled FAQ and
 * save it. Shutdown: save the index again so documents ingested while
 * running survive a restart.
 */

import * as fs from 'fs';
import { Document } from '@langchain/core/documents';
import { ChunkMetadata } from '../../shared/types';
import { toError } from '../errors';
import { getLogger } from '../utils/logger';
import { IPromptTemplateStore } from './promptTemplates';
import { TokenTextSplitter } from './textSplitter';
import { IVectorStore } from './vectorStore';

const log = getLogger('VectorStoreLifecycle');

export const FAQ_DOCUMENT = 'docs/consultancy-faq.txt';
export const FAQ_FILENAME = 'consultancy-faq.txt';

export type InitializationOutcome = 'loaded' | 'built';

export class VectorStoreLifecycle {
    constructor(
        private readonly vectorStore: IVectorStore,
        private readonly resources: IPromptTemplateStore,
        private readonly splitter: TokenTextSplitter,
        private readonly filePath: string
    ) {}

    /**
     * @throws VectorStoreError when an existing index file is unreadable
     */
    async initialize(): Promise<InitializationOutcome> {
        if (fs.existsSync(this.filePath)) {
            log.info({ path: this.filePath }, 'Loading vector store from file');
            await this.vectorStore.load(this.filePath);
            log.info({ chunks: this.vectorStore.size() }, 'Vector store loaded');
            return 'loaded';
        }

        log.info({ path: this.filePath }, 'Vector store does not exist, building from FAQ');
        const text = await this.resources.loadResourceText(FAQ_DOCUMENT);
        const source = new Document<ChunkMetadata>({
            pageContent: text,
            metadata: { filename: FAQ_FILENAME },
        });

        const chunks = this.splitter.splitDocuments([source]);
        await this.vectorStore.add(chunks);
        await this.vectorStore.save(this.filePath);
        log.info({ chunks: chunks.length, path: this.filePath }, 'Vector store built and saved');
        return 'built';
    }

    /**
     * @returns whether the index was saved
     */
    async shutdown(): Promise<boolean> {
        try {
            log.info({ path: this.filePath }, 'Saving vector store on shutdown');
            await this.vectorStore.save(this.filePath);
            log.info('Vector store saved on shutdown');
            return true;
        } catch (error) {
            log.error({ err: toError(error) }, 'Failed to save vector store on shutdown');
            return false;
        }
    }
}

export function createVectorStoreLifecycle(
    vectorStore: IVectorStore,
    resources: IPromptTemplateStore,
    splitter: TokenTextSplitter,
    filePath: string
): VectorStoreLifecycle {
    return new VectorStoreLifecycle(vectorStore, resources, splitter, filePath);
}
