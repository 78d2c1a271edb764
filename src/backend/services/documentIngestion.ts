/**
 * Document Ingestion Service
 *
 * Adds documents to the knowledge base and manages what is stored.
 *
 * PIPELINE:
 * 1. Validate the upload (size, extension, not empty)
 * 2. Decode it as UTF-8 text
 * 3. Split into token chunks
 * 4. Embed and store the chunks
 *
 * Chunks are grouped back into documents by their `filename` metadata.
 */

import { Document } from '@langchain/core/documents';
import {
    ApiResponse,
    ChunkMetadata,
    DeletionResult,
    DocumentStatistics,
    DocumentSummary,
    IngestionResult,
    UploadedFile,
} from '../../shared/types';
import { AIServiceError, AppError, ValidationError, toError } from '../errors';
import { getLogger } from '../utils/logger';
import { success } from './apiResponse';
import { TokenSplitterConfig, TokenTextSplitter } from './textSplitter';
import { IVectorStoreRepository } from './vectorStoreRepository';

const log = getLogger('DocumentIngestion');

export const MAX_FILE_SIZE = 10 * 1024 * 1024;

export const SUPPORTED_EXTENSIONS: ReadonlySet<string> = new Set([
    'txt', 'md', 'markdown', 'text', 'log', 'csv', 'json', 'xml', 'html', 'htm',
]);

export const DEFAULT_TEXT_TITLE = 'Text Document';

const UNKNOWN_FILENAME = 'unknown';

const INPUT_VALIDATION_ERROR = 'Input Validation Error';

export const INGESTION_SPLITTER_CONFIG: Partial<TokenSplitterConfig> = {
    chunkSize: 800,
    chunkOverlap: 400,
    minChunkSizeChars: 400,
    minChunkLengthToEmbed: 5,
    maxNumChunks: 10000,
    keepSeparator: true,
};

/**
 * Lowercased text after the last dot, or '' when there is none.
 */
export function getFileExtension(filename: string): string {
    if (!filename || filename.trim().length === 0) {
        return '';
    }
    const lastDot = filename.lastIndexOf('.');
    if (lastDot === -1 || lastDot === filename.length - 1) {
        return '';
    }
    return filename.substring(lastDot + 1).toLowerCase();
}

export function isSupportedFileFormat(filename: string): boolean {
    return SUPPORTED_EXTENSIONS.has(getFileExtension(filename));
}

function filenameOf(metadata: ChunkMetadata): string {
    const filename = metadata.filename;
    return typeof filename === 'string' && filename.length > 0 ? filename : UNKNOWN_FILENAME;
}

export interface IDocumentIngestionService {
    ingestDocument(file: UploadedFile, metadata?: string): Promise<ApiResponse<IngestionResult>>;
    ingestTextContent(
        content: string,
        title?: string,
        metadata?: string
    ): Promise<ApiResponse<IngestionResult>>;
    listDocuments(): ApiResponse<DocumentSummary[]>;
    deleteDocuments(idsCsv: string): ApiResponse<DeletionResult>;
    getDocumentStatistics(): ApiResponse<DocumentStatistics>;
}

export class DocumentIngestionService implements IDocumentIngestionService {
    constructor(
        private readonly repository: IVectorStoreRepository,
        private readonly splitter: TokenTextSplitter
    ) {}

    /**
     * @throws ValidationError for empty, oversized or unsupported files
     */
    async ingestDocument(file: UploadedFile, metadata?: string): Promise<ApiResponse<IngestionResult>> {
        log.info({ filename: file.originalName, size: file.size }, 'Starting document ingestion');
        this.validateFile(file);

        return this.guard('Document ingestion failed', async () => {
            const content = file.buffer.toString('utf-8');
            const source = this.buildSource(metadata, file.originalName, file.size);
            return this.processContent(content, file.originalName, source);
        });
    }

    async ingestTextContent(
        content: string,
        title?: string,
        metadata?: string
    ): Promise<ApiResponse<IngestionResult>> {
        log.info({ length: content.length }, 'Starting text content ingestion');
        const documentTitle = title && title.trim().length > 0 ? title : DEFAULT_TEXT_TITLE;

        return this.guard('Text content ingestion failed', async () => {
            const source = this.buildSource(metadata, documentTitle, content.length);
            return this.processContent(content, documentTitle, source);
        });
    }

    listDocuments(): ApiResponse<DocumentSummary[]> {
        const groups = new Map<string, Document<ChunkMetadata>[]>();
        for (const chunk of this.repository.findAllDocuments()) {
            const filename = filenameOf(chunk.metadata);
            const group = groups.get(filename);
            if (group) {
                group.push(chunk);
            } else {
                groups.set(filename, [chunk]);
            }
        }

        const summaries: DocumentSummary[] = [];
        for (const [filename, chunks] of groups) {
            summaries.push({
                filename,
                chunkCount: chunks.length,
                metadata: chunks[0]?.metadata ?? {},
                totalCharacters: chunks.reduce((sum, chunk) => sum + chunk.pageContent.length, 0),
            });
        }

        log.info({ documents: summaries.length }, 'Retrieved document list');
        return success(summaries, 'Document list retrieved successfully');
    }

    /**
     * @param idsCsv comma separated chunk ids
     * @throws ValidationError when no id remains after trimming
     */
    deleteDocuments(idsCsv: string): ApiResponse<DeletionResult> {
        const ids = idsCsv
            .split(',')
            .map((id) => id.trim())
            .filter((id) => id.length > 0);

        if (ids.length === 0) {
            throw new ValidationError('No valid document IDs provided', INPUT_VALIDATION_ERROR);
        }

        this.repository.deleteDocuments(ids);
        return success(
            { deletedIds: ids, count: ids.length, timestamp: new Date().toISOString() },
            'Documents deleted successfully'
        );
    }

    getDocumentStatistics(): ApiResponse<DocumentStatistics> {
        const chunks = this.repository.findAllDocuments();
        const totalCharacters = chunks.reduce((sum, chunk) => sum + chunk.pageContent.length, 0);
        const files = new Set<string>();
        const fileTypes: Record<string, number> = {};

        for (const chunk of chunks) {
            const filename = filenameOf(chunk.metadata);
            files.add(filename);
            const extension = getFileExtension(filename);
            fileTypes[extension] = (fileTypes[extension] ?? 0) + 1;
        }

        const stats: DocumentStatistics = {
            totalDocuments: chunks.length,
            totalCharacters,
            uniqueFiles: files.size,
            averageChunkSize: chunks.length > 0 ? totalCharacters / chunks.length : 0,
            fileTypes,
            timestamp: new Date().toISOString(),
            hasDocuments: this.repository.hasDocuments(),
        };

        log.info({ chunks: stats.totalDocuments, files: stats.uniqueFiles }, 'Retrieved document statistics');
        return success(stats, 'Document statistics retrieved successfully');
    }

    private validateFile(file: UploadedFile): void {
        if (file.size === 0 || file.buffer.length === 0) {
            throw new ValidationError('File is empty', INPUT_VALIDATION_ERROR);
        }
        if (file.size > MAX_FILE_SIZE) {
            throw new ValidationError(
                `File size exceeds maximum allowed size of ${MAX_FILE_SIZE / 1024 / 1024}MB`,
                INPUT_VALIDATION_ERROR
            );
        }
        if (!isSupportedFileFormat(file.originalName)) {
            throw new ValidationError(
                `Unsupported file format. Supported formats: ${Array.from(SUPPORTED_EXTENSIONS).join(', ')}`,
                INPUT_VALIDATION_ERROR
            );
        }
    }

    /**
     * Human-readable provenance string stored as the `source` metadata.
     */
    private buildSource(userMetadata: string | undefined, title: string, size: number): string {
        let source = `title=${title}, size=${size}, ingestionTime=${new Date().toISOString()}`;
        if (userMetadata && userMetadata.trim().length > 0) {
            source += `, userMetadata=${userMetadata}`;
        }
        return source;
    }

    private async processContent(
        content: string,
        title: string,
        source: string
    ): Promise<ApiResponse<IngestionResult>> {
        const startTime = Date.now();

        const metadata: ChunkMetadata = {
            filename: title,
            source,
            ingestionTime: new Date().toISOString(),
            originalLength: content.length,
        };

        const chunks = this.splitter.splitDocuments([
            new Document<ChunkMetadata>({ pageContent: content, metadata }),
        ]);
        await this.repository.storeDocuments(chunks);

        const processingTimeMs = Date.now() - startTime;
        log.info({ filename: title, chunks: chunks.length, processingTimeMs }, 'Document processed');

        return success(
            {
                filename: title,
                originalLength: content.length,
                chunkCount: chunks.length,
                processingTimeMs,
                metadata,
                timestamp: new Date().toISOString(),
            },
            'Document processed and stored successfully'
        );
    }

    /**
     * Passes AppErrors through; anything else becomes an AIServiceError.
     */
    private async guard<T>(context: string, task: () => Promise<T>): Promise<T> {
        try {
            return await task();
        } catch (error) {
            if (error instanceof AppError) {
                throw error;
            }
            const cause = toError(error);
            log.error({ err: cause }, context);
            throw new AIServiceError(`${context}: ${cause.message}`, cause);
        }
    }
}

export function createDocumentIngestionService(
    repository: IVectorStoreRepository,
    splitter: TokenTextSplitter
): DocumentIngestionService {
    return new DocumentIngestionService(repository, splitter);
}
