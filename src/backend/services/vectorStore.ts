/**
 * Vector Store Service
 *
 * In-memory similarity index over embedded document chunks, persisted
 * to a single JSON file.
 *
 * HOW IT WORKS:
 * 1. Each added document is embedded once and kept with its vector
 * 2. A query is embedded the same way
 * 3. Documents are ranked by cosine similarity to the query vector
 *
 * The file maps each document id to `{ id, text, metadata, embedding }`.
 * Saving writes a temp file and renames it over the target, so a crash
 * mid-save leaves the previous index intact.
 */

import * as fs from 'fs';
import * as path from 'path';
import { Document } from '@langchain/core/documents';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ChunkMetadata } from '../../shared/types';
import { EmbeddingClient } from '../clients/ollamaClient';
import { VectorStoreError, toError } from '../errors';

export const DEFAULT_TOP_K = 4;

export interface SearchRequest {
    query: string;
    topK?: number;
    /** Minimum cosine similarity a hit must reach (0 accepts everything) */
    similarityThreshold?: number;
}

export interface SearchResult {
    document: Document<ChunkMetadata>;
    score: number; // Cosine similarity, higher = more similar
}

interface StoredEntry {
    id: string;
    text: string;
    metadata: ChunkMetadata;
    embedding: number[];
}

const persistedIndexSchema = z.record(
    z.string(),
    z.object({
        id: z.string(),
        text: z.string(),
        metadata: z.record(z.string(), z.unknown()),
        embedding: z.array(z.number()),
    })
);

/**
 * Interface for vector store operations.
 */
export interface IVectorStore {
    add(documents: Document<ChunkMetadata>[]): Promise<string[]>;
    similaritySearch(request: SearchRequest): Promise<SearchResult[]>;
    delete(ids: string[]): number;
    listAll(): Document<ChunkMetadata>[];
    size(): number;
    clear(): void;
    save(filePath: string): Promise<void>;
    load(filePath: string): Promise<void>;
}

/**
 * Calculate cosine similarity between two vectors.
 *
 * Formula: cos(θ) = (A · B) / (||A|| × ||B||)
 */
export function cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
    }

    if (a.length === 0) {
        return 0;
    }

    let dotProduct = 0;
    let magnitudeA = 0;
    let magnitudeB = 0;

    for (let i = 0; i < a.length; i++) {
        const aVal = a[i] ?? 0;
        const bVal = b[i] ?? 0;
        dotProduct += aVal * bVal;
        magnitudeA += aVal * aVal;
        magnitudeB += bVal * bVal;
    }

    const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

    // Zero vectors are unrelated to everything
    if (magnitude === 0) {
        return 0;
    }

    return dotProduct / magnitude;
}

function toDocument(entry: StoredEntry): Document<ChunkMetadata> {
    return new Document<ChunkMetadata>({
        id: entry.id,
        pageContent: entry.text,
        metadata: { ...entry.metadata },
    });
}

/**
 * Exact (brute force) search; every query is compared to every entry.
 */
export class SimpleVectorStore implements IVectorStore {
    private entries: Map<string, StoredEntry> = new Map();

    constructor(private readonly embeddingClient: EmbeddingClient) {}

    /**
     * Embeds and stores documents. Documents without an id get one;
     * an existing id is overwritten.
     *
     * @returns ids in input order
     */
    async add(documents: Document<ChunkMetadata>[]): Promise<string[]> {
        const ids: string[] = [];
        for (const document of documents) {
            const embedding = await this.embeddingClient.generateEmbedding(document.pageContent);
            const id = document.id ?? uuidv4();
            this.entries.set(id, {
                id,
                text: document.pageContent,
                metadata: { ...document.metadata },
                embedding,
            });
            ids.push(id);
        }
        return ids;
    }

    /**
     * @returns at most `topK` results, most similar first
     */
    async similaritySearch(request: SearchRequest): Promise<SearchResult[]> {
        const topK = request.topK ?? DEFAULT_TOP_K;
        const threshold = request.similarityThreshold ?? 0;

        if (this.entries.size === 0 || topK <= 0) {
            return [];
        }

        const queryEmbedding = await this.embeddingClient.generateEmbedding(request.query);
        const results: SearchResult[] = [];

        for (const entry of this.entries.values()) {
            const score = cosineSimilarity(queryEmbedding, entry.embedding);
            if (score >= threshold) {
                results.push({ document: toDocument(entry), score });
            }
        }

        results.sort((a, b) => b.score - a.score);
        return results.slice(0, topK);
    }

    /**
     * @returns number of ids that were present
     */
    delete(ids: string[]): number {
        let count = 0;
        for (const id of ids) {
            if (this.entries.delete(id)) {
                count++;
            }
        }
        return count;
    }

    listAll(): Document<ChunkMetadata>[] {
        return Array.from(this.entries.values(), toDocument);
    }

    size(): number {
        return this.entries.size;
    }

    clear(): void {
        this.entries.clear();
    }

    async save(filePath: string): Promise<void> {
        const serialized: Record<string, StoredEntry> = {};
        for (const [id, entry] of this.entries) {
            serialized[id] = entry;
        }

        const tempPath = `${filePath}.tmp`;
        await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
        await fs.promises.writeFile(tempPath, JSON.stringify(serialized, null, 2), 'utf-8');
        await fs.promises.rename(tempPath, filePath);
    }

    /**
     * Replaces the current contents with the index stored at `filePath`.
     *
     * @throws VectorStoreError when the file cannot be read or is not a saved index
     */
    async load(filePath: string): Promise<void> {
        let raw: string;
        try {
            raw = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            throw new VectorStoreError(`Cannot read vector store file ${filePath}: ${toError(error).message}`, toError(error));
        }

        let json: unknown;
        try {
            json = JSON.parse(raw);
        } catch (error) {
            throw new VectorStoreError(`Vector store file ${filePath} is not valid JSON`, toError(error));
        }

        const parsed = persistedIndexSchema.safeParse(json);
        if (!parsed.success) {
            throw new VectorStoreError(`Vector store file ${filePath} has an unexpected format`, parsed.error);
        }

        const entries = new Map<string, StoredEntry>();
        for (const [key, entry] of Object.entries(parsed.data)) {
            entries.set(key, { ...entry, id: key });
        }
        this.entries = entries;
    }
}

export function createVectorStore(embeddingClient: EmbeddingClient): SimpleVectorStore {
    return new SimpleVectorStore(embeddingClient);
}
