/**
 * Token Text Splitter
 *
 * Splits documents into chunks measured in model tokens rather than
 * characters, so every chunk fits the embedding model's input.
 *
 * Each step takes a window of `chunkSize` tokens, decodes it and, when
 * the text has a sentence boundary past `minChunkSizeChars`, cuts right
 * after it. The next window starts `chunkOverlap` tokens before the end
 * of the text just emitted.
 */

import { Document } from '@langchain/core/documents';
import { getEncoding, type TiktokenEncoding } from 'js-tiktoken';
import { v4 as uuidv4 } from 'uuid';

/**
 * Reversible text <-> token id mapping.
 */
export interface Tokenizer {
    encode(text: string): number[];
    decode(tokens: number[]): string;
}

export interface TokenSplitterConfig {
    /** Tokens per window */
    chunkSize: number;
    /** Tokens shared between consecutive chunks */
    chunkOverlap: number;
    /** A sentence boundary is only used as the cut point past this many characters */
    minChunkSizeChars: number;
    /** Chunks this short (after trimming) are dropped */
    minChunkLengthToEmbed: number;
    /** Upper bound on chunks produced from a single text */
    maxNumChunks: number;
    /** Keep line breaks inside chunks; when false they become spaces */
    keepSeparator: boolean;
}

export const DEFAULT_SPLITTER_CONFIG: TokenSplitterConfig = {
    chunkSize: 800,
    chunkOverlap: 400,
    minChunkSizeChars: 350,
    minChunkLengthToEmbed: 5,
    maxNumChunks: 10000,
    keepSeparator: true,
};

const SENTENCE_BOUNDARIES = ['.', '?', '!', '\n'];

let defaultTokenizer: Tokenizer | undefined;

/**
 * cl100k_base, shared across splitters. The rank tables ship with
 * js-tiktoken, so nothing is downloaded.
 */
export function getDefaultTokenizer(encoding: TiktokenEncoding = 'cl100k_base'): Tokenizer {
    if (!defaultTokenizer) {
        const tiktoken = getEncoding(encoding);
        defaultTokenizer = {
            encode: (text) => tiktoken.encode(text),
            decode: (tokens) => tiktoken.decode(tokens),
        };
    }
    return defaultTokenizer;
}

export class TokenTextSplitter {
    private readonly config: TokenSplitterConfig;
    private readonly tokenizer: Tokenizer;

    constructor(config: Partial<TokenSplitterConfig> = {}, tokenizer?: Tokenizer) {
        this.config = { ...DEFAULT_SPLITTER_CONFIG, ...config };
        this.tokenizer = tokenizer ?? getDefaultTokenizer();

        if (this.config.chunkSize <= 0) {
            throw new RangeError('chunkSize must be positive');
        }
        if (this.config.chunkOverlap < 0 || this.config.chunkOverlap >= this.config.chunkSize) {
            throw new RangeError('chunkOverlap must be at least 0 and smaller than chunkSize');
        }
    }

    splitText(text: string): string[] {
        if (!text || text.trim().length === 0) {
            return [];
        }

        const { chunkSize, chunkOverlap, maxNumChunks, minChunkLengthToEmbed } = this.config;
        let tokens = this.tokenizer.encode(text);
        const chunks: string[] = [];

        while (tokens.length > 0 && chunks.length < maxNumChunks) {
            const window = tokens.slice(0, chunkSize);
            const windowText = this.tokenizer.decode(window);
            let chunkText = windowText;

            if (chunkText.trim().length === 0) {
                tokens = tokens.slice(window.length);
                continue;
            }

            const boundary = Math.max(...SENTENCE_BOUNDARIES.map((b) => chunkText.lastIndexOf(b)));
            if (boundary !== -1 && boundary > this.config.minChunkSizeChars) {
                chunkText = chunkText.substring(0, boundary + 1);
            }

            const emitted = this.finish(chunkText);
            if (emitted.length > minChunkLengthToEmbed) {
                chunks.push(emitted);
            }

            // Near the end of the input, whatever follows the cut becomes the last chunk
            const beyond = tokens.length - window.length;
            if (beyond < chunkSize) {
                const tail = windowText.substring(chunkText.length) + this.tokenizer.decode(tokens.slice(window.length));
                if (beyond === 0 || tail.trim().length === 0) {
                    const last = this.finish(tail);
                    if (last.length > minChunkLengthToEmbed && chunks.length < maxNumChunks) {
                        chunks.push(last);
                    }
                    tokens = [];
                    break;
                }
            }

            const consumed = this.tokenizer.encode(chunkText).length;
            // overlap never exceeds half the chunk, so the window always advances
            const overlap = Math.min(chunkOverlap, Math.floor(consumed / 2));
            tokens = tokens.slice(Math.max(1, consumed - overlap));
        }

        if (tokens.length > 0) {
            const remaining = this.finish(this.tokenizer.decode(tokens));
            if (remaining.length > minChunkLengthToEmbed) {
                chunks.push(remaining);
            }
        }

        return chunks;
    }

    /**
     * Splits each document; chunks inherit the source metadata plus
     * their position as `chunkIndex`, and get fresh ids.
     */
    splitDocuments(documents: Document[]): Document[] {
        const result: Document[] = [];
        for (const document of documents) {
            this.splitText(document.pageContent).forEach((content, chunkIndex) => {
                result.push(
                    new Document({
                        id: uuidv4(),
                        pageContent: content,
                        metadata: { ...document.metadata, chunkIndex },
                    })
                );
            });
        }
        return result;
    }

    getConfig(): Readonly<TokenSplitterConfig> {
        return this.config;
    }

    private finish(text: string): string {
        return this.config.keepSeparator ? text.trim() : text.replace(/\r?\n/g, ' ').trim();
    }
}

export function createTokenTextSplitter(
    config?: Partial<TokenSplitterConfig>,
    tokenizer?: Tokenizer
): TokenTextSplitter {
    return new TokenTextSplitter(config, tokenizer);
}
