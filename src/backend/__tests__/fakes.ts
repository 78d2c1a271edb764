/**
 * In-process stand-ins shared by the backend tests.
 */

import { ChatMessage, GenerationOptions } from '../../shared/types';
import { IOllamaClient } from '../clients/ollamaClient';
import { Tokenizer } from '../services/textSplitter';

export const EMBEDDING_DIMENSIONS = 32;

function hashWord(word: string): number {
    let hash = 0;
    for (let i = 0; i < word.length; i++) {
        hash = (hash * 31 + word.charCodeAt(i)) >>> 0;
    }
    return hash % EMBEDDING_DIMENSIONS;
}

/**
 * Bag-of-words embedding: texts with the same words get the same vector.
 */
export function embedWords(text: string): number[] {
    const vector = new Array<number>(EMBEDDING_DIMENSIONS).fill(0);
    for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
        const index = hashWord(word);
        vector[index] = (vector[index] ?? 0) + 1;
    }
    return vector;
}

/**
 * Scripted Ollama: replies with `reply` (or throws it when it is an
 * Error) and records every chat request.
 */
export class FakeOllamaClient implements IOllamaClient {
    available = true;
    reply: string | Error = 'Paris is the capital of France.';
    embeddingFailure: Error | undefined;
    readonly chatCalls: ChatMessage[][] = [];
    embeddingCalls = 0;

    async isAvailable(): Promise<boolean> {
        return this.available;
    }

    async chat(messages: ChatMessage[], _options?: GenerationOptions): Promise<string> {
        this.chatCalls.push(messages);
        if (this.reply instanceof Error) {
            throw this.reply;
        }
        return this.reply;
    }

    async generateEmbedding(text: string): Promise<number[]> {
        this.embeddingCalls++;
        if (this.embeddingFailure) {
            throw this.embeddingFailure;
        }
        return embedWords(text);
    }

    /** Content of the last message of the most recent chat call */
    lastPrompt(): string {
        const call = this.chatCalls[this.chatCalls.length - 1] ?? [];
        return call[call.length - 1]?.content ?? '';
    }
}

/**
 * One token per word, trailing whitespace included, so decoding a
 * token range gives back the exact source text.
 */
export function createWordTokenizer(): Tokenizer {
    const vocabulary: string[] = [];
    const ids = new Map<string, number>();

    return {
        encode(text: string): number[] {
            const pieces = text.match(/\S+\s*|\s+/g) ?? [];
            return pieces.map((piece) => {
                let id = ids.get(piece);
                if (id === undefined) {
                    id = vocabulary.length;
                    vocabulary.push(piece);
                    ids.set(piece, id);
                }
                return id;
            });
        },
        decode(tokens: number[]): string {
            return tokens.map((token) => vocabulary[token] ?? '').join('');
        },
    };
}
