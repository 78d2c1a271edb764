/**
 * Structured Output Service
 *
 * Asks the model for output in a machine-readable shape and parses it:
 * - a list (comma separated values)
 * - a map (JSON object)
 * - a typed object (JSON validated against a Zod schema)
 *
 * Format instructions are substituted into the prompt as {format}.
 */

import { CommaSeparatedListOutputParser, JsonOutputParser } from '@langchain/core/output_parsers';
import { z } from 'zod';
import { ApiResponse, Author } from '../../shared/types';
import { IOllamaClient } from '../clients/ollamaClient';
import { AIServiceError, toError } from '../errors';
import { success } from './apiResponse';
import { renderTemplate } from './promptTemplates';

export const SONGS_TEMPLATE = `Please give me a list of the top 10 songs by {artist}. If you don't know the answer, just say "I don't know".
{format}
`;

export const AUTHOR_LINKS_TEMPLATE = `Generate a list of links for the author {author}. Include the author's name as the key and any social network links as the object.
{format}
`;

export const AUTHOR_BOOKS_TEMPLATE = `Generate a list of books written by the author {author}. If you are not positive that the book belongs to this author, please don't include it.
{format}
`;

export const MAP_FORMAT_INSTRUCTIONS = `Your response should be in JSON format.
The data structure for the JSON should be a single object whose keys are strings.
Do not include any explanations, only provide a RFC8259 compliant JSON response following this format without deviation.
Remove the \`\`\`json markdown surrounding the output including the trailing "\`\`\`".`;

export const AUTHOR_FORMAT_INSTRUCTIONS = `Your response should be in JSON format.
The JSON should be a single object with exactly these fields:
- "author": the author's full name, as a string
- "books": titles of books written by the author, as an array of strings
Do not include any explanations, only provide a RFC8259 compliant JSON response following this format without deviation.
Remove the \`\`\`json markdown surrounding the output including the trailing "\`\`\`".`;

export const authorSchema = z.object({
    author: z.string().describe("The author's full name"),
    books: z.array(z.string()).describe('Titles of books written by the author'),
});

export interface IOutputService {
    generateSongsList(artist: string): Promise<ApiResponse<string[]>>;
    generateAuthorLinks(author: string): Promise<ApiResponse<Record<string, unknown>>>;
    generateAuthorBooks(author: string): Promise<ApiResponse<Author>>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class OutputService implements IOutputService {
    private readonly listParser = new CommaSeparatedListOutputParser();
    private readonly jsonParser = new JsonOutputParser<Record<string, unknown>>();

    constructor(private readonly ollamaClient: IOllamaClient) {}

    async generateSongsList(artist: string): Promise<ApiResponse<string[]>> {
        try {
            const content = await this.complete(SONGS_TEMPLATE, {
                artist,
                format: this.listParser.getFormatInstructions(),
            });
            const songs = await this.listParser.parse(content);
            return success(songs, 'Songs list generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate songs list', error);
        }
    }

    async generateAuthorLinks(author: string): Promise<ApiResponse<Record<string, unknown>>> {
        try {
            const content = await this.complete(AUTHOR_LINKS_TEMPLATE, {
                author,
                format: MAP_FORMAT_INSTRUCTIONS,
            });
            const parsed: unknown = await this.jsonParser.parse(content);
            if (!isPlainObject(parsed)) {
                throw new Error('Model output is not a JSON object');
            }
            return success(parsed, 'Author links generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate author links', error);
        }
    }

    async generateAuthorBooks(author: string): Promise<ApiResponse<Author>> {
        try {
            const content = await this.complete(AUTHOR_BOOKS_TEMPLATE, {
                author,
                format: AUTHOR_FORMAT_INSTRUCTIONS,
            });
            const parsed: unknown = await this.jsonParser.parse(content);
            const books = authorSchema.parse(parsed);
            return success(books, 'Author books generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate author books', error);
        }
    }

    private async complete(template: string, variables: Record<string, string>): Promise<string> {
        const prompt = await renderTemplate(template, variables);
        return this.ollamaClient.chat([{ role: 'user', content: prompt }]);
    }

    private aiFailure(context: string, error: unknown): AIServiceError {
        const cause = toError(error);
        return new AIServiceError(`${context}: ${cause.message}`, cause);
    }
}

export function createOutputService(ollamaClient: IOllamaClient): OutputService {
    return new OutputService(ollamaClient);
}
