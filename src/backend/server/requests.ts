/**
 * Request schemas for the HTTP layer.
 *
 * Query parameters that are absent or empty fall back to their default;
 * whitespace-only values are rejected as blank.
 */

import { z } from 'zod';
import { ValidationError } from '../errors';

const notBlank = (value: string): boolean => value.trim().length > 0;

function text(label: string, max?: number) {
    const base = z.string({
        required_error: `${label} is required`,
        invalid_type_error: `${label} must be a string`,
    });
    const bounded = max === undefined
        ? base
        : base.max(max, `${label} must be between 1 and ${max} characters`);
    return bounded.refine(notBlank, `${label} cannot be blank`);
}

function withDefault<T extends z.ZodTypeAny>(schema: T, fallback: string) {
    return z.preprocess((value) => (value === undefined || value === '' ? fallback : value), schema);
}

export const DEFAULT_MESSAGE = 'Tell me a Dad joke';
export const DEFAULT_GENRE = 'tech';
export const DEFAULT_ARTIST = 'Taylor Swift';
export const DEFAULT_AUTHOR = 'Ken Kousen';
export const MAX_TOP_K = 50;

// ----------------------------------------------------------------------------
// Bodies
// ----------------------------------------------------------------------------

export const promptRequestSchema = z.object({
    prompt: text('Prompt', 500),
});

export const contextInjectionRequestSchema = z.object({
    prompt: text('Prompt', 500),
    stuffit: z.boolean({ invalid_type_error: 'Stuffit must be a boolean' }).default(false),
});

export const queryRequestSchema = z.object({
    query: text('Query', 500),
    topK: z
        .number({ invalid_type_error: 'TopK must be a number' })
        .int('TopK must be an integer')
        .min(1, `TopK must be between 1 and ${MAX_TOP_K}`)
        .max(MAX_TOP_K, `TopK must be between 1 and ${MAX_TOP_K}`)
        .optional(),
});

export const textIngestionRequestSchema = z.object({
    content: text('Content', 10000),
    title: z.string({ invalid_type_error: 'Title must be a string' }).optional(),
    metadata: z.string({ invalid_type_error: 'Metadata must be a string' }).optional(),
});

export const uploadFieldsSchema = z.object({
    metadata: z.string({ invalid_type_error: 'Metadata must be a string' }).optional(),
});

// ----------------------------------------------------------------------------
// Query strings and path parameters
// ----------------------------------------------------------------------------

export const messageQuerySchema = z.object({
    message: withDefault(text('Message', 500), DEFAULT_MESSAGE),
});

export const genreQuerySchema = z.object({
    genre: withDefault(text('Genre', 50), DEFAULT_GENRE),
});

export const artistQuerySchema = z.object({
    artist: withDefault(text('Artist', 100), DEFAULT_ARTIST),
});

export const authorQuerySchema = z.object({
    author: withDefault(text('Author', 100), DEFAULT_AUTHOR),
});

export const authorParamSchema = z.object({
    author: text('Author', 100),
});

export const deleteQuerySchema = z.object({
    ids: text('Document IDs'),
});

/**
 * Formats issues as `<field>: <message>; ` concatenated.
 */
export function formatIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'request'}: ${issue.message}; `)
        .join('');
}

/**
 * @throws ValidationError listing every failing field
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
    const result = schema.safeParse(input ?? {});
    if (!result.success) {
        throw new ValidationError(formatIssues(result.error));
    }
    return result.data;
}
