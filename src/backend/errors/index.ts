/**
 * Application error types
 *
 * Every error the HTTP layer knows how to translate extends AppError,
 * which carries the status code and the envelope message used for it.
 * Anything that is not an AppError is reported as a masked 500.
 */

export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly title: string,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'AppError';
    }

    /**
     * Detail string placed in the envelope's `data` field.
     */
    get publicDetail(): string {
        return this.message;
    }
}

/**
 * Request fields failed their constraints (blank, too long, wrong type).
 */
export class ValidationError extends AppError {
    constructor(message: string, title: string = 'Validation Error') {
        super(message, 400, title);
        this.name = 'ValidationError';
    }
}

/**
 * Input was rejected by the sanitizer or the content filter.
 * The detail never reaches the client.
 */
export class SecurityError extends AppError {
    constructor(message: string) {
        super(message, 400, 'Request Validation Error');
        this.name = 'SecurityError';
    }

    get publicDetail(): string {
        return 'Request contains invalid or inappropriate content';
    }
}

/**
 * The chat model call (or parsing its output) failed.
 */
export class AIServiceError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, 503, 'AI Service Error', cause);
        this.name = 'AIServiceError';
    }
}

/**
 * Embedding, search or persistence of the similarity index failed.
 */
export class VectorStoreError extends AppError {
    constructor(message: string, cause?: Error) {
        super(message, 500, 'Vector Store Error', cause);
        this.name = 'VectorStoreError';
    }
}

/**
 * Environment or resource configuration is invalid. Raised at startup.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Normalizes an unknown thrown value.
 */
export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
