/**
 * Input Sanitizer
 *
 * Screens user prompts before they reach the chat model. Input that
 * looks like a prompt injection attempt is rejected with a SecurityError;
 * accepted input has template and markup characters stripped and its
 * whitespace collapsed.
 */

import { SecurityError } from '../errors';
import { getLogger } from '../utils/logger';

const log = getLogger('InputSanitizer');

export const MAX_INPUT_LENGTH = 2000;

/**
 * Phrasings used to override the model's instructions.
 */
const INJECTION_PATTERNS: RegExp[] = [
    /ignore\s+(previous|all)\s+(instructions?|prompts?)/is,
    /forget\s+(everything|all|previous)/is,
    /new\s+(instructions?|prompts?)\s*:/is,
    /system\s*:\s*you\s+are/is,
    /assistant\s*:\s*/is,
    /user\s*:\s*/is,
    /\[\s*system\s*\]/is,
    /\{\{.*system.*\}\}/is,
    /act\s+as\s+(a\s+)?different/is,
    /pretend\s+(you\s+are|to\s+be)/is,
    /jailbreak/is,
    /roleplay\s+as/is,
];

const SUSPICIOUS_KEYWORDS: readonly string[] = [
    'jailbreak',
    'dan mode',
    'developer mode',
    'god mode',
    'admin mode',
    'root access',
    'bypass',
    'override',
    'unrestricted',
    'uncensored',
];

const SPECIAL_CHARS = /[{}[\]<>$#@]/g;

export class InputSanitizer {
    /**
     * Validates and cleans a prompt.
     *
     * @returns the cleaned prompt
     * @throws SecurityError when the input is too long, matches an injection
     *         pattern or keyword, or is empty once cleaned
     */
    sanitizeInput(input: string): string {
        log.debug({ length: input.length }, 'Sanitizing input');

        if (input.length > MAX_INPUT_LENGTH) {
            log.warn(
                { length: input.length, max: MAX_INPUT_LENGTH, input: this.getSafeLogString(input) },
                'Input exceeds maximum length'
            );
            throw new SecurityError(
                `Input exceeds maximum allowed length of ${MAX_INPUT_LENGTH} characters`
            );
        }

        const pattern = this.findInjectionPattern(input);
        if (pattern) {
            log.warn(
                { pattern: pattern.source, input: this.getSafeLogString(input) },
                'Potential prompt injection detected'
            );
            throw new SecurityError('Input contains potentially dangerous injection patterns');
        }

        const keyword = this.findSuspiciousKeyword(input);
        if (keyword) {
            log.warn({ keyword, input: this.getSafeLogString(input) }, 'Suspicious keyword detected');
            throw new SecurityError('Input contains suspicious keywords that are not allowed');
        }

        const sanitized = input.replace(SPECIAL_CHARS, '').replace(/\s+/g, ' ').trim();

        if (sanitized.length === 0) {
            throw new SecurityError('Input cannot be empty after sanitization');
        }

        log.debug('Input sanitization completed');
        return sanitized;
    }

    /**
     * Read-only variant of sanitizeInput: reports whether the input
     * would be accepted.
     */
    isInputSafe(input: string | null | undefined): boolean {
        if (!input || input.trim().length === 0) {
            return false;
        }
        if (input.length > MAX_INPUT_LENGTH) {
            return false;
        }
        return !this.findInjectionPattern(input) && !this.findSuspiciousKeyword(input);
    }

    getMaxInputLength(): number {
        return MAX_INPUT_LENGTH;
    }

    /**
     * Shortens input for log lines: at most 50 characters.
     */
    getSafeLogString(input: string | null | undefined): string {
        if (input === null || input === undefined) {
            return 'null';
        }
        if (input.length <= 50) {
            return input;
        }
        return `${input.substring(0, 47)}...`;
    }

    private findInjectionPattern(input: string): RegExp | undefined {
        return INJECTION_PATTERNS.find((pattern) => pattern.test(input));
    }

    private findSuspiciousKeyword(input: string): string | undefined {
        const lower = input.toLowerCase();
        return SUSPICIOUS_KEYWORDS.find((keyword) => lower.includes(keyword));
    }
}

export function createInputSanitizer(): InputSanitizer {
    return new InputSanitizer();
}
