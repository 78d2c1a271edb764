/**
 * Prompt and output screening
 *
 * - InputSanitizer: rejects prompt injection attempts, cleans accepted input
 * - ContentFilter: blocks offensive/harmful/spam content, redacts personal data
 */

export {
    InputSanitizer,
    createInputSanitizer,
    MAX_INPUT_LENGTH,
} from './inputSanitizer';

export {
    ContentFilter,
    createContentFilter,
    ContentViolationType,
    REDACTION_MARKER,
} from './contentFilter';

export type { FilterResult } from './contentFilter';
