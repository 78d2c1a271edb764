/**
 * Content Filter
 *
 * Screens prompts and model output. Profanity, harmful topics and spam
 * block the content; personal information is redacted and let through.
 *
 * Checks run in a fixed order and the first blocking check wins:
 * profanity -> harmful keywords -> personal information -> spam.
 */

import { getLogger } from '../utils/logger';

const log = getLogger('ContentFilter');

export enum ContentViolationType {
    PROFANITY = 'PROFANITY',
    HARMFUL_CONTENT = 'HARMFUL_CONTENT',
    PERSONAL_INFO = 'PERSONAL_INFO',
    SPAM = 'SPAM',
    NONE = 'NONE',
}

export interface FilterResult {
    blocked: boolean;
    reason?: string;
    filteredContent: string;
    violationType: ContentViolationType;
}

// All patterns carry the g flag for replace(); detection uses search(),
// which ignores lastIndex.
const PROFANITY_PATTERNS: RegExp[] = [
    /\b(damn|hell|crap|stupid|idiot|moron)\b/gi,
    /\b(hate|kill|die|murder|violence)\b/gi,
    /\b(sex|porn|adult|explicit)\b/gi,
];

const HARMFUL_KEYWORDS: readonly string[] = [
    'bomb',
    'weapon',
    'drug',
    'illegal',
    'hack',
    'exploit',
    'virus',
    'malware',
    'scam',
    'fraud',
    'steal',
    'piracy',
    'terrorism',
];

const PII_PATTERNS: RegExp[] = [
    // SSN
    /\b\d{3}-\d{2}-\d{4}\b/g,
    // card number
    /\b\d{4}[\s-]?\d{4}[\s-]?\d{4}[\s-]?\d{4}\b/g,
    // email
    /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/g,
    // phone
    /\b\d{3}-\d{3}-\d{4}\b/g,
];

const SPAM_PATTERNS: RegExp[] = [
    /\b(buy now|click here|free money|get rich|lottery|winner)\b/gi,
    /\b(viagra|cialis|penis|enlargement)\b/gi,
    /\b(urgent|limited time|act now|don't wait)\b/gi,
];

export const REDACTION_MARKER = '[REDACTED]';

function passed(content: string): FilterResult {
    return { blocked: false, filteredContent: content, violationType: ContentViolationType.NONE };
}

export class ContentFilter {
    filterContent(content: string | null | undefined): FilterResult {
        if (!content || content.trim().length === 0) {
            return {
                blocked: false,
                reason: 'Content is empty',
                filteredContent: content ?? '',
                violationType: ContentViolationType.NONE,
            };
        }

        log.debug({ length: content.length }, 'Filtering content');

        const profanity = this.checkProfanity(content);
        if (profanity.blocked) {
            return profanity;
        }

        const harmful = this.checkHarmfulContent(content);
        if (harmful.blocked) {
            return harmful;
        }

        const pii = this.checkPersonalInformation(content);

        const spam = this.checkSpamContent(pii.filteredContent);
        if (spam.blocked) {
            return spam;
        }

        if (pii.violationType === ContentViolationType.PERSONAL_INFO) {
            return pii;
        }

        log.debug('Content filtering completed - no violations detected');
        return {
            blocked: false,
            reason: 'Content approved',
            filteredContent: content,
            violationType: ContentViolationType.NONE,
        };
    }

    /**
     * True unless the content would be blocked. Redactable PII counts as safe.
     */
    isContentSafe(content: string | null | undefined): boolean {
        if (!content || content.trim().length === 0) {
            return true;
        }
        return !this.filterContent(content).blocked;
    }

    getFilteringInfo(): string {
        return (
            `Content Filter - Patterns: Profanity=${PROFANITY_PATTERNS.length}, ` +
            `Harmful=${HARMFUL_KEYWORDS.length}, PII=${PII_PATTERNS.length}, ` +
            `Spam=${SPAM_PATTERNS.length}`
        );
    }

    private checkProfanity(content: string): FilterResult {
        const pattern = PROFANITY_PATTERNS.find((p) => content.search(p) !== -1);
        if (!pattern) {
            return passed(content);
        }
        log.warn('Profanity detected in content');
        return {
            blocked: true,
            reason: 'Content contains inappropriate language',
            filteredContent: content.replace(pattern, '***'),
            violationType: ContentViolationType.PROFANITY,
        };
    }

    private checkHarmfulContent(content: string): FilterResult {
        const lower = content.toLowerCase();
        const keyword = HARMFUL_KEYWORDS.find((k) => lower.includes(k));
        if (!keyword) {
            return passed(content);
        }
        log.warn({ keyword }, 'Harmful content detected');
        return {
            blocked: true,
            reason: `Content contains potentially harmful material: ${keyword}`,
            filteredContent: content,
            violationType: ContentViolationType.HARMFUL_CONTENT,
        };
    }

    private checkPersonalInformation(content: string): FilterResult {
        let filtered = content;
        let found = false;

        for (const pattern of PII_PATTERNS) {
            if (filtered.search(pattern) !== -1) {
                filtered = filtered.replace(pattern, REDACTION_MARKER);
                found = true;
            }
        }

        if (!found) {
            return passed(content);
        }

        log.warn('Personal information detected in content');
        return {
            blocked: false,
            reason: 'Personal information redacted from content',
            filteredContent: filtered,
            violationType: ContentViolationType.PERSONAL_INFO,
        };
    }

    private checkSpamContent(content: string): FilterResult {
        if (!SPAM_PATTERNS.some((p) => content.search(p) !== -1)) {
            return passed(content);
        }
        log.warn('Spam-like content detected');
        return {
            blocked: true,
            reason: 'Content appears to be spam or promotional material',
            filteredContent: content,
            violationType: ContentViolationType.SPAM,
        };
    }
}

export function createContentFilter(): ContentFilter {
    return new ContentFilter();
}
