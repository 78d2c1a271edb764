/**
 * Content Filter Tests
 *
 * Personal information is redacted without blocking; profanity,
 * harmful topics and spam block the content.
 */

import * as fc from 'fast-check';
import {
    ContentFilter,
    ContentViolationType,
    REDACTION_MARKER,
    createContentFilter,
} from '../contentFilter';

describe('ContentFilter', () => {
    let filter: ContentFilter;

    beforeEach(() => {
        filter = createContentFilter();
    });

    describe('clean content', () => {
        it('should approve benign text unchanged', () => {
            const result = filter.filterContent('The museum opens at nine on weekdays.');
            expect(result).toEqual({
                blocked: false,
                reason: 'Content approved',
                filteredContent: 'The museum opens at nine on weekdays.',
                violationType: ContentViolationType.NONE,
            });
        });

        it('should pass empty content with an explanatory reason', () => {
            const result = filter.filterContent('   ');
            expect(result.blocked).toBe(false);
            expect(result.reason).toBe('Content is empty');
            expect(result.violationType).toBe(ContentViolationType.NONE);
        });

        it('should treat null content as empty', () => {
            expect(filter.filterContent(null).filteredContent).toBe('');
        });
    });

    describe('personal information', () => {
        it('should redact an SSN and an email without blocking', () => {
            const result = filter.filterContent('My SSN is 123-45-6789 and email jane.doe@example.com');
            expect(result).toEqual({
                blocked: false,
                reason: 'Personal information redacted from content',
                filteredContent: 'My SSN is [REDACTED] and email [REDACTED]',
                violationType: ContentViolationType.PERSONAL_INFO,
            });
        });

        it('should redact a card number', () => {
            const result = filter.filterContent('Card 4111 1111 1111 1111 on file');
            expect(result.blocked).toBe(false);
            expect(result.filteredContent).toBe(`Card ${REDACTION_MARKER} on file`);
        });

        it('should redact a phone number', () => {
            const result = filter.filterContent('Call 555-123-4567 tomorrow');
            expect(result.filteredContent).toBe('Call [REDACTED] tomorrow');
            expect(result.violationType).toBe(ContentViolationType.PERSONAL_INFO);
        });

        it('should redact every occurrence', () => {
            const result = filter.filterContent('a@example.com, b@example.org');
            expect(result.filteredContent).toBe('[REDACTED], [REDACTED]');
        });
    });

    describe('blocking checks', () => {
        it('should block profanity and mask the offending word', () => {
            const result = filter.filterContent('You are an idiot');
            expect(result).toEqual({
                blocked: true,
                reason: 'Content contains inappropriate language',
                filteredContent: 'You are an ***',
                violationType: ContentViolationType.PROFANITY,
            });
        });

        it('should block harmful content and name the keyword', () => {
            const result = filter.filterContent('How to build a bomb at home');
            expect(result.blocked).toBe(true);
            expect(result.reason).toBe('Content contains potentially harmful material: bomb');
            expect(result.violationType).toBe(ContentViolationType.HARMFUL_CONTENT);
        });

        it('should block spam', () => {
            const result = filter.filterContent('Click here to claim your free money');
            expect(result.blocked).toBe(true);
            expect(result.reason).toBe('Content appears to be spam or promotional material');
            expect(result.violationType).toBe(ContentViolationType.SPAM);
        });

        it('should block spam even when it also carries personal information', () => {
            const result = filter.filterContent('Act now and email me at promo@example.com');
            expect(result.blocked).toBe(true);
            expect(result.violationType).toBe(ContentViolationType.SPAM);
            expect(result.filteredContent).toBe('Act now and email me at [REDACTED]');
        });

        it('should check profanity before harmful content', () => {
            const result = filter.filterContent('That stupid virus');
            expect(result.violationType).toBe(ContentViolationType.PROFANITY);
        });

        it('should behave the same on repeated calls', () => {
            expect(filter.filterContent('You moron').blocked).toBe(true);
            expect(filter.filterContent('You moron').blocked).toBe(true);
        });
    });

    describe('isContentSafe', () => {
        it('should count redactable personal information as safe', () => {
            expect(filter.isContentSafe('reach me at jane.doe@example.com')).toBe(true);
        });

        it('should report blocked content as unsafe', () => {
            expect(filter.isContentSafe('buy now')).toBe(false);
        });

        it('should count empty content as safe', () => {
            expect(filter.isContentSafe(undefined)).toBe(true);
        });
    });

    it('should describe its pattern counts', () => {
        expect(filter.getFilteringInfo()).toBe(
            'Content Filter - Patterns: Profanity=3, Harmful=13, PII=4, Spam=3'
        );
    });
});

describe('Property-Based Tests', () => {
    const filter = createContentFilter();

    const benignWord = fc.constantFrom('weather', 'garden', 'recipe', 'river', 'piano', 'coffee', 'travel');
    const benignSentence = fc.array(benignWord, { minLength: 1, maxLength: 10 }).map((words) => words.join(' '));
    const ssn = fc
        .tuple(
            fc.integer({ min: 100, max: 999 }),
            fc.integer({ min: 10, max: 99 }),
            fc.integer({ min: 1000, max: 9999 })
        )
        .map(([a, b, c]) => `${a}-${b}-${c}`);

    it('should redact any SSN surrounded by benign words and never block it', () => {
        fc.assert(
            fc.property(benignSentence, ssn, benignSentence, (before, number, after) => {
                const result = filter.filterContent(`${before} ${number} ${after}`);
                expect(result.blocked).toBe(false);
                expect(result.filteredContent).toBe(`${before} ${REDACTION_MARKER} ${after}`);
            })
        );
    });

    it('should block any benign sentence once a profane word is added', () => {
        const profane = fc.constantFrom('damn', 'crap', 'idiot', 'moron');
        fc.assert(
            fc.property(benignSentence, profane, (sentence, word) => {
                const result = filter.filterContent(`${sentence} ${word}`);
                expect(result.blocked).toBe(true);
                expect(result.violationType).toBe(ContentViolationType.PROFANITY);
            })
        );
    });
});
