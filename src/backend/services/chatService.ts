/**
 * Chat Service
 *
 * Chat completion and the prompt engineering demonstrations:
 * - generateResponse: screened chat (sanitizer + content filter on the way in and out)
 * - generateSimplePrompt: a single fixed user message
 * - generatePromptTemplate / generateExternalPromptTemplate: variable substitution
 *   from an inline template and from a template file
 * - generateWithSystemMessage: behaviour set by a system message
 * - stuffThePrompt: optional context injection from a bundled document
 */

import { ApiResponse, ChatMessage } from '../../shared/types';
import { IOllamaClient } from '../clients/ollamaClient';
import { AIServiceError, SecurityError, toError } from '../errors';
import { ContentFilter } from '../security/contentFilter';
import { InputSanitizer } from '../security/inputSanitizer';
import { getLogger } from '../utils/logger';
import { success } from './apiResponse';
import { IPromptTemplateStore, renderTemplate } from './promptTemplates';

const log = getLogger('ChatService');

export const YOUTUBE_TEMPLATE = `List 10 of the most popular YouTubers in {genre} along with their current subscriber counts.
If you don't know the answer, just say "I don't know".
`;

export const SIMPLE_PROMPT = 'Tell me a dad joke';

export const COMEDIAN_SYSTEM_MESSAGE =
    'You are a world class comedian. Your task is to tell dad jokes. ' +
    'If someone asks you about any other jokes, tell them you only tell dad jokes';

export const SERIOUS_JOKE_REQUEST = 'Tell me a serious joke about the universe';

export const OLYMPIC_CONTEXT_DOCUMENT = 'docs/olympic-sports.txt';

export interface IChatService {
    generateResponse(message: string): Promise<ApiResponse<string>>;
    generateDirect(message: string): Promise<ApiResponse<string>>;
    generateSimplePrompt(): Promise<ApiResponse<string>>;
    generatePromptTemplate(genre: string): Promise<ApiResponse<string>>;
    generateExternalPromptTemplate(genre: string): Promise<ApiResponse<string>>;
    generateWithSystemMessage(): Promise<ApiResponse<string>>;
    stuffThePrompt(question: string, stuffit: boolean): Promise<ApiResponse<string>>;
}

function userMessage(content: string): ChatMessage {
    return { role: 'user', content };
}

export class ChatService implements IChatService {
    constructor(
        private readonly ollamaClient: IOllamaClient,
        private readonly templates: IPromptTemplateStore,
        private readonly inputSanitizer: InputSanitizer,
        private readonly contentFilter: ContentFilter
    ) {}

    /**
     * Screened chat completion.
     *
     * 1. Sanitize the prompt (rejects injection attempts)
     * 2. Filter it (blocks offensive/harmful/spam, redacts personal data)
     * 3. Ask the model
     * 4. Filter the reply and return its filtered text
     *
     * @throws SecurityError when the prompt is rejected
     * @throws AIServiceError for any other failure
     */
    async generateResponse(message: string): Promise<ApiResponse<string>> {
        log.info({ length: message.length }, 'Generating AI response');

        try {
            const sanitized = this.inputSanitizer.sanitizeInput(message);

            const inbound = this.contentFilter.filterContent(sanitized);
            if (inbound.blocked) {
                log.warn({ reason: inbound.reason }, 'Content blocked');
                throw new SecurityError(`Request blocked: ${inbound.reason ?? 'content rejected'}`);
            }

            const reply = await this.ollamaClient.chat([userMessage(inbound.filteredContent)]);

            const outbound = this.contentFilter.filterContent(reply);
            log.info({ length: outbound.filteredContent.length }, 'AI response generated');
            return success(outbound.filteredContent, 'AI response generated successfully');
        } catch (error) {
            if (error instanceof SecurityError) {
                log.error({ reason: error.message }, 'Security validation failed');
                throw error;
            }
            log.error({ err: error }, 'Failed to generate AI response');
            throw this.aiFailure('Failed to generate response', error);
        }
    }

    /**
     * Unscreened pass-through to the model.
     */
    async generateDirect(message: string): Promise<ApiResponse<string>> {
        try {
            const reply = await this.ollamaClient.chat([userMessage(message)]);
            return success(reply, 'AI response generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate response', error);
        }
    }

    async generateSimplePrompt(): Promise<ApiResponse<string>> {
        try {
            const reply = await this.ollamaClient.chat([userMessage(SIMPLE_PROMPT)]);
            return success(reply, 'Simple prompt response generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate simple prompt response', error);
        }
    }

    async generatePromptTemplate(genre: string): Promise<ApiResponse<string>> {
        try {
            const prompt = await renderTemplate(YOUTUBE_TEMPLATE, { genre });
            const reply = await this.ollamaClient.chat([userMessage(prompt)]);
            return success(reply, 'YouTube list generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate YouTube list', error);
        }
    }

    /**
     * Same request as generatePromptTemplate, with the template read
     * from prompts/youtube.st.
     */
    async generateExternalPromptTemplate(genre: string): Promise<ApiResponse<string>> {
        try {
            const template = await this.templates.loadTemplate('youtube');
            const prompt = await renderTemplate(template, { genre });
            const reply = await this.ollamaClient.chat([userMessage(prompt)]);
            return success(reply, 'YouTube extended list generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate YouTube extended list', error);
        }
    }

    async generateWithSystemMessage(): Promise<ApiResponse<string>> {
        try {
            const reply = await this.ollamaClient.chat([
                { role: 'system', content: COMEDIAN_SYSTEM_MESSAGE },
                userMessage(SERIOUS_JOKE_REQUEST),
            ]);
            return success(reply, 'Dad joke generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate dad joke', error);
        }
    }

    /**
     * Answers a question with the olympic-sports template. With `stuffit`
     * the bundled sports list is injected as {context}; without it the
     * model answers from its own training data.
     */
    async stuffThePrompt(question: string, stuffit: boolean): Promise<ApiResponse<string>> {
        try {
            const template = await this.templates.loadTemplate('olympic-sports');
            const context = stuffit
                ? await this.templates.loadResourceText(OLYMPIC_CONTEXT_DOCUMENT)
                : '';
            const prompt = await renderTemplate(template, { question, context });
            const reply = await this.ollamaClient.chat([userMessage(prompt)]);
            return success(reply, 'Olympic sports information generated successfully');
        } catch (error) {
            throw this.aiFailure('Failed to generate Olympic sports information', error);
        }
    }

    private aiFailure(context: string, error: unknown): AIServiceError {
        const cause = toError(error);
        return new AIServiceError(`${context}: ${cause.message}`, cause);
    }
}

export function createChatService(
    ollamaClient: IOllamaClient,
    templates: IPromptTemplateStore,
    inputSanitizer: InputSanitizer,
    contentFilter: ContentFilter
): ChatService {
    return new ChatService(ollamaClient, templates, inputSanitizer, contentFilter);
}
