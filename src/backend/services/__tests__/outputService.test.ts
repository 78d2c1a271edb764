/**
 * Structured Output Service Tests
 */

import { AIServiceError } from '../../errors';
import { FakeOllamaClient } from '../../__tests__/fakes';
import {
    AUTHOR_FORMAT_INSTRUCTIONS,
    MAP_FORMAT_INSTRUCTIONS,
    OutputService,
    createOutputService,
} from '../outputService';

describe('OutputService', () => {
    let client: FakeOllamaClient;
    let service: OutputService;

    beforeEach(() => {
        client = new FakeOllamaClient();
        service = createOutputService(client);
    });

    describe('generateSongsList', () => {
        it('should parse comma separated output into a list', async () => {
            client.reply = 'Song A, Song B, Song C';

            const response = await service.generateSongsList('The Examples');

            expect(response).toEqual({
                success: true,
                message: 'Songs list generated successfully',
                data: ['Song A', 'Song B', 'Song C'],
            });
        });

        it('should ask for the artist with list format instructions', async () => {
            client.reply = 'Song A';
            await service.generateSongsList('The Examples');
            expect(client.lastPrompt()).toContain('top 10 songs by The Examples');
            expect(client.lastPrompt()).toContain('comma separated');
        });

        it('should turn model failures into AIServiceError', async () => {
            client.reply = new Error('model offline');
            await expect(service.generateSongsList('The Examples')).rejects.toThrow(
                'Failed to generate songs list: model offline'
            );
        });
    });

    describe('generateAuthorLinks', () => {
        it('should parse a JSON object', async () => {
            client.reply = '{"Jane Example": {"website": "https://example.com/jane"}}';

            const response = await service.generateAuthorLinks('Jane Example');

            expect(response.data).toEqual({ 'Jane Example': { website: 'https://example.com/jane' } });
            expect(response.message).toBe('Author links generated successfully');
        });

        it('should accept JSON wrapped in a markdown fence', async () => {
            client.reply = '```json\n{"site": "https://example.com"}\n```';
            const response = await service.generateAuthorLinks('Jane Example');
            expect(response.data).toEqual({ site: 'https://example.com' });
        });

        it('should include the map format instructions in the prompt', async () => {
            client.reply = '{}';
            await service.generateAuthorLinks('Jane Example');
            expect(client.lastPrompt()).toContain('for the author Jane Example');
            expect(client.lastPrompt()).toContain(MAP_FORMAT_INSTRUCTIONS);
        });

        it('should reject output that is not a JSON object', async () => {
            client.reply = '["https://example.com"]';
            await expect(service.generateAuthorLinks('Jane Example')).rejects.toBeInstanceOf(AIServiceError);
        });
    });

    describe('generateAuthorBooks', () => {
        it('should parse output into an author with books', async () => {
            client.reply = '{"author": "Jane Example", "books": ["First Light", "Second Wind"]}';

            const response = await service.generateAuthorBooks('Jane Example');

            expect(response).toEqual({
                success: true,
                message: 'Author books generated successfully',
                data: { author: 'Jane Example', books: ['First Light', 'Second Wind'] },
            });
        });

        it('should ask for the author object fields in the prompt', async () => {
            client.reply = '{"author": "Jane Example", "books": []}';
            await service.generateAuthorBooks('Jane Example');
            expect(client.lastPrompt()).toContain('books written by the author Jane Example');
            expect(client.lastPrompt()).toContain(AUTHOR_FORMAT_INSTRUCTIONS);
        });

        it('should accept an author object wrapped in a markdown fence', async () => {
            client.reply = '```json\n{"author": "Jane Example", "books": ["First Light"]}\n```';
            const response = await service.generateAuthorBooks('Jane Example');
            expect(response.data).toEqual({ author: 'Jane Example', books: ['First Light'] });
        });

        it('should reject output missing required fields', async () => {
            client.reply = '{"author": "Jane Example"}';
            await expect(service.generateAuthorBooks('Jane Example')).rejects.toBeInstanceOf(AIServiceError);
        });

        it('should reject output that is not JSON', async () => {
            client.reply = 'I do not know this author.';
            await expect(service.generateAuthorBooks('Jane Example')).rejects.toThrow(
                /^Failed to generate author books: /
            );
        });
    });
});
