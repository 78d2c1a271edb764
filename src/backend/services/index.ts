/**
 * Backend services
 *
 * Core business logic components:
 * - ChatService: screened chat and the prompt engineering demos
 * - OutputService: structured output (list, map, typed object)
 * - RagService: retrieval-augmented answers and similarity search
 * - DocumentIngestionService: knowledge base ingestion and management
 * - SimpleVectorStore + repository + lifecycle: the persisted similarity index
 */

export { success, failure, DEFAULT_SUCCESS_MESSAGE, DEFAULT_FAILURE_MESSAGE } from './apiResponse';

export {
    PromptTemplateStore,
    createPromptTemplateStore,
    renderTemplate,
} from './promptTemplates';

export type { IPromptTemplateStore, TemplateVariables } from './promptTemplates';

export {
    ChatService,
    createChatService,
    YOUTUBE_TEMPLATE,
    SIMPLE_PROMPT,
    COMEDIAN_SYSTEM_MESSAGE,
    SERIOUS_JOKE_REQUEST,
} from './chatService';

export type { IChatService } from './chatService';

export {
    OutputService,
    createOutputService,
    authorSchema,
    AUTHOR_FORMAT_INSTRUCTIONS,
    MAP_FORMAT_INSTRUCTIONS,
} from './outputService';

export type { IOutputService } from './outputService';

export {
    TokenTextSplitter,
    createTokenTextSplitter,
    getDefaultTokenizer,
    DEFAULT_SPLITTER_CONFIG,
} from './textSplitter';

export type { Tokenizer, TokenSplitterConfig } from './textSplitter';

export {
    SimpleVectorStore,
    createVectorStore,
    cosineSimilarity,
} from './vectorStore';

export type { IVectorStore, SearchRequest, SearchResult } from './vectorStore';

export { VectorStoreRepository, createVectorStoreRepository } from './vectorStoreRepository';

export type { IVectorStoreRepository } from './vectorStoreRepository';

export {
    VectorStoreLifecycle,
    createVectorStoreLifecycle,
    FAQ_DOCUMENT,
    FAQ_FILENAME,
} from './vectorStoreLifecycle';

export type { InitializationOutcome } from './vectorStoreLifecycle';

export {
    RagService,
    createRagService,
    DEFAULT_TOP_K,
    DEFAULT_SEARCH_TOP_K,
} from './ragService';

export type { IRagService } from './ragService';

export {
    DocumentIngestionService,
    createDocumentIngestionService,
    getFileExtension,
    isSupportedFileFormat,
    INGESTION_SPLITTER_CONFIG,
    MAX_FILE_SIZE,
    SUPPORTED_EXTENSIONS,
} from './documentIngestion';

export type { IDocumentIngestionService } from './documentIngestion';
