/**
 * Prompt Template Service
 *
 * Loads prompt templates and bundled documents from the resources
 * directory. Variable substitution is LangChain's PromptTemplate
 * (f-string syntax: `{name}`).
 */

import * as fs from 'fs';
import * as path from 'path';
import { PromptTemplate } from '@langchain/core/prompts';
import { ConfigurationError } from '../errors';

export type TemplateVariables = Record<string, string>;

export interface IPromptTemplateStore {
    /** Reads `prompts/<name>.st` */
    loadTemplate(name: string): Promise<string>;
    /** Reads any file below the resources directory as UTF-8 */
    loadResourceText(relativePath: string): Promise<string>;
}

/**
 * Substitutes variables into a template string.
 * Missing variables are an error (raised by PromptTemplate).
 */
export async function renderTemplate(
    template: string,
    variables: TemplateVariables
): Promise<string> {
    return PromptTemplate.fromTemplate(template).format(variables);
}

export class PromptTemplateStore implements IPromptTemplateStore {
    private readonly cache = new Map<string, string>();

    constructor(private readonly resourcesDir: string) {}

    async loadTemplate(name: string): Promise<string> {
        return this.loadResourceText(path.join('prompts', `${name}.st`));
    }

    async loadResourceText(relativePath: string): Promise<string> {
        const cached = this.cache.get(relativePath);
        if (cached !== undefined) {
            return cached;
        }

        const filePath = path.resolve(this.resourcesDir, relativePath);
        if (!filePath.startsWith(path.resolve(this.resourcesDir) + path.sep)) {
            throw new ConfigurationError(`Resource path escapes resources directory: ${relativePath}`);
        }

        let text: string;
        try {
            text = await fs.promises.readFile(filePath, 'utf-8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Cannot read resource ${relativePath}: ${reason}`);
        }

        this.cache.set(relativePath, text);
        return text;
    }
}

export function createPromptTemplateStore(resourcesDir: string): PromptTemplateStore {
    return new PromptTemplateStore(resourcesDir);
}
