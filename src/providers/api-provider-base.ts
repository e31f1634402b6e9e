// src/providers/api-provider-base.ts

import { LLMProviderError } from '../errors.js';
import { LLMProvider } from './llm-provider.interface.js';

export interface ApiCallParams {
    url: string;
    headers: Record<string, string>;
    body: Record<string, unknown>;
}

export abstract class ApiProviderBase implements LLMProvider {
    abstract readonly name: string;

    constructor(
        protected host: string,
        protected model: string,
        public maxOutputTokens: number,
        protected apiKey?: string
    ) {}

    getModelName(): string {
        return this.model;
    }

    protected abstract buildApiCallParams(prompt: string): ApiCallParams;

    /** Pulls the reply text out of the decoded body, or undefined when there is none. */
    protected abstract extractText(data: unknown): string | undefined;

    async generateReview(prompt: string): Promise<string> {
        const { url, headers, body } = this.buildApiCallParams(prompt);

        const response = await fetch(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                ...headers,
            },
            body: JSON.stringify(body),
        });

        if (!response.ok) {
            const errorText = await response.text();
            throw new LLMProviderError(
                this.name,
                `${response.status} - ${response.statusText}. Response: ${errorText}`,
                response.status
            );
        }

        const data: unknown = await response.json();
        const text = this.extractText(data);

        if (typeof text !== 'string' || text.length === 0) {
            throw new LLMProviderError(this.name, `unexpected or empty response body: ${JSON.stringify(data)}`);
        }

        return text.trim();
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
