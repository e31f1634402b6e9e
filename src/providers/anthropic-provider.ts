// src/providers/anthropic-provider.ts

import { ApiProviderBase, ApiCallParams, isRecord } from './api-provider-base.js';

export const ANTHROPIC_API_VERSION = '2023-06-01';

export class AnthropicProvider extends ApiProviderBase {
    readonly name: string = 'Anthropic';

    constructor(host: string, model: string, maxOutputTokens: number, apiKey?: string) {
        super(host || 'https://api.anthropic.com', model, maxOutputTokens, apiKey);
    }

    protected buildApiCallParams(prompt: string): ApiCallParams {
        return {
            url: `${this.host}/v1/messages`,
            headers: {
                'x-api-key': this.apiKey ?? '',
                'anthropic-version': ANTHROPIC_API_VERSION,
            },
            body: {
                model: this.model,
                max_tokens: this.maxOutputTokens,
                messages: [{ role: 'user', content: prompt }],
            },
        };
    }

    // { content: [{ type: 'text', text }] }
    protected extractText(data: unknown): string | undefined {
        if (!isRecord(data) || !Array.isArray(data.content)) return undefined;
        const block: unknown = data.content[0];
        return isRecord(block) && typeof block.text === 'string' ? block.text : undefined;
    }
}
