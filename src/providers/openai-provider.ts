// src/providers/openai-provider.ts

import { ApiProviderBase, ApiCallParams, isRecord } from './api-provider-base.js';

export class OpenAIProvider extends ApiProviderBase {
    readonly name: string = 'OpenAI';

    constructor(host: string, model: string, maxOutputTokens: number, apiKey?: string) {
        super(host || 'https://api.openai.com/v1', model, maxOutputTokens, apiKey);
    }

    protected buildApiCallParams(prompt: string): ApiCallParams {
        return {
            url: `${this.host}/chat/completions`,
            headers: {
                Authorization: `Bearer ${this.apiKey ?? ''}`,
            },
            body: {
                model: this.model,
                messages: [
                    {
                        role: 'system',
                        content: 'You are an expert technical documentation reviewer. Reply with JSON only.',
                    },
                    { role: 'user', content: prompt },
                ],
                temperature: 0.3,
                max_tokens: this.maxOutputTokens,
            },
        };
    }

    protected extractText(data: unknown): string | undefined {
        if (!isRecord(data) || !Array.isArray(data.choices)) return undefined;
        const choice: unknown = data.choices[0];
        if (!isRecord(choice) || !isRecord(choice.message)) return undefined;
        return typeof choice.message.content === 'string' ? choice.message.content : undefined;
    }
}
