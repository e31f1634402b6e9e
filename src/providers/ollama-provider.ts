// src/providers/ollama-provider.ts

import { ApiProviderBase, ApiCallParams, isRecord } from './api-provider-base.js';

export class OllamaProvider extends ApiProviderBase {
    readonly name: string = 'Ollama';

    constructor(host: string, model: string, maxOutputTokens: number) {
        super(host || 'http://localhost:11434', model, maxOutputTokens);
    }

    protected buildApiCallParams(prompt: string): ApiCallParams {
        return {
            url: `${this.host}/api/generate`,
            headers: {},
            body: {
                model: this.model,
                prompt: prompt,
                stream: false,
                format: 'json',
                options: {
                    temperature: 0.3,
                    num_predict: this.maxOutputTokens,
                },
            },
        };
    }

    protected extractText(data: unknown): string | undefined {
        return isRecord(data) && typeof data.response === 'string' ? data.response : undefined;
    }
}
