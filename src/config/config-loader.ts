// src/config/config-loader.ts

import * as fs from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import {
    LLMProvider,
    AnthropicProvider,
    OpenAIProvider,
    OllamaProvider,
} from '../providers/index.js';

export const DEFAULT_CONFIG_PATH = '.github/pr-review-config.json';

export interface LLMSettings {
    provider: string;
    model: string;
    maxOutputTokens: number;
}

export interface ReviewConfig {
    readonly enabledChecks: readonly string[];
    readonly excludePatterns: readonly string[];
    readonly maxIssuesPerFile: number;
    readonly llm: Readonly<LLMSettings>;
}

// Snake-case on disk, matching the feedback file.
const ReviewConfigFileSchema = z.object({
    enabled_checks: z.array(z.string()).optional(),
    exclude_patterns: z.array(z.string()).optional(),
    max_issues_per_file: z.number().int().positive().optional(),
    llm: z
        .object({
            provider: z.string().min(1).optional(),
            model: z.string().min(1).optional(),
            max_output_tokens: z.number().int().positive().optional(),
        })
        .optional(),
});

export type ReviewConfigFile = z.infer<typeof ReviewConfigFileSchema>;

export function getDefaultConfig(): ReviewConfig {
    return freezeConfig({
        enabledChecks: [
            'grammar',
            'spelling',
            'style_guide',
            'mdx_syntax',
            'frontmatter',
            'code_blocks',
            'internal_links',
        ],
        excludePatterns: ['**/reference/**', '**/node_modules/**'],
        maxIssuesPerFile: 20,
        llm: {
            provider: 'anthropic',
            model: 'claude-sonnet-4-5-20250929',
            maxOutputTokens: 4096,
        },
    });
}

interface ProviderDetails {
    api_key_env?: string;
    host_env?: string;
    create: (host: string, model: string, maxOutputTokens: number, apiKey?: string) => LLMProvider;
}

const ProviderMap: Record<string, ProviderDetails> = {
    anthropic: {
        api_key_env: 'ANTHROPIC_API_KEY',
        create: (host, model, max, apiKey) => new AnthropicProvider(host, model, max, apiKey),
    },
    openai: {
        api_key_env: 'OPENAI_API_KEY',
        host_env: 'OPENAI_BASE_URL',
        create: (host, model, max, apiKey) => new OpenAIProvider(host, model, max, apiKey),
    },
    ollama: {
        host_env: 'OLLAMA_HOST',
        create: (host, model, max) => new OllamaProvider(host, model, max),
    },
};
ProviderMap.claude = ProviderMap.anthropic;

export class ConfigLoader {
    private _config: ReviewConfig;

    public get config(): ReviewConfig {
        return this._config;
    }

    constructor(private configPath: string = DEFAULT_CONFIG_PATH) {
        this._config = this.loadConfig();
    }

    private loadConfig(): ReviewConfig {
        if (!fs.existsSync(this.configPath)) {
            console.log(`📂 No review config at ${this.configPath}, using defaults`);
            return getDefaultConfig();
        }

        const fileContents = fs.readFileSync(this.configPath, 'utf8');
        let loaded: unknown;
        try {
            // JSON is valid YAML, so one parser covers both formats.
            loaded = yaml.load(fileContents);
        } catch (e) {
            throw new ConfigError(`Could not parse review configuration: ${errorMessage(e)}`, this.configPath);
        }

        const parsed = ReviewConfigFileSchema.safeParse(loaded ?? {});
        if (!parsed.success) {
            const issues = parsed.error.issues
                .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
                .join('; ');
            throw new ConfigError(`Invalid configuration structure: ${issues}`, this.configPath);
        }

        console.log(`📂 Loaded review config from ${this.configPath}`);
        return mergeWithDefaults(parsed.data);
    }

    /**
     * Provider and model for this run. `modelOverride` follows the
     * `provider:model` form; a bare model keeps the configured provider.
     */
    public getLLMSettings(modelOverride?: string): LLMSettings {
        const llm = this._config.llm;
        if (!modelOverride) {
            return { ...llm };
        }

        for (const provider of Object.keys(ProviderMap)) {
            if (modelOverride.startsWith(`${provider}:`)) {
                return {
                    ...llm,
                    provider,
                    model: modelOverride.substring(provider.length + 1),
                };
            }
        }
        return { ...llm, model: modelOverride };
    }

    /** Name of the environment variable holding the provider's API key, if it needs one. */
    public getApiKeyEnv(settings: LLMSettings): string | undefined {
        return this.getProviderDetails(settings.provider).api_key_env;
    }

    public getLLMProvider(settings: LLMSettings, env: NodeJS.ProcessEnv = process.env): LLMProvider {
        const details = this.getProviderDetails(settings.provider);
        const apiKey = details.api_key_env ? env[details.api_key_env] : undefined;
        const host = details.host_env ? env[details.host_env] ?? '' : '';

        return details.create(host, settings.model, settings.maxOutputTokens, apiKey);
    }

    private getProviderDetails(providerName: string): ProviderDetails {
        const details = ProviderMap[providerName.toLowerCase()];
        if (!details) {
            throw new ConfigError(
                `Unknown LLM provider: ${providerName}. Expected one of ${Object.keys(ProviderMap).join(', ')}`,
                this.configPath
            );
        }
        return details;
    }
}

export function mergeWithDefaults(file: ReviewConfigFile): ReviewConfig {
    const defaults = getDefaultConfig();
    return freezeConfig({
        enabledChecks: file.enabled_checks ?? [...defaults.enabledChecks],
        excludePatterns: file.exclude_patterns ?? [...defaults.excludePatterns],
        maxIssuesPerFile: file.max_issues_per_file ?? defaults.maxIssuesPerFile,
        llm: {
            provider: file.llm?.provider ?? defaults.llm.provider,
            model: file.llm?.model ?? defaults.llm.model,
            maxOutputTokens: file.llm?.max_output_tokens ?? defaults.llm.maxOutputTokens,
        },
    });
}

function freezeConfig(config: {
    enabledChecks: string[];
    excludePatterns: string[];
    maxIssuesPerFile: number;
    llm: LLMSettings;
}): ReviewConfig {
    Object.freeze(config.enabledChecks);
    Object.freeze(config.excludePatterns);
    Object.freeze(config.llm);
    return Object.freeze(config);
}
