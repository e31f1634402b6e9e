// src/errors.ts

export class MissingEnvironmentError extends Error {
  constructor(public readonly missing: string[]) {
    super(`Missing required environment variable(s): ${missing.join(', ')}`);
    this.name = 'MissingEnvironmentError';
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly configPath?: string) {
    super(configPath ? `${message} (${configPath})` : message);
    this.name = 'ConfigError';
  }
}

export class LLMProviderError extends Error {
  constructor(
    public readonly provider: string,
    message: string,
    public readonly status?: number
  ) {
    super(`LLM API Error (${provider}): ${message}`);
    this.name = 'LLMProviderError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
