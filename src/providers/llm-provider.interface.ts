// src/providers/llm-provider.interface.ts

export interface LLMProvider {
  readonly name: string;
  maxOutputTokens: number;
  getModelName(): string;
  generateReview(prompt: string): Promise<string>;
}
