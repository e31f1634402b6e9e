// src/review/prompt.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ConfigError, errorMessage } from '../errors.js';

const agent = 'docs-review';

/** Shipped template, two levels up from both src/review and dist/review. */
export const DEFAULT_PROMPT_PATH = fileURLToPath(new URL(`../../prompts/${agent}.md`, import.meta.url));

/**
 * `DOCS_REVIEW_PROMPT` (relative to the working directory) wins over the
 * shipped template.
 */
export function getPromptFilePath(env: NodeJS.ProcessEnv = process.env): string {
  const envVarName = `${agent.toUpperCase().replace('-', '_')}_PROMPT`;
  const envPath = env[envVarName];
  if (envPath) {
    return path.resolve(process.cwd(), envPath);
  }
  return DEFAULT_PROMPT_PATH;
}

export function loadPromptTemplate(promptPath: string = getPromptFilePath()): string {
  let template: string;
  try {
    template = fs.readFileSync(promptPath, 'utf8');
  } catch (e) {
    throw new ConfigError(`Failed to load prompt template for agent ${agent}: ${errorMessage(e)}`, promptPath);
  }
  if (template.trim().length === 0) {
    throw new ConfigError(`Prompt template for agent ${agent} is empty`, promptPath);
  }
  console.log(`✓ Loaded prompt template (${template.length} chars)`);
  return template;
}

// One pass, so placeholder text inside a diff is left alone; the callback keeps
// `$&` and friends from being read as replacement patterns.
export function buildReviewPrompt(template: string, filepath: string, content: string, diff: string): string {
  const values: Record<string, string> = {
    FILE_PATH: filepath,
    DIFF: diff,
    CONTENT: content,
  };
  return template.replace(/\[(FILE_PATH|DIFF|CONTENT)\]/g, (_match, key: string) => values[key] ?? '');
}
