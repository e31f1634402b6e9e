// src/config/feedback-store.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';

export const DEFAULT_FEEDBACK_PATH = '.github/pr-review-feedback.json';

export interface FeedbackState {
  readonly acceptedPatterns: readonly string[];
  readonly ignoredPatterns: readonly string[];
  readonly totalReviews: number;
}

const FeedbackFileSchema = z.object({
  accepted_patterns: z.array(z.string()).default([]),
  ignored_patterns: z.array(z.string()).default([]),
  total_reviews: z.number().int().nonnegative().default(0),
});

export function emptyFeedback(): FeedbackState {
  return { acceptedPatterns: [], ignoredPatterns: [], totalReviews: 0 };
}

export function incrementReviews(state: FeedbackState): FeedbackState {
  return { ...state, totalReviews: state.totalReviews + 1 };
}

export class FeedbackStore {
  constructor(private readonly feedbackPath: string = DEFAULT_FEEDBACK_PATH) {}

  get path(): string {
    return this.feedbackPath;
  }

  load(): FeedbackState {
    if (!fs.existsSync(this.feedbackPath)) {
      return emptyFeedback();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.feedbackPath, 'utf8'));
    } catch (e) {
      throw new ConfigError(`Could not read feedback data: ${errorMessage(e)}`, this.feedbackPath);
    }

    const parsed = FeedbackFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError(`Invalid feedback data: ${parsed.error.issues[0]?.message}`, this.feedbackPath);
    }

    return {
      acceptedPatterns: parsed.data.accepted_patterns,
      ignoredPatterns: parsed.data.ignored_patterns,
      totalReviews: parsed.data.total_reviews,
    };
  }

  save(state: FeedbackState): void {
    fs.mkdirSync(path.dirname(this.feedbackPath), { recursive: true });
    const file = {
      accepted_patterns: state.acceptedPatterns,
      ignored_patterns: state.ignoredPatterns,
      total_reviews: state.totalReviews,
    };
    fs.writeFileSync(this.feedbackPath, `${JSON.stringify(file, null, 2)}\n`);
  }
}
