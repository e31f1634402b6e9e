// src/review/review-engine-types.ts

import type { FeedbackState } from '../config/feedback-store.js';

export type Severity = 'critical' | 'major' | 'minor';

export interface Issue {
  line?: number;
  severity: Severity;
  category: string;
  issue: string;
  suggestion: string;
}

export interface ReviewResult {
  issues: Issue[];
  summary: string;
}

export interface FileReviewTask {
  path: string;
  diff: string;
  content: string;
}

/** Per-file results, in the order the files were reviewed. */
export type ReviewResults = Map<string, ReviewResult>;

export type ParseOutcome =
  | { kind: 'parsed'; result: ReviewResult }
  | { kind: 'unparseable'; reason: string };

export interface RunContext {
  prNumber: number;
  baseSha: string;
  headSha: string;
}

export type RunOutcome =
  | { status: 'nothing-to-review' }
  | { status: 'completed'; results: ReviewResults; feedback: FeedbackState };
