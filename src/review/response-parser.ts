// src/review/response-parser.ts

import { z } from 'zod';
import { errorMessage } from '../errors.js';
import { ParseOutcome, ReviewResult, Severity } from './review-engine-types.js';

const SEVERITIES: readonly Severity[] = ['critical', 'major', 'minor'];

const JSON_FENCE = /```json\s*(\{.*?\})\s*```/s;
const GENERIC_FENCE = /```\s*(\{.*?\})\s*```/s;

function stringOr(fallback: string) {
  return z.preprocess(v => (typeof v === 'string' ? v : undefined), z.string().default(fallback));
}

const IssueSchema = z.object({
  line: z.preprocess(v => {
    if (typeof v === 'string' && /^\d+$/.test(v.trim())) return Number(v.trim());
    return typeof v === 'number' && Number.isInteger(v) && v > 0 ? v : undefined;
  }, z.number().int().positive().optional()),
  severity: z.preprocess(v => {
    const normalized = typeof v === 'string' ? v.toLowerCase().trim() : '';
    return SEVERITIES.find(s => s === normalized) ?? 'minor';
  }, z.enum(['critical', 'major', 'minor'])),
  category: stringOr('general'),
  issue: stringOr(''),
  suggestion: stringOr(''),
});

const ReviewReplySchema = z.object({
  issues: z.preprocess(v => v ?? undefined, z.array(IssueSchema).default([])),
  summary: stringOr(''),
});

/**
 * Returns the object inside a ```json fence, or inside a bare ``` fence when
 * there is no tagged one. Anything else comes back trimmed.
 */
export function stripCodeFence(response: string): string {
  const text = response.trim();

  if (text.includes('```json')) {
    const match = JSON_FENCE.exec(text);
    if (match) return match[1];
  } else if (text.includes('```')) {
    const match = GENERIC_FENCE.exec(text);
    if (match) return match[1];
  }
  return text;
}

export function parseReviewResponse(response: string): ParseOutcome {
  const jsonString = stripCodeFence(response);

  let decoded: unknown;
  try {
    decoded = JSON.parse(jsonString);
  } catch (error) {
    return { kind: 'unparseable', reason: errorMessage(error) };
  }

  const parsed = ReviewReplySchema.safeParse(decoded);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'reply'}: ${issue.message}`)
      .join('; ');
    return { kind: 'unparseable', reason };
  }

  return { kind: 'parsed', result: parsed.data };
}

export function unparseableResult(reason: string): ReviewResult {
  return { issues: [], summary: `Error during review: ${reason}` };
}
