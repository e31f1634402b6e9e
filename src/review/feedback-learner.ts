// src/review/feedback-learner.ts

import { errorMessage } from '../errors.js';
import { SourceHost } from '../github/source-host.js';
import { REVIEW_MARKER } from './comment-formatter.js';

/**
 * Looks at the review comments this tool left on the pull request.
 *
 * Nothing is derived from them yet: there is no rule for telling an accepted
 * suggestion from an ignored one, so the feedback state is left untouched.
 * Returns how many of our comments were seen.
 */
export async function learnFromFeedback(host: SourceHost, prNumber: number): Promise<number> {
  try {
    const comments = await host.listReviewComments(prNumber);
    const ours = comments.filter(c => c.body.includes(REVIEW_MARKER));
    console.log(`📚 Found ${ours.length} earlier review comment(s) on PR #${prNumber}`);
    return ours.length;
  } catch (error) {
    console.error(`Error learning from feedback: ${errorMessage(error)}`);
    return 0;
  }
}
