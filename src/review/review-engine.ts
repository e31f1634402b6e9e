// src/review/review-engine.ts

import { ReviewConfig } from '../config/config-loader.js';
import { FeedbackState, FeedbackStore, incrementReviews } from '../config/feedback-store.js';
import { errorMessage } from '../errors.js';
import { ChangedFile, SourceHost } from '../github/source-host.js';
import { LLMProvider } from '../providers/index.js';
import { buildSummaryComment, formatIssueComment } from './comment-formatter.js';
import { learnFromFeedback } from './feedback-learner.js';
import { selectFilesToReview } from './file-filter.js';
import { buildReviewPrompt } from './prompt.js';
import { parseReviewResponse, unparseableResult } from './response-parser.js';
import {
  FileReviewTask,
  ReviewResult,
  ReviewResults,
  RunContext,
  RunOutcome,
} from './review-engine-types.js';

export interface ReviewEngineOptions {
  host: SourceHost;
  llm: LLMProvider;
  config: ReviewConfig;
  promptTemplate: string;
  feedback: FeedbackState;
  feedbackStore: FeedbackStore;
}

export class ReviewEngine {
  private readonly host: SourceHost;
  private readonly llm: LLMProvider;
  private readonly config: ReviewConfig;
  private readonly promptTemplate: string;
  private readonly feedbackStore: FeedbackStore;
  private readonly initialFeedback: FeedbackState;

  constructor(options: ReviewEngineOptions) {
    this.host = options.host;
    this.llm = options.llm;
    this.config = options.config;
    this.promptTemplate = options.promptTemplate;
    this.feedbackStore = options.feedbackStore;
    this.initialFeedback = options.feedback;
    console.log(`🤖 ReviewEngine using: ${this.llm.name} - ${this.llm.getModelName()}`);
  }

  async run(context: RunContext): Promise<RunOutcome> {
    console.log(`Starting AI documentation review for PR #${context.prNumber}`);
    console.log(`Repository: ${this.host.fullName}`);
    console.log(`Base: ${context.baseSha.substring(0, 7)}, Head: ${context.headSha.substring(0, 7)}`);

    const changedFiles = await this.host.compare(context.baseSha, context.headSha);
    const filesToReview = selectFilesToReview(
      changedFiles.map(f => f.filename),
      this.config.excludePatterns
    );

    if (filesToReview.length === 0) {
      console.log('No documentation files to review.');
      return { status: 'nothing-to-review' };
    }

    console.log(`Found ${filesToReview.length} file(s) to review:`);
    filesToReview.forEach(f => console.log(`  - ${f}`));

    const results: ReviewResults = new Map();

    for (const filepath of filesToReview) {
      console.log(`\nReviewing ${filepath}...`);

      const task = await this.buildTask(filepath, changedFiles, context.headSha);
      if (!task) {
        console.warn(`  Skipping ${filepath}: Could not fetch content or diff`);
        continue;
      }

      const result = await this.reviewFile(task);
      results.set(filepath, result);

      await this.postIssueComments(filepath, result, context.headSha);
    }

    await this.postSummaryComment(results, context.prNumber);

    await learnFromFeedback(this.host, context.prNumber);

    const feedback = incrementReviews(this.initialFeedback);
    this.feedbackStore.save(feedback);

    console.log('\n✓ Review complete!');
    return { status: 'completed', results, feedback };
  }

  private async buildTask(
    filepath: string,
    changedFiles: ChangedFile[],
    headSha: string
  ): Promise<FileReviewTask | null> {
    // First entry wins when a comparison lists a path twice.
    const diff = changedFiles.find(f => f.filename === filepath)?.patch;
    const content = await this.host.getFileContent(filepath, headSha);

    if (!content || !diff) {
      return null;
    }
    return { path: filepath, diff, content };
  }

  async reviewFile(task: FileReviewTask): Promise<ReviewResult> {
    const prompt = buildReviewPrompt(this.promptTemplate, task.path, task.content, task.diff);
    console.log(`📏 Prompt: ${prompt.length} chars`);

    let response: string;
    try {
      response = await this.llm.generateReview(prompt);
    } catch (error) {
      console.error(`Error reviewing ${task.path}: ${errorMessage(error)}`);
      return unparseableResult(errorMessage(error));
    }

    const outcome = parseReviewResponse(response);
    if (outcome.kind === 'unparseable') {
      console.error(`Error reviewing ${task.path}: ${outcome.reason}`);
      console.error(`  RAW RESPONSE SNIPPET: ${response.substring(0, 500)}`);
      return unparseableResult(outcome.reason);
    }
    return outcome.result;
  }

  private async postIssueComments(filepath: string, result: ReviewResult, headSha: string): Promise<void> {
    if (result.issues.length === 0) {
      console.log(`✓ ${filepath}: No issues found`);
      return;
    }

    console.log(`⚠ ${filepath}: Found ${result.issues.length} issue(s)`);

    for (const issue of result.issues.slice(0, this.config.maxIssuesPerFile)) {
      try {
        await this.host.createCommitComment({
          sha: headSha,
          path: filepath,
          line: issue.line,
          body: formatIssueComment(issue),
        });
      } catch (error) {
        console.error(`  Failed to post comment on line ${issue.line ?? '?'}: ${errorMessage(error)}`);
      }
    }
  }

  private async postSummaryComment(results: ReviewResults, prNumber: number): Promise<void> {
    try {
      await this.host.createIssueComment(prNumber, buildSummaryComment(results));
    } catch (error) {
      console.error(`Failed to post summary comment: ${errorMessage(error)}`);
    }
  }
}
