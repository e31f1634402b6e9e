// src/main.ts

import { ConfigLoader, DEFAULT_CONFIG_PATH, LLMSettings } from './config/config-loader.js';
import { readRunEnvironment, RunEnvironment } from './config/env.js';
import { DEFAULT_FEEDBACK_PATH, FeedbackStore } from './config/feedback-store.js';
import { createOctokit, OctokitSourceHost } from './github/octokit-host.js';
import { SourceHost } from './github/source-host.js';
import { LLMProvider } from './providers/index.js';
import { getPromptFilePath, loadPromptTemplate } from './review/prompt.js';
import { ReviewEngine } from './review/review-engine.js';
import { RunOutcome } from './review/review-engine-types.js';

export interface MainDependencies {
  createHost?: (runEnv: RunEnvironment) => SourceHost;
  createLLM?: (settings: LLMSettings) => LLMProvider;
}

/**
 * Startup plus one review run. Startup failures (missing environment,
 * bad config, missing prompt) are thrown to the caller.
 */
export async function runReview(env: NodeJS.ProcessEnv, deps: MainDependencies = {}): Promise<RunOutcome> {
  const configLoader = new ConfigLoader(env.REVIEW_CONFIG_PATH || DEFAULT_CONFIG_PATH);
  const config = configLoader.config;
  const llmSettings = configLoader.getLLMSettings(env.REVIEW_MODEL);

  const runEnv = readRunEnvironment(env, configLoader.getApiKeyEnv(llmSettings));

  const llm = deps.createLLM
    ? deps.createLLM(llmSettings)
    : configLoader.getLLMProvider(llmSettings, env);
  console.log(`🤖 PR Review Agent initialized. Configured Model: **${llmSettings.provider} (${llmSettings.model})**`);

  const host = deps.createHost
    ? deps.createHost(runEnv)
    : new OctokitSourceHost(createOctokit(runEnv.githubToken), runEnv.owner, runEnv.repo);

  const feedbackStore = new FeedbackStore(env.REVIEW_FEEDBACK_PATH || DEFAULT_FEEDBACK_PATH);
  const feedback = feedbackStore.load();
  const promptTemplate = loadPromptTemplate(getPromptFilePath(env));

  const engine = new ReviewEngine({ host, llm, config, promptTemplate, feedback, feedbackStore });
  return engine.run({
    prNumber: runEnv.prNumber,
    baseSha: runEnv.baseSha,
    headSha: runEnv.headSha,
  });
}
