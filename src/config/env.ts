// src/config/env.ts

import { ConfigError, MissingEnvironmentError } from '../errors.js';

export interface RunEnvironment {
  githubToken: string;
  owner: string;
  repo: string;
  prNumber: number;
  baseSha: string;
  headSha: string;
}

const REQUIRED = ['GITHUB_TOKEN', 'REPO_NAME', 'PR_NUMBER', 'BASE_SHA', 'HEAD_SHA'] as const;

/**
 * Reads the values the CI workflow passes in. Every missing name is reported
 * at once; `llmApiKeyEnv` adds the provider's key to the required set.
 */
export function readRunEnvironment(env: NodeJS.ProcessEnv, llmApiKeyEnv?: string): RunEnvironment {
  const required: string[] = [...REQUIRED];
  if (llmApiKeyEnv) required.unshift(llmApiKeyEnv);

  const missing = required.filter(name => !env[name]);
  if (missing.length > 0) {
    throw new MissingEnvironmentError(missing);
  }

  const repoName = env.REPO_NAME ?? '';
  const [owner, repo, ...rest] = repoName.split('/');
  if (!owner || !repo || rest.length > 0) {
    throw new ConfigError(`REPO_NAME must look like owner/repo, got "${repoName}"`);
  }

  const prNumber = Number(env.PR_NUMBER);
  if (!Number.isInteger(prNumber) || prNumber <= 0) {
    throw new ConfigError(`PR_NUMBER must be a positive integer, got "${env.PR_NUMBER}"`);
  }

  return {
    githubToken: env.GITHUB_TOKEN ?? '',
    owner,
    repo,
    prNumber,
    baseSha: env.BASE_SHA ?? '',
    headSha: env.HEAD_SHA ?? '',
  };
}
