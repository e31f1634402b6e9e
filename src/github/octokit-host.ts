// src/github/octokit-host.ts

import { Octokit } from '@octokit/rest';
import { errorMessage } from '../errors.js';
import { ChangedFile, CommitCommentRequest, ReviewComment, SourceHost } from './source-host.js';

export function createOctokit(token: string): Octokit {
  return new Octokit({
    auth: token,
    userAgent: 'docs-review-agent',
  });
}

export class OctokitSourceHost implements SourceHost {
  constructor(
    private octokit: Octokit,
    private owner: string,
    private repo: string
  ) {}

  get fullName(): string {
    return `${this.owner}/${this.repo}`;
  }

  async compare(baseSha: string, headSha: string): Promise<ChangedFile[]> {
    const { data } = await this.octokit.rest.repos.compareCommitsWithBasehead({
      owner: this.owner,
      repo: this.repo,
      basehead: `${baseSha}...${headSha}`,
    });

    return (data.files ?? []).map(f => ({
      filename: f.filename,
      status: f.status,
      patch: f.patch,
    }));
  }

  async getFileContent(path: string, ref: string): Promise<string | null> {
    try {
      const { data } = await this.octokit.rest.repos.getContent({
        owner: this.owner,
        repo: this.repo,
        path,
        ref,
      });

      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        return null;
      }
      const encoding: BufferEncoding = data.encoding === 'base64' ? 'base64' : 'utf8';
      return Buffer.from(data.content, encoding).toString('utf8');
    } catch (error) {
      console.warn(`  Could not fetch ${path}@${ref.substring(0, 7)}: ${errorMessage(error)}`);
      return null;
    }
  }

  async createCommitComment(request: CommitCommentRequest): Promise<void> {
    await this.octokit.rest.repos.createCommitComment({
      owner: this.owner,
      repo: this.repo,
      commit_sha: request.sha,
      body: request.body,
      path: request.path,
      line: request.line,
    });
  }

  async createIssueComment(prNumber: number, body: string): Promise<void> {
    await this.octokit.rest.issues.createComment({
      owner: this.owner,
      repo: this.repo,
      issue_number: prNumber,
      body,
    });
  }

  async listReviewComments(prNumber: number): Promise<ReviewComment[]> {
    const comments = await this.octokit.paginate(this.octokit.rest.pulls.listReviewComments, {
      owner: this.owner,
      repo: this.repo,
      pull_number: prNumber,
      per_page: 100,
    });

    return comments.map(c => ({
      id: c.id,
      body: c.body,
      path: c.path,
      user: c.user?.login,
    }));
  }
}
