import { Octokit } from '@octokit/rest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { OctokitSourceHost } from '../src/github/octokit-host.js';

interface Route {
  method: string;
  path: string;
  status?: number;
  body: unknown;
}

interface SentRequest {
  method: string;
  path: string;
  search: string;
  body: unknown;
}

function createHost(routes: Route[]): { host: OctokitSourceHost; sent: SentRequest[] } {
  const sent: SentRequest[] = [];

  const fakeFetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? 'GET';
    const path = decodeURIComponent(url.pathname);
    sent.push({ method, path, search: url.search, body: init?.body ? JSON.parse(String(init.body)) : undefined });

    const route = routes.find(r => r.method === method && r.path === path);
    if (!route) {
      return new Response(JSON.stringify({ message: 'Not Found' }), {
        status: 404,
        headers: { 'content-type': 'application/json' },
      });
    }
    return new Response(JSON.stringify(route.body), {
      status: route.status ?? 200,
      headers: { 'content-type': 'application/json' },
    });
  };

  const octokit = new Octokit({ auth: 'test-token', request: { fetch: fakeFetch } });
  return { host: new OctokitSourceHost(octokit, 'acme', 'docs'), sent };
}

describe('OctokitSourceHost', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists the files of a comparison with their patches', async () => {
    const { host, sent } = createHost([
      {
        method: 'GET',
        path: '/repos/acme/docs/compare/abc...def',
        body: {
          files: [
            { filename: 'docs/a.md', status: 'modified', patch: '@@ -1 +1 @@\n-a\n+b' },
            { filename: 'logo.png', status: 'added' },
          ],
        },
      },
    ]);

    await expect(host.compare('abc', 'def')).resolves.toEqual([
      { filename: 'docs/a.md', status: 'modified', patch: '@@ -1 +1 @@\n-a\n+b' },
      { filename: 'logo.png', status: 'added', patch: undefined },
    ]);
    expect(sent[0].method).toBe('GET');
    expect(host.fullName).toBe('acme/docs');
  });

  it('decodes base64 file content at a ref', async () => {
    const { host, sent } = createHost([
      {
        method: 'GET',
        path: '/repos/acme/docs/contents/docs/a.md',
        body: {
          type: 'file',
          encoding: 'base64',
          content: Buffer.from('# Héllo\n', 'utf8').toString('base64'),
        },
      },
    ]);

    await expect(host.getFileContent('docs/a.md', 'def')).resolves.toBe('# Héllo\n');
    expect(sent[0].search).toBe('?ref=def');
  });

  it('returns null for directories and missing files', async () => {
    const { host } = createHost([
      { method: 'GET', path: '/repos/acme/docs/contents/docs', body: [{ type: 'file', name: 'a.md' }] },
    ]);

    await expect(host.getFileContent('docs', 'def')).resolves.toBeNull();
    await expect(host.getFileContent('docs/missing.md', 'def')).resolves.toBeNull();
  });

  it('posts a line comment on the commit', async () => {
    const { host, sent } = createHost([
      { method: 'POST', path: '/repos/acme/docs/commits/def/comments', status: 201, body: { id: 1 } },
    ]);

    await host.createCommitComment({ sha: 'def', path: 'docs/a.md', line: 4, body: 'Fix this' });

    expect(sent[0]).toMatchObject({
      method: 'POST',
      body: { body: 'Fix this', path: 'docs/a.md', line: 4 },
    });
  });

  it('posts a pull request comment', async () => {
    const { host, sent } = createHost([
      { method: 'POST', path: '/repos/acme/docs/issues/12/comments', status: 201, body: { id: 2 } },
    ]);

    await host.createIssueComment(12, 'Summary');

    expect(sent[0]).toMatchObject({ method: 'POST', body: { body: 'Summary' } });
  });

  it('surfaces comment failures to the caller', async () => {
    const { host } = createHost([]);

    await expect(host.createIssueComment(12, 'Summary')).rejects.toThrow();
  });

  it('lists review comments on the pull request', async () => {
    const { host } = createHost([
      {
        method: 'GET',
        path: '/repos/acme/docs/pulls/12/comments',
        body: [
          { id: 5, body: '*AI Documentation Review*', path: 'docs/a.md', user: { login: 'ci-bot' } },
        ],
      },
    ]);

    await expect(host.listReviewComments(12)).resolves.toEqual([
      { id: 5, body: '*AI Documentation Review*', path: 'docs/a.md', user: 'ci-bot' },
    ]);
  });
});
