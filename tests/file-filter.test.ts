import { describe, expect, it } from 'vitest';
import { globToRegExp, selectFilesToReview, shouldReviewFile } from '../src/review/file-filter.js';

const DEFAULT_EXCLUDES = ['**/reference/**', '**/node_modules/**'];

describe('globToRegExp', () => {
  it('matches nested reference docs and nothing outside them', () => {
    const re = globToRegExp('**/reference/**');
    expect(re.test('docs/reference/x.md')).toBe(true);
    expect(re.test('reference/x.md')).toBe(true);
    expect(re.test('docs/guide/x.md')).toBe(false);
    expect(re.test('docs/myreference/x.md')).toBe(false);
  });

  it('keeps a single star inside one segment', () => {
    const re = globToRegExp('docs/*/draft.md');
    expect(re.test('docs/guide/draft.md')).toBe(true);
    expect(re.test('docs/guide/deep/draft.md')).toBe(false);
  });

  it('anchors at the start of the path only', () => {
    const re = globToRegExp('drafts/');
    expect(re.test('drafts/a.md')).toBe(true);
    expect(re.test('docs/drafts/a.md')).toBe(false);
  });

  it('treats regex characters as literals', () => {
    const re = globToRegExp('docs/v1.0/**');
    expect(re.test('docs/v1.0/a.md')).toBe(true);
    expect(re.test('docs/v1x0/a.md')).toBe(false);
  });

  it('maps ? to a single non-separator character', () => {
    const re = globToRegExp('docs/v?/**');
    expect(re.test('docs/v2/a.md')).toBe(true);
    expect(re.test('docs/v/a.md')).toBe(false);
  });
});

describe('shouldReviewFile', () => {
  it.each([
    ['docs/guide/install.md', true],
    ['docs/guide/install.mdx', true],
    ['README.md', true],
    ['docs/reference/api.md', false],
    ['site/node_modules/pkg/README.md', false],
    ['src/index.ts', false],
    ['docs/guide/diagram.png', false],
    ['docs/notes.markdown', false],
  ])('%s -> %s', (filepath, expected) => {
    expect(shouldReviewFile(filepath, DEFAULT_EXCLUDES)).toBe(expected);
  });

  it('reviews every doc file when there are no exclude patterns', () => {
    expect(shouldReviewFile('docs/reference/api.md', [])).toBe(true);
  });
});

describe('selectFilesToReview', () => {
  it('keeps input order and lists a repeated path once', () => {
    const selected = selectFilesToReview(
      ['b.md', 'src/a.ts', 'a.mdx', 'b.md', 'docs/reference/c.md'],
      DEFAULT_EXCLUDES
    );
    expect(selected).toEqual(['b.md', 'a.mdx']);
  });
});
