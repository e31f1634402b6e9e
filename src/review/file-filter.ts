// src/review/file-filter.ts

export const DOC_EXTENSIONS = ['.md', '.mdx'] as const;

/**
 * Translates an exclude glob into a regex anchored at the start of the path.
 * `**\/` spans zero or more directories, `**` anything, `*` and `?` stay within
 * one segment.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '^';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern[i];
    if (ch === '*' && pattern[i + 1] === '*') {
      if (pattern[i + 2] === '/') {
        source += '(?:.*/)?';
        i += 3;
      } else {
        source += '.*';
        i += 2;
      }
    } else if (ch === '*') {
      source += '[^/]*';
      i += 1;
    } else if (ch === '?') {
      source += '[^/]';
      i += 1;
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
      i += 1;
    }
  }

  return new RegExp(source);
}

export function isDocumentationFile(filepath: string): boolean {
  return DOC_EXTENSIONS.some(ext => filepath.endsWith(ext));
}

export function shouldReviewFile(filepath: string, excludePatterns: readonly string[]): boolean {
  if (!isDocumentationFile(filepath)) {
    return false;
  }
  return !excludePatterns.some(pattern => globToRegExp(pattern).test(filepath));
}

/** Eligible paths in input order, each listed once. */
export function selectFilesToReview(filenames: readonly string[], excludePatterns: readonly string[]): string[] {
  const seen = new Set<string>();
  const selected: string[] = [];

  for (const filename of filenames) {
    if (seen.has(filename)) continue;
    seen.add(filename);
    if (shouldReviewFile(filename, excludePatterns)) {
      selected.push(filename);
    }
  }
  return selected;
}
