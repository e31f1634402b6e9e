// src/review/comment-formatter.ts

import { Issue, ReviewResults, Severity } from './review-engine-types.js';

/** Marker the feedback pass uses to recognise comments this tool posted. */
export const REVIEW_MARKER = 'AI Documentation Review';

const SEVERITY_EMOJI: Record<Severity, string> = {
  critical: '🚨',
  major: '⚠️',
  minor: 'ℹ️',
};

const REVIEW_COVERAGE = `The review checked for:
- Grammar and spelling (American English)
- Google Developer Documentation Style Guide adherence
- MDX/Mintlify syntax
- Frontmatter completeness
- Code block formatting and language tags
- Internal link formats
- Image alt text
`;

export const ALL_CLEAR_SUMMARY = `## ✅ ${REVIEW_MARKER} Complete

All changed documentation files look good! No issues found.

${REVIEW_COVERAGE}`;

export function formatIssueComment(issue: Issue): string {
  const emoji = SEVERITY_EMOJI[issue.severity];

  return `${emoji} **${issue.severity.toUpperCase()}** - ${issue.category}

${issue.issue}

**Suggestion:**
${issue.suggestion}

---
*${REVIEW_MARKER}* | [Severity: ${issue.severity}]`;
}

export function countBySeverity(issues: readonly Issue[]): Record<Severity, number> {
  const counts: Record<Severity, number> = { critical: 0, major: 0, minor: 0 };
  for (const issue of issues) {
    counts[issue.severity]++;
  }
  return counts;
}

export function buildSummaryComment(results: ReviewResults): string {
  const all = [...results.values()];
  const totalIssues = all.reduce((sum, r) => sum + r.issues.length, 0);

  if (totalIssues === 0) {
    return ALL_CLEAR_SUMMARY;
  }

  const filesWithIssues = all.filter(r => r.issues.length > 0).length;

  let summary = `## 📝 ${REVIEW_MARKER} Complete

Found **${totalIssues} issue(s)** across **${filesWithIssues} file(s)**.

### Files Reviewed
`;

  for (const [filepath, result] of results) {
    if (result.issues.length > 0) {
      const { critical, major, minor } = countBySeverity(result.issues);
      summary += `\n- \`${filepath}\`: ${critical} critical, ${major} major, ${minor} minor`;
    } else {
      summary += `\n- \`${filepath}\`: ✓ No issues`;
    }
  }

  summary += `

### Review Coverage
${REVIEW_COVERAGE}
---
*This review only covers changed lines, not pre-existing content.*
`;

  return summary;
}
