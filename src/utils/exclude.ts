import ignore from 'ignore';
import type { ChangedFile } from '../types.js';

const RECURSIVE_PREFIX = '**/';

export type PathMatcher = (path: string | undefined) => boolean;

// 相対パターンはパスの末尾から照合する (`dist/*` は `pkg/dist/x.js` にもマッチ)
function toGitignorePattern(pattern: string): string {
  if (pattern.startsWith('/') || pattern.startsWith(RECURSIVE_PREFIX)) {
    return pattern;
  }
  return `${RECURSIVE_PREFIX}${pattern}`;
}

/**
 * Compiles exclusion globs into a matcher with gitignore semantics. A leading
 * `/` anchors a pattern to the repository root. Everything else matches as a
 * path suffix, and a match on a directory excludes every path below it.
 */
export function createExcludeMatcher(patterns: readonly string[]): PathMatcher {
  const rules = patterns.map((pattern) => pattern.trim()).filter((pattern) => pattern.length > 0);
  const matcher = ignore({ ignorecase: false }).add(rules.map(toGitignorePattern));
  // `**/tail` は常にルート直下の `tail` にも適用する
  const tails = ignore({ ignorecase: false }).add(
    rules.filter((rule) => rule.startsWith(RECURSIVE_PREFIX)).map((rule) => `/${rule.slice(RECURSIVE_PREFIX.length)}`)
  );

  return (path) => {
    if (!path) {
      return false;
    }
    return matcher.ignores(path) || tails.ignores(path);
  };
}

export function shouldExclude(path: string | undefined, patterns: readonly string[]): boolean {
  return createExcludeMatcher(patterns)(path);
}

export function isExcludedChange(file: ChangedFile, patterns: readonly string[]): boolean {
  const excluded = createExcludeMatcher(patterns);
  return excluded(file.oldPath) || excluded(file.newPath);
}
