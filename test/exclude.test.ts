import { describe, expect, it } from 'vitest';
import { isExcludedChange, shouldExclude } from '../src/utils/exclude.js';

describe('shouldExclude', () => {
  it('matches extensions on the final path segment only', () => {
    expect(shouldExclude('error.log', ['*.log'])).toBe(true);
    expect(shouldExclude('logs/deep/error.log', ['*.log'])).toBe(true);
    expect(shouldExclude('main.py', ['*.log'])).toBe(false);
  });

  it('excludes everything below a matching directory', () => {
    expect(shouldExclude('error.log/readme.md', ['*.log'])).toBe(true);
    expect(shouldExclude('dist/assets/bundle.js', ['dist/*'])).toBe(true);
    expect(shouldExclude('vendor/lib/index.ts', ['vendor'])).toBe(true);
  });

  it('matches plain names as a path suffix', () => {
    expect(shouldExclude('target.txt', ['target.txt'])).toBe(true);
    expect(shouldExclude('a/b/c/target.txt', ['target.txt'])).toBe(true);
    expect(shouldExclude('a/b/c/not_target.txt', ['target.txt'])).toBe(false);
    expect(shouldExclude('src/config.json', ['config.json'])).toBe(true);
  });

  it('matches **/ patterns at the root and at any depth', () => {
    const excludes = ['**/secret.txt'];
    expect(shouldExclude('secret.txt', excludes)).toBe(true);
    expect(shouldExclude('subdir/secret.txt', excludes)).toBe(true);
    expect(shouldExclude('deep/nested/secret.txt', excludes)).toBe(true);
    expect(shouldExclude('not_secret.txt', excludes)).toBe(false);
  });

  it('lets ** in the middle of a pattern span zero or more directories', () => {
    expect(shouldExclude('src/gen/types.ts', ['src/**/*.ts'])).toBe(true);
    expect(shouldExclude('src/types.ts', ['src/**/*.ts'])).toBe(true);
    expect(shouldExclude('lib/types.ts', ['src/**/*.ts'])).toBe(false);
  });

  it('keeps * inside a single segment', () => {
    expect(shouldExclude('dist/bundle.js', ['dist/*'])).toBe(true);
    expect(shouldExclude('packages/web/dist/bundle.js', ['dist/*'])).toBe(true);
    expect(shouldExclude('distro/bundle.js', ['dist/*'])).toBe(false);
  });

  it('anchors patterns that start with a slash', () => {
    expect(shouldExclude('dist/bundle.js', ['/dist/*'])).toBe(true);
    expect(shouldExclude('web/dist/bundle.js', ['/dist/*'])).toBe(false);
  });

  it('supports ? and character classes', () => {
    expect(shouldExclude('file1.tmp', ['file?.tmp'])).toBe(true);
    expect(shouldExclude('file10.tmp', ['file?.tmp'])).toBe(false);
    expect(shouldExclude('v2.bak', ['v[0-9].bak'])).toBe(true);
    expect(shouldExclude('vx.bak', ['v[0-9].bak'])).toBe(false);
  });

  it('treats regex characters in patterns literally', () => {
    expect(shouldExclude('a+b(1).txt', ['a+b(1).txt'])).toBe(true);
    expect(shouldExclude('aab1.txt', ['a+b(1).txt'])).toBe(false);
  });

  it('matches case-sensitively', () => {
    expect(shouldExclude('README.md', ['*.md'])).toBe(true);
    expect(shouldExclude('README.MD', ['*.md'])).toBe(false);
  });

  it('reads ! and # as ordinary characters', () => {
    expect(shouldExclude('!notes.txt', ['!notes.txt'])).toBe(true);
    expect(shouldExclude('#draft.md', ['#draft.md'])).toBe(true);
  });

  it('returns false for a missing path or no patterns', () => {
    expect(shouldExclude(undefined, ['*.txt'])).toBe(false);
    expect(shouldExclude('', ['*'])).toBe(false);
    expect(shouldExclude('a.txt', [])).toBe(false);
    expect(shouldExclude('a.txt', ['', '  '])).toBe(false);
  });

  it('excludes when any of several patterns matches', () => {
    const excludes = ['*.tmp', 'dist/*'];
    expect(shouldExclude('file.tmp', excludes)).toBe(true);
    expect(shouldExclude('dist/bundle.js', excludes)).toBe(true);
    expect(shouldExclude('src/app.js', excludes)).toBe(false);
  });
});

describe('isExcludedChange', () => {
  it('excludes a change when either side of it matches', () => {
    const renamed = { oldPath: 'package-lock.json', newPath: 'locks/npm.txt', patchText: '' };
    expect(isExcludedChange(renamed, ['package-lock.json'])).toBe(true);
    expect(isExcludedChange(renamed, ['*.txt'])).toBe(true);
    expect(isExcludedChange(renamed, ['*.md'])).toBe(false);
  });

  it('ignores the missing side of an added file', () => {
    expect(isExcludedChange({ newPath: 'new.txt', patchText: '' }, ['*.md'])).toBe(false);
  });
});
