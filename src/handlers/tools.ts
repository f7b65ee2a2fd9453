import { tool, toMcpError } from '../errors.js';
import { toCommitObject, toDiffObject } from '../renderers/renderer.js';
import type { CommitObject, DiffObject } from '../renderers/renderer.js';
import { STAGED } from '../types.js';
import type { DiffInput, GitContext } from '../types.js';
import { requireAncestor } from './arguments.js';

// ツールはフレーミング無しの射影だけを返す (出力形式の設定には依存しない)

export async function handleDiffTool(context: GitContext, input: DiffInput): Promise<DiffObject[]> {
  try {
    const ancestor = requireAncestor(input);
    const changes = await context.repo.getChanges(ancestor, 'HEAD', context.excludes);
    return changes.map(toDiffObject);
  } catch (error: unknown) {
    throw toMcpError(tool('git_diff'), input.ancestor && `ancestor: ${input.ancestor}`, error);
  }
}

export async function handleCachedDiffTool(context: GitContext): Promise<DiffObject[]> {
  try {
    const changes = await context.repo.getChanges('HEAD', STAGED, context.excludes);
    return changes.map(toDiffObject);
  } catch (error: unknown) {
    throw toMcpError(tool('git_cached_diff'), undefined, error);
  }
}

export async function handleCommitMessagesTool(context: GitContext, input: DiffInput): Promise<CommitObject[]> {
  try {
    const ancestor = requireAncestor(input);
    const commits = await context.repo.getHistory(ancestor);
    return commits.map(toCommitObject);
  } catch (error: unknown) {
    throw toMcpError(tool('git_commit_messages'), input.ancestor && `ancestor: ${input.ancestor}`, error);
  }
}
