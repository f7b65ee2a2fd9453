import type { ChangedFile, CommitRecord, OutputFormat } from '../types.js';

export const NEW_ADDITION = 'New Addition';
export const DELETED = 'Deleted';

export interface DiffObject {
  a_path: string;
  b_path: string;
  diff: string;
}

export interface CommitObject {
  hexsha: string;
  author: string;
  create_time: string;
  message: string;
}

export interface HistorySection {
  ancestor: string;
  commits: readonly CommitRecord[];
}

export interface Renderer {
  readonly format: OutputFormat;
  /** Used in the framing sentences, e.g. "... in plain text." */
  readonly formatName: string;
  renderDiff(changes: readonly ChangedFile[]): string;
  renderHistory(commits: readonly CommitRecord[], ancestor: string): string;
  /** Like renderHistory, but never renders an empty history as ambiguous emptiness. */
  renderHistoryPrompt(commits: readonly CommitRecord[], ancestor: string): string;
  /** History (when given) and diff as one document. */
  renderComposite(history: HistorySection | undefined, changes: readonly ChangedFile[]): string;
}

export function noCommitsMessage(ancestor: string): string {
  return `No commits found between ${ancestor} and HEAD.`;
}

export function toDiffObject(file: ChangedFile): DiffObject {
  return {
    a_path: file.oldPath || NEW_ADDITION,
    b_path: file.newPath || DELETED,
    diff: file.patchText,
  };
}

export function toCommitObject(commit: CommitRecord): CommitObject {
  return {
    hexsha: commit.id,
    author: commit.author,
    create_time: commit.timestamp,
    message: commit.message,
  };
}
