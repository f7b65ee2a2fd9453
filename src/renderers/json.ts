import type { ChangedFile, CommitRecord } from '../types.js';
import { noCommitsMessage, toCommitObject, toDiffObject } from './renderer.js';
import type { HistorySection, Renderer } from './renderer.js';

function pretty(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export class JsonRenderer implements Renderer {
  readonly format = 'json';
  readonly formatName = 'the JSON format';

  renderDiff(changes: readonly ChangedFile[]): string {
    return pretty(changes.map(toDiffObject));
  }

  renderHistory(commits: readonly CommitRecord[]): string {
    return pretty(commits.map(toCommitObject));
  }

  renderHistoryPrompt(commits: readonly CommitRecord[], ancestor: string): string {
    if (commits.length === 0) {
      // 既存のクライアントが期待する `{"key": value}` 形式に合わせる
      return `{"error_message": ${JSON.stringify(noCommitsMessage(ancestor))}}`;
    }
    return this.renderHistory(commits);
  }

  renderComposite(history: HistorySection | undefined, changes: readonly ChangedFile[]): string {
    const diff = changes.map(toDiffObject);
    if (!history) {
      return pretty({ diff });
    }
    return pretty({
      commit_history: history.commits.map(toCommitObject),
      diff,
    });
  }
}
