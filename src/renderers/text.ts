import type { ChangedFile, CommitRecord } from '../types.js';
import { noCommitsMessage, toDiffObject } from './renderer.js';
import type { HistorySection, Renderer } from './renderer.js';

const FILE_RULE = '-'.repeat(50);
const FILE_END_RULE = '='.repeat(50);
const COMMIT_RULE = '-'.repeat(10);

export class TextRenderer implements Renderer {
  readonly format = 'text';
  readonly formatName = 'plain text';

  renderDiff(changes: readonly ChangedFile[]): string {
    return changes
      .map((file) => {
        const { a_path, b_path, diff } = toDiffObject(file);
        return `File: ${a_path} -> ${b_path}\n` + `${FILE_RULE}\n` + diff + `${FILE_END_RULE}\n`;
      })
      .join('\n');
  }

  renderHistory(commits: readonly CommitRecord[], ancestor: string): string {
    if (commits.length === 0) {
      return noCommitsMessage(ancestor);
    }

    const blocks = commits
      .map((commit) => `${commit.id} by ${commit.author} at ${commit.timestamp}\n\n${commit.message}`)
      .join(`\n\n${COMMIT_RULE}\n\n`);
    return `Commit messages between ${ancestor} and HEAD:\n` + `${COMMIT_RULE}\n\n` + blocks;
  }

  renderHistoryPrompt(commits: readonly CommitRecord[], ancestor: string): string {
    return this.renderHistory(commits, ancestor);
  }

  renderComposite(history: HistorySection | undefined, changes: readonly ChangedFile[]): string {
    const diff = this.renderDiff(changes);
    if (!history) {
      return diff;
    }
    return this.renderHistory(history.commits, history.ancestor) + '\n\n' + diff;
  }
}
