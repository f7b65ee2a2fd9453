import { GitPromptsError, prompt, toMcpError } from '../errors.js';
import type { HistorySection } from '../renderers/renderer.js';
import { STAGED } from '../types.js';
import type { CommitMessageInput, GitContext } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { DEFAULT_WINDOW_SIZE } from './arguments.js';

const logger = createLogger('handlers.commit-message');

export const NO_STAGED_CHANGES =
  'There are no staged changes. Tell the user that nothing is staged for commit, ' +
  'and ask whether they would like to stage their unstaged changes first.';

export const COMMIT_MESSAGE_INSTRUCTIONS =
  '\nPlease write a commit message for the staged changes above. ' +
  'Follow the style of the recent commit messages where they are given.\n\n' +
  '- Put the complete commit message, and nothing else, inside a single fenced code block (```).\n' +
  '- If you notice any issues in the staged changes (bugs, typos, leftover debug code), ' +
  'list them separately after the code block, outside of it.\n';

export async function handleGenerateCommitMessage(context: GitContext, input: CommitMessageInput): Promise<string> {
  const windowSize = input.windowSize ?? DEFAULT_WINDOW_SIZE;

  try {
    if (!Number.isInteger(windowSize) || windowSize < 0) {
      throw new GitPromptsError('MissingArgument', `window_size must be a non-negative integer, got ${windowSize}`);
    }
    const { repo, renderer } = context;

    logger.info(`generate-commit-message: window ${windowSize}`);
    const changes = await repo.getChanges('HEAD', STAGED, context.excludes);
    if (changes.length === 0) {
      return NO_STAGED_CHANGES;
    }

    // window_size = 0 の場合は履歴を取得しない
    let history: HistorySection | undefined;
    if (windowSize > 0) {
      const ancestor = `HEAD~${windowSize}`;
      history = { ancestor, commits: await repo.getHistory(ancestor) };
    }

    const framing = history
      ? `\n\nAbove is the commit history of the last ${windowSize} commits and the staged changes in ${renderer.formatName}.\n`
      : `\n\nAbove is the staged changes in ${renderer.formatName}.\n`;

    return renderer.renderComposite(history, changes) + framing + COMMIT_MESSAGE_INSTRUCTIONS;
  } catch (error: unknown) {
    throw toMcpError(prompt('generate-commit-message'), `window_size: ${windowSize}`, error);
  }
}
