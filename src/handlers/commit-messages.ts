import { prompt, toMcpError } from '../errors.js';
import type { DiffInput, GitContext } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { requireAncestor } from './arguments.js';

const logger = createLogger('handlers.commit-messages');

export async function handleGitCommitMessages(context: GitContext, input: DiffInput): Promise<string> {
  try {
    const ancestor = requireAncestor(input);

    logger.info(`git-commit-messages: ${ancestor}..HEAD`);
    const commits = await context.repo.getHistory(ancestor);

    return context.renderer.renderHistoryPrompt(commits, ancestor);
  } catch (error: unknown) {
    throw toMcpError(prompt('git-commit-messages'), input.ancestor && `ancestor: ${input.ancestor}`, error);
  }
}
