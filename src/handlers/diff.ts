import { prompt, toMcpError } from '../errors.js';
import { STAGED } from '../types.js';
import type { DiffInput, GitContext } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { requireAncestor } from './arguments.js';

const logger = createLogger('handlers.diff');

export async function handleGitDiff(context: GitContext, input: DiffInput): Promise<string> {
  try {
    const ancestor = requireAncestor(input);
    const { renderer } = context;

    logger.info(`git-diff: ${ancestor}..HEAD`);
    const changes = await context.repo.getChanges(ancestor, 'HEAD', context.excludes);

    return (
      renderer.renderDiff(changes) +
      `\n\nAbove is the diff results between HEAD and ${ancestor} in ${renderer.formatName}.\n`
    );
  } catch (error: unknown) {
    throw toMcpError(prompt('git-diff'), input.ancestor && `ancestor: ${input.ancestor}`, error);
  }
}

export async function handleGitCachedDiff(context: GitContext): Promise<string> {
  try {
    const { renderer } = context;

    logger.info('git-cached-diff: HEAD..index');
    const changes = await context.repo.getChanges('HEAD', STAGED, context.excludes);

    return renderer.renderDiff(changes) + `\n\nAbove is the staged changes in ${renderer.formatName}.`;
  } catch (error: unknown) {
    throw toMcpError(prompt('git-cached-diff'), undefined, error);
  }
}
