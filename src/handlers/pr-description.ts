import { prompt, toMcpError } from '../errors.js';
import type { DiffInput, GitContext } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { requireAncestor } from './arguments.js';

const logger = createLogger('handlers.pr-description');

export const PR_DESCRIPTION_INSTRUCTIONS =
  '\nPlease provide a detailed description of the above changes proposed by a pull request. ' +
  'Your description should include, but is not limited to, the following sections:\n\n' +
  '- **Overview of the Changes:** A concise summary of what was modified.\n' +
  '- **Key Changes:** A list of the main changes that were implemented.\n' +
  '- (Only include when applicable) **New Dependencies Added:** Identify any new dependencies that have been introduced.\n';

export async function handleGeneratePrDescription(context: GitContext, input: DiffInput): Promise<string> {
  try {
    const ancestor = requireAncestor(input);
    const { repo, renderer } = context;

    logger.info(`generate-pr-desc: ${ancestor}..HEAD`);
    const changes = await repo.getChanges(ancestor, 'HEAD', context.excludes);
    const commits = await repo.getHistory(ancestor);

    return (
      renderer.renderComposite({ ancestor, commits }, changes) +
      `\n\nAbove is the commit history and diff results between HEAD and ${ancestor} in ${renderer.formatName}.\n` +
      PR_DESCRIPTION_INSTRUCTIONS
    );
  } catch (error: unknown) {
    throw toMcpError(prompt('generate-pr-desc'), input.ancestor && `ancestor: ${input.ancestor}`, error);
  }
}
