import { z } from 'zod';
import { GitPromptsError } from '../errors.js';
import type { CommitMessageInput, DiffInput } from '../types.js';

export const DEFAULT_WINDOW_SIZE = 5;

const optionalString = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

const windowSize = z.preprocess(
  (value) => (value === '' || value === undefined ? undefined : typeof value === 'string' ? Number(value) : value),
  z.number().int().nonnegative().optional()
);

const AncestorArgumentsSchema = z.object({ ancestor: optionalString });
const WindowSizeArgumentsSchema = z.object({ window_size: windowSize });

function invalid(error: z.ZodError): GitPromptsError {
  const detail = error.issues.map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
  return new GitPromptsError('MissingArgument', `Invalid argument: ${detail}`);
}

/** MCP のプロンプト引数 (文字列) とツール引数 (JSON) の両方を受け付ける */
export function parseDiffInput(args: unknown): DiffInput {
  const parsed = AncestorArgumentsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw invalid(parsed.error);
  }
  return { ancestor: parsed.data.ancestor };
}

export function parseCommitMessageInput(args: unknown): CommitMessageInput {
  const parsed = WindowSizeArgumentsSchema.safeParse(args ?? {});
  if (!parsed.success) {
    throw invalid(parsed.error);
  }
  return { windowSize: parsed.data.window_size };
}

export function requireAncestor(input: DiffInput): string {
  if (!input.ancestor) {
    throw new GitPromptsError('MissingArgument', 'Ancestor argument required');
  }
  return input.ancestor;
}
