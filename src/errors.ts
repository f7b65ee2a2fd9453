import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';

export type GitPromptsErrorKind =
  | 'MissingArgument'
  | 'RevisionNotFound'
  | 'InvalidRevisionRange'
  | 'RepositoryError'
  | 'EncodingError'
  | 'RepositoryUnavailable';

export class GitPromptsError extends Error {
  readonly kind: GitPromptsErrorKind;

  constructor(kind: GitPromptsErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = kind;
    this.kind = kind;
  }
}

// 呼び出し側の入力に起因するエラー
const CALLER_ERRORS: ReadonlySet<GitPromptsErrorKind> = new Set([
  'MissingArgument',
  'RevisionNotFound',
  'InvalidRevisionRange',
]);

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export interface Operation {
  kind: 'prompt' | 'tool';
  name: string;
}

export const prompt = (name: string): Operation => ({ kind: 'prompt', name });
export const tool = (name: string): Operation => ({ kind: 'tool', name });

function describeFailure(operation: Operation): string {
  return operation.kind === 'prompt'
    ? `Error generating the final prompt for ${operation.name}`
    : `Error running the tool ${operation.name}`;
}

/**
 * Wraps any failure raised while building a prompt or tool result into a
 * single McpError that names the operation and the argument it was given.
 */
export function toMcpError(operation: Operation, argument: string | undefined, error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  const code =
    error instanceof GitPromptsError && CALLER_ERRORS.has(error.kind)
      ? ErrorCode.InvalidParams
      : ErrorCode.InternalError;

  return new McpError(
    code,
    describeFailure(operation) +
      (argument ? ` (${argument})` : '') +
      `:\n` +
      `${error instanceof GitPromptsError ? `${error.kind}: ` : ''}${errorMessage(error)}`
  );
}
