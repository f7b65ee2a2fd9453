import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  GetPromptRequestSchema,
  ListPromptsRequestSchema,
  ListToolsRequestSchema,
  McpError,
} from '@modelcontextprotocol/sdk/types.js';
import type { Prompt, Tool } from '@modelcontextprotocol/sdk/types.js';
import { prompt, tool, toMcpError } from './errors.js';
import type { Operation } from './errors.js';
import { parseCommitMessageInput, parseDiffInput } from './handlers/arguments.js';
import { handleGenerateCommitMessage } from './handlers/commit-message.js';
import { handleGitCommitMessages } from './handlers/commit-messages.js';
import { handleGitCachedDiff, handleGitDiff } from './handlers/diff.js';
import { handleGeneratePrDescription } from './handlers/pr-description.js';
import { handleCachedDiffTool, handleCommitMessagesTool, handleDiffTool } from './handlers/tools.js';
import { createRenderer } from './renderers/index.js';
import type { GitContext, GitRepository, ServerConfig } from './types.js';
import { createLogger } from './utils/logger.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

const logger = createLogger('server');

const ANCESTOR_ARGUMENT = {
  name: 'ancestor',
  description: 'The ancestor commit hash or branch name',
  required: true,
};

const PROMPTS: Prompt[] = [
  {
    name: 'generate-pr-desc',
    description: 'Generate PR Description based on the diff between the HEAD and the ancestor branch or commit',
    arguments: [ANCESTOR_ARGUMENT],
  },
  {
    name: 'git-diff',
    description: 'Generate a diff between the HEAD and the ancestor branch or commit',
    arguments: [ANCESTOR_ARGUMENT],
  },
  {
    name: 'git-cached-diff',
    description: 'Generate a diff between the files in the staging area (the index) and the HEAD',
    arguments: [],
  },
  {
    name: 'git-commit-messages',
    description: 'Get commit messages between the ancestor and HEAD',
    arguments: [ANCESTOR_ARGUMENT],
  },
  {
    name: 'generate-commit-message',
    description: 'Generate a commit message for the staged changes, using the recent commit history as context',
    arguments: [
      {
        name: 'window_size',
        description: 'Number of recent commits to include as context (default 5, 0 to leave the history out)',
        required: false,
      },
    ],
  },
];

const ANCESTOR_INPUT_SCHEMA: Tool['inputSchema'] = {
  type: 'object',
  properties: {
    ancestor: {
      type: 'string',
      description: 'The ancestor commit hash or branch name',
    },
  },
  required: ['ancestor'],
};

const TOOLS: Tool[] = [
  {
    name: 'git_diff',
    description: 'Per-file diffs between the ancestor branch or commit and HEAD',
    inputSchema: ANCESTOR_INPUT_SCHEMA,
  },
  {
    name: 'git_cached_diff',
    description: 'Per-file diffs between HEAD and the staging area (the index)',
    inputSchema: { type: 'object', properties: {} },
  },
  {
    name: 'git_commit_messages',
    description: 'Commits between the ancestor and HEAD, newest first',
    inputSchema: ANCESTOR_INPUT_SCHEMA,
  },
];

function parseArguments<T>(operation: Operation, parse: () => T): T {
  try {
    return parse();
  } catch (error: unknown) {
    throw toMcpError(operation, undefined, error);
  }
}

export class GitPromptsServer {
  private server: Server;
  private context: GitContext;

  constructor(repo: GitRepository, options: Pick<ServerConfig, 'excludes' | 'format'>) {
    this.server = new Server(
      {
        name: SERVER_NAME,
        version: SERVER_VERSION,
      },
      {
        capabilities: {
          prompts: {},
          tools: {},
        },
      }
    );

    this.context = {
      repo,
      excludes: options.excludes,
      renderer: createRenderer(options.format),
    };

    this.setupPromptHandlers();
    this.setupToolHandlers();
  }

  private setupPromptHandlers(): void {
    this.server.setRequestHandler(ListPromptsRequestSchema, async () => ({ prompts: PROMPTS }));

    this.server.setRequestHandler(GetPromptRequestSchema, async (request) => {
      const { name } = request.params;
      const text = await this.getPromptText(name, request.params.arguments);
      return {
        description: PROMPTS.find((prompt) => prompt.name === name)?.description,
        messages: [
          {
            role: 'user',
            content: {
              type: 'text',
              text,
            },
          },
        ],
      };
    });
  }

  private async getPromptText(name: string, args: unknown): Promise<string> {
    logger.debug(`prompt ${name} requested`);

    switch (name) {
      case 'generate-pr-desc':
        return handleGeneratePrDescription(this.context, parseArguments(prompt(name), () => parseDiffInput(args)));

      case 'git-diff':
        return handleGitDiff(this.context, parseArguments(prompt(name), () => parseDiffInput(args)));

      case 'git-cached-diff':
        return handleGitCachedDiff(this.context);

      case 'git-commit-messages':
        return handleGitCommitMessages(this.context, parseArguments(prompt(name), () => parseDiffInput(args)));

      case 'generate-commit-message':
        return handleGenerateCommitMessage(
          this.context,
          parseArguments(prompt(name), () => parseCommitMessageInput(args))
        );

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown prompt: ${name}`);
    }
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name } = request.params;
      const records = await this.callTool(name, request.params.arguments);
      return {
        content: records.map((record) => ({
          type: 'text' as const,
          text: JSON.stringify(record, null, 2),
        })),
      };
    });
  }

  private async callTool(name: string, args: unknown): Promise<object[]> {
    logger.debug(`tool ${name} called`);

    switch (name) {
      case 'git_diff':
        return handleDiffTool(this.context, parseArguments(tool(name), () => parseDiffInput(args)));

      case 'git_cached_diff':
        return handleCachedDiffTool(this.context);

      case 'git_commit_messages':
        return handleCommitMessagesTool(this.context, parseArguments(tool(name), () => parseDiffInput(args)));

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  }

  async connect(transport: Transport): Promise<void> {
    await this.server.connect(transport);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  async run(): Promise<void> {
    await this.connect(new StdioServerTransport());
    logger.info(`${SERVER_NAME} ${SERVER_VERSION} running on stdio`);
  }
}
