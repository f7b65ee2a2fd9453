export const SERVER_NAME = 'git-prompts-mcp-server';
export const SERVER_VERSION = '0.3.0';
