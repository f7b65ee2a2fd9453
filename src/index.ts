#!/usr/bin/env node
import { CommanderError } from 'commander';
import { parseConfig } from './config.js';
import { errorMessage } from './errors.js';
import { GitPromptsServer } from './server.js';
import { openRepository } from './utils/git.js';
import { configureLogging, createLogger } from './utils/logger.js';
import { notify } from './utils/notify.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

const logger = createLogger('main');

async function main(): Promise<void> {
  const config = parseConfig(process.argv.slice(2));
  configureLogging({ level: config.logLevel, logFile: config.logFile });

  await notify(`Git Prompts MCP server version ${SERVER_VERSION} is starting`, config.notify);
  logger.info(
    `Starting ${SERVER_NAME} ${SERVER_VERSION}\n` +
      `Repository: ${config.repository}\n` +
      `Excludes: ${config.excludes.join(', ') || '(none)'}\n` +
      `Format: ${config.format}`
  );

  try {
    // リポジトリを開けない場合はリクエストを受け付けずに終了する
    const repo = await openRepository(config.repository);
    const server = new GitPromptsServer(repo, config);
    await server.run();
  } catch (error: unknown) {
    logger.error(`${SERVER_NAME} failed to start: ${errorMessage(error)}`);
    await notify(`Git Prompts MCP server version ${SERVER_VERSION} failed to start`, config.notify);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  console.error(error);
  process.exit(1);
});
