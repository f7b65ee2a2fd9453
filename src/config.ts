import { Command, InvalidArgumentError, Option } from 'commander';
import * as os from 'os';
import * as path from 'path';
import { errorMessage } from './errors.js';
import type { LogLevel, OutputFormat, ServerConfig } from './types.js';
import { SERVER_NAME, SERVER_VERSION } from './version.js';

const FORMATS: readonly OutputFormat[] = ['text', 'json'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

type CliOptions = {
  excludes?: string[];
  format?: OutputFormat;
  logFile?: string;
  logLevel: LogLevel;
  notify: boolean;
};

export function parseFormat(value: string): OutputFormat {
  const format = FORMATS.find((candidate) => candidate === value.trim().toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Output format must be one of ${FORMATS.join(', ')}, got '${value}'.`);
  }
  return format;
}

function collect(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

export function splitExcludes(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(','))
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern.length > 0);
}

function timestamp(now: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

export function defaultLogFile(now: Date = new Date()): string {
  return path.join(os.tmpdir(), `git_prompts_mcp_${timestamp(now)}.log`);
}

/**
 * Builds the process-wide configuration from the command line, falling back
 * to GIT_REPOSITORY, GIT_EXCLUDES and GIT_OUTPUT_FORMAT. Usage errors are
 * thrown as CommanderError instead of exiting.
 */
export function parseConfig(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const program = new Command()
    .name(SERVER_NAME)
    .description('MCP server that turns git diffs and commit history into prompts')
    .version(SERVER_VERSION)
    .argument('[repository]', 'path to the Git repository (default: $GIT_REPOSITORY or the current directory)')
    .option('-e, --excludes <patterns>', 'glob patterns to leave out of diffs, repeated or comma-separated', collect)
    .addOption(
      new Option('-f, --format <format>', 'output format: text or json (default: $GIT_OUTPUT_FORMAT or text)').argParser(
        parseFormat
      )
    )
    .option('--log-file <path>', 'file that log lines are appended to')
    .addOption(new Option('--log-level <level>', 'log level').choices(LOG_LEVELS).default('info'))
    .option('--no-notify', 'disable desktop notifications')
    .exitOverride();

  program.parse([...argv], { from: 'user' });
  const options = program.opts<CliOptions>();

  const repository = program.args[0] || env.GIT_REPOSITORY || process.cwd();
  const excludes = options.excludes ?? (env.GIT_EXCLUDES ? [env.GIT_EXCLUDES] : []);
  let format: OutputFormat = options.format ?? 'text';
  if (!options.format && env.GIT_OUTPUT_FORMAT) {
    try {
      format = parseFormat(env.GIT_OUTPUT_FORMAT);
    } catch (error: unknown) {
      program.error(`GIT_OUTPUT_FORMAT: ${errorMessage(error)}`, {
        code: 'commander.invalidArgument',
      });
    }
  }

  const config: ServerConfig = {
    repository: path.resolve(repository),
    excludes: Object.freeze(splitExcludes(excludes)),
    format,
    logFile: options.logFile ?? defaultLogFile(),
    logLevel: options.logLevel,
    notify: options.notify,
  };
  return Object.freeze(config);
}
