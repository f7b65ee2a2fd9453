import { simpleGit, SimpleGit, SimpleGitOptions } from 'simple-git';
import fs from 'fs-extra';
import { GitPromptsError, errorMessage } from '../errors.js';
import type { ChangedFile, CommitRecord, DiffTarget, GitRepository } from '../types.js';
import { parseDiff } from './diff-parser.js';
import { createExcludeMatcher } from './exclude.js';
import { createLogger } from './logger.js';

const logger = createLogger('git');

const LOG_FORMAT = {
  hash: '%H',
  author_name: '%an',
  authored_at: '%at',
  message: '%B',
};

export interface LogEntry {
  hash: string;
  author_name: string;
  authored_at: string;
  message: string;
}

/** Unix 秒を `2024-01-02T03:04:05+00:00` 形式に変換 */
export function formatTimestamp(unixSeconds: number): string {
  return new Date(unixSeconds * 1000).toISOString().replace(/\.\d{3}Z$/, '+00:00');
}

export function toCommitRecord(entry: LogEntry): CommitRecord {
  return {
    id: entry.hash.trim(),
    author: entry.author_name,
    timestamp: formatTimestamp(Number(entry.authored_at)),
    message: entry.message.trim(),
  };
}

// "-" で始まるリビジョンは git のオプションとして解釈されてしまう
function assertNotOption(revision: string): void {
  if (revision.startsWith('-')) {
    throw new Error(`'${revision}' looks like an option, not a revision`);
  }
}

export class SimpleGitRepository implements GitRepository {
  readonly workingDir: string;
  private options: Partial<SimpleGitOptions>;
  private git: SimpleGit;

  constructor(workingDir: string) {
    this.workingDir = workingDir;
    this.options = {
      baseDir: workingDir,
      binary: 'git',
      maxConcurrentProcesses: 4,
      config: ['core.quotepath=false'],
    };
    this.git = simpleGit(this.options);
  }

  /** Runs `git diff` and returns stdout as the bytes git wrote. */
  private async diffBytes(args: string[]): Promise<Buffer> {
    const chunks: Buffer[] = [];
    const git = simpleGit(this.options).outputHandler((_command, stdout) => {
      stdout.on('data', (chunk: Buffer) => chunks.push(chunk));
    });
    await git.diff(args);
    return Buffer.concat(chunks);
  }

  async isRepo(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  async resolveRevision(revision: string): Promise<string> {
    try {
      assertNotOption(revision);
      const sha = await this.git.revparse(['--verify', `${revision}^{commit}`]);
      if (!sha.trim()) {
        throw new Error(`git rev-parse returned no commit for '${revision}'`);
      }
      return sha.trim();
    } catch (error: unknown) {
      throw new GitPromptsError(
        'RevisionNotFound',
        `Revision '${revision}' could not be resolved:\n` +
          `Error: ${errorMessage(error)}\n` +
          `Working directory: ${this.workingDir}`,
        { cause: error }
      );
    }
  }

  async getChanges(source: string, target: DiffTarget, excludes: readonly string[]): Promise<ChangedFile[]> {
    const sourceSha = await this.resolveRevision(source);
    const targetSha = typeof target === 'string' ? await this.resolveRevision(target) : undefined;

    const args = [
      '--no-color',
      '--no-ext-diff',
      '--src-prefix=a/',
      '--dst-prefix=b/',
      '--full-index',
      '-M',
      '-p',
    ];
    // STAGED または undefined の場合は index と比較する
    if (targetSha === undefined) {
      args.unshift('--cached');
      args.push(sourceSha);
    } else {
      args.push(sourceSha, targetSha);
    }

    let raw: Buffer;
    try {
      raw = await this.diffBytes(args);
    } catch (error: unknown) {
      throw new GitPromptsError(
        'RepositoryError',
        `git diff failed:\n` + `Error: ${errorMessage(error)}\n` + `Working directory: ${this.workingDir}`,
        { cause: error }
      );
    }

    const isExcluded = createExcludeMatcher(excludes);
    let excluded = 0;
    const kept = parseDiff(raw, (file) => {
      if (isExcluded(file.oldPath) || isExcluded(file.newPath)) {
        excluded += 1;
        return false;
      }
      return true;
    });
    logger.debug(
      `diff ${source}..${typeof target === 'string' ? target : 'index'}: ` +
        `${kept.length + excluded} files, ${excluded} excluded`
    );
    return kept;
  }

  async getHistory(ancestor: string): Promise<CommitRecord[]> {
    try {
      assertNotOption(ancestor);
      const log = await this.git.log<LogEntry>({
        from: ancestor,
        to: 'HEAD',
        symmetric: false,
        format: LOG_FORMAT,
      });
      logger.debug(`log ${ancestor}..HEAD: ${log.all.length} commits`);
      return log.all.map(toCommitRecord);
    } catch (error: unknown) {
      throw new GitPromptsError(
        'InvalidRevisionRange',
        `Invalid revision range '${ancestor}..HEAD':\n` +
          `Error: ${errorMessage(error)}\n` +
          `Working directory: ${this.workingDir}`,
        { cause: error }
      );
    }
  }
}

/**
 * Opens the repository once at startup. Any failure here is fatal to the
 * process, so it is reported as RepositoryUnavailable.
 */
export async function openRepository(workingDir: string): Promise<SimpleGitRepository> {
  if (!(await fs.pathExists(workingDir))) {
    throw new GitPromptsError('RepositoryUnavailable', `${workingDir} does not exist`);
  }

  let repo: SimpleGitRepository;
  let isRepo: boolean;
  try {
    repo = new SimpleGitRepository(workingDir);
    isRepo = await repo.isRepo();
  } catch (error: unknown) {
    // simpleGit() はディレクトリが無効だと GitConstructError を同期的に投げる
    throw new GitPromptsError('RepositoryUnavailable', `${workingDir} could not be opened: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  if (!isRepo) {
    throw new GitPromptsError('RepositoryUnavailable', `${workingDir} is not a valid Git repository`);
  }
  logger.info(`Opened repository at ${workingDir}`);
  return repo;
}
