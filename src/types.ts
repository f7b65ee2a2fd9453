import type { Renderer } from './renderers/renderer.js';

export type OutputFormat = 'text' | 'json';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  repository: string;
  excludes: readonly string[];
  format: OutputFormat;
  logFile?: string;
  logLevel: LogLevel;
  notify: boolean;
}

/** Index (staging area) を表す疑似リビジョン */
export const STAGED = Symbol('staged');

export type DiffTarget = string | typeof STAGED | undefined;

export interface ChangedFile {
  /** 追加されたファイルでは undefined */
  oldPath?: string;
  /** 削除されたファイルでは undefined */
  newPath?: string;
  patchText: string;
}

export interface CommitRecord {
  id: string;
  author: string;
  timestamp: string;
  message: string;
}

export interface GitRepository {
  readonly workingDir: string;
  getChanges(source: string, target: DiffTarget, excludes: readonly string[]): Promise<ChangedFile[]>;
  getHistory(ancestor: string): Promise<CommitRecord[]>;
}

export interface DiffInput {
  ancestor?: string;
}

export interface CommitMessageInput {
  windowSize?: number;
}

export interface GitContext {
  repo: GitRepository;
  excludes: readonly string[];
  renderer: Renderer;
}
