import fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { configureLogging, createLogger, formatLogLine } from '../src/utils/logger.js';

describe('logger', () => {
  let tempDir: string | undefined;

  afterEach(async () => {
    configureLogging({ level: 'info' });
    vi.restoreAllMocks();
    if (tempDir) {
      await fs.remove(tempDir);
      tempDir = undefined;
    }
  });

  it('formats lines with time, level and name', () => {
    expect(formatLogLine('git', 'warn', 'slow diff', new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe(
      '[2024-01-02T03:04:05.000Z][WARN][git] slow diff'
    );
  });

  it('writes to stderr and the log file above the configured level', async () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'git-prompts-log-'));
    const logFile = path.join(tempDir, 'nested', 'server.log');

    configureLogging({ level: 'info', logFile });
    const logger = createLogger('test');
    logger.debug('hidden');
    logger.info('shown');
    logger.error('also shown');

    expect(stderr).toHaveBeenCalledTimes(2);
    const lines = (await fs.readFile(logFile, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\[.+\]\[INFO\]\[test\] shown$/);
    expect(lines[1]).toMatch(/^\[.+\]\[ERROR\]\[test\] also shown$/);
  });
});
