import { CommanderError } from 'commander';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it, vi } from 'vitest';
import { defaultLogFile, parseConfig, parseFormat, splitExcludes } from '../src/config.js';

describe('parseConfig', () => {
  it('reads the repository, excludes and format from the command line', () => {
    const config = parseConfig(['/srv/repo', '-e', '*.lock,dist/*', '-e', '**/secret.txt', '-f', 'JSON'], {});

    expect(config.repository).toBe(path.resolve('/srv/repo'));
    expect(config.excludes).toEqual(['*.lock', 'dist/*', '**/secret.txt']);
    expect(config.format).toBe('json');
    expect(config.logLevel).toBe('info');
    expect(config.notify).toBe(true);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('takes one pattern per --excludes so the repository may follow it', () => {
    const config = parseConfig(['--excludes', '*.lock', '/srv/repo'], {});

    expect(config.repository).toBe(path.resolve('/srv/repo'));
    expect(config.excludes).toEqual(['*.lock']);
  });

  it('falls back to the environment', () => {
    const config = parseConfig([], {
      GIT_REPOSITORY: '/srv/other',
      GIT_EXCLUDES: '*.log, ,*.tmp',
      GIT_OUTPUT_FORMAT: 'text',
    });

    expect(config.repository).toBe(path.resolve('/srv/other'));
    expect(config.excludes).toEqual(['*.log', '*.tmp']);
    expect(config.format).toBe('text');
  });

  it('defaults to plain text, no excludes and the current directory', () => {
    const config = parseConfig([], {});

    expect(config.repository).toBe(process.cwd());
    expect(config.excludes).toEqual([]);
    expect(config.format).toBe('text');
  });

  it('accepts the logging and notification switches', () => {
    const config = parseConfig(['--log-file', '/tmp/prompts.log', '--log-level', 'debug', '--no-notify'], {});

    expect(config.logFile).toBe('/tmp/prompts.log');
    expect(config.logLevel).toBe('debug');
    expect(config.notify).toBe(false);
  });

  it('throws instead of exiting on an unknown format', () => {
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    expect(() => parseConfig(['-f', 'xml'], {})).toThrow(CommanderError);
    expect(() => parseConfig([], { GIT_OUTPUT_FORMAT: 'yaml' })).toThrow(CommanderError);

    stderr.mockRestore();
  });
});

describe('config helpers', () => {
  it('splits comma-separated exclude lists', () => {
    expect(splitExcludes(['a,b', ' c ', ''])).toEqual(['a', 'b', 'c']);
  });

  it('accepts formats case-insensitively', () => {
    expect(parseFormat('Json')).toBe('json');
    expect(parseFormat(' TEXT ')).toBe('text');
  });

  it('names the default log file after the start time', () => {
    expect(defaultLogFile(new Date(2024, 0, 2, 3, 4, 5))).toBe(
      path.join(os.tmpdir(), 'git_prompts_mcp_20240102030405.log')
    );
  });
});
