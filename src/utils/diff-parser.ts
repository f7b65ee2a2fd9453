import { GitPromptsError } from '../errors.js';
import type { ChangedFile } from '../types.js';

const DIFF_HEADER = 'diff --git ';
const HEADER_BYTES = Buffer.from(DIFF_HEADER);
const NEWLINE = 0x0a;
const STRICT_UTF8 = new TextDecoder('utf-8', { fatal: true });
const DEV_NULL = '/dev/null';

const EXTENDED_HEADER =
  /^(old mode|new mode|deleted file mode|new file mode|copy from|copy to|rename from|rename to|similarity index|dissimilarity index|index) /;

const ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '"': '"',
  '\\': '\\',
};

/**
 * Undoes git's C-style path quoting (`"a/caf\303\251.txt"`). Octal escapes
 * are raw bytes, so they are collected and decoded as UTF-8 together.
 */
export function unquotePath(value: string): string {
  if (!value.startsWith('"') || !value.endsWith('"') || value.length < 2) {
    return value;
  }

  const bytes: number[] = [];
  const body = value.slice(1, -1);
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char !== '\\') {
      const codePoint = body.codePointAt(i) ?? 0;
      bytes.push(...Buffer.from(String.fromCodePoint(codePoint), 'utf-8'));
      if (codePoint > 0xffff) {
        i += 1;
      }
      continue;
    }
    const next = body[i + 1] ?? '';
    const octal = /^[0-7]{3}/.exec(body.slice(i + 1));
    if (octal) {
      bytes.push(parseInt(octal[0], 8));
      i += 3;
    } else {
      bytes.push(...Buffer.from(ESCAPES[next] ?? next, 'utf-8'));
      i += 1;
    }
  }
  return Buffer.from(bytes).toString('utf-8');
}

function stripPrefix(path: string, prefix: string): string {
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

/** `--- a/path` / `+++ b/path` の行からパスを取り出す */
function parseMarkerPath(line: string, prefix: string): string | undefined {
  // git はスペースを含むパスの後ろにタブを付ける
  const raw = unquotePath(line.slice(4).replace(/\t$/, ''));
  if (raw === DEV_NULL) {
    return undefined;
  }
  return stripPrefix(raw, prefix);
}

function parseHeaderPaths(rest: string): [string | undefined, string | undefined] {
  if (rest.startsWith('"')) {
    const close = rest.indexOf('" ', 1);
    if (close === -1) {
      return [undefined, undefined];
    }
    const oldPath = unquotePath(rest.slice(0, close + 1));
    const newPath = unquotePath(rest.slice(close + 2));
    return [stripPrefix(oldPath, 'a/'), stripPrefix(newPath, 'b/')];
  }

  // 引用符なしの場合、名前変更以外では a/ と b/ 側は同じ長さになる
  if ((rest.length - 1) % 2 === 0) {
    const half = (rest.length - 1) / 2;
    const oldPath = rest.slice(0, half);
    const newPath = rest.slice(half + 1);
    if (stripPrefix(oldPath, 'a/') === stripPrefix(newPath, 'b/')) {
      return [stripPrefix(oldPath, 'a/'), stripPrefix(newPath, 'b/')];
    }
  }
  return [undefined, undefined];
}

function parseBlock(block: string): ChangedFile {
  const lines = block.split('\n');
  let [oldPath, newPath] = parseHeaderPaths(lines[0].slice(DIFF_HEADER.length));
  let created = false;
  let deleted = false;
  let consumed = lines[0].length + 1;

  for (let i = 1; i < lines.length; i++) {
    const line = lines[i];

    if (line.startsWith('--- ')) {
      oldPath = parseMarkerPath(line, 'a/');
    } else if (line.startsWith('+++ ')) {
      newPath = parseMarkerPath(line, 'b/');
      consumed += line.length + 1;
      break;
    } else if (EXTENDED_HEADER.test(line)) {
      if (line.startsWith('rename from ') || line.startsWith('copy from ')) {
        oldPath = unquotePath(line.slice(line.indexOf(' from ') + 6));
      } else if (line.startsWith('rename to ') || line.startsWith('copy to ')) {
        newPath = unquotePath(line.slice(line.indexOf(' to ') + 4));
      } else if (line.startsWith('new file mode ')) {
        created = true;
      } else if (line.startsWith('deleted file mode ')) {
        deleted = true;
      }
    } else {
      break;
    }
    consumed += line.length + 1;
  }

  return {
    oldPath: created ? undefined : oldPath,
    newPath: deleted ? undefined : newPath,
    patchText: block.slice(Math.min(consumed, block.length)),
  };
}

function splitBlocks(raw: Buffer): Buffer[] {
  const starts: number[] = [];
  for (let at = raw.indexOf(HEADER_BYTES); at !== -1; at = raw.indexOf(HEADER_BYTES, at + 1)) {
    if (at === 0 || raw[at - 1] === NEWLINE) {
      starts.push(at);
    }
  }
  return starts.map((start, i) => raw.subarray(start, starts[i + 1] ?? raw.length));
}

function decodeBlock(block: Buffer, file: ChangedFile): string {
  try {
    return STRICT_UTF8.decode(block);
  } catch (error: unknown) {
    throw new GitPromptsError(
      'EncodingError',
      `Patch for '${file.newPath ?? file.oldPath}' is not valid UTF-8`,
      { cause: error }
    );
  }
}

/**
 * Splits the output of `git diff -p` into one record per file. The patch
 * text of each record starts after the `+++` line (or after the extended
 * header for binary and mode-only changes) and is kept byte-for-byte.
 * Records rejected by `keep` are dropped before their patch is decoded, so
 * only the kept ones have to be valid UTF-8.
 */
export function parseDiff(raw: Buffer | string, keep: (file: ChangedFile) => boolean = () => true): ChangedFile[] {
  const bytes = typeof raw === 'string' ? Buffer.from(raw, 'utf-8') : raw;
  const files: ChangedFile[] = [];
  for (const block of splitBlocks(bytes)) {
    const header = parseBlock(block.toString('utf-8'));
    if ((header.oldPath === undefined && header.newPath === undefined) || !keep(header)) {
      continue;
    }
    files.push(parseBlock(decodeBlock(block, header)));
  }
  return files;
}
