/**
 * run-catalog — Log files
 *
 * File-system access used by the incremental loader: pattern expansion,
 * modification times, and reading the first line, the last line or every
 * line of a run log.
 */

import { createReadStream } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { open, readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, parse, sep } from 'node:path';
import { createInterface } from 'node:readline';

/** One line of a file and whether a newline ended it. */
export interface LogLine {
  readonly text: string;
  readonly terminated: boolean;
}

/** The file operations the loader needs. */
export interface LogFileSystem {
  /** Files matching a path whose segments may contain `*` and `?`, sorted. */
  expand(pattern: string): Promise<string[]>;
  /** Modification time in milliseconds, or `undefined` if the file is gone. */
  mtime(path: string): Promise<number | undefined>;
  /** `undefined` for an empty file. */
  readFirstLine(path: string): Promise<LogLine | undefined>;
  /** `undefined` for an empty file. */
  readLastLine(path: string): Promise<LogLine | undefined>;
  readLines(path: string): AsyncIterable<string>;
}

const NEWLINE = 0x0a;
const CHUNK_SIZE = 64 * 1024;

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function hasWildcard(segment: string): boolean {
  return segment.includes('*') || segment.includes('?');
}

/** Compile a file-name pattern with `*` and `?` wildcards. */
export function fileNamePattern(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

function decodeLine(bytes: Buffer): string {
  const text = bytes.toString('utf8');
  return text.endsWith('\r') ? text.slice(0, -1) : text;
}

/** Read `length` bytes at `position`, or fewer at end of file. */
async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  let filled = 0;
  while (filled < length) {
    const { bytesRead } = await handle.read(buffer, filled, length - filled, position + filled);
    if (bytesRead === 0) break;
    filled += bytesRead;
  }
  return buffer.subarray(0, filled);
}

async function withFile<T>(path: string, fn: (handle: FileHandle) => Promise<T>): Promise<T> {
  const handle = await open(path, 'r');
  try {
    return await fn(handle);
  } finally {
    await handle.close();
  }
}

/** `file`, `directory`, `other`, or `undefined` when nothing is there. */
async function entryKind(path: string): Promise<'file' | 'directory' | 'other' | undefined> {
  try {
    const info = await stat(path);
    return info.isFile() ? 'file' : info.isDirectory() ? 'directory' : 'other';
  } catch (err: unknown) {
    if (isMissing(err)) return undefined;
    throw err;
  }
}

async function listDirectory(dir: string): Promise<Dirent[]> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if (isMissing(err)) return [];
    throw err;
  }
}

/** The local file system. */
export const nodeLogFileSystem: LogFileSystem = {
  async expand(pattern: string): Promise<string[]> {
    const { root } = parse(pattern);
    const segments = pattern.slice(root.length).split(sep).filter((segment) => segment !== '');
    let candidates = [root === '' ? '.' : root];

    for (const [i, segment] of segments.entries()) {
      const last = i === segments.length - 1;
      const next: string[] = [];
      for (const dir of candidates) {
        if (!hasWildcard(segment)) {
          const path = join(dir, segment);
          const kind = await entryKind(path);
          if (kind === (last ? 'file' : 'directory')) next.push(path);
          continue;
        }
        const matcher = fileNamePattern(segment);
        for (const entry of await listDirectory(dir)) {
          const wanted = last ? entry.isFile() : entry.isDirectory();
          if (wanted && matcher.test(entry.name)) next.push(join(dir, entry.name));
        }
      }
      candidates = next;
      if (candidates.length === 0) break;
    }
    return segments.length === 0 ? [] : candidates.sort();
  },

  async mtime(path: string): Promise<number | undefined> {
    try {
      return (await stat(path)).mtimeMs;
    } catch (err: unknown) {
      if (isMissing(err)) return undefined;
      throw err;
    }
  },

  readFirstLine(path: string): Promise<LogLine | undefined> {
    return withFile(path, async (handle) => {
      const chunks: Buffer[] = [];
      let position = 0;
      for (;;) {
        const chunk = await readAt(handle, position, CHUNK_SIZE);
        const newline = chunk.indexOf(NEWLINE);
        if (newline !== -1) {
          chunks.push(chunk.subarray(0, newline));
          return { text: decodeLine(Buffer.concat(chunks)), terminated: true };
        }
        chunks.push(chunk);
        position += chunk.length;
        if (chunk.length < CHUNK_SIZE) break;
      }
      if (position === 0) return undefined;
      return { text: decodeLine(Buffer.concat(chunks)), terminated: false };
    });
  },

  readLastLine(path: string): Promise<LogLine | undefined> {
    return withFile(path, async (handle) => {
      const { size } = await handle.stat();
      if (size === 0) return undefined;

      const tail = await readAt(handle, size - 1, 1);
      const terminated = tail[0] === NEWLINE;
      const chunks: Buffer[] = [];
      let position = terminated ? size - 1 : size;

      while (position > 0) {
        const length = Math.min(CHUNK_SIZE, position);
        position -= length;
        const chunk = await readAt(handle, position, length);
        const newline = chunk.lastIndexOf(NEWLINE);
        if (newline !== -1) {
          chunks.unshift(chunk.subarray(newline + 1));
          break;
        }
        chunks.unshift(chunk);
      }
      return { text: decodeLine(Buffer.concat(chunks)), terminated };
    });
  },

  async *readLines(path: string): AsyncGenerator<string, void, undefined> {
    const stream = createReadStream(path, { encoding: 'utf8' });
    const lines = createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });
    try {
      for await (const line of lines) {
        yield line;
      }
    } finally {
      lines.close();
      stream.destroy();
    }
  },
};
