import { bufferFrom } from 'extract-base-iterator';
import type { Stats } from 'fs';
import fs from 'graceful-fs';
import mkdirp from 'mkdirp-classic';
import path from 'path';
import { UnsafeEntryPathError } from './sevenz/errors.ts';

/**
 * Destination for one extracted file. `end()` is called once all bytes are
 * written (immediately for directories and empty files); `abort(err)` replaces
 * it when the file's data could not be produced.
 */
export interface Sink {
  write(chunk: Buffer): void;
  end(): void;
  abort?(err: Error): void;
}

/**
 * Collects a copy of a file's bytes in memory.
 */
export class BufferSink implements Sink {
  private chunks: Buffer[] = [];
  ended = false;
  error: Error | null = null;

  write(chunk: Buffer): void {
    this.chunks.push(bufferFrom(chunk));
  }

  end(): void {
    this.ended = true;
  }

  abort(err: Error): void {
    this.error = err;
  }

  toBuffer(): Buffer {
    if (this.chunks.length !== 1) this.chunks = [Buffer.concat(this.chunks)];
    return this.chunks[0];
  }

  toString(encoding: BufferEncoding = 'utf8'): string {
    return this.toBuffer().toString(encoding);
  }
}

export interface FileSinkOptions {
  mode?: number;
  /** Directory the file must stay inside: no parent below it may be a symbolic link */
  root?: string;
}

/**
 * Writes a file on disk. The file (and its parent directories) is created on
 * the first write or on end, so empty files still appear.
 */
export class FileSink implements Sink {
  readonly filePath: string;
  private mode?: number;
  private root?: string;
  private fd = -1;
  private closed = false;

  constructor(filePath: string, options: FileSinkOptions = {}) {
    this.filePath = filePath;
    this.mode = options.mode;
    this.root = options.root;
  }

  private open(): number {
    if (this.fd < 0) {
      if (this.root !== undefined) assertNoLinkedParent(this.root, this.filePath);
      mkdirp.sync(path.dirname(this.filePath));
      this.fd = fs.openSync(this.filePath, 'w', this.mode);
    }
    return this.fd;
  }

  write(chunk: Buffer): void {
    const fd = this.open();
    let offset = 0;
    while (offset < chunk.length) {
      offset += fs.writeSync(fd, chunk, offset, chunk.length - offset);
    }
  }

  end(): void {
    if (this.closed) return;
    this.open();
    this.close();
  }

  /** Closes and removes the partial file. */
  abort(_err: Error): void {
    if (this.closed) return;
    const opened = this.fd >= 0;
    this.close();
    if (opened) fs.unlinkSync(this.filePath);
  }

  private close(): void {
    this.closed = true;
    if (this.fd < 0) return;
    const fd = this.fd;
    this.fd = -1;
    fs.closeSync(fd);
  }
}

/**
 * Creates a symbolic link whose target is the entry's content.
 * With a root, targets that are absolute or resolve outside it are refused.
 */
export class SymlinkSink implements Sink {
  readonly linkPath: string;
  private root?: string;
  private target = new BufferSink();

  constructor(linkPath: string, root?: string) {
    this.linkPath = linkPath;
    this.root = root;
  }

  write(chunk: Buffer): void {
    this.target.write(chunk);
  }

  end(): void {
    const target = this.target.toString('utf8');
    if (this.root !== undefined) {
      assertNoLinkedParent(this.root, this.linkPath);
      if (!isContained(this.root, path.resolve(path.dirname(this.linkPath), target)) || path.isAbsolute(target) || DRIVE_LETTER.test(target)) {
        throw new UnsafeEntryPathError(`${displayPath(this.root, this.linkPath)} -> ${target}`);
      }
    }
    mkdirp.sync(path.dirname(this.linkPath));
    if (lexists(this.linkPath)) fs.unlinkSync(this.linkPath);
    fs.symlinkSync(target, this.linkPath);
  }
}

/**
 * Drops every byte; the worker still verifies the file's CRC.
 */
export function createDiscardSink(): Sink {
  return {
    write: () => {},
    end: () => {},
  };
}

const DRIVE_LETTER = /^[A-Za-z]:/;

function lstatOrNull(filePath: string): Stats | null {
  try {
    return fs.lstatSync(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
    throw err;
  }
}

function lexists(filePath: string): boolean {
  return lstatOrNull(filePath) !== null;
}

function isContained(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), target);
  return relative === '' || (relative.split(path.sep)[0] !== '..' && !path.isAbsolute(relative));
}

function displayPath(root: string, target: string): string {
  return path.relative(path.resolve(root), target).split(path.sep).join('/');
}

/**
 * Throw UnsafeEntryPathError when a directory between `root` and `target`
 * already exists as a symbolic link.
 */
export function assertNoLinkedParent(root: string, target: string): void {
  const base = path.resolve(root);
  const relative = path.relative(base, path.dirname(path.resolve(target)));
  if (!relative) return;

  let current = base;
  const parts = relative.split(path.sep);
  for (let i = 0; i < parts.length; i++) {
    current = path.join(current, parts[i]);
    const stats = lstatOrNull(current);
    if (!stats) return;
    if (stats.isSymbolicLink()) throw new UnsafeEntryPathError(displayPath(base, path.resolve(target)));
  }
}

/**
 * Creates a directory (and its parents) when ended.
 */
export class DirectorySink implements Sink {
  readonly dirPath: string;
  private root?: string;

  constructor(dirPath: string, root?: string) {
    this.dirPath = dirPath;
    this.root = root;
  }

  write(_chunk: Buffer): void {}

  end(): void {
    if (this.root !== undefined) assertNoLinkedParent(this.root, this.dirPath);
    mkdirp.sync(this.dirPath);
  }
}
