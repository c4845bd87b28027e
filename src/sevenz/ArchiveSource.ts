/**
 * ArchiveSource - random access to 7z archive bytes
 *
 * Sources read synchronously: a single archive handle drives one folder at a
 * time, so reads never interleave.
 */

import { allocBuffer } from 'extract-base-iterator';
import fs from 'graceful-fs';

export interface ArchiveSource {
  /** Read up to `length` bytes at `position`; shorter only at end of data. */
  read(position: number, length: number): Buffer;
  getSize(): number;
  close(): void;
}

/**
 * Archive already held in memory.
 */
export class BufferSource implements ArchiveSource {
  private buffer: Buffer;

  constructor(buffer: Buffer) {
    this.buffer = buffer;
  }

  read(position: number, length: number): Buffer {
    return this.buffer.subarray(position, Math.min(position + length, this.buffer.length));
  }

  getSize(): number {
    return this.buffer.length;
  }

  close(): void {}
}

/**
 * Archive read through an open file descriptor.
 */
export class FileSource implements ArchiveSource {
  private fd: number;
  private size: number;

  constructor(fd: number, size: number) {
    this.fd = fd;
    this.size = size;
  }

  static open(filePath: string): FileSource {
    const fd = fs.openSync(filePath, 'r');
    try {
      return new FileSource(fd, fs.fstatSync(fd).size);
    } catch (err) {
      fs.closeSync(fd);
      throw err;
    }
  }

  read(position: number, length: number): Buffer {
    const toRead = Math.max(0, Math.min(length, this.size - position));
    const buf = allocBuffer(toRead);
    let total = 0;
    while (total < toRead) {
      const bytesRead = fs.readSync(this.fd, buf, total, toRead - total, position + total);
      if (bytesRead === 0) break;
      total += bytesRead;
    }
    return total < toRead ? buf.subarray(0, total) : buf;
  }

  getSize(): number {
    return this.size;
  }

  close(): void {
    if (this.fd < 0) return;
    const fd = this.fd;
    this.fd = -1;
    fs.closeSync(fd);
  }
}

/**
 * Several sources read back to back as one archive (`name.7z.001`, `name.7z.002`, ...).
 */
export class VolumeSource implements ArchiveSource {
  private volumes: ArchiveSource[];
  private offsets: number[] = [];
  private size = 0;

  constructor(volumes: ArchiveSource[]) {
    this.volumes = volumes;
    for (let i = 0; i < volumes.length; i++) {
      this.offsets.push(this.size);
      this.size += volumes[i].getSize();
    }
  }

  read(position: number, length: number): Buffer {
    const chunks: Buffer[] = [];
    let pos = position;
    let remaining = Math.max(0, Math.min(length, this.size - position));

    for (let i = 0; i < this.volumes.length && remaining > 0; i++) {
      const start = this.offsets[i];
      const end = start + this.volumes[i].getSize();
      if (pos >= end) continue;

      const chunk = this.volumes[i].read(pos - start, Math.min(remaining, end - pos));
      chunks.push(chunk);
      pos += chunk.length;
      remaining -= chunk.length;
      if (pos < end) break; // volume ended early
    }

    return chunks.length === 1 ? chunks[0] : Buffer.concat(chunks);
  }

  getSize(): number {
    return this.size;
  }

  close(): void {
    let firstError: unknown;
    for (let i = 0; i < this.volumes.length; i++) {
      try {
        this.volumes[i].close();
      } catch (err) {
        if (firstError === undefined) firstError = err;
      }
    }
    if (firstError !== undefined) throw firstError;
  }
}
