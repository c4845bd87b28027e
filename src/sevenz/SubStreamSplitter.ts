/**
 * SubStreamSplitter - divides a folder's decoded output into per-file ranges
 *
 * A solid folder decodes to one byte stream; the substream sizes in the
 * header cut it into consecutive file contents. Chunks are routed as they
 * arrive, with a running CRC-32 per range.
 */

import { crc32 } from 'extract-base-iterator';
import { TruncatedDataError } from './errors.ts';
import type { StreamsInfo } from './headers.ts';

export interface SubStreamRange {
  /** Global substream index (position in StreamsInfo.unpackSizes) */
  streamIndex: number;
  /** Offset within the folder's decoded output */
  offset: number;
  size: number;
  expectedCrc?: number;
}

export interface SubStreamHandlers {
  onData?: (index: number, chunk: Buffer) => void;
  onComplete: (index: number, crc: number, expectedCrc: number | undefined) => void;
}

/**
 * Index of the first substream of each folder.
 */
export function getFolderStreamStarts(info: StreamsInfo): number[] {
  const starts: number[] = [];
  let next = 0;
  for (let i = 0; i < info.folders.length; i++) {
    starts.push(next);
    next += info.numUnpackStreamsPerFolder[i];
  }
  return starts;
}

/**
 * Byte ranges of a folder's substreams, in declaration order.
 */
export function getFolderSubStreams(info: StreamsInfo, folderIndex: number): SubStreamRange[] {
  const first = getFolderStreamStarts(info)[folderIndex];
  const count = info.numUnpackStreamsPerFolder[folderIndex];
  const folder = info.folders[folderIndex];

  const ranges: SubStreamRange[] = [];
  let offset = 0;
  for (let i = 0; i < count; i++) {
    const streamIndex = first + i;
    let expectedCrc = info.unpackCRCs[streamIndex];
    if (expectedCrc === undefined && count === 1) expectedCrc = folder.unpackCRC;

    const size = info.unpackSizes[streamIndex];
    ranges.push({ streamIndex: streamIndex, offset: offset, size: size, expectedCrc: expectedCrc });
    offset += size;
  }
  return ranges;
}

export class SubStreamSplitter {
  private ranges: SubStreamRange[];
  private handlers: SubStreamHandlers;
  private current = 0;
  private position = 0;
  private crc = 0;
  private finished = false;

  constructor(ranges: SubStreamRange[], handlers: SubStreamHandlers) {
    this.ranges = ranges;
    this.handlers = handlers;
  }

  /**
   * Route a decoded chunk to the range(s) it covers. Bytes past the last range are dropped.
   */
  write(chunk: Buffer): void {
    let offset = 0;
    this.completeFinishedRanges();

    while (offset < chunk.length && this.current < this.ranges.length) {
      const range = this.ranges[this.current];
      const rangeEnd = range.offset + range.size;
      const toWrite = Math.min(chunk.length - offset, rangeEnd - this.position);

      const piece = chunk.subarray(offset, offset + toWrite);
      this.crc = crc32(piece, this.crc);
      if (this.handlers.onData) this.handlers.onData(this.current, piece);

      this.position += toWrite;
      offset += toWrite;
      this.completeFinishedRanges();
    }
  }

  /**
   * Signal the end of decoded data.
   * @throws TruncatedDataError when ranges are still waiting for bytes
   */
  end(): void {
    if (this.finished) return;
    this.finished = true;
    this.completeFinishedRanges();

    if (this.current < this.ranges.length) {
      const missing = this.ranges.length - this.current;
      throw new TruncatedDataError(`Decoded folder ended at byte ${this.position} with ${missing} substream(s) incomplete`);
    }
  }

  isComplete(index: number): boolean {
    return index < this.current;
  }

  // Complete every range whose last byte has been written (zero-size ranges included)
  private completeFinishedRanges(): void {
    while (this.current < this.ranges.length) {
      const range = this.ranges[this.current];
      if (this.position < range.offset + range.size) break;

      const crc = this.crc;
      this.current++;
      this.crc = 0;
      this.handlers.onComplete(this.current - 1, crc, range.expectedCrc);
    }
  }
}
