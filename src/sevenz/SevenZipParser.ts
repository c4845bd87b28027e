/**
 * SevenZipParser - reads the archive structure
 *
 * Parser Flow:
 * 1. Read signature header (32 bytes) to get header location
 * 2. Read and verify the next header
 * 3. While it is a kEncodedHeader, decode its folder and parse the result
 * 4. Parse streams info (folder structure, pack positions)
 * 5. Parse files info (names, sizes, attributes)
 * 6. Build the entry list, mapping files with data onto substreams
 *
 * Decompression:
 * - 7z uses "folders" as decompression units
 * - Solid archives: multiple files share one folder (decoded once)
 * - Non-solid: one file per folder
 */

import { crc32, verifyCrc32Region } from 'extract-base-iterator';
import type { ArchiveSource } from './ArchiveSource.ts';
import { codecIdToKey, getCodecName, isCodecSupported } from './codecs/index.ts';
import { ErrorCode, FILETIME_TICKS_PER_MS, FILETIME_UNIX_EPOCH_TICKS, FileAttribute, SIGNATURE_HEADER_SIZE, UnixMode } from './constants.ts';
import { MalformedHeaderError, NotA7zArchiveError, TruncatedDataError, UnsupportedCompressionMethodError, UnsupportedHeaderEncodingError } from './errors.ts';
import { readFolder } from './FolderDecoder.ts';
import { type ArchiveHeader, type FileInfo, parseNextHeader, parseSignatureHeader, type StreamsInfo } from './headers.ts';

const MAX_HEADER_NESTING = 4;

/** Name given to entries the header stores without one */
export const DEFAULT_ENTRY_NAME = 'contents';

export type EntryType = 'file' | 'directory' | 'link';

export interface SevenZipEntry {
  /** Position in the header's file list */
  id: number;
  /** Full path inside the archive */
  name: string;
  basename: string;
  type: EntryType;
  isDirectory: boolean;
  isEmptyFile: boolean;
  isAntiFile: boolean;
  hasStream: boolean;
  size: number;
  crc?: number;
  attributes?: number;
  mode?: number;
  // 100ns ticks since 1601-01-01 UTC
  creationTime?: bigint;
  accessTime?: bigint;
  lastWriteTime?: bigint;
  mtime?: Date;
  // -1 when the entry has no substream
  folderIndex: number;
  streamIndex: number;
  streamIndexInFolder: number;
}

export interface ParsedArchive {
  header: ArchiveHeader;
  entries: SevenZipEntry[];
}

interface StreamLocation {
  folderIndex: number;
  streamIndex: number;
  streamIndexInFolder: number;
  size: number;
  crc?: number;
}

const NO_STREAM: StreamLocation = { folderIndex: -1, streamIndex: -1, streamIndexInFolder: -1, size: 0 };

/**
 * Convert a FILETIME tick count to a Date (millisecond precision).
 */
export function filetimeToDate(ticks: bigint): Date {
  const delta = ticks - FILETIME_UNIX_EPOCH_TICKS;
  let ms = delta / FILETIME_TICKS_PER_MS;
  // bigint division truncates toward zero; round pre-1970 times down
  if (delta < 0n && delta % FILETIME_TICKS_PER_MS !== 0n) ms -= 1n;
  return new Date(Number(ms));
}

export class SevenZipParser {
  private source: ArchiveSource;

  constructor(source: ArchiveSource) {
    this.source = source;
  }

  /**
   * Parse the archive structure.
   * @param defaultName - name for entries stored without one
   */
  parse(defaultName: string = DEFAULT_ENTRY_NAME): ParsedArchive {
    const signature = parseSignatureHeader(this.source.read(0, SIGNATURE_HEADER_SIZE));

    // An archive with no next header holds no entries
    if (signature.nextHeaderSize === 0) {
      return { header: { signature: signature, filesInfo: [] }, entries: [] };
    }

    const headerOffset = SIGNATURE_HEADER_SIZE + signature.nextHeaderOffset;
    const headerEnd = headerOffset + signature.nextHeaderSize;
    if (headerEnd > this.source.getSize()) {
      throw new TruncatedDataError(`Archive is ${this.source.getSize()} bytes but its header ends at ${headerEnd}`);
    }

    let headerBuf = this.source.read(headerOffset, signature.nextHeaderSize);
    if (!verifyCrc32Region(headerBuf, 0, headerBuf.length, signature.nextHeaderCRC)) {
      throw new NotA7zArchiveError('Next header CRC mismatch', ErrorCode.CRC_MISMATCH);
    }

    let next = parseNextHeader(headerBuf);
    for (let depth = 1; next.type === 'encoded'; depth++) {
      if (depth > MAX_HEADER_NESTING) {
        throw new MalformedHeaderError(`Encoded headers nested deeper than ${MAX_HEADER_NESTING} levels`);
      }
      headerBuf = this.decodeEncodedHeader(next.streamsInfo);
      next = parseNextHeader(headerBuf);
    }

    const header: ArchiveHeader = {
      signature: signature,
      streamsInfo: next.header.streamsInfo,
      filesInfo: next.header.filesInfo,
    };
    return { header: header, entries: buildEntries(header, defaultName) };
  }

  /**
   * Decode the folder holding a compressed (or otherwise encoded) header.
   */
  private decodeEncodedHeader(info: StreamsInfo): Buffer {
    if (info.folders.length === 0) {
      throw new MalformedHeaderError('Encoded header declares no folder');
    }

    const folder = info.folders[0];
    for (let i = 0; i < folder.coders.length; i++) {
      const id = folder.coders[i].id;
      if (!isCodecSupported(id)) {
        throw new UnsupportedHeaderEncodingError(`Header is encoded with ${getCodecName(id)}`, codecIdToKey(id));
      }
    }

    let output: Buffer;
    try {
      output = readFolder(this.source, info, 0);
    } catch (err) {
      if (err instanceof UnsupportedCompressionMethodError) {
        throw new UnsupportedHeaderEncodingError(`Header is encoded with ${err.methodName}`, err.methodId, err);
      }
      throw err;
    }

    const expected = info.unpackCRCs[0] ?? folder.unpackCRC;
    if (expected !== undefined && crc32(output) !== expected) {
      throw new NotA7zArchiveError('Encoded header CRC mismatch', ErrorCode.CRC_MISMATCH);
    }
    return output;
  }
}

/**
 * Build entries in header order, assigning each file with data the next substream.
 */
export function buildEntries(header: ArchiveHeader, defaultName: string = DEFAULT_ENTRY_NAME): SevenZipEntry[] {
  const files = header.filesInfo;
  const info = header.streamsInfo;
  const entries: SevenZipEntry[] = [];

  let folderIndex = 0;
  let streamIndex = 0;
  let streamInFolder = 0;

  for (let id = 0; id < files.length; id++) {
    const file = files[id];
    if (!file.hasStream) {
      entries.push(createEntry(id, file, NO_STREAM, defaultName));
      continue;
    }
    if (!info) {
      throw new MalformedHeaderError(`File ${id} has data but the archive declares no streams`);
    }

    // Folders holding no substreams are skipped
    while (folderIndex < info.folders.length && streamInFolder >= info.numUnpackStreamsPerFolder[folderIndex]) {
      folderIndex++;
      streamInFolder = 0;
    }
    if (folderIndex >= info.folders.length) {
      throw new MalformedHeaderError(`File ${id} has data but all ${streamIndex} substreams are assigned`);
    }

    const location: StreamLocation = {
      folderIndex: folderIndex,
      streamIndex: streamIndex,
      streamIndexInFolder: streamInFolder,
      size: info.unpackSizes[streamIndex],
      crc: info.unpackCRCs[streamIndex],
    };
    entries.push(createEntry(id, file, location, defaultName));
    streamIndex++;
    streamInFolder++;
  }

  return entries;
}

function createEntry(id: number, file: FileInfo, location: StreamLocation, defaultName: string): SevenZipEntry {
  const name = file.name || defaultName;
  let type: EntryType = file.isDirectory ? 'directory' : 'file';

  // Unix mode lives in the high 16 bits when the extension bit is set
  let mode: number | undefined;
  if (file.attributes !== undefined) {
    if ((file.attributes & FileAttribute.UNIX_EXTENSION) !== 0) {
      mode = file.attributes >>> 16;
      if ((mode & UnixMode.TYPE_MASK) === UnixMode.SYMLINK) type = 'link';
    } else {
      mode = file.isDirectory ? UnixMode.DEFAULT_DIR : UnixMode.DEFAULT_FILE;
    }
  }

  return {
    id: id,
    name: name,
    basename: getBaseName(name),
    type: type,
    isDirectory: file.isDirectory,
    isEmptyFile: file.isEmptyFile,
    isAntiFile: file.isAntiFile,
    hasStream: file.hasStream,
    size: location.size,
    crc: location.crc,
    attributes: file.attributes,
    mode: mode,
    creationTime: file.ctime,
    accessTime: file.atime,
    lastWriteTime: file.mtime,
    mtime: file.mtime === undefined ? undefined : filetimeToDate(file.mtime),
    folderIndex: location.folderIndex,
    streamIndex: location.streamIndex,
    streamIndexInFolder: location.streamIndexInFolder,
  };
}

function getBaseName(path: string): string {
  const lastSlash = path.lastIndexOf('/');
  const lastBackslash = path.lastIndexOf('\\');
  const lastSep = Math.max(lastSlash, lastBackslash);
  return lastSep >= 0 ? path.slice(lastSep + 1) : path;
}
