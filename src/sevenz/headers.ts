// 7z header parsing
// Reference: 7-Zip DOC/7zFormat.txt

import { bufferEquals, readUInt64LE, verifyCrc32Region } from 'extract-base-iterator';
import { ByteReader } from './ByteReader.ts';
import { findUnboundOutputs } from './CoderGraph.ts';
import { CoderFlag, ErrorCode, PropertyId, SEVENZ_MAGIC, SIGNATURE_HEADER_SIZE } from './constants.ts';
import { MalformedHeaderError, NotA7zArchiveError, TruncatedDataError } from './errors.ts';

// Upper bounds for counts read from a folder record
const MAX_CODERS_PER_FOLDER = 64;
const MAX_CODER_STREAMS = 64;
const MAX_CODEC_ID_SIZE = 8;

export interface SignatureHeader {
  majorVersion: number;
  minorVersion: number;
  startHeaderCRC: number;
  nextHeaderOffset: number;
  nextHeaderSize: number;
  nextHeaderCRC: number;
}

export interface Coder {
  id: number[]; // method id bytes
  numInStreams: number;
  numOutStreams: number;
  properties?: Buffer;
}

/** Edge feeding coder output `outIndex` into coder input `inIndex` (folder-wide stream indices). */
export interface BindPair {
  inIndex: number;
  outIndex: number;
}

export interface Folder {
  coders: Coder[];
  bindPairs: BindPair[];
  packedStreams: number[]; // folder input index fed by each pack stream slot
  unpackSizes: number[]; // one per coder output
  unpackCRC?: number;
}

export interface StreamsInfo {
  packPos: number; // relative to the end of the signature header
  packSizes: number[];
  packCRCs?: (number | undefined)[];
  folders: Folder[];
  numUnpackStreamsPerFolder: number[];
  unpackSizes: number[]; // one per substream
  unpackCRCs: (number | undefined)[]; // one per substream
}

export interface FileInfo {
  name: string;
  hasStream: boolean;
  isDirectory: boolean;
  isEmptyFile: boolean;
  isAntiFile: boolean; // "anti" items mark deletions in update archives
  attributes?: number;
  // 100ns ticks since 1601-01-01 UTC
  ctime?: bigint;
  atime?: bigint;
  mtime?: bigint;
}

export interface HeaderContent {
  streamsInfo?: StreamsInfo;
  filesInfo: FileInfo[];
}

export interface ArchiveHeader extends HeaderContent {
  signature: SignatureHeader;
}

/** Either a plain header or the description of the folder holding the real one. */
export type NextHeader = { type: 'header'; header: HeaderContent } | { type: 'encoded'; streamsInfo: StreamsInfo };

/**
 * Parse and verify the 32-byte signature header.
 */
export function parseSignatureHeader(buf: Buffer): SignatureHeader {
  if (buf.length < SEVENZ_MAGIC.length || !bufferEquals(buf, 0, SEVENZ_MAGIC)) {
    throw new NotA7zArchiveError('Not a valid 7z archive');
  }
  if (buf.length < SIGNATURE_HEADER_SIZE) {
    throw new TruncatedDataError(`Signature header truncated: ${buf.length} of ${SIGNATURE_HEADER_SIZE} bytes`);
  }

  const majorVersion = buf[6];
  const minorVersion = buf[7];
  if (majorVersion !== 0) {
    throw new NotA7zArchiveError(`Unsupported 7z version: ${majorVersion}.${minorVersion}`, ErrorCode.UNSUPPORTED_VERSION);
  }

  // CRC of the 20 bytes that follow it
  const startHeaderCRC = buf.readUInt32LE(8);
  if (!verifyCrc32Region(buf, 12, 20, startHeaderCRC)) {
    throw new NotA7zArchiveError('Start header CRC mismatch', ErrorCode.CRC_MISMATCH);
  }

  return {
    majorVersion: majorVersion,
    minorVersion: minorVersion,
    startHeaderCRC: startHeaderCRC,
    nextHeaderOffset: readUInt64LE(buf, 12),
    nextHeaderSize: readUInt64LE(buf, 20),
    nextHeaderCRC: buf.readUInt32LE(28),
  };
}

/**
 * Parse the block the signature header points at (kHeader or kEncodedHeader).
 */
export function parseNextHeader(buf: Buffer): NextHeader {
  const reader = new ByteReader(buf);
  const propertyId = reader.readNumber();

  if (propertyId === PropertyId.kHeader) {
    return { type: 'header', header: parseHeaderContent(reader) };
  }
  if (propertyId === PropertyId.kEncodedHeader) {
    return { type: 'encoded', streamsInfo: parseStreamsInfo(reader) };
  }
  throw new MalformedHeaderError(`Expected kHeader or kEncodedHeader, got ${propertyId}`);
}

/**
 * Parse header content following the kHeader id.
 */
export function parseHeaderContent(reader: ByteReader): HeaderContent {
  const result: HeaderContent = { filesInfo: [] };

  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;

    switch (propertyId) {
      case PropertyId.kArchiveProperties:
        skipArchiveProperties(reader);
        break;
      case PropertyId.kAdditionalStreamsInfo:
        // parsed for validation, the data is not used
        parseStreamsInfo(reader);
        break;
      case PropertyId.kMainStreamsInfo:
        result.streamsInfo = parseStreamsInfo(reader);
        break;
      case PropertyId.kFilesInfo:
        result.filesInfo = parseFilesInfo(reader, result.streamsInfo ? result.streamsInfo.unpackSizes.length : 0);
        break;
      default:
        throw new MalformedHeaderError(`Unknown property ID in header: ${propertyId}`);
    }
  }

  return result;
}

/**
 * Parse a StreamsInfo block (main streams, additional streams or encoded header).
 */
export function parseStreamsInfo(reader: ByteReader): StreamsInfo {
  const info: StreamsInfo = {
    packPos: 0,
    packSizes: [],
    folders: [],
    numUnpackStreamsPerFolder: [],
    unpackSizes: [],
    unpackCRCs: [],
  };
  let hasSubStreams = false;

  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;

    switch (propertyId) {
      case PropertyId.kPackInfo:
        parsePackInfo(reader, info);
        break;
      case PropertyId.kUnpackInfo:
        info.folders = parseUnpackInfo(reader);
        break;
      case PropertyId.kSubStreamsInfo:
        parseSubStreamsInfo(reader, info);
        hasSubStreams = true;
        break;
      default:
        throw new MalformedHeaderError(`Unknown property ID in StreamsInfo: ${propertyId}`);
    }
  }

  // Without SubStreamsInfo each folder holds exactly one stream
  if (!hasSubStreams) {
    for (let i = 0; i < info.folders.length; i++) {
      const folder = info.folders[i];
      info.numUnpackStreamsPerFolder.push(1);
      info.unpackSizes.push(folderOutputSize(folder));
      info.unpackCRCs.push(folder.unpackCRC);
    }
  }

  return info;
}

function parsePackInfo(reader: ByteReader, info: StreamsInfo): void {
  info.packPos = reader.readNumber();
  const numPackStreams = reader.readNumber();

  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;

    if (propertyId === PropertyId.kSize) {
      info.packSizes = [];
      for (let i = 0; i < numPackStreams; i++) info.packSizes.push(reader.readNumber());
    } else if (propertyId === PropertyId.kCRC) {
      info.packCRCs = readDigests(reader, numPackStreams);
    } else {
      throw new MalformedHeaderError(`Unknown property ID in PackInfo: ${propertyId}`);
    }
  }

  if (info.packSizes.length !== numPackStreams) {
    throw new MalformedHeaderError(`PackInfo declares ${numPackStreams} pack streams but lists ${info.packSizes.length} sizes`);
  }
}

function parseUnpackInfo(reader: ByteReader): Folder[] {
  const folders: Folder[] = [];

  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;

    if (propertyId === PropertyId.kFolder) {
      const numFolders = reader.readNumber();
      if (reader.readByte() !== 0) {
        throw new MalformedHeaderError('External folders are not supported');
      }
      for (let i = 0; i < numFolders; i++) folders.push(parseFolder(reader));
    } else if (propertyId === PropertyId.kCodersUnpackSize) {
      for (let i = 0; i < folders.length; i++) {
        const folder = folders[i];
        let numOutputs = 0;
        for (let j = 0; j < folder.coders.length; j++) numOutputs += folder.coders[j].numOutStreams;
        folder.unpackSizes = [];
        for (let j = 0; j < numOutputs; j++) folder.unpackSizes.push(reader.readNumber());
      }
    } else if (propertyId === PropertyId.kCRC) {
      const digests = readDigests(reader, folders.length);
      for (let i = 0; i < folders.length; i++) folders[i].unpackCRC = digests[i];
    } else {
      throw new MalformedHeaderError(`Unknown property ID in UnpackInfo: ${propertyId}`);
    }
  }

  return folders;
}

function parseFolder(reader: ByteReader): Folder {
  const numCoders = reader.readNumber();
  if (numCoders < 1 || numCoders > MAX_CODERS_PER_FOLDER) {
    throw new MalformedHeaderError(`Invalid coder count: ${numCoders}`);
  }

  const coders: Coder[] = [];
  let numInStreamsTotal = 0;
  let numOutStreamsTotal = 0;

  for (let i = 0; i < numCoders; i++) {
    const flags = reader.readByte();
    if ((flags & CoderFlag.ALTERNATIVE_METHODS) !== 0) {
      throw new MalformedHeaderError('Alternative coder methods are not supported');
    }

    const idSize = flags & CoderFlag.ID_SIZE_MASK;
    if (idSize > MAX_CODEC_ID_SIZE) {
      throw new MalformedHeaderError(`Invalid codec id size: ${idSize}`);
    }
    const id = Array.from(reader.readBytes(idSize));

    let numInStreams = 1;
    let numOutStreams = 1;
    if ((flags & CoderFlag.IS_COMPLEX) !== 0) {
      numInStreams = reader.readNumber();
      numOutStreams = reader.readNumber();
      if (numInStreams > MAX_CODER_STREAMS || numOutStreams > MAX_CODER_STREAMS) {
        throw new MalformedHeaderError(`Invalid coder stream counts: ${numInStreams} in, ${numOutStreams} out`);
      }
    }

    let properties: Buffer | undefined;
    if ((flags & CoderFlag.HAS_PROPERTIES) !== 0) {
      properties = reader.readBytes(reader.readNumber());
    }

    coders.push({ id: id, numInStreams: numInStreams, numOutStreams: numOutStreams, properties: properties });
    numInStreamsTotal += numInStreams;
    numOutStreamsTotal += numOutStreams;
  }

  if (numOutStreamsTotal === 0) {
    throw new MalformedHeaderError('Folder has no output streams');
  }

  const numBindPairs = numOutStreamsTotal - 1;
  const bindPairs: BindPair[] = [];
  for (let i = 0; i < numBindPairs; i++) {
    bindPairs.push({ inIndex: reader.readNumber(), outIndex: reader.readNumber() });
  }

  const numPackedStreams = numInStreamsTotal - numBindPairs;
  if (numPackedStreams < 1) {
    throw new MalformedHeaderError(`Folder has ${numInStreamsTotal} inputs for ${numBindPairs} bind pairs`);
  }

  const packedStreams: number[] = [];
  if (numPackedStreams === 1) {
    // implied: the single input no bind pair feeds
    for (let i = 0; i < numInStreamsTotal && packedStreams.length === 0; i++) {
      if (!bindPairs.some((pair) => pair.inIndex === i)) packedStreams.push(i);
    }
    if (packedStreams.length === 0) {
      throw new MalformedHeaderError('Folder has no unbound input stream');
    }
  } else {
    for (let i = 0; i < numPackedStreams; i++) packedStreams.push(reader.readNumber());
  }

  return { coders: coders, bindPairs: bindPairs, packedStreams: packedStreams, unpackSizes: [] };
}

function parseSubStreamsInfo(reader: ByteReader, info: StreamsInfo): void {
  const folders = info.folders;
  const numUnpackStreams: number[] = [];
  for (let i = 0; i < folders.length; i++) numUnpackStreams.push(1);

  let propertyId = reader.readNumber();

  if (propertyId === PropertyId.kNumUnpackStream) {
    for (let i = 0; i < folders.length; i++) numUnpackStreams[i] = reader.readNumber();
    propertyId = reader.readNumber();
  }

  // Sizes: all but the last per folder are stored, the last is the remainder
  const hasSizes = propertyId === PropertyId.kSize;
  const unpackSizes: number[] = [];
  for (let i = 0; i < folders.length; i++) {
    const numStreams = numUnpackStreams[i];
    if (numStreams === 0) continue;

    if (numStreams > 1 && !hasSizes) {
      throw new MalformedHeaderError(`Folder ${i} holds ${numStreams} streams but no sizes are stored`);
    }

    let sum = 0;
    for (let j = 1; j < numStreams; j++) {
      const size = reader.readNumber();
      unpackSizes.push(size);
      sum += size;
    }

    const folderSize = folderOutputSize(folders[i]);
    if (sum > folderSize) {
      throw new MalformedHeaderError(`Substream sizes of folder ${i} exceed its unpacked size`);
    }
    unpackSizes.push(folderSize - sum);
  }
  if (hasSizes) propertyId = reader.readNumber();

  // Folders holding a single stream with a folder CRC need no substream digest
  let numDigests = 0;
  for (let i = 0; i < folders.length; i++) {
    if (numUnpackStreams[i] !== 1 || folders[i].unpackCRC === undefined) numDigests += numUnpackStreams[i];
  }

  let digests: (number | undefined)[] | undefined;
  while (propertyId !== PropertyId.kEnd) {
    if (propertyId === PropertyId.kCRC) {
      digests = readDigests(reader, numDigests);
    } else {
      throw new MalformedHeaderError(`Unknown property ID in SubStreamsInfo: ${propertyId}`);
    }
    propertyId = reader.readNumber();
  }

  const unpackCRCs: (number | undefined)[] = [];
  let digestIndex = 0;
  for (let i = 0; i < folders.length; i++) {
    const numStreams = numUnpackStreams[i];
    if (numStreams === 1 && folders[i].unpackCRC !== undefined) {
      unpackCRCs.push(folders[i].unpackCRC);
      continue;
    }
    for (let j = 0; j < numStreams; j++) {
      unpackCRCs.push(digests ? digests[digestIndex++] : undefined);
    }
  }

  info.numUnpackStreamsPerFolder = numUnpackStreams;
  info.unpackSizes = unpackSizes;
  info.unpackCRCs = unpackCRCs;
}

/**
 * @param numStreams - substreams declared before the file list; files beyond them need an empty-stream bit each
 */
function parseFilesInfo(reader: ByteReader, numStreams: number): FileInfo[] {
  const numFiles = reader.readNumber();
  if (numFiles > numStreams + reader.remaining() * 8) {
    throw new TruncatedDataError(`FilesInfo declares ${numFiles} files in ${reader.remaining()} bytes`);
  }

  const files: FileInfo[] = [];
  for (let i = 0; i < numFiles; i++) {
    files.push({ name: '', hasStream: true, isDirectory: false, isEmptyFile: false, isAntiFile: false });
  }

  let emptyStreamFlags: boolean[] = [];
  let emptyFileFlags: boolean[] = [];
  let antiFlags: boolean[] = [];
  let numEmptyStreams = 0;

  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;

    const size = reader.readNumber();
    // each property is parsed from its own slice
    const prop = new ByteReader(reader.readBytes(size));

    switch (propertyId) {
      case PropertyId.kEmptyStream:
        emptyStreamFlags = prop.readBoolVector(numFiles);
        numEmptyStreams = emptyStreamFlags.filter(Boolean).length;
        break;
      case PropertyId.kEmptyFile:
        emptyFileFlags = prop.readBoolVector(numEmptyStreams);
        break;
      case PropertyId.kAnti:
        antiFlags = prop.readBoolVector(numEmptyStreams);
        break;
      case PropertyId.kName:
        parseFileNames(prop, files);
        break;
      case PropertyId.kCTime:
        parseFileTimes(prop, files, 'ctime');
        break;
      case PropertyId.kATime:
        parseFileTimes(prop, files, 'atime');
        break;
      case PropertyId.kMTime:
        parseFileTimes(prop, files, 'mtime');
        break;
      case PropertyId.kWinAttributes:
        parseAttributes(prop, files);
        break;
      default:
        // kDummy, kStartPos, kComment and unknown properties
        break;
    }
  }

  let emptyIndex = 0;
  for (let i = 0; i < numFiles; i++) {
    if (!emptyStreamFlags[i]) continue;
    const file = files[i];
    file.hasStream = false;
    file.isEmptyFile = emptyFileFlags[emptyIndex] === true;
    file.isDirectory = !file.isEmptyFile;
    file.isAntiFile = antiFlags[emptyIndex] === true;
    emptyIndex++;
  }

  return files;
}

/**
 * Names are UTF-16LE, each NUL-terminated.
 */
function parseFileNames(reader: ByteReader, files: FileInfo[]): void {
  if (reader.readByte() !== 0) {
    throw new MalformedHeaderError('External file names are not supported');
  }

  const buf = reader.buffer;
  for (let i = 0; i < files.length; i++) {
    const start = reader.offset;
    let end = start;
    while (end + 1 < buf.length && (buf[end] !== 0 || buf[end + 1] !== 0)) end += 2;
    if (end + 1 >= buf.length) {
      throw new TruncatedDataError(`File name ${i} is not terminated`);
    }
    files[i].name = buf.toString('utf16le', start, end);
    reader.offset = end + 2;
  }
}

function parseFileTimes(reader: ByteReader, files: FileInfo[], timeType: 'ctime' | 'atime' | 'mtime'): void {
  const defined = reader.readDefinedVector(files.length);
  if (reader.readByte() !== 0) {
    throw new MalformedHeaderError('External file times are not supported');
  }
  for (let i = 0; i < files.length; i++) {
    if (defined[i]) files[i][timeType] = reader.readBigUInt64();
  }
}

function parseAttributes(reader: ByteReader, files: FileInfo[]): void {
  const defined = reader.readDefinedVector(files.length);
  if (reader.readByte() !== 0) {
    throw new MalformedHeaderError('External file attributes are not supported');
  }
  for (let i = 0; i < files.length; i++) {
    if (defined[i]) files[i].attributes = reader.readUInt32();
  }
}

function readDigests(reader: ByteReader, count: number): (number | undefined)[] {
  const defined = reader.readDefinedVector(count);
  const digests: (number | undefined)[] = [];
  for (let i = 0; i < count; i++) {
    digests.push(defined[i] ? reader.readUInt32() : undefined);
  }
  return digests;
}

function skipArchiveProperties(reader: ByteReader): void {
  for (;;) {
    const propertyId = reader.readNumber();
    if (propertyId === PropertyId.kEnd) break;
    reader.skip(reader.readNumber());
  }
}

// Size of the folder's final output, or its last declared size when the
// graph has no single final output (decoding that folder then fails).
function folderOutputSize(folder: Folder): number {
  const outputs = findUnboundOutputs(folder);
  const index = outputs.length === 1 ? outputs[0] : folder.unpackSizes.length - 1;
  const size = folder.unpackSizes[index];
  if (size === undefined) {
    throw new MalformedHeaderError('Folder has no unpack sizes');
  }
  return size;
}
