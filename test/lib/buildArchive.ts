// Assembles small Copy-coded 7z archives in memory

import { crc32 } from 'extract-base-iterator';

export interface TestFile {
  /** Omitted: the header stores no name for this file */
  name?: string;
  data?: Buffer | string;
  directory?: boolean;
  anti?: boolean;
  attributes?: number;
  mtime?: bigint;
}

export interface BuildOptions {
  /** All file data in one folder (default: one folder per file) */
  solid?: boolean;
  /** Store per-folder CRCs in UnpackInfo (non-solid only) */
  folderCrcs?: boolean;
  /** Stream indices whose stored CRC is wrong */
  badCrcs?: number[];
  /** Store the header itself as a Copy-coded encoded header */
  encodeHeader?: boolean;
}

export function encodeNumber(value: number): Buffer {
  let extra = 0;
  while (extra < 8 && value >= 2 ** (7 * (extra + 1))) extra++;
  if (extra === 0) return Buffer.from([value]);
  if (extra === 8) {
    const out = Buffer.alloc(9);
    out[0] = 0xff;
    out.writeBigUInt64LE(BigInt(value), 1);
    return out;
  }

  const out = Buffer.alloc(extra + 1);
  out[0] = ((0xff << (8 - extra)) & 0xff) | Math.floor(value / 2 ** (8 * extra));
  let low = value;
  for (let i = 0; i < extra; i++) {
    out[1 + i] = low % 256;
    low = Math.floor(low / 256);
  }
  return out;
}

export function bitVector(values: boolean[]): Buffer {
  const out = Buffer.alloc(Math.ceil(values.length / 8));
  for (let i = 0; i < values.length; i++) {
    if (values[i]) out[i >> 3] |= 0x80 >> (i & 7);
  }
  return out;
}

function uint32(value: number): Buffer {
  const out = Buffer.alloc(4);
  out.writeUInt32LE(value >>> 0, 0);
  return out;
}

function uint64(value: bigint): Buffer {
  const out = Buffer.alloc(8);
  out.writeBigUInt64LE(value, 0);
  return out;
}

function property(id: number, data: Buffer): Buffer {
  return Buffer.concat([Buffer.from([id]), encodeNumber(data.length), data]);
}

/**
 * StreamsInfo for Copy folders: `folders` lists the substream contents of each folder.
 */
export function copyStreamsInfo(packPos: number, folders: Buffer[][], options: { folderCrcs?: boolean; storedCrcs?: number[] } = {}): Buffer {
  const parts: Buffer[] = [];
  const folderData = folders.map((streams) => Buffer.concat(streams));

  parts.push(Buffer.from([0x06]), encodeNumber(packPos), encodeNumber(folders.length), Buffer.from([0x09]));
  for (let i = 0; i < folderData.length; i++) parts.push(encodeNumber(folderData[i].length));
  parts.push(Buffer.from([0x00]));

  parts.push(Buffer.from([0x07, 0x0b]), encodeNumber(folders.length), Buffer.from([0x00]));
  for (let i = 0; i < folders.length; i++) parts.push(Buffer.from([0x01, 0x01, 0x00]));
  parts.push(Buffer.from([0x0c]));
  for (let i = 0; i < folderData.length; i++) parts.push(encodeNumber(folderData[i].length));

  // stored CRC of each substream, in order
  const stored: number[] = [];
  for (let i = 0; i < folders.length; i++) {
    for (let j = 0; j < folders[i].length; j++) stored.push(crc32(folders[i][j]));
  }
  const crcs = options.storedCrcs || stored;

  const useFolderCrcs = options.folderCrcs === true && folders.every((streams) => streams.length === 1);
  if (useFolderCrcs) {
    parts.push(Buffer.from([0x0a, 0x01]));
    for (let i = 0; i < crcs.length; i++) parts.push(uint32(crcs[i]));
  }
  parts.push(Buffer.from([0x00]));

  parts.push(Buffer.from([0x08]));
  if (folders.some((streams) => streams.length !== 1)) {
    parts.push(Buffer.from([0x0d]));
    for (let i = 0; i < folders.length; i++) parts.push(encodeNumber(folders[i].length));
  }
  const sizes: Buffer[] = [];
  for (let i = 0; i < folders.length; i++) {
    for (let j = 0; j < folders[i].length - 1; j++) sizes.push(encodeNumber(folders[i][j].length));
  }
  if (sizes.length > 0) parts.push(Buffer.from([0x09]), ...sizes);
  if (!useFolderCrcs && crcs.length > 0) {
    parts.push(Buffer.from([0x0a, 0x01]));
    for (let i = 0; i < crcs.length; i++) parts.push(uint32(crcs[i]));
  }
  parts.push(Buffer.from([0x00]));

  parts.push(Buffer.from([0x00]));
  return Buffer.concat(parts);
}

export function filesInfo(files: TestFile[]): Buffer {
  const parts: Buffer[] = [encodeNumber(files.length)];

  const empty = files.map((file) => file.directory === true || toBuffer(file.data).length === 0);
  if (empty.some(Boolean)) {
    parts.push(property(0x0e, bitVector(empty)));
    const emptyFiles = files.filter((_file, i) => empty[i]);
    const emptyFileFlags = emptyFiles.map((file) => file.directory !== true);
    if (emptyFileFlags.some(Boolean)) parts.push(property(0x0f, bitVector(emptyFileFlags)));
    const antiFlags = emptyFiles.map((file) => file.anti === true);
    if (antiFlags.some(Boolean)) parts.push(property(0x10, bitVector(antiFlags)));
  }

  if (files.some((file) => file.name !== undefined)) {
    const names = files.map((file) => Buffer.from(`${file.name || ''}\u0000`, 'utf16le'));
    parts.push(property(0x11, Buffer.concat([Buffer.from([0x00]), ...names])));
  }

  const mtimes = files.map((file) => file.mtime);
  if (mtimes.some((t) => t !== undefined)) {
    const values: Buffer[] = [];
    for (let i = 0; i < mtimes.length; i++) {
      const t = mtimes[i];
      if (t !== undefined) values.push(uint64(t));
    }
    parts.push(property(0x14, Buffer.concat([definedVector(mtimes.map((t) => t !== undefined)), Buffer.from([0x00]), ...values])));
  }

  const attributes = files.map((file) => file.attributes);
  if (attributes.some((a) => a !== undefined)) {
    const values: Buffer[] = [];
    for (let i = 0; i < attributes.length; i++) {
      const a = attributes[i];
      if (a !== undefined) values.push(uint32(a));
    }
    parts.push(property(0x15, Buffer.concat([definedVector(attributes.map((a) => a !== undefined)), Buffer.from([0x00]), ...values])));
  }

  parts.push(Buffer.from([0x00]));
  return Buffer.concat(parts);
}

function definedVector(defined: boolean[]): Buffer {
  return defined.every(Boolean) ? Buffer.from([0x01]) : Buffer.concat([Buffer.from([0x00]), bitVector(defined)]);
}

function toBuffer(data: Buffer | string | undefined): Buffer {
  if (data === undefined) return Buffer.alloc(0);
  return typeof data === 'string' ? Buffer.from(data, 'utf8') : data;
}

/**
 * Signature header + packed data + next header.
 */
export function wrapArchive(packed: Buffer, nextHeader: Buffer): Buffer {
  const start = Buffer.concat([uint64(BigInt(packed.length)), uint64(BigInt(nextHeader.length)), uint32(crc32(nextHeader))]);
  const signature = Buffer.concat([Buffer.from([0x37, 0x7a, 0xbc, 0xaf, 0x27, 0x1c, 0x00, 0x04]), uint32(crc32(start)), start]);
  return Buffer.concat([signature, packed, nextHeader]);
}

export function buildArchive(files: TestFile[], options: BuildOptions = {}): Buffer {
  const streams: Buffer[] = [];
  for (let i = 0; i < files.length; i++) {
    const data = toBuffer(files[i].data);
    if (files[i].directory !== true && data.length > 0) streams.push(data);
  }

  const folders = options.solid ? (streams.length > 0 ? [streams] : []) : streams.map((data) => [data]);
  const packed = Buffer.concat(streams);

  const headerParts: Buffer[] = [Buffer.from([0x01])];
  if (folders.length > 0) {
    const storedCrcs = streams.map((data, i) => {
      const value = crc32(data);
      return options.badCrcs && options.badCrcs.indexOf(i) >= 0 ? (value ^ 1) >>> 0 : value;
    });
    headerParts.push(Buffer.from([0x04]), copyStreamsInfo(0, folders, { folderCrcs: options.folderCrcs, storedCrcs: storedCrcs }));
  }
  headerParts.push(Buffer.from([0x05]), filesInfo(files), Buffer.from([0x00]));
  const header = Buffer.concat(headerParts);

  if (!options.encodeHeader) return wrapArchive(packed, header);

  const encoded = Buffer.concat([Buffer.from([0x17]), copyStreamsInfo(packed.length, [[header]], { folderCrcs: true })]);
  return wrapArchive(Buffer.concat([packed, header]), encoded);
}
