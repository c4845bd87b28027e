// Codec registry for 7z decompression
// Each codec decodes a coder's complete input stream(s) to its declared output size

import { decodeBcj, decodeBcjArm, decodeBcjArm64, decodeBcjArmt, decodeBcjIa64, decodeBcjPpc, decodeBcjSparc, decodeDelta } from 'xz-compat';
import { CodecId } from '../constants.ts';
import { DecompressionError, UnsupportedCompressionMethodError } from '../errors.ts';
import { decodeBcj2 } from './Bcj2.ts';
import { decodeBzip2 } from './BZip2.ts';
import { decodeCopy } from './Copy.ts';
import { decodeDeflate } from './Deflate.ts';
import { decodeLzma } from './Lzma.ts';
import { decodeLzma2 } from './Lzma2.ts';

export interface Codec {
  name: string;
  /** Input streams the coder consumes (1 when omitted) */
  numInStreams?: number;
  decode: (inputs: Buffer[], properties: Buffer | undefined, unpackSize: number) => Buffer;
}

type SingleStreamDecode = (input: Buffer, properties?: Buffer, unpackSize?: number) => Buffer;

function wrapSyncDecode(name: string, fn: SingleStreamDecode): Codec['decode'] {
  return (inputs, properties, unpackSize) => {
    if (inputs.length !== 1) {
      throw new DecompressionError(`${name} takes one input stream, got ${inputs.length}`);
    }
    return fn(inputs[0], properties, unpackSize);
  };
}

// Registry of supported codecs
const codecs: { [key: string]: Codec } = {};

// Names of every method id we recognise, decodable or not
const codecNames: { [key: string]: string } = {};

/**
 * Convert codec ID bytes to a string key, e.g. `3-1-1`
 */
export function codecIdToKey(id: number[]): string {
  const parts: string[] = [];
  for (let i = 0; i < id.length; i++) {
    parts.push(id[i].toString(16).toUpperCase());
  }
  return parts.join('-');
}

function nameCodec(id: number[], name: string): void {
  codecNames[codecIdToKey(id)] = name;
}

/**
 * Register a codec (replacing any codec registered under the same id)
 */
export function registerCodec(id: number[], codec: Codec): void {
  codecs[codecIdToKey(id)] = codec;
  nameCodec(id, codec.name);
}

/**
 * Get a codec by ID
 * @throws UnsupportedCompressionMethodError if no codec is registered for the id
 */
export function getCodec(id: number[]): Codec {
  const key = codecIdToKey(id);
  const codec = codecs[key];
  if (!codec) {
    throw new UnsupportedCompressionMethodError(key, getCodecName(id));
  }
  return codec;
}

export function isCodecSupported(id: number[]): boolean {
  return codecs[codecIdToKey(id)] !== undefined;
}

/**
 * Get human-readable codec name
 */
export function getCodecName(id: number[]): string {
  const key = codecIdToKey(id);
  return codecNames[key] || `Unknown (${key})`;
}

// Methods recognised but not decoded
nameCodec(CodecId.PPMD, 'PPMd');
nameCodec(CodecId.DEFLATE64, 'Deflate64');
nameCodec(CodecId.ZSTD, 'Zstandard');
nameCodec(CodecId.AES, 'AES-256');

// Register built-in codecs

registerCodec(CodecId.COPY, { name: 'Copy', decode: wrapSyncDecode('Copy', decodeCopy) });
registerCodec(CodecId.LZMA, { name: 'LZMA', decode: wrapSyncDecode('LZMA', decodeLzma) });
registerCodec(CodecId.LZMA2, { name: 'LZMA2', decode: wrapSyncDecode('LZMA2', decodeLzma2) });
registerCodec(CodecId.DELTA, { name: 'Delta', decode: wrapSyncDecode('Delta', (input, properties) => decodeDelta(input, properties)) });
registerCodec(CodecId.DEFLATE, { name: 'Deflate', decode: wrapSyncDecode('Deflate', decodeDeflate) });
registerCodec(CodecId.BZIP2, { name: 'BZip2', decode: wrapSyncDecode('BZip2', decodeBzip2) });

// Branch converters
registerCodec(CodecId.BCJ_X86, { name: 'BCJ (x86)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcj(input, properties)) });
registerCodec(CodecId.BCJ_ARM, { name: 'BCJ (ARM)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjArm(input, properties)) });
registerCodec(CodecId.BCJ_ARMT, { name: 'BCJ (ARM Thumb)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjArmt(input, properties)) });
registerCodec(CodecId.BCJ_ARM64, { name: 'BCJ (ARM64)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjArm64(input, properties)) });
registerCodec(CodecId.BCJ_PPC, { name: 'BCJ (PowerPC)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjPpc(input, properties)) });
registerCodec(CodecId.BCJ_IA64, { name: 'BCJ (IA64)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjIa64(input, properties)) });
registerCodec(CodecId.BCJ_SPARC, { name: 'BCJ (SPARC)', decode: wrapSyncDecode('BCJ', (input, properties) => decodeBcjSparc(input, properties)) });

// BCJ2 (x86) filter - four input streams
registerCodec(CodecId.BCJ2, { name: 'BCJ2', numInStreams: 4, decode: decodeBcj2 });
