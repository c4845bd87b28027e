// Variable-length integer encoding used throughout 7z headers
//
// The count of leading one bits in the first byte gives the number of
// little-endian bytes that follow; the remaining low bits of the first
// byte are the most significant part of the value:
// 0xxxxxxx                    -> 1 byte  (0-127)
// 10xxxxxx + 1 byte           -> 2 bytes (0-16383)
// 110xxxxx + 2 bytes          -> 3 bytes
// ...
// 11111110 + 7 bytes          -> 8 bytes
// 11111111 + 8 bytes          -> 9 bytes (full 64-bit)
//
// Values are returned as JavaScript numbers, exact up to 2^53 - 1.

import { readUInt64LE } from 'extract-base-iterator';
import { TruncatedDataError } from './errors.ts';

export interface NumberReadResult {
  value: number;
  bytesRead: number;
}

function ensureAvailable(buf: Buffer, offset: number, length: number, what: string): void {
  if (offset < 0 || offset + length > buf.length) {
    throw new TruncatedDataError(`Unexpected end of data reading ${what} at offset ${offset}`);
  }
}

/**
 * Read a 7z variable-length number.
 */
export function readNumber(buf: Buffer, offset: number): NumberReadResult {
  ensureAvailable(buf, offset, 1, 'number');
  const firstByte = buf[offset];

  if (firstByte === 0xff) {
    ensureAvailable(buf, offset + 1, 8, 'number');
    return { value: readUInt64LE(buf, offset + 1), bytesRead: 9 };
  }

  let extraBytes = 0;
  let mask = 0x80;
  while (extraBytes < 8 && (firstByte & mask) !== 0) {
    extraBytes++;
    mask >>= 1;
  }
  ensureAvailable(buf, offset + 1, extraBytes, 'number');

  let value = 0;
  for (let i = 0; i < extraBytes; i++) {
    value += buf[offset + 1 + i] * 256 ** i;
  }
  // bits below the length marker
  value += (firstByte & (mask - 1)) * 256 ** extraBytes;

  return { value: value, bytesRead: 1 + extraBytes };
}

function readBoolean(buf: Buffer, offset: number): boolean {
  ensureAvailable(buf, offset, 1, 'boolean');
  return buf[offset] !== 0;
}

/**
 * Read a bit vector of `count` items, most significant bit first.
 */
export function readBoolVector(buf: Buffer, offset: number, count: number): { values: boolean[]; bytesRead: number } {
  const bytesNeeded = Math.ceil(count / 8);
  ensureAvailable(buf, offset, bytesNeeded, 'bit vector');

  const values: boolean[] = [];
  for (let i = 0; i < count; i++) {
    const byte = buf[offset + (i >> 3)];
    values.push((byte & (0x80 >> (i & 7))) !== 0);
  }
  return { values: values, bytesRead: bytesNeeded };
}

/**
 * Read a "defined" vector: a non-zero "all defined" byte, or zero followed by a bit vector.
 */
export function readDefinedVector(buf: Buffer, offset: number, count: number): { defined: boolean[]; bytesRead: number } {
  if (readBoolean(buf, offset)) {
    const defined: boolean[] = [];
    for (let i = 0; i < count; i++) defined.push(true);
    return { defined: defined, bytesRead: 1 };
  }

  const bits = readBoolVector(buf, offset + 1, count);
  return { defined: bits.values, bytesRead: 1 + bits.bytesRead };
}
