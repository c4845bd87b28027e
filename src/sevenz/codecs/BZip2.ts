// BZip2 codec - 7z stores bzip2 data with the standard BZh header
//
// Uses unbzip2-stream's internal bzip2 block decoder

import { allocBuffer } from 'extract-base-iterator';
import bzip2 from 'unbzip2-stream/lib/bzip2.js';
import { DecompressionError } from '../errors.ts';

/**
 * Decode BZip2 compressed data into a buffer of `unpackSize` bytes
 */
export function decodeBzip2(input: Buffer, _properties?: Buffer, unpackSize?: number): Buffer {
  if (typeof unpackSize !== 'number') {
    throw new DecompressionError('BZip2 requires known unpack size');
  }

  const output = allocBuffer(unpackSize);
  let written = 0;
  bzip2.simple(input, (byte: number) => {
    if (written >= unpackSize) {
      throw new DecompressionError(`BZip2 data decodes to more than ${unpackSize} bytes`);
    }
    output[written++] = byte;
  });

  return written === unpackSize ? output : output.subarray(0, written);
}
