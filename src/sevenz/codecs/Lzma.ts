// LZMA codec
// LZMA properties in 7z are 5 bytes: 1 byte lc/lp/pb + 4 bytes dictionary size (little-endian)

import { decodeLzma as lzmaDecode } from 'xz-compat';
import { DecompressionError } from '../errors.ts';

/**
 * Decode LZMA compressed data to buffer
 *
 * @param properties - 5 bytes: lc/lp/pb + dict size
 * @param unpackSize - Expected output size, required since raw LZMA streams may lack an end marker
 */
export function decodeLzma(input: Buffer, properties?: Buffer, unpackSize?: number): Buffer {
  if (!properties || properties.length < 5) {
    throw new DecompressionError('LZMA requires 5-byte properties');
  }
  if (typeof unpackSize !== 'number' || unpackSize < 0) {
    throw new DecompressionError('LZMA requires known unpack size');
  }

  return lzmaDecode(input, properties, unpackSize);
}
