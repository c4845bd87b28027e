// LZMA2 codec
//
// LZMA2 format specification:
// https://github.com/ulikunitz/xz/blob/master/doc/LZMA2.md
//
// Control byte values:
// 0x00         = End of stream
// 0x01         = Uncompressed chunk, dictionary reset
// 0x02         = Uncompressed chunk, no dictionary reset
// 0x80-0xFF    = LZMA compressed chunk (bits encode reset flags and size)

import { decodeLzma2 as lzma2Decode } from 'xz-compat';
import { DecompressionError } from '../errors.ts';

/**
 * Decode LZMA2 compressed data to buffer
 *
 * @param properties - 1 byte: dictionary size
 */
export function decodeLzma2(input: Buffer, properties?: Buffer, unpackSize?: number): Buffer {
  if (!properties || properties.length < 1) {
    throw new DecompressionError('LZMA2 requires properties byte');
  }
  if (properties[0] > 40) {
    throw new DecompressionError(`Invalid LZMA2 dictionary size byte: ${properties[0]}`);
  }

  return lzma2Decode(input, properties, unpackSize);
}
