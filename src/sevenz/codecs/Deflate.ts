// Deflate codec - 7z stores raw deflate without zlib or gzip headers

import { inflateRaw } from 'extract-base-iterator';

export function decodeDeflate(input: Buffer, _properties?: Buffer, _unpackSize?: number): Buffer {
  return inflateRaw(input);
}
