// Copy codec - stored data, passed through unchanged

/**
 * Decode a buffer using the Copy codec (identity)
 */
export function decodeCopy(input: Buffer, _properties?: Buffer, _unpackSize?: number): Buffer {
  return input;
}
