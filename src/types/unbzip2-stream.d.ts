declare module 'unbzip2-stream/lib/bzip2.js' {
  interface Bzip2 {
    /**
     * Decode a complete bzip2 stream (BZh header included)
     * @param write - receives each decoded byte in order
     */
    simple(input: Buffer | Uint8Array, write: (byte: number) => void): void;
  }
  const bzip2: Bzip2;
  export = bzip2;
}
