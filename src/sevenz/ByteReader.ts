import { TruncatedDataError } from './errors.ts';
import { readBoolVector, readDefinedVector, readNumber } from './NumberCodec.ts';

/**
 * Forward-only cursor over an in-memory header buffer.
 * Every read past the end throws TruncatedDataError.
 */
export class ByteReader {
  readonly buffer: Buffer;
  offset: number;

  constructor(buffer: Buffer, offset = 0) {
    this.buffer = buffer;
    this.offset = offset;
  }

  remaining(): number {
    return this.buffer.length - this.offset;
  }

  private ensure(length: number, what: string): void {
    if (length < 0 || this.offset + length > this.buffer.length) {
      throw new TruncatedDataError(`Unexpected end of header reading ${what} at offset ${this.offset}`);
    }
  }

  readByte(): number {
    this.ensure(1, 'byte');
    return this.buffer[this.offset++];
  }

  readUInt32(): number {
    this.ensure(4, 'uint32');
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readBigUInt64(): bigint {
    this.ensure(8, 'uint64');
    const value = this.buffer.readBigUInt64LE(this.offset);
    this.offset += 8;
    return value;
  }

  readNumber(): number {
    const result = readNumber(this.buffer, this.offset);
    this.offset += result.bytesRead;
    return result.value;
  }

  readBytes(length: number): Buffer {
    this.ensure(length, `${length} bytes`);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readBoolVector(count: number): boolean[] {
    const result = readBoolVector(this.buffer, this.offset, count);
    this.offset += result.bytesRead;
    return result.values;
  }

  readDefinedVector(count: number): boolean[] {
    const result = readDefinedVector(this.buffer, this.offset, count);
    this.offset += result.bytesRead;
    return result.defined;
  }

  skip(length: number): void {
    this.ensure(length, `${length} skipped bytes`);
    this.offset += length;
  }
}
