// BCJ2 (x86) filter codec - branch/call/jump converter with four input streams
// Reference: LZMA SDK Bcj2.c
//
// Stream layout:
//   Stream 0: Main data (literals and branch opcodes)
//   Stream 1: CALL targets (for 0xE8), big-endian absolute addresses
//   Stream 2: JUMP targets (for 0xE9 and 0x0F 0x8x), big-endian absolute addresses
//   Stream 3: Range coder data (one decision per branch opcode)

import { allocBuffer } from 'extract-base-iterator';
import { DecompressionError } from '../errors.ts';

const kTopValue = 1 << 24;
const kNumBitModelTotalBits = 11;
const kBitModelTotal = 1 << kNumBitModelTotalBits;
const kNumMoveBits = 5;

// Probability models:
// 0-255: CALL (0xE8), indexed by the previous byte
// 256:   JMP (0xE9)
// 257:   conditional jumps (0x0F 0x80-0x8F)
const kNumProbs = 258;

interface RangeDecoder {
  range: number;
  code: number;
  stream: Buffer;
  pos: number;
}

function readRangeByte(rd: RangeDecoder): number {
  if (rd.pos >= rd.stream.length) {
    throw new DecompressionError('BCJ2 range coder stream is truncated');
  }
  return rd.stream[rd.pos++];
}

function initRangeDecoder(stream: Buffer): RangeDecoder {
  const rd: RangeDecoder = { range: 0xffffffff, code: 0, stream: stream, pos: 0 };
  for (let i = 0; i < 5; i++) {
    rd.code = ((rd.code << 8) | readRangeByte(rd)) >>> 0;
  }
  return rd;
}

function decodeBit(rd: RangeDecoder, probs: Uint16Array, index: number): number {
  const prob = probs[index];
  const bound = ((rd.range >>> kNumBitModelTotalBits) * prob) >>> 0;

  let bit: number;
  if (rd.code < bound) {
    rd.range = bound;
    probs[index] = prob + ((kBitModelTotal - prob) >>> kNumMoveBits);
    bit = 0;
  } else {
    rd.range = (rd.range - bound) >>> 0;
    rd.code = (rd.code - bound) >>> 0;
    probs[index] = prob - (prob >>> kNumMoveBits);
    bit = 1;
  }

  if (rd.range < kTopValue) {
    rd.range = (rd.range << 8) >>> 0;
    rd.code = ((rd.code << 8) | readRangeByte(rd)) >>> 0;
  }
  return bit;
}

function isBranch(prevByte: number, b: number): boolean {
  return (b & 0xfe) === 0xe8 || (prevByte === 0x0f && (b & 0xf0) === 0x80);
}

/**
 * Combine the four BCJ2 streams into exactly `unpackSize` bytes.
 */
export function decodeBcj2(inputs: Buffer[], _properties: Buffer | undefined, unpackSize: number): Buffer {
  if (inputs.length !== 4) {
    throw new DecompressionError(`BCJ2 requires 4 input streams, got ${inputs.length}`);
  }
  const [mainStream, callStream, jumpStream, rcStream] = inputs;

  const output = allocBuffer(unpackSize);
  const probs = new Uint16Array(kNumProbs).fill(kBitModelTotal >>> 1);
  const rd = initRangeDecoder(rcStream);

  let outPos = 0;
  let mainPos = 0;
  let callPos = 0;
  let jumpPos = 0;
  let prevByte = 0;

  while (outPos < unpackSize) {
    // Copy literals up to and including the next branch opcode
    let b = 0;
    let branch = false;
    while (outPos < unpackSize && mainPos < mainStream.length) {
      b = mainStream[mainPos++];
      output[outPos++] = b;
      if (isBranch(prevByte, b)) {
        branch = true;
        break;
      }
      prevByte = b;
    }
    if (!branch || outPos === unpackSize) break;

    const probIndex = b === 0xe8 ? prevByte : b === 0xe9 ? 256 : 257;
    if (decodeBit(rd, probs, probIndex) === 0) {
      prevByte = b;
      continue;
    }

    let src: number;
    if (b === 0xe8) {
      if (callPos + 4 > callStream.length) throw new DecompressionError('BCJ2 call stream is truncated');
      src = callStream.readUInt32BE(callPos);
      callPos += 4;
    } else {
      if (jumpPos + 4 > jumpStream.length) throw new DecompressionError('BCJ2 jump stream is truncated');
      src = jumpStream.readUInt32BE(jumpPos);
      jumpPos += 4;
    }

    // absolute target back to a displacement from the next instruction
    const dest = (src - (outPos + 4)) >>> 0;
    for (let i = 0; i < 4 && outPos < unpackSize; i++) {
      output[outPos++] = (dest >>> (8 * i)) & 0xff;
    }
    prevByte = dest >>> 24;
  }

  if (outPos !== unpackSize) {
    throw new DecompressionError(`BCJ2 main stream ended after ${outPos} of ${unpackSize} bytes`);
  }
  return output;
}
