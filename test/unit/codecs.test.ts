import assert from 'assert';
import { bufferFrom } from 'extract-base-iterator';
import zlib from 'zlib';
import { decodeBcj2 } from '../../src/sevenz/codecs/Bcj2.ts';
import { codecIdToKey, getCodec, getCodecName, isCodecSupported, registerCodec } from '../../src/sevenz/codecs/index.ts';
import { CodecId } from '../../src/sevenz/constants.ts';
import { DecompressionError, MalformedFolderError, UnsupportedCompressionMethodError } from '../../src/sevenz/errors.ts';
import { decodeFolder } from '../../src/sevenz/FolderDecoder.ts';
import type { Coder, Folder } from '../../src/sevenz/headers.ts';

function coder(id: number[], properties?: Buffer, numInStreams = 1): Coder {
  return { id: id, numInStreams: numInStreams, numOutStreams: 1, properties: properties };
}

function single(id: number[], size: number, properties?: Buffer): Folder {
  return { coders: [coder(id, properties)], bindPairs: [], packedStreams: [0], unpackSizes: [size] };
}

// Test-only codec: concatenates its two inputs
var CONCAT_ID = [0x7f, 0x7f, 0x01];
registerCodec(CONCAT_ID, {
  name: 'Concat',
  numInStreams: 2,
  decode: (inputs) => Buffer.concat(inputs),
});
var THROWING_ID = [0x7f, 0x7f, 0x02];
registerCodec(THROWING_ID, {
  name: 'Throwing',
  decode: () => {
    throw new RangeError('bad input');
  },
});

describe('codec registry', () => {
  it('should key method ids as upper-case hex', () => {
    assert.equal(codecIdToKey(CodecId.LZMA), '3-1-1');
    assert.equal(codecIdToKey(CodecId.AES), '6-F1-7-1');
  });

  it('should know supported and recognised methods', () => {
    assert.equal(isCodecSupported(CodecId.LZMA2), true);
    assert.equal(isCodecSupported(CodecId.BCJ2), true);
    assert.equal(isCodecSupported(CodecId.PPMD), false);
    assert.equal(isCodecSupported(CodecId.AES), false);
    assert.equal(getCodecName(CodecId.LZMA), 'LZMA');
    assert.equal(getCodecName(CodecId.PPMD), 'PPMd');
    assert.equal(getCodecName([0x09, 0x09]), 'Unknown (9-9)');
  });

  it('should throw a typed error for unsupported methods', () => {
    assert.throws(
      () => getCodec(CodecId.PPMD),
      (err: unknown) => err instanceof UnsupportedCompressionMethodError && err.methodId === '3-4-1' && err.methodName === 'PPMd' && err.message === 'Unsupported compression method: PPMd (3-4-1)'
    );
  });
});

describe('decodeFolder', () => {
  it('should pass stored data through Copy', () => {
    var data = bufferFrom('stored bytes', 'utf8');
    assert.equal(decodeFolder(single(CodecId.COPY, data.length), [data]).toString('utf8'), 'stored bytes');
  });

  it('should inflate Deflate data', () => {
    var text = 'deflate deflate deflate deflate';
    var packed = zlib.deflateRawSync(Buffer.from(text, 'utf8'));
    assert.equal(decodeFolder(single(CodecId.DEFLATE, text.length), [packed]).toString('utf8'), text);
  });

  it('should undo the Delta filter', () => {
    var output = decodeFolder(single(CodecId.DELTA, 4, bufferFrom([0x00])), [bufferFrom([1, 1, 1, 1])]);
    assert.deepEqual(Array.from(output), [1, 2, 3, 4]);
  });

  it('should run chained coders in graph order', () => {
    // coder 0 reads the output of coder 1
    var folder: Folder = {
      coders: [coder(CodecId.COPY), coder(CodecId.COPY)],
      bindPairs: [{ inIndex: 0, outIndex: 1 }],
      packedStreams: [1],
      unpackSizes: [3, 3],
    };
    assert.equal(decodeFolder(folder, [bufferFrom('abc', 'utf8')]).toString('utf8'), 'abc');
  });

  it('should route several pack streams to a multi-input coder', () => {
    var folder: Folder = { coders: [coder(CONCAT_ID, undefined, 2)], bindPairs: [], packedStreams: [1, 0], unpackSizes: [6] };
    // pack slot 0 feeds input 1, slot 1 feeds input 0
    assert.equal(decodeFolder(folder, [bufferFrom('def', 'utf8'), bufferFrom('abc', 'utf8')]).toString('utf8'), 'abcdef');
  });

  it('should reject an output of the wrong size', () => {
    assert.throws(() => decodeFolder(single(CodecId.COPY, 10), [bufferFrom('short', 'utf8')]), (err: unknown) => err instanceof DecompressionError && err.message === 'Copy produced 5 bytes, expected 10');
  });

  it('should wrap codec library errors', () => {
    assert.throws(
      () => decodeFolder(single(THROWING_ID, 1), [bufferFrom([0])]),
      (err: unknown) => err instanceof DecompressionError && err.message === 'Throwing decoding failed: bad input' && err.cause instanceof RangeError
    );
  });

  it('should reject a coder whose stream counts disagree with its codec', () => {
    var folder: Folder = { coders: [coder(CodecId.COPY, undefined, 2)], bindPairs: [], packedStreams: [0, 1], unpackSizes: [2] };
    assert.throws(() => decodeFolder(folder, [bufferFrom([1]), bufferFrom([2])], 0), MalformedFolderError);
  });

  it('should check every coder before decoding', () => {
    var folder: Folder = {
      coders: [coder(CodecId.COPY), coder(CodecId.PPMD)],
      bindPairs: [{ inIndex: 0, outIndex: 1 }],
      packedStreams: [1],
      unpackSizes: [3, 3],
    };
    assert.throws(() => decodeFolder(folder, [bufferFrom('abc', 'utf8')]), UnsupportedCompressionMethodError);
  });
});

describe('BCJ2', () => {
  var callStream = bufferFrom([0x00, 0x00, 0x10, 0x00]);
  var empty = bufferFrom([]);

  it('should copy a branch opcode through when the range coder says no', () => {
    var output = decodeBcj2([bufferFrom([0x90, 0xe8, 0x41]), callStream, empty, bufferFrom([0, 0, 0, 0, 0])], undefined, 3);
    assert.deepEqual(Array.from(output), [0x90, 0xe8, 0x41]);
  });

  it('should convert a CALL target back to a relative displacement', () => {
    // absolute 0x1000 from the end of the 4-byte operand at offset 2
    var output = decodeBcj2([bufferFrom([0x90, 0xe8]), callStream, empty, bufferFrom([0x00, 0xff, 0xff, 0xff, 0xff])], undefined, 6);
    assert.deepEqual(Array.from(output), [0x90, 0xe8, 0xfa, 0x0f, 0x00, 0x00]);
  });

  it('should fail when the main stream is short', () => {
    assert.throws(() => decodeBcj2([bufferFrom([0x90]), empty, empty, bufferFrom([0, 0, 0, 0, 0])], undefined, 4), DecompressionError);
  });

  it('should fail when the call stream is short', () => {
    assert.throws(() => decodeBcj2([bufferFrom([0xe8]), empty, empty, bufferFrom([0x00, 0xff, 0xff, 0xff, 0xff])], undefined, 5), DecompressionError);
  });

  it('should require four inputs', () => {
    assert.throws(() => decodeBcj2([empty], undefined, 0), DecompressionError);
  });
});
