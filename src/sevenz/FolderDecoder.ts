/**
 * FolderDecoder - runs a folder's coder graph over its pack streams
 *
 * Buffer-chain evaluation: each coder's output is materialized before the
 * coders consuming it run, in the graph's topological order.
 */

import { crc32 } from 'extract-base-iterator';
import type { ArchiveSource } from './ArchiveSource.ts';
import { buildCoderGraph } from './CoderGraph.ts';
import { getCodec } from './codecs/index.ts';
import { SIGNATURE_HEADER_SIZE } from './constants.ts';
import { DecompressionError, MalformedFolderError, SevenZipError, TruncatedDataError } from './errors.ts';
import type { Folder, StreamsInfo } from './headers.ts';

/**
 * Index of the first pack stream of each folder.
 */
export function getFolderPackStreamStarts(info: StreamsInfo): number[] {
  const starts: number[] = [];
  let next = 0;
  for (let i = 0; i < info.folders.length; i++) {
    starts.push(next);
    next += info.folders[i].packedStreams.length;
  }
  return starts;
}

/**
 * Absolute archive offset of each pack stream.
 * Pack streams are contiguous, starting `packPos` bytes after the signature header.
 */
export function getPackStreamOffsets(info: StreamsInfo): number[] {
  const offsets: number[] = [];
  let offset = SIGNATURE_HEADER_SIZE + info.packPos;
  for (let i = 0; i < info.packSizes.length; i++) {
    offsets.push(offset);
    offset += info.packSizes[i];
  }
  return offsets;
}

/**
 * Read the pack streams feeding one folder, in pack slot order.
 */
export function readFolderPackStreams(source: ArchiveSource, info: StreamsInfo, folderIndex: number): Buffer[] {
  const folder = info.folders[folderIndex];
  const first = getFolderPackStreamStarts(info)[folderIndex];
  const offsets = getPackStreamOffsets(info);

  const streams: Buffer[] = [];
  for (let slot = 0; slot < folder.packedStreams.length; slot++) {
    const packIndex = first + slot;
    if (packIndex >= info.packSizes.length) {
      throw new MalformedFolderError(`pack stream ${packIndex} is not declared`, folderIndex);
    }

    const size = info.packSizes[packIndex];
    const data = source.read(offsets[packIndex], size);
    if (data.length < size) {
      throw new TruncatedDataError(`Pack stream ${packIndex} truncated: ${data.length} of ${size} bytes`);
    }

    const expected = info.packCRCs ? info.packCRCs[packIndex] : undefined;
    if (expected !== undefined && crc32(data) !== expected) {
      throw new DecompressionError(`Pack stream ${packIndex} CRC mismatch`);
    }
    streams.push(data);
  }
  return streams;
}

/**
 * Check that every coder of the folder has a registered codec.
 * @throws UnsupportedCompressionMethodError naming the first missing method
 */
export function assertFolderSupported(folder: Folder): void {
  for (let i = 0; i < folder.coders.length; i++) getCodec(folder.coders[i].id);
}

/**
 * Decode a folder to its final output.
 *
 * @param packStreams - the folder's pack streams in pack slot order
 */
export function decodeFolder(folder: Folder, packStreams: Buffer[], folderIndex?: number): Buffer {
  assertFolderSupported(folder);
  const graph = buildCoderGraph(folder, folderIndex);

  if (packStreams.length !== folder.packedStreams.length) {
    throw new MalformedFolderError(`expected ${folder.packedStreams.length} pack streams, got ${packStreams.length}`, folderIndex);
  }

  const outputs: (Buffer | undefined)[] = [];

  for (let n = 0; n < graph.order.length; n++) {
    const coderIndex = graph.order[n];
    const coder = folder.coders[coderIndex];
    const codec = getCodec(coder.id);

    if ((codec.numInStreams || 1) !== coder.numInStreams || coder.numOutStreams !== 1) {
      throw new MalformedFolderError(`${codec.name} coder declares ${coder.numInStreams} inputs and ${coder.numOutStreams} outputs`, folderIndex);
    }

    const inputs: Buffer[] = [];
    for (let j = 0; j < coder.numInStreams; j++) {
      const source = graph.inputSources[graph.inStreamStart[coderIndex] + j];
      const input = source.type === 'pack' ? packStreams[source.slot] : outputs[source.outIndex];
      if (input === undefined) {
        throw new MalformedFolderError(`input ${j} of coder ${coderIndex} is not available`, folderIndex);
      }
      inputs.push(input);
    }

    const outIndex = graph.outStreamStart[coderIndex];
    const unpackSize = folder.unpackSizes[outIndex];
    if (unpackSize === undefined) {
      throw new MalformedFolderError(`no unpack size for output ${outIndex}`, folderIndex);
    }

    let output: Buffer;
    try {
      output = codec.decode(inputs, coder.properties, unpackSize);
    } catch (err) {
      if (err instanceof SevenZipError) throw err;
      throw new DecompressionError(`${codec.name} decoding failed: ${err instanceof Error ? err.message : String(err)}`, err);
    }

    if (output.length !== unpackSize) {
      throw new DecompressionError(`${codec.name} produced ${output.length} bytes, expected ${unpackSize}`);
    }
    outputs[outIndex] = output;
  }

  const result = outputs[graph.finalOutput];
  if (result === undefined) {
    throw new MalformedFolderError('final output was not produced', folderIndex);
  }
  return result;
}

/**
 * Read and decode one folder of the archive.
 * The unpacked CRC is left to the caller: per-file checks report which file is damaged.
 */
export function readFolder(source: ArchiveSource, info: StreamsInfo, folderIndex: number): Buffer {
  return decodeFolder(info.folders[folderIndex], readFolderPackStreams(source, info, folderIndex), folderIndex);
}
