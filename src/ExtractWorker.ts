/**
 * ExtractWorker - decodes the folders needed by a set of registered files
 *
 * Each folder is read and decoded once; its output is split into substreams
 * and every registered file receives its bytes, followed by end() or abort().
 */

import type { ArchiveSource } from './sevenz/ArchiveSource.ts';
import { ChecksumMismatchError, MalformedHeaderError, TruncatedDataError, UnknownEntryError } from './sevenz/errors.ts';
import { readFolder } from './sevenz/FolderDecoder.ts';
import type { StreamsInfo } from './sevenz/headers.ts';
import type { SevenZipEntry } from './sevenz/SevenZipParser.ts';
import { getFolderSubStreams, SubStreamSplitter } from './sevenz/SubStreamSplitter.ts';
import type { Sink } from './sinks.ts';
import type { ExtractFailure, ExtractReport, WorkerOptions } from './types.ts';

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

// null registers a discard: the bytes are dropped (and verified with verifyDiscarded)
type Registration = Sink | null;

export default class ExtractWorker {
  private entries: SevenZipEntry[];
  private targets: Map<number, Registration> = new Map();

  constructor(entries: SevenZipEntry[]) {
    this.entries = entries;
  }

  register(fileId: number, sink: Registration): void {
    if (!Number.isInteger(fileId) || fileId < 0 || fileId >= this.entries.length) {
      throw new UnknownEntryError(fileId);
    }
    this.targets.set(fileId, sink);
  }

  extract(source: ArchiveSource, streamsInfo: StreamsInfo | undefined, options: WorkerOptions = {}): ExtractReport {
    const report: ExtractReport = { extracted: [], failures: [], skipped: [] };
    const chunkSize = options.chunkSize && options.chunkSize > 0 ? options.chunkSize : DEFAULT_CHUNK_SIZE;

    // Registered files grouped by folder; files without data end right away
    const byFolder = new Map<number, number[]>();
    this.targets.forEach((sink, fileId) => {
      const entry = this.entries[fileId];
      if (entry.folderIndex < 0) {
        if (!sink) {
          report.extracted.push(fileId);
          return;
        }
        this.settle(report, entry, () => sink.end());
        return;
      }
      const ids = byFolder.get(entry.folderIndex);
      ids ? ids.push(fileId) : byFolder.set(entry.folderIndex, [fileId]);
    });

    const folders = Array.from(byFolder.keys()).sort((a, b) => a - b);
    for (let i = 0; i < folders.length; i++) {
      const fileIds = byFolder.get(folders[i]) || [];
      const needed = options.verifyDiscarded || fileIds.some((id) => this.targets.get(id));
      if (!needed) {
        for (let j = 0; j < fileIds.length; j++) report.skipped.push(fileIds[j]);
        continue;
      }
      if (!streamsInfo) {
        throw new MalformedHeaderError('Entries reference folders but the archive has no streams');
      }
      this.extractFolder(source, streamsInfo, folders[i], fileIds, chunkSize, report);
    }

    report.extracted.sort((a, b) => a - b);
    report.skipped.sort((a, b) => a - b);
    return report;
  }

  private extractFolder(source: ArchiveSource, info: StreamsInfo, folderIndex: number, fileIds: number[], chunkSize: number, report: ExtractReport): void {
    let data: Buffer;
    try {
      data = readFolder(source, info, folderIndex);
    } catch (err) {
      const error = toError(err);
      for (let i = 0; i < fileIds.length; i++) this.fail(report, this.entries[fileIds[i]], error);
      return;
    }

    // Splitter range index -> file id
    const ranges = getFolderSubStreams(info, folderIndex);
    const owners: (number | undefined)[] = [];
    for (let i = 0; i < fileIds.length; i++) {
      const entry = this.entries[fileIds[i]];
      owners[entry.streamIndexInFolder] = entry.id;
    }
    const failed = new Set<number>();

    const splitter = new SubStreamSplitter(ranges, {
      onData: (index, chunk) => {
        const fileId = owners[index];
        if (fileId === undefined || failed.has(fileId)) return;
        const sink = this.targets.get(fileId);
        if (!sink) return;
        try {
          sink.write(chunk);
        } catch (err) {
          failed.add(fileId);
          this.fail(report, this.entries[fileId], toError(err));
        }
      },
      onComplete: (index, crc, expectedCrc) => {
        const fileId = owners[index];
        if (fileId === undefined || failed.has(fileId)) return;
        const entry = this.entries[fileId];
        const sink = this.targets.get(fileId);
        if (expectedCrc !== undefined && crc !== expectedCrc) {
          failed.add(fileId);
          if (sink) this.finish(report, entry, sink);
          report.failures.push({ fileId: fileId, name: entry.name, error: new ChecksumMismatchError(fileId, entry.name, expectedCrc, crc) });
          return;
        }
        if (!sink) {
          report.extracted.push(fileId);
          return;
        }
        this.settle(report, entry, () => sink.end());
      },
    });

    try {
      for (let offset = 0; offset < data.length; offset += chunkSize) {
        splitter.write(data.subarray(offset, Math.min(offset + chunkSize, data.length)));
      }
      splitter.end();
    } catch (err) {
      if (!(err instanceof TruncatedDataError)) throw err;
      for (let i = 0; i < fileIds.length; i++) {
        const entry = this.entries[fileIds[i]];
        if (!failed.has(entry.id) && !splitter.isComplete(entry.streamIndexInFolder)) this.fail(report, entry, err);
      }
    }
  }

  // Run a sink's end(); a throw becomes the file's failure
  private settle(report: ExtractReport, entry: SevenZipEntry, end: () => void): void {
    try {
      end();
      report.extracted.push(entry.id);
    } catch (err) {
      report.failures.push({ fileId: entry.id, name: entry.name, error: toError(err) });
    }
  }

  // End a sink whose content is already known to be bad; its own error is secondary
  private finish(report: ExtractReport, entry: SevenZipEntry, sink: Sink): void {
    try {
      sink.end();
    } catch (err) {
      report.failures.push({ fileId: entry.id, name: entry.name, error: toError(err) });
    }
  }

  private fail(report: ExtractReport, entry: SevenZipEntry, error: Error): void {
    const failure: ExtractFailure = { fileId: entry.id, name: entry.name, error: error };
    report.failures.push(failure);
    const sink = this.targets.get(entry.id);
    if (sink && sink.abort) {
      try {
        sink.abort(error);
      } catch (abortErr) {
        report.failures.push({ fileId: entry.id, name: entry.name, error: toError(abortErr) });
      }
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
