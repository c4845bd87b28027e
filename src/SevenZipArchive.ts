import fs from 'graceful-fs';
import path from 'path';
import ExtractWorker from './ExtractWorker.ts';
import { type ArchiveSource, BufferSource, FileSource, VolumeSource } from './sevenz/ArchiveSource.ts';
import { UnsafeEntryPathError, UseAfterCloseError } from './sevenz/errors.ts';
import type { ArchiveHeader } from './sevenz/headers.ts';
import { DEFAULT_ENTRY_NAME, type SevenZipEntry, SevenZipParser } from './sevenz/SevenZipParser.ts';
import { DirectorySink, FileSink, type Sink, SymlinkSink } from './sinks.ts';
import type { ArchiveInput, ArchiveOptions, ExtractOptions, ExtractReport } from './types.ts';

const FIRST_VOLUME = /\.001$/;

/**
 * Sibling volumes of `name.001`: `name.001`, `name.002`, ... while they exist.
 */
export function findVolumes(firstVolume: string): string[] {
  const base = firstVolume.replace(FIRST_VOLUME, '');
  const volumes: string[] = [];
  for (let i = 1; i <= 999; i++) {
    const volumePath = `${base}.${String(i).padStart(3, '0')}`;
    if (!fs.existsSync(volumePath)) break;
    volumes.push(volumePath);
  }
  return volumes;
}

/**
 * Name for unnamed entries: the archive file name without `.001` and `.7z`.
 */
export function defaultEntryName(archivePath: string): string {
  const stem = path.basename(archivePath).replace(FIRST_VOLUME, '').replace(/\.7z$/i, '');
  return stem || DEFAULT_ENTRY_NAME;
}

/**
 * Resolve an entry name below `dest`, or undefined when it would land outside.
 */
export function resolveEntryPath(dest: string, name: string): string | undefined {
  const parts = name.split(/[\\/]+/).filter((part) => part.length > 0 && part !== '.');
  if (parts.length === 0 || path.isAbsolute(name) || /^[A-Za-z]:/.test(name)) return undefined;

  const root = path.resolve(dest);
  const target = path.resolve(root, ...parts);
  const relative = path.relative(root, target);
  if (!relative || relative.split(path.sep)[0] === '..' || path.isAbsolute(relative)) return undefined;
  return target;
}

function openSource(input: ArchiveInput, options: ArchiveOptions): ArchiveSource {
  if (Buffer.isBuffer(input)) return new BufferSource(input);
  if (typeof input !== 'string') return input;

  const volumes = options.volumes || (FIRST_VOLUME.test(input) ? findVolumes(input) : []);
  if (volumes.length === 0) return FileSource.open(input);

  const sources: FileSource[] = [];
  try {
    for (let i = 0; i < volumes.length; i++) sources.push(FileSource.open(volumes[i]));
  } catch (err) {
    for (let i = 0; i < sources.length; i++) sources[i].close();
    throw err;
  }
  return new VolumeSource(sources);
}

/**
 * A 7z archive opened for listing and extraction.
 *
 * The archive owns its source until close(); every other call on a closed
 * archive throws UseAfterCloseError.
 */
export default class SevenZipArchive {
  readonly header: ArchiveHeader;
  private source: ArchiveSource | null;
  private list: SevenZipEntry[];

  private constructor(source: ArchiveSource, header: ArchiveHeader, entries: SevenZipEntry[]) {
    this.source = source;
    this.header = header;
    this.list = entries;
  }

  /**
   * Open an archive from a path (`.001` opens the whole volume set), a buffer or a source.
   * A source passed in is closed if parsing fails, and by close() otherwise.
   */
  static open(input: ArchiveInput, options: ArchiveOptions = {}): SevenZipArchive {
    const source = openSource(input, options);
    const defaultName = options.defaultName || (typeof input === 'string' ? defaultEntryName(input) : DEFAULT_ENTRY_NAME);
    try {
      const parsed = new SevenZipParser(source).parse(defaultName);
      return new SevenZipArchive(source, parsed.header, parsed.entries);
    } catch (err) {
      source.close();
      throw err;
    }
  }

  get closed(): boolean {
    return this.source === null;
  }

  listNames(): string[] {
    this.assertOpen('list names');
    return this.list.map((entry) => entry.name);
  }

  /**
   * Entries in header order. Each call starts a new pass.
   */
  *entries(): Generator<SevenZipEntry> {
    for (let i = 0; ; i++) {
      this.assertOpen('iterate entries');
      if (i >= this.list.length) return;
      yield this.list[i];
    }
  }

  getEntries(): SevenZipEntry[] {
    this.assertOpen('get entries');
    return this.list.slice();
  }

  /**
   * First entry stored under `name`.
   */
  getEntry(name: string): SevenZipEntry | undefined {
    this.assertOpen('get entry');
    for (let i = 0; i < this.list.length; i++) {
      if (this.list[i].name === name) return this.list[i];
    }
    return undefined;
  }

  /**
   * Write every entry below `dest`. Anti items are skipped; later entries
   * with the same name overwrite earlier ones. Links pointing outside `dest`
   * and entries below an existing link fail with UnsafeEntryPathError.
   */
  extractAll(dest: string, options: ExtractOptions = {}): ExtractReport {
    const source = this.assertOpen('extract');
    const worker = new ExtractWorker(this.list);
    const unsafe: ExtractReport['failures'] = [];

    for (let i = 0; i < this.list.length; i++) {
      const entry = this.list[i];
      if (entry.isAntiFile) continue;

      const target = resolveEntryPath(dest, entry.name);
      if (target === undefined) {
        unsafe.push({ fileId: entry.id, name: entry.name, error: new UnsafeEntryPathError(entry.name) });
        continue;
      }

      let sink: Sink;
      if (entry.type === 'directory') sink = new DirectorySink(target, dest);
      else if (entry.type === 'link') sink = new SymlinkSink(target, dest);
      else sink = new FileSink(target, { root: dest });
      worker.register(entry.id, sink);
    }

    const report = worker.extract(source, this.header.streamsInfo, options);
    if (unsafe.length > 0) {
      report.failures = unsafe.concat(report.failures);
    }
    return settle(report, options);
  }

  /**
   * Extract the registered files: a sink receives the bytes, null discards them.
   */
  extractSelected(targets: Map<number, Sink | null>, options: ExtractOptions = {}): ExtractReport {
    const source = this.assertOpen('extract');
    const worker = new ExtractWorker(this.list);
    targets.forEach((sink, fileId) => worker.register(fileId, sink));
    return settle(worker.extract(source, this.header.streamsInfo, options), options);
  }

  /**
   * Decode every folder and verify every checksum without writing anything.
   */
  test(options: ExtractOptions = {}): ExtractReport {
    const source = this.assertOpen('test');
    const worker = new ExtractWorker(this.list);
    for (let i = 0; i < this.list.length; i++) worker.register(this.list[i].id, null);
    return settle(worker.extract(source, this.header.streamsInfo, { chunkSize: options.chunkSize, verifyDiscarded: true }), options);
  }

  close(): void {
    if (!this.source) return;
    const source = this.source;
    this.source = null;
    source.close();
  }

  private assertOpen(operation: string): ArchiveSource {
    if (!this.source) throw new UseAfterCloseError(operation);
    return this.source;
  }
}

function settle(report: ExtractReport, options: ExtractOptions): ExtractReport {
  if (options.throwOnError !== false && report.failures.length > 0) throw report.failures[0].error;
  return report;
}
