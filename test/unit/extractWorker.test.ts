import assert from 'assert';
import { crc32 } from 'extract-base-iterator';
import ExtractWorker from '../../src/ExtractWorker.ts';
import { type ArchiveSource, BufferSource } from '../../src/sevenz/ArchiveSource.ts';
import { ErrorCode } from '../../src/sevenz/constants.ts';
import { ChecksumMismatchError, UnknownEntryError } from '../../src/sevenz/errors.ts';
import { SevenZipParser } from '../../src/sevenz/SevenZipParser.ts';
import { BufferSink, type Sink } from '../../src/sinks.ts';
import { type BuildOptions, buildArchive, type TestFile } from '../lib/buildArchive.ts';

var FILES: TestFile[] = [
  { name: 'a.txt', data: 'alpha' },
  { name: 'b.txt', data: 'beta' },
  { name: 'c.txt', data: 'gamma' },
];

function open(files: TestFile[], options: BuildOptions = {}) {
  var source = new BufferSource(buildArchive(files, options));
  var parsed = new SevenZipParser(source).parse();
  return { source: source, header: parsed.header, worker: new ExtractWorker(parsed.entries) };
}

describe('ExtractWorker', () => {
  it('should extract only the registered file', () => {
    var archive = open(FILES);
    var sink = new BufferSink();
    archive.worker.register(1, sink);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);
    assert.deepEqual(report, { extracted: [1], failures: [], skipped: [] });
    assert.equal(sink.toString(), 'beta');
    assert.equal(sink.ended, true);
  });

  it('should read only the pack streams of registered folders', () => {
    var archive = open(FILES);
    var reads: number[][] = [];
    var recording: ArchiveSource = {
      read: (position, length) => {
        reads.push([position, length]);
        return archive.source.read(position, length);
      },
      getSize: () => archive.source.getSize(),
      close: () => {},
    };
    archive.worker.register(1, new BufferSink());
    archive.worker.register(2, null);
    archive.worker.extract(recording, archive.header.streamsInfo);
    // signature header, then 'alpha' (5 bytes), then 'beta'
    assert.deepEqual(reads, [[37, 4]]);
  });

  it('should split a solid folder between files', () => {
    var archive = open(FILES, { solid: true });
    var sinks = [new BufferSink(), new BufferSink(), new BufferSink()];
    for (var i = 0; i < sinks.length; i++) archive.worker.register(i, sinks[i]);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo, { chunkSize: 3 });
    assert.deepEqual(report.extracted, [0, 1, 2]);
    assert.deepEqual(
      sinks.map((sink) => sink.toString()),
      ['alpha', 'beta', 'gamma']
    );
  });

  it('should skip folders holding only discards', () => {
    var archive = open(FILES);
    archive.worker.register(0, null);
    archive.worker.register(2, null);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);
    assert.deepEqual(report, { extracted: [], failures: [], skipped: [0, 2] });
  });

  it('should verify discards sharing a folder with a sink', () => {
    var archive = open(FILES, { solid: true, badCrcs: [0] });
    var sink = new BufferSink();
    archive.worker.register(0, null);
    archive.worker.register(1, sink);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);
    assert.deepEqual(report.extracted, [1]);
    assert.equal(report.failures.length, 1);
    assert.equal(report.failures[0].fileId, 0);
    assert.ok(report.failures[0].error instanceof ChecksumMismatchError);
    assert.equal(sink.toString(), 'beta');
  });

  it('should decode discards when asked to verify them', () => {
    var archive = open(FILES, { badCrcs: [2] });
    for (var i = 0; i < 3; i++) archive.worker.register(i, null);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo, { verifyDiscarded: true });
    assert.deepEqual(report.extracted, [0, 1]);
    assert.deepEqual(report.skipped, []);
    assert.equal(report.failures.length, 1);
    assert.equal(report.failures[0].name, 'c.txt');
  });

  it('should report a CRC mismatch and still end the sink', () => {
    var archive = open(FILES, { badCrcs: [0] });
    var bad = new BufferSink();
    var good = new BufferSink();
    archive.worker.register(0, bad);
    archive.worker.register(1, good);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);

    assert.deepEqual(report.extracted, [1]);
    assert.equal(report.failures.length, 1);
    var error = report.failures[0].error;
    assert.ok(error instanceof ChecksumMismatchError);
    if (!(error instanceof ChecksumMismatchError)) return;
    var actual = crc32(Buffer.from('alpha'));
    assert.equal(error.fileId, 0);
    assert.equal(error.actual, actual);
    assert.equal(error.expected, (actual ^ 1) >>> 0);
    assert.equal(bad.ended, true);
    assert.equal(bad.error, null);
    assert.equal(good.toString(), 'beta');
  });

  it('should end entries without data', () => {
    var archive = open([
      { name: 'dir', directory: true },
      { name: 'empty.txt', data: '' },
    ]);
    assert.equal(archive.header.streamsInfo, undefined);
    var dir = new BufferSink();
    var empty = new BufferSink();
    archive.worker.register(0, dir);
    archive.worker.register(1, empty);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);
    assert.deepEqual(report, { extracted: [0, 1], failures: [], skipped: [] });
    assert.equal(dir.ended, true);
    assert.equal(empty.toBuffer().length, 0);
  });

  it('should abort a file whose sink fails to write', () => {
    var archive = open(FILES, { solid: true });
    var aborted: Error[] = [];
    var failing: Sink = {
      write: () => {
        throw new Error('disk full');
      },
      end: () => assert.fail('end should not be called'),
      abort: (err) => {
        aborted.push(err);
      },
    };
    var after = new BufferSink();
    archive.worker.register(0, failing);
    archive.worker.register(1, after);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo, { chunkSize: 2 });

    assert.deepEqual(report.extracted, [1]);
    assert.equal(report.failures.length, 1);
    assert.equal(report.failures[0].error.message, 'disk full');
    assert.equal(aborted.length, 1);
    assert.equal(after.toString(), 'beta');
  });

  it('should reject unknown file ids', () => {
    var archive = open(FILES);
    assert.throws(
      () => archive.worker.register(3, null),
      (err: unknown) => err instanceof UnknownEntryError && err.code === ErrorCode.UNKNOWN_ENTRY && err.fileId === 3 && err.message === 'No entry with id 3'
    );
    assert.throws(() => archive.worker.register(-1, null), UnknownEntryError);
    assert.throws(() => archive.worker.register(1.5, null), UnknownEntryError);
    var report = archive.worker.extract(archive.source, archive.header.streamsInfo);
    assert.deepEqual(report, { extracted: [], failures: [], skipped: [] });
  });
});
