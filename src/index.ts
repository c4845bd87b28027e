export { default as ExtractWorker } from './ExtractWorker.ts';
export { default, defaultEntryName, findVolumes, resolveEntryPath } from './SevenZipArchive.ts';
export { type ArchiveSource, BufferSource, FileSource, VolumeSource } from './sevenz/ArchiveSource.ts';
export { getCodecName, isCodecSupported, registerCodec, type Codec } from './sevenz/codecs/index.ts';
export { ErrorCode, type ErrorCodeValue } from './sevenz/constants.ts';
export * from './sevenz/errors.ts';
export type { ArchiveHeader, FileInfo, Folder, StreamsInfo } from './sevenz/headers.ts';
export { DEFAULT_ENTRY_NAME, type EntryType, filetimeToDate, type SevenZipEntry, SevenZipParser } from './sevenz/SevenZipParser.ts';
export { assertNoLinkedParent, BufferSink, createDiscardSink, DirectorySink, FileSink, type FileSinkOptions, type Sink, SymlinkSink } from './sinks.ts';
export * from './types.ts';
export { default as unpack } from './unpack.ts';
