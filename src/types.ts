import type { ArchiveSource } from './sevenz/ArchiveSource.ts';

export interface ArchiveOptions {
  /**
   * Volume paths in order, read back to back as one archive.
   * Found automatically when the path ends in `.001`.
   */
  volumes?: string[];
  /** Name for entries the header stores without one; defaults to the archive file stem */
  defaultName?: string;
}

export type ArchiveInput = string | Buffer | ArchiveSource;

export interface WorkerOptions {
  /** Decode and CRC-check folders whose files are all registered as discards */
  verifyDiscarded?: boolean;
  /** Bytes handed to the splitter per write (default 64 KiB) */
  chunkSize?: number;
}

export interface ExtractOptions extends WorkerOptions {
  /** When false, failures are only reported; otherwise the first one is thrown after every file is processed */
  throwOnError?: boolean;
}

export interface ExtractFailure {
  fileId: number;
  name: string;
  error: Error;
}

export interface ExtractReport {
  /** Ids of files delivered intact, ascending */
  extracted: number[];
  failures: ExtractFailure[];
  /** Ids registered as discards whose folder was not decoded */
  skipped: number[];
}

export type UnpackCallback = (err?: Error | null, report?: ExtractReport) => void;

export interface UnpackOptions extends ArchiveOptions, ExtractOptions {}
