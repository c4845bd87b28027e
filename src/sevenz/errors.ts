import { ErrorCode, type ErrorCodeValue } from './constants.ts';

/** Base class for every error raised while reading a 7z archive. */
export class SevenZipError extends Error {
  /** Machine-readable error code. */
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'SevenZipError';
    this.code = code;
  }
}

/** Bad signature, unsupported format version, or start/next header CRC mismatch. */
export class NotA7zArchiveError extends SevenZipError {
  constructor(message: string, code: ErrorCodeValue = ErrorCode.INVALID_SIGNATURE) {
    super(code, message);
    this.name = 'NotA7zArchiveError';
  }
}

/** The source ended in the middle of a structure. */
export class TruncatedDataError extends SevenZipError {
  constructor(message: string) {
    super(ErrorCode.TRUNCATED_ARCHIVE, message);
    this.name = 'TruncatedDataError';
  }
}

export class MalformedHeaderError extends SevenZipError {
  constructor(message: string) {
    super(ErrorCode.CORRUPT_HEADER, message);
    this.name = 'MalformedHeaderError';
  }
}

/** A folder's coder graph cannot be evaluated. */
export class MalformedFolderError extends SevenZipError {
  readonly folderIndex?: number;

  constructor(message: string, folderIndex?: number) {
    super(ErrorCode.MALFORMED_FOLDER, folderIndex === undefined ? message : `Folder ${folderIndex}: ${message}`);
    this.name = 'MalformedFolderError';
    this.folderIndex = folderIndex;
  }
}

/** The header is stored through a coder chain this library cannot decode (encrypted headers included). */
export class UnsupportedHeaderEncodingError extends SevenZipError {
  readonly methodId?: string;

  constructor(message: string, methodId?: string, cause?: unknown) {
    super(ErrorCode.COMPRESSED_HEADER, message, { cause: cause });
    this.name = 'UnsupportedHeaderEncodingError';
    this.methodId = methodId;
  }
}

export class UnsupportedCompressionMethodError extends SevenZipError {
  /** Method id as upper-case hex bytes joined by '-', e.g. `3-4-1` */
  readonly methodId: string;
  readonly methodName: string;

  constructor(methodId: string, methodName: string) {
    super(ErrorCode.UNSUPPORTED_CODEC, `Unsupported compression method: ${methodName} (${methodId})`);
    this.name = 'UnsupportedCompressionMethodError';
    this.methodId = methodId;
    this.methodName = methodName;
  }
}

export class DecompressionError extends SevenZipError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.DECOMPRESSION_FAILED, message, { cause: cause });
    this.name = 'DecompressionError';
  }
}

export class ChecksumMismatchError extends SevenZipError {
  readonly fileId: number;
  readonly path: string;
  readonly expected: number;
  readonly actual: number;

  constructor(fileId: number, path: string, expected: number, actual: number) {
    super(ErrorCode.CRC_MISMATCH, `CRC mismatch for ${path}: expected ${hex32(expected)}, got ${hex32(actual)}`);
    this.name = 'ChecksumMismatchError';
    this.fileId = fileId;
    this.path = path;
    this.expected = expected;
    this.actual = actual;
  }
}

export class UseAfterCloseError extends SevenZipError {
  constructor(operation: string) {
    super(ErrorCode.ARCHIVE_CLOSED, `Cannot ${operation}: archive is closed`);
    this.name = 'UseAfterCloseError';
  }
}

/** An entry name resolves outside the extraction directory. */
export class UnsafeEntryPathError extends SevenZipError {
  readonly path: string;

  constructor(path: string) {
    super(ErrorCode.UNSAFE_PATH, `Entry path escapes the destination directory: ${path}`);
    this.name = 'UnsafeEntryPathError';
    this.path = path;
  }
}

/** A file id that is not in the archive's entry list. */
export class UnknownEntryError extends SevenZipError {
  readonly fileId: number;

  constructor(fileId: number) {
    super(ErrorCode.UNKNOWN_ENTRY, `No entry with id ${fileId}`);
    this.name = 'UnknownEntryError';
    this.fileId = fileId;
  }
}

function hex32(value: number): string {
  return (value >>> 0).toString(16).padStart(8, '0');
}
