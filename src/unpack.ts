import once from 'call-once-fn';
import SevenZipArchive from './SevenZipArchive.ts';
import type { ExtractReport, UnpackCallback, UnpackOptions } from './types.ts';

/**
 * Open, extract and close an archive off the caller's stack.
 * Errors reach the callback (or reject the promise) unchanged.
 */
export default function unpack(archivePath: string, dest: string, callback: UnpackCallback): void;
export default function unpack(archivePath: string, dest: string, options: UnpackOptions, callback: UnpackCallback): void;
export default function unpack(archivePath: string, dest: string, options?: UnpackOptions): Promise<ExtractReport>;
export default function unpack(archivePath: string, dest: string, options?: UnpackOptions | UnpackCallback, callback?: UnpackCallback): void | Promise<ExtractReport> {
  callback = typeof options === 'function' ? options : callback;
  const opts: UnpackOptions = typeof options === 'function' ? {} : options || {};

  if (typeof callback === 'function') {
    const done = once(callback);
    setImmediate(() => {
      let report: ExtractReport;
      try {
        report = run(archivePath, dest, opts);
      } catch (err) {
        return done(err instanceof Error ? err : new Error(String(err)));
      }
      done(null, report);
    });
    return;
  }

  return new Promise((resolve, reject) =>
    unpack(archivePath, dest, opts, (err?: Error | null, report?: ExtractReport) => {
      if (err) return reject(err);
      report ? resolve(report) : reject(new Error('Extraction finished without a report'));
    })
  );
}

function run(archivePath: string, dest: string, options: UnpackOptions): ExtractReport {
  const archive = SevenZipArchive.open(archivePath, options);
  try {
    return archive.extractAll(dest, options);
  } finally {
    archive.close();
  }
}
